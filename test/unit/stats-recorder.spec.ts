import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { StatsRecorder, ServiceStatus, readStatsFile } from '../../src';

describe('StatsRecorder', () => {
  let dir: string;
  let statsPath: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'relay-stats-'));
    statsPath = path.join(dir, 'stats.json');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function readFile(): unknown {
    return JSON.parse(fs.readFileSync(statsPath, 'utf8'));
  }

  describe('load', () => {
    it('should start fresh when the file is missing', async () => {
      const recorder = new StatsRecorder(statsPath);

      expect(await recorder.load()).toEqual({ messages: 0, status: ServiceStatus.STARTING });
      expect(fs.existsSync(statsPath)).toBe(false);
    });

    it('should reset the counter when the file cannot be parsed', async () => {
      fs.writeFileSync(statsPath, '{not json');
      const recorder = new StatsRecorder(statsPath);

      expect(await recorder.load()).toEqual({ messages: 0, status: ServiceStatus.RESET });
    });

    it('should restore a persisted snapshot', async () => {
      fs.writeFileSync(statsPath, JSON.stringify({ messages: 5, status: 'stopped' }));
      const recorder = new StatsRecorder(statsPath);

      expect(await recorder.load()).toEqual({ messages: 5, status: ServiceStatus.STOPPED });
    });
  });

  describe('writes', () => {
    it('should persist the whole snapshot on every change', async () => {
      fs.writeFileSync(statsPath, JSON.stringify({ messages: 5, status: 'stopped' }));
      const recorder = new StatsRecorder(statsPath);
      await recorder.load();

      await recorder.markRunning();
      expect(readFile()).toEqual({ messages: 5, status: 'running' });

      await recorder.increment();
      expect(readFile()).toEqual({ messages: 6, status: 'running' });

      await recorder.markStopped();
      expect(readFile()).toEqual({ messages: 6, status: 'stopped' });
      expect(recorder.snapshot()).toEqual({ messages: 6, status: ServiceStatus.STOPPED });
    });

    it('should not lose concurrent increments', async () => {
      const recorder = new StatsRecorder(statsPath);
      await recorder.load();

      await Promise.all(Array.from({ length: 10 }, () => recorder.increment()));

      expect(recorder.snapshot().messages).toBe(10);
      expect(readFile()).toEqual({ messages: 10, status: 'starting' });
    });

    it('should create the parent directory', async () => {
      const nested = path.join(dir, 'nested', 'deeper', 'stats.json');
      const recorder = new StatsRecorder(nested);

      await recorder.markRunning();

      expect(JSON.parse(fs.readFileSync(nested, 'utf8'))).toEqual({
        messages: 0,
        status: 'running',
      });
    });
  });
});

describe('readStatsFile', () => {
  let dir: string;
  let statsPath: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'relay-stats-'));
    statsPath = path.join(dir, 'stats.json');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should report unknown when the file is missing', async () => {
    expect(await readStatsFile(statsPath)).toEqual({ messages: 0, status: 'unknown' });
  });

  it('should report error when the file is unparsable', async () => {
    fs.writeFileSync(statsPath, 'garbage');
    expect(await readStatsFile(statsPath)).toEqual({ messages: 0, status: 'error' });
  });

  it('should report error for an invalid counter', async () => {
    fs.writeFileSync(statsPath, JSON.stringify({ messages: -1, status: 'running' }));
    expect(await readStatsFile(statsPath)).toEqual({ messages: 0, status: 'error' });
  });

  it('should map an unrecognized status to unknown', async () => {
    fs.writeFileSync(statsPath, JSON.stringify({ messages: 3, status: 'sleeping' }));
    expect(await readStatsFile(statsPath)).toEqual({ messages: 3, status: 'unknown' });
  });

  it('should return the persisted values', async () => {
    fs.writeFileSync(statsPath, JSON.stringify({ messages: 12, status: 'running' }));
    expect(await readStatsFile(statsPath)).toEqual({ messages: 12, status: 'running' });
  });
});
