import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  ChannelStatsService,
  EnvFileSettings,
  MockStorageAdapter,
  SourceChatList,
} from '../../src';

describe('ChannelStatsService', () => {
  const SOURCE_A = -1001000000001;
  const UNKNOWN = -1001000000009;

  let dir: string;
  let envPath: string;
  let storage: MockStorageAdapter;
  let sources: SourceChatList;
  let settings: EnvFileSettings;
  let service: ChannelStatsService;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'relay-channels-'));
    envPath = path.join(dir, '.env');
    storage = new MockStorageAdapter();
    sources = new SourceChatList([SOURCE_A]);
    settings = new EnvFileSettings(envPath);
    service = new ChannelStatsService(storage, sources, settings);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should persist a new source before relaying it', async () => {
    const label = await service.upsertSource(UNKNOWN, ' Deals ');

    expect(label.name).toBe('Deals');
    expect(fs.readFileSync(envPath, 'utf8')).toBe(`SOURCE_CHATS=${SOURCE_A},${UNKNOWN}\n`);
    expect(sources.list()).toEqual([SOURCE_A, UNKNOWN]);
  });

  it('should not relay a new source when the settings write fails', async () => {
    jest.spyOn(settings, 'update').mockRejectedValue(new Error('EACCES: permission denied'));

    await expect(service.upsertSource(UNKNOWN, 'Deals')).rejects.toThrow('EACCES: permission denied');

    expect(sources.has(UNKNOWN)).toBe(false);
    expect(sources.list()).toEqual([SOURCE_A]);
  });

  it('should only relabel a configured source', async () => {
    const update = jest.spyOn(settings, 'update');

    await service.upsertSource(SOURCE_A, 'First');

    expect(update).not.toHaveBeenCalled();
    expect(await storage.listChannelLabels()).toEqual([
      expect.objectContaining({ sourceId: SOURCE_A, name: 'First' }),
    ]);
  });
});
