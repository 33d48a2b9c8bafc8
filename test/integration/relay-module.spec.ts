import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { BadRequestException, INestApplicationContext, NotFoundException } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import {
  RelayModule,
  RelayService,
  FiltersController,
  ChannelsController,
  SettingsController,
  MaintenanceController,
  StatsController,
  HealthController,
  MockStorageAdapter,
  MockTransportAdapter,
  MockMessageFactory,
  ProcessingOutcome,
  ProcessedMessage,
  subtractDays,
} from '../../src';

describe('RelayModule', () => {
  const SOURCE_A = -1001000000001;
  const SOURCE_B = -1001000000002;
  const UNKNOWN = -1001000000099;

  let dir: string;
  let settingsPath: string;
  let statsPath: string;
  let storage: MockStorageAdapter;
  let transport: MockTransportAdapter;
  let app: INestApplicationContext;

  beforeEach(async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'relay-module-'));
    settingsPath = path.join(dir, 'config', '.env');
    statsPath = path.join(dir, 'data', 'stats.json');
    storage = new MockStorageAdapter();
    transport = new MockTransportAdapter();

    app = await NestFactory.createApplicationContext(
      RelayModule.forRoot({
        storage: { type: 'custom', adapter: storage },
        transport: { type: 'custom', adapter: transport },
        sourceChats: [SOURCE_A, SOURCE_B],
        settingsPath,
        statsPath,
        admin: { password: 'test-secret' },
        linkExpansion: { expander: { expand: async (url) => url } },
      }),
      { logger: false },
    );
    await app.init();
  });

  afterEach(async () => {
    await app.close();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function readStats(): unknown {
    return JSON.parse(fs.readFileSync(statsPath, 'utf8'));
  }

  describe('Lifecycle', () => {
    it('should start receiving and mark the service running', () => {
      expect(transport.isStarted).toBe(true);
      expect(app.get(RelayService).isReceiving()).toBe(true);
      expect(readStats()).toEqual({ messages: 0, status: 'running' });
    });

    it('should forward messages pushed by the transport', async () => {
      await transport.emit(MockMessageFactory.text('Deal SAVE2024', { sourceId: SOURCE_A, messageId: 1 }));
      await transport.emit(MockMessageFactory.text('save2024 again', { sourceId: SOURCE_B, messageId: 7 }));

      expect(transport.getDeliveries()).toEqual([{ text: 'Deal SAVE2024', silent: true }]);
      expect(readStats()).toEqual({ messages: 1, status: 'running' });
    });

    it('should stop the transport and write the final status on close', async () => {
      await app.close();

      expect(transport.isStarted).toBe(false);
      expect(readStats()).toEqual({ messages: 0, status: 'stopped' });

      // afterEach closes again
      app = await NestFactory.createApplicationContext(
        RelayModule.forRoot({
          storage: { type: 'mock' },
          transport: { type: 'mock' },
          sourceChats: [],
          settingsPath,
          statsPath,
          admin: { password: 'test-secret' },
          retention: { enabled: false },
          autoStart: false,
        }),
        { logger: false },
      );
      await app.init();
      expect(app.get(RelayService).isReceiving()).toBe(false);
    });
  });

  describe('Filters', () => {
    it('should manage the ordered chain', async () => {
      const filters = app.get(FiltersController);

      const first = await filters.create({ pattern: 'A', replacement: 'B' });
      const second = await filters.create({ pattern: 'B', replacement: 'C' });
      expect(first).toEqual({ id: 1, pattern: 'A', replacement: 'B', sortOrder: 1, linkExpansion: false });

      const moved = await filters.moveUp(second.id);
      expect(moved.map((rule) => rule.id)).toEqual([second.id, first.id]);

      const result = await app
        .get(RelayService)
        .processMessage(MockMessageFactory.text('A', { sourceId: SOURCE_A, messageId: 2 }));
      expect(result.filteredText).toBe('B');
    });

    it('should reject invalid patterns and unknown ids', async () => {
      const filters = app.get(FiltersController);

      await expect(filters.create({ pattern: '(' })).rejects.toBeInstanceOf(BadRequestException);
      await expect(filters.update(42, { pattern: 'x' })).rejects.toBeInstanceOf(NotFoundException);
      await expect(filters.remove(42)).rejects.toBeInstanceOf(NotFoundException);
      await expect(filters.moveDown(42)).rejects.toBeInstanceOf(NotFoundException);
    });
  });

  describe('Channels', () => {
    it('should list configured sources first, then unknown ones', async () => {
      await storage.markProcessed(UNKNOWN, 1);
      await storage.markProcessed(SOURCE_B, 1);
      await storage.markProcessed(SOURCE_B, 2);
      await storage.upsertChannelLabel(SOURCE_B, 'Second');

      expect(await app.get(ChannelsController).stats()).toEqual([
        { sourceId: SOURCE_A, name: '', messages: 0, configured: true },
        { sourceId: SOURCE_B, name: 'Second', messages: 2, configured: true },
        { sourceId: UNKNOWN, name: '', messages: 1, configured: false },
      ]);
    });

    it('should add a new source to the settings file', async () => {
      const channels = app.get(ChannelsController);

      await channels.upsert(UNKNOWN, { name: '  New source  ' });

      expect(fs.readFileSync(settingsPath, 'utf8')).toBe(
        `SOURCE_CHATS=${SOURCE_A},${SOURCE_B},${UNKNOWN}\n`,
      );
      const stats = await channels.stats();
      expect(stats[2]).toEqual({ sourceId: UNKNOWN, name: 'New source', messages: 0, configured: true });
    });
  });

  describe('Settings', () => {
    it('should apply a new duplicate-code pattern to the next message', async () => {
      await app.get(SettingsController).updateDuplicateCodes({ regex: 'id:(\\d+)' });

      const result = await app
        .get(RelayService)
        .processMessage(MockMessageFactory.text('item id:77 LONGWORD', { sourceId: SOURCE_A, messageId: 3 }));

      expect(result.codes).toEqual(['77']);
    });
  });

  describe('Maintenance', () => {
    it('should run a sweep on demand', async () => {
      storage.injectTestData({
        processed: [new ProcessedMessage(SOURCE_A, 1, subtractDays(new Date(), 45))],
      });

      const report = await app.get(MaintenanceController).cleanup();

      expect(report).toMatchObject({ retentionDays: 30, processedRemoved: 1, error: null });
    });

    it('should clear processed identities and codes', async () => {
      await storage.markProcessed(SOURCE_A, 1);
      await storage.recordCodes(['AAA111']);

      await app.get(MaintenanceController).clearState();

      expect(await storage.getStatistics()).toMatchObject({ processed: 0, duplicateCodes: 0 });
    });
  });

  describe('Stats and Health', () => {
    it('should report the stats file with store counts', async () => {
      await storage.markProcessed(SOURCE_A, 1);

      expect(await app.get(StatsController).stats()).toEqual({
        messages: 0,
        status: 'running',
        storage: { processed: 1, duplicateCodes: 0, filters: 0, channels: 0 },
      });
    });

    it('should report readiness', async () => {
      const health = app.get(HealthController);

      expect(health.health()).toEqual({ status: 'ok' });
      const ready = await health.readiness();
      expect(ready.status).toBe('ready');
      expect(ready.checks).toEqual({ database: true, transport: true });

      storage.failOperation('isHealthy');
      expect((await health.readiness()).status).toBe('not_ready');
    });
  });

  it('should classify a redelivery through the service', async () => {
    const relay = app.get(RelayService);
    const message = MockMessageFactory.text('Deal ONCE1234', { sourceId: SOURCE_A, messageId: 9 });

    expect((await relay.processMessage(message)).outcome).toBe(ProcessingOutcome.FORWARDED);
    expect((await relay.processMessage(message)).outcome).toBe(ProcessingOutcome.ALREADY_PROCESSED);
  });
});
