/**
 * Example: Using the relay as a local library
 *
 * Embeds the relay module in another NestJS application, and runs the
 * forwarding pipeline on its own with in-memory adapters.
 */

// app.module.ts
import { Module } from '@nestjs/common';
import {
  RelayModule,
  ForwardingPipeline,
  LinkFilterChain,
  CodeExtractor,
  MockStorageAdapter,
  MockTransportAdapter,
  MockMessageFactory,
  InMemorySettings,
  LINK_EXPANSION_SENTINEL,
} from '../src';

@Module({
  imports: [
    RelayModule.forRoot({
      storage: {
        type: 'typeorm',
        options: { database: 'data/state.db' },
      },
      transport: {
        type: 'telegram',
        telegram: {
          token: process.env.TELEGRAM_BOT_TOKEN ?? '',
          destinationChat: '@my_destination',
        },
      },
      sourceChats: [-1001000000001, -1001000000002],
      settingsPath: 'config/.env',
      statsPath: 'data/stats.json',
      admin: {
        password: process.env.ADMIN_PASSWORD ?? '',
      },
    }),
  ],
})
export class AppModule {}

// standalone pipeline
export async function runStandalone(): Promise<void> {
  const storage = new MockStorageAdapter();
  const transport = new MockTransportAdapter();
  const settings = new InMemorySettings();

  // Short links are expanded over the network, then tracking tags removed
  await storage.createFilter({ pattern: 'https?://amzn\\.to/\\S+', replacement: LINK_EXPANSION_SENTINEL });
  await storage.createFilter({ pattern: 'tag=[\\w-]+', replacement: 'tag=mine-21' });

  const pipeline = new ForwardingPipeline({
    storageAdapter: storage,
    transport,
    linkFilterChain: new LinkFilterChain(storage, {
      expand: async (url) => url,
    }),
    codeExtractor: new CodeExtractor(() => settings.getDuplicateCodePattern()),
  });

  const first = await pipeline.process(MockMessageFactory.text('Deal SAVE2024 https://example.com/?tag=other-20'));
  const second = await pipeline.process(MockMessageFactory.text('Again: save2024'));

  console.log(first.outcome, first.filteredText);
  console.log(second.outcome, second.duplicateCodes);
  console.log(transport.getDeliveries());
}
