/**
 * Channel Relay
 *
 * Relays messages from a set of source chats to one destination chat,
 * rewriting links through an ordered filter chain and suppressing messages
 * whose codes were already forwarded.
 */
import 'reflect-metadata';

// Export all core components
export * from './core';

// Export testing utilities from _shared
export {
  MockMessageFactory,
  MessageScenarios,
  InMemorySettings,
} from './_shared/testing/mock-message-factory';
export type {
  MessageOptions,
  InMemorySettingsValues,
} from './_shared/testing/mock-message-factory';

// Export adapters
export * from './adapters/storage/mock';
export * from './adapters/storage/typeorm';
export * from './adapters/transport/mock';
export * from './adapters/transport/telegram';

// Export NestJS module, services and controllers
export * from './modules';

// Export configuration
export * from './config';
