/**
 * Relay NestJS Module
 *
 * Main module for running the relay inside a NestJS application
 */

// Main module
export { RelayModule } from './relay.module';

// Configuration
export type { RelayModuleConfig, RelayModuleAsyncConfig } from './relay.config';
export { defaultRelayConfig, mergeRelayConfig } from './relay.config';

// Injection tokens
export * from './constants';

// Controllers
export * from './controllers';

// Services
export * from './services';

// Decorators
export * from './decorators/admin.decorators';

// Guards and interceptors
export * from './guards';
export * from './interceptors';
