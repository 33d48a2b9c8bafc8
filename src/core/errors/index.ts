export * from './relay.errors';
