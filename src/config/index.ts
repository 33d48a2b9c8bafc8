export * from './env.validation';
export * from './relay.configuration';
