export * from './common.types';
export * from './storage.adapter';
export * from './message-transport.interface';
export * from './runtime-settings.interface';
