export * from './settings-parsers';
export * from './env-file-settings';
export * from './source-chat-list';
