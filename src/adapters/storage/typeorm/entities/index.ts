export * from './processed-message.entity';
export * from './channel-label.entity';
export * from './duplicate-code.entity';
export * from './filter-rule.entity';
export * from './utc-timestamp.transformer';
