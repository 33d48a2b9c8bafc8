export * from './filter-rule.model';
export * from './processed-message.model';
export * from './duplicate-code.model';
export * from './channel-label.model';
export * from './relay-stats.model';
