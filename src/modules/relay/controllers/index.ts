export * from './health.controller';
export * from './filters.controller';
export * from './channels.controller';
export * from './settings.controller';
export * from './maintenance.controller';
export * from './query.controller';
export * from './stats.controller';
