export * from './relay.service';
export * from './retention.service';
export * from './settings.service';
export * from './filter-rules.service';
export * from './channel-stats.service';
export * from './admin-query.service';
