export * from './service-status.enum';
export * from './processing-outcome.enum';
export * from './retention-phase.enum';
