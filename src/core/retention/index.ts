export * from './schedule';
export * from './retention-scheduler';
