export * from './stats-recorder';
