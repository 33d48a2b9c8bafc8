export * from './operation-lock';
export * from './delay';
export * from './timestamps';
