export * from './pattern-cache';
export * from './link-expander';
export * from './link-filter-chain';
