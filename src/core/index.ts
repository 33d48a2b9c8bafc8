/**
 * Relay core - message pipeline, filter chain, code dedup and retention
 * Storage and transport agnostic
 */

// Domain models
export * from './domain/models';
export * from './domain/enums';

// Interfaces and contracts
export * from './interfaces';
export * from './errors';
export * from './utils';

// Runtime settings
export * from './config';

// Link filter chain and duplicate codes
export * from './filters';
export * from './codes';

// Forwarding pipeline
export * from './pipeline';

// Background retention
export * from './retention';

// Stats
export * from './stats';
