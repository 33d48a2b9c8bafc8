/**
 * Relay processing pipeline
 *
 * 1. Identity dedup - (source, message) already decided
 * 2. Link filter - ordered rewrite chain
 * 3. Code dedup - content fingerprint already forwarded
 * 4. Delivery - silent send to the destination
 * 5. Commit - record identity, codes and counter
 */

// Main processor
export { ForwardingPipeline } from './forwarding-pipeline';

// Pipeline types
export * from './types';

// Individual stages (for testing or custom pipelines)
export { IdentityDedupStage } from './stages/identity-dedup.stage';
export { LinkFilterStage } from './stages/link-filter.stage';
export { CodeDedupStage } from './stages/code-dedup.stage';
export { DeliveryStage } from './stages/delivery.stage';
export { CommitStage } from './stages/commit.stage';
