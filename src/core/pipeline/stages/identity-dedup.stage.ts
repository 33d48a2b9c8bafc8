import { ProcessingOutcome } from '../../domain/enums';
import { StorageAdapter } from '../../interfaces';
import { PipelineStage, RelayContext, StageResult } from '../types';

/**
 * Stage 1: Identity dedup
 * A (source, message) pair that already has a final decision is a no-op
 */
export class IdentityDedupStage implements PipelineStage {
  name = 'identity-dedup';

  constructor(private readonly storageAdapter: StorageAdapter) {}

  async execute(context: RelayContext): Promise<StageResult> {
    const { sourceId, messageId } = context.message;
    const processed = await this.storageAdapter.isProcessed(sourceId, messageId);

    if (processed) {
      context.outcome = ProcessingOutcome.ALREADY_PROCESSED;
      return {
        success: true,
        context,
        shouldContinue: false,
        metadata: { isDuplicate: true },
      };
    }

    return { success: true, context, shouldContinue: true };
  }
}
