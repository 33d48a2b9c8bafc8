import { Logger } from '@nestjs/common';
import { DuplicateCache } from '../../codes';
import { ProcessingOutcome } from '../../domain/enums';
import { StorageAdapter } from '../../interfaces';
import { StatsRecorder } from '../../stats';
import { PipelineStage, RelayContext, StageResult } from '../types';

/**
 * Stage 5: Commit
 * Records the identity and its codes, then bumps the forwarded counter.
 * The counter is best-effort: a failed stats write is logged only.
 */
export class CommitStage implements PipelineStage {
  name = 'commit';
  private readonly logger = new Logger(CommitStage.name);

  constructor(
    private readonly storageAdapter: StorageAdapter,
    private readonly cache: DuplicateCache,
    private readonly statsRecorder?: StatsRecorder,
  ) {}

  async execute(context: RelayContext): Promise<StageResult> {
    const { sourceId, messageId } = context.message;

    await this.storageAdapter.markProcessed(sourceId, messageId);
    await this.cache.record(context.codes);
    context.outcome = ProcessingOutcome.FORWARDED;

    if (this.statsRecorder) {
      try {
        await this.statsRecorder.increment();
      } catch (error) {
        this.logger.error(
          `Stats update failed after ${sourceId}:${messageId}: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    }

    return { success: true, context, shouldContinue: true };
  }
}
