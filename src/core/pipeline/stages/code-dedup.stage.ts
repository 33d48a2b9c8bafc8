import { Logger } from '@nestjs/common';
import { CodeExtractor, DuplicateCache } from '../../codes';
import { ProcessingOutcome } from '../../domain/enums';
import { StorageAdapter } from '../../interfaces';
import { PipelineStage, RelayContext, StageResult } from '../types';

/**
 * Stage 3: Code dedup
 * Extracts codes from the filtered text. If any is already known the
 * message is a content duplicate: it is marked processed and not delivered.
 */
export class CodeDedupStage implements PipelineStage {
  name = 'code-dedup';
  private readonly logger = new Logger(CodeDedupStage.name);

  constructor(
    private readonly extractor: CodeExtractor,
    private readonly cache: DuplicateCache,
    private readonly storageAdapter: StorageAdapter,
  ) {}

  async execute(context: RelayContext): Promise<StageResult> {
    context.codes = this.extractor.extract(context.filteredText);
    if (context.codes.length === 0) {
      return { success: true, context, shouldContinue: true };
    }

    context.duplicateCodes = await this.cache.exists(context.codes);
    if (context.duplicateCodes.length === 0) {
      return { success: true, context, shouldContinue: true };
    }

    const { sourceId, messageId } = context.message;
    this.logger.log(
      `[SKIP] Duplicate codes ${[...context.duplicateCodes].sort().join(',')} in ${sourceId}:${messageId}`,
    );

    await this.storageAdapter.markProcessed(sourceId, messageId);
    context.outcome = ProcessingOutcome.DUPLICATE_CODE;

    return {
      success: true,
      context,
      shouldContinue: false,
      metadata: { duplicateCodes: context.duplicateCodes },
    };
  }
}
