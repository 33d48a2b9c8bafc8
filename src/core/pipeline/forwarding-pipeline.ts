import { Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { DuplicateCache } from '../codes';
import { ProcessingOutcome } from '../domain/enums';
import { processedKey } from '../domain/models';
import { DeliveryError, PipelineError, toError } from '../errors';
import { InboundMessage } from '../interfaces';
import {
  PipelineConfig,
  PipelineStage,
  ProcessingMetrics,
  ProcessingResult,
  RelayContext,
} from './types';
import { IdentityDedupStage } from './stages/identity-dedup.stage';
import { LinkFilterStage } from './stages/link-filter.stage';
import { CodeDedupStage } from './stages/code-dedup.stage';
import { DeliveryStage } from './stages/delivery.stage';
import { CommitStage } from './stages/commit.stage';

/**
 * ForwardingPipeline orchestrates the relay of one inbound message
 *
 * Pipeline stages:
 * 1. Identity dedup - skip (source, message) pairs already decided
 * 2. Link filter - apply the ordered rewrite chain
 * 3. Code dedup - skip content already forwarded under another identity
 * 4. Delivery - silent send to the destination
 * 5. Commit - record identity and codes, bump the counter
 *
 * process() never rejects. Calls for the same identity are run one after
 * the other, so a concurrent duplicate sees the first one's commit.
 */
export class ForwardingPipeline {
  private readonly logger = new Logger(ForwardingPipeline.name);
  private readonly stages: PipelineStage[];
  private readonly logErrors: boolean;
  private readonly inFlight = new Map<string, Promise<ProcessingResult>>();
  private readonly outcomes = new Map<ProcessingOutcome, number>();

  constructor(private readonly config: PipelineConfig) {
    this.logErrors = config.logErrors ?? true;
    this.stages = this.initializeStages();
  }

  async process(message: InboundMessage): Promise<ProcessingResult> {
    const key = processedKey(message.sourceId, message.messageId);
    const previous: Promise<unknown> = this.inFlight.get(key) ?? Promise.resolve();

    const run = previous.then(
      () => this.execute(message),
      () => this.execute(message),
    );
    this.inFlight.set(key, run);

    try {
      return await run;
    } finally {
      if (this.inFlight.get(key) === run) {
        this.inFlight.delete(key);
      }
    }
  }

  /**
   * Run all stages for one message and classify the outcome
   */
  private async execute(message: InboundMessage): Promise<ProcessingResult> {
    const startTime = Date.now();
    const context: RelayContext = {
      message,
      receivedAt: message.receivedAt ?? new Date(),
      processingId: uuidv4(),
      startTime: new Date(startTime),
      codes: [],
      duplicateCodes: [],
      metadata: {},
    };

    const metrics: ProcessingMetrics = {
      totalDurationMs: 0,
      stageDurations: new Map(),
      filtered: false,
      delivered: false,
      committed: false,
    };

    try {
      await this.executePipeline(context, metrics);
    } catch (error) {
      const failure = error instanceof PipelineError && error.cause ? error.cause : toError(error);
      context.error = failure;
      context.outcome =
        failure instanceof DeliveryError
          ? ProcessingOutcome.DELIVERY_FAILED
          : ProcessingOutcome.STORE_ERROR;

      if (this.logErrors) {
        const label = failure instanceof DeliveryError ? 'Error forwarding' : 'Store error for';
        this.logger.error(
          `${label} ${message.sourceId}:${message.messageId}: ${failure.message}`,
        );
      }
    }

    const outcome = context.outcome ?? ProcessingOutcome.FORWARDED;
    metrics.totalDurationMs = Date.now() - startTime;
    this.outcomes.set(outcome, (this.outcomes.get(outcome) ?? 0) + 1);

    if (outcome === ProcessingOutcome.FORWARDED) {
      this.logger.log(`[OK] Forwarded ${message.sourceId}:${message.messageId}`);
    }

    await this.reportFate(context, outcome, metrics.totalDurationMs);

    return {
      success:
        outcome !== ProcessingOutcome.DELIVERY_FAILED &&
        outcome !== ProcessingOutcome.STORE_ERROR,
      processingId: context.processingId,
      outcome,
      filteredText: context.filteredText,
      codes: context.codes,
      duplicateCodes: context.duplicateCodes,
      receipt: context.receipt,
      error: context.error,
      metrics,
    };
  }

  /**
   * Execute the pipeline stages sequentially
   */
  private async executePipeline(
    context: RelayContext,
    metrics: ProcessingMetrics,
  ): Promise<void> {
    for (const stage of this.stages) {
      const stageStartTime = Date.now();

      try {
        const result = await stage.execute(context);
        metrics.stageDurations.set(stage.name, Date.now() - stageStartTime);
        this.updateMetrics(stage.name, result.success, metrics);

        if (!result.success && result.error) {
          throw result.error;
        }
        if (!result.shouldContinue) {
          break;
        }
      } catch (error) {
        metrics.stageDurations.set(stage.name, Date.now() - stageStartTime);

        throw new PipelineError(
          `Stage '${stage.name}' failed: ${error instanceof Error ? error.message : String(error)}`,
          stage.name,
          error instanceof Error ? error : undefined,
        );
      }
    }
  }

  /**
   * Initialize pipeline stages based on configuration
   */
  private initializeStages(): PipelineStage[] {
    const cache = new DuplicateCache(this.config.storageAdapter);

    return [
      new IdentityDedupStage(this.config.storageAdapter),
      new LinkFilterStage(this.config.linkFilterChain),
      new CodeDedupStage(this.config.codeExtractor, cache, this.config.storageAdapter),
      new DeliveryStage(this.config.transport),
      new CommitStage(this.config.storageAdapter, cache, this.config.statsRecorder),
    ];
  }

  private updateMetrics(
    stageName: string,
    success: boolean,
    metrics: ProcessingMetrics,
  ): void {
    if (!success) return;

    switch (stageName) {
      case 'link-filter':
        metrics.filtered = true;
        break;
      case 'delivery':
        metrics.delivered = true;
        break;
      case 'commit':
        metrics.committed = true;
        break;
    }
  }

  private async reportFate(
    context: RelayContext,
    outcome: ProcessingOutcome,
    latencyMs: number,
  ): Promise<void> {
    if (!this.config.hooks?.onMessageFate) {
      return;
    }

    try {
      await this.config.hooks.onMessageFate({
        sourceId: context.message.sourceId,
        messageId: context.message.messageId,
        outcome,
        latencyMs,
        codes: context.codes,
        error: context.error,
      });
    } catch (error) {
      this.logger.warn(
        `onMessageFate hook failed: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  /**
   * Get pipeline statistics
   */
  getStatistics(): {
    stages: string[];
    inFlight: number;
    outcomes: Record<string, number>;
  } {
    return {
      stages: this.stages.map((s) => s.name),
      inFlight: this.inFlight.size,
      outcomes: Object.fromEntries(this.outcomes),
    };
  }
}
