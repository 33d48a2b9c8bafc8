import { Logger } from '@nestjs/common';
import { RetentionPhase } from '../domain/enums';
import { RuntimeSettings, StorageAdapter } from '../interfaces';
import { delay, subtractDays } from '../utils';
import { MIN_WAIT_SECONDS, secondsUntilNextRun } from './schedule';

export interface SweepReport {
  retentionDays: number;
  cutoff: Date | null;
  processedRemoved: number;
  codesRemoved: number;
  processedSweepSkipped: boolean;
  codesCleared: boolean;
  error?: Error;
}

export interface RetentionSchedulerOptions {
  /**
   * Sleep primitive; resolves false when interrupted
   */
  sleep?: (ms: number, signal: AbortSignal) => Promise<boolean>;
  clock?: () => Date;
}

/**
 * Background retention loop
 *
 *   WAIT  -> sleep until the configured time of day (>= 60 s)
 *   SWEEP -> purge old processed identities, clear the code cache
 *
 * Settings are read again at the start of each phase. A failed sweep is
 * logged and the loop goes back to WAIT.
 */
export class RetentionScheduler {
  private readonly logger = new Logger(RetentionScheduler.name);
  private readonly sleep: (ms: number, signal: AbortSignal) => Promise<boolean>;
  private readonly clock: () => Date;
  private phase: RetentionPhase = RetentionPhase.IDLE;
  private controller?: AbortController;
  private loop?: Promise<void>;
  private lastReport?: SweepReport;

  constructor(
    private readonly storage: StorageAdapter,
    private readonly settings: RuntimeSettings,
    options: RetentionSchedulerOptions = {},
  ) {
    this.sleep = options.sleep ?? delay;
    this.clock = options.clock ?? (() => new Date());
  }

  start(): void {
    if (this.loop) {
      return;
    }

    this.controller = new AbortController();
    this.loop = this.run(this.controller.signal);
    this.logger.log('Retention scheduler started');
  }

  async stop(): Promise<void> {
    this.controller?.abort();
    await this.loop;
    this.loop = undefined;
    this.controller = undefined;
    this.phase = RetentionPhase.STOPPED;
  }

  getPhase(): RetentionPhase {
    return this.phase;
  }

  getLastReport(): SweepReport | undefined {
    return this.lastReport;
  }

  /**
   * One SWEEP phase, using the settings as they are now
   *
   * The processed sweep and the code-cache clear fail independently; the
   * first error is kept on the report.
   */
  async runOnce(): Promise<SweepReport> {
    const now = this.clock();
    const report: SweepReport = {
      retentionDays: 0,
      cutoff: null,
      processedRemoved: 0,
      codesRemoved: 0,
      processedSweepSkipped: true,
      codesCleared: false,
    };

    let retentionDays: number;
    try {
      retentionDays = this.settings.getCleanupDays();
    } catch (error) {
      this.recordFailure(report, 'Could not read retention settings', error);
      this.lastReport = report;
      return report;
    }

    report.retentionDays = retentionDays;
    if (retentionDays > 0) {
      await this.sweepProcessed(report, now);
    }

    try {
      if (retentionDays > 0 || this.settings.shouldClearCodesWhenDisabled()) {
        report.codesRemoved = await this.storage.clearCodes();
        report.codesCleared = true;
        this.logger.log(`Code cache cleanup removed ${report.codesRemoved} rows`);
      }
    } catch (error) {
      this.recordFailure(report, 'Code cache cleanup failed', error);
    }

    this.lastReport = report;
    return report;
  }

  private async sweepProcessed(report: SweepReport, now: Date): Promise<void> {
    const cutoff = subtractDays(now, report.retentionDays);
    // Nothing is stored before 1970; a window reaching past it keeps every row
    if (Number.isNaN(cutoff.getTime()) || cutoff.getTime() < 0) {
      this.logger.warn(`Retention of ${report.retentionDays} days keeps every processed row`);
      return;
    }

    report.cutoff = cutoff;
    report.processedSweepSkipped = false;
    try {
      report.processedRemoved = await this.storage.deleteProcessedBefore(cutoff);
      this.logger.log(
        `Cleanup removed ${report.processedRemoved} rows older than ${report.retentionDays} days`,
      );
    } catch (error) {
      this.recordFailure(report, 'Processed message cleanup failed', error);
    }
  }

  private recordFailure(report: SweepReport, message: string, error: unknown): void {
    const failure = error instanceof Error ? error : new Error(String(error));
    if (!report.error) {
      report.error = failure;
    }
    this.logger.error(`${message}: ${failure.message}`);
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      this.phase = RetentionPhase.WAIT;
      const waitSeconds = this.nextWaitSeconds();
      this.logger.debug(`Next retention sweep in ${waitSeconds}s`);

      const elapsed = await this.sleep(waitSeconds * 1000, signal);
      if (!elapsed || signal.aborted) {
        break;
      }

      this.phase = RetentionPhase.SWEEP;
      await this.runOnce();
    }

    this.phase = RetentionPhase.STOPPED;
  }

  private nextWaitSeconds(): number {
    try {
      return secondsUntilNextRun(this.settings.getCleanupTime(), this.clock());
    } catch (error) {
      this.logger.error(
        `Could not read cleanup time: ${error instanceof Error ? error.message : String(error)}`,
      );
      return MIN_WAIT_SECONDS;
    }
  }
}
