import { Injectable, Inject } from '@nestjs/common';
import type {
  RetentionPhase,
  RetentionScheduler,
  SweepReport,
} from '../../../core';
import { RETENTION_SCHEDULER } from '../constants';

/**
 * Retention Service
 *
 * Nest-facing wrapper around the retention scheduler loop
 */
@Injectable()
export class RetentionService {
  constructor(
    @Inject(RETENTION_SCHEDULER)
    private readonly scheduler: RetentionScheduler,
  ) {}

  start(): void {
    this.scheduler.start();
  }

  stop(): Promise<void> {
    return this.scheduler.stop();
  }

  /**
   * Manually trigger a sweep with the current settings
   */
  runNow(): Promise<SweepReport> {
    return this.scheduler.runOnce();
  }

  getStatus(): { phase: RetentionPhase; lastSweep: SweepReport | null } {
    return {
      phase: this.scheduler.getPhase(),
      lastSweep: this.scheduler.getLastReport() ?? null,
    };
  }
}
