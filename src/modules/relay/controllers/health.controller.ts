import { Controller, Get, Inject, HttpStatus, HttpCode } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import type { StorageAdapter } from '../../../core';
import { STORAGE_ADAPTER } from '../constants';
import { AdminOnly } from '../decorators/admin.decorators';
import { RelayService } from '../services/relay.service';
import { RetentionService } from '../services/retention.service';
import { ApiHealthCheck, ApiReadinessCheck } from '../../../_shared/swagger/decorators';

/**
 * Health Controller
 * Liveness is public; readiness details need the admin password
 */
@ApiTags('Health')
@Controller('health')
export class HealthController {
  constructor(
    @Inject(STORAGE_ADAPTER)
    private readonly storageAdapter: StorageAdapter,
    private readonly relayService: RelayService,
    private readonly retentionService: RetentionService,
  ) {}

  @Get()
  @HttpCode(HttpStatus.OK)
  @ApiHealthCheck()
  health(): { status: string } {
    return { status: 'ok' };
  }

  @Get('ready')
  @AdminOnly()
  @ApiReadinessCheck()
  async readiness(): Promise<{
    status: string;
    checks: {
      database: boolean;
      transport: boolean;
    };
    details: Record<string, unknown>;
  }> {
    const databaseHealthy = await this.storageAdapter.isHealthy();
    const receiving = this.relayService.isReceiving();

    return {
      status: databaseHealthy && receiving ? 'ready' : 'not_ready',
      checks: {
        database: databaseHealthy,
        transport: receiving,
      },
      details: {
        pipeline: this.relayService.getPipelineStatistics(),
        retention: { phase: this.retentionService.getStatus().phase },
        database: databaseHealthy ? 'connected' : 'disconnected',
      },
    };
  }
}
