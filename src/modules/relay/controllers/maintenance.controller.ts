import {
  Controller,
  Post,
  Delete,
  HttpCode,
  HttpStatus,
  Inject,
  Logger,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import type { StorageAdapter } from '../../../core';
import { STORAGE_ADAPTER } from '../constants';
import { AdminOnly } from '../decorators/admin.decorators';
import { RetentionService } from '../services/retention.service';
import { ApiRunCleanup, ApiClearState } from '../../../_shared/swagger/decorators';

/**
 * Maintenance Controller
 */
@ApiTags('Maintenance')
@AdminOnly()
@Controller('maintenance')
export class MaintenanceController {
  private readonly logger = new Logger(MaintenanceController.name);

  constructor(
    @Inject(STORAGE_ADAPTER)
    private readonly storageAdapter: StorageAdapter,
    private readonly retentionService: RetentionService,
  ) {}

  @Post('cleanup')
  @HttpCode(HttpStatus.OK)
  @ApiRunCleanup()
  async cleanup(): Promise<Record<string, unknown>> {
    const report = await this.retentionService.runNow();
    return {
      ...report,
      error: report.error?.message ?? null,
    };
  }

  @Delete('state')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiClearState()
  async clearState(): Promise<void> {
    await this.storageAdapter.clearState();
    this.logger.log('Database cleared');
  }
}
