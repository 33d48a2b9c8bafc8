import { Controller, Get, Inject } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { readStatsFile } from '../../../core';
import type { RelayStats, StorageAdapter, StorageStatistics } from '../../../core';
import { RELAY_CONFIG, STORAGE_ADAPTER } from '../constants';
import type { RelayModuleConfig } from '../relay.config';
import { AdminOnly } from '../decorators/admin.decorators';
import { ApiRelayStats } from '../../../_shared/swagger/decorators';

/**
 * Stats Controller
 * Reports the stats file as an outside observer sees it
 */
@ApiTags('Stats')
@AdminOnly()
@Controller('stats')
export class StatsController {
  constructor(
    @Inject(RELAY_CONFIG)
    private readonly config: RelayModuleConfig,
    @Inject(STORAGE_ADAPTER)
    private readonly storageAdapter: StorageAdapter,
  ) {}

  @Get()
  @ApiRelayStats()
  async stats(): Promise<RelayStats & { storage: StorageStatistics }> {
    const [stats, storage] = await Promise.all([
      readStatsFile(this.config.statsPath),
      this.storageAdapter.getStatistics(),
    ]);
    return { ...stats, storage };
  }
}
