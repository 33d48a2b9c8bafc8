import { Controller, Get, Put, Param, Body, ParseIntPipe } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { ChannelLabel, ChannelStatistics } from '../../../core';
import { AdminOnly } from '../decorators/admin.decorators';
import { ChannelStatsService } from '../services/channel-stats.service';
import { ApiChannelStats, ApiUpsertChannel } from '../../../_shared/swagger/decorators';
import { UpsertChannelDto } from '../../../_shared/dto';

/**
 * Channels Controller
 * Source chat labels and per-source counts
 */
@ApiTags('Channels')
@AdminOnly()
@Controller('channels')
export class ChannelsController {
  constructor(private readonly channelStatsService: ChannelStatsService) {}

  @Get('stats')
  @ApiChannelStats()
  stats(): Promise<ChannelStatistics[]> {
    return this.channelStatsService.getChannelStats();
  }

  @Put(':sourceId')
  @ApiUpsertChannel()
  upsert(
    @Param('sourceId', ParseIntPipe) sourceId: number,
    @Body() dto: UpsertChannelDto,
  ): Promise<ChannelLabel> {
    return this.channelStatsService.upsertSource(sourceId, dto.name ?? '');
  }
}
