import { Injectable, Inject, Logger } from '@nestjs/common';
import {
  ChannelLabel,
  ChannelStatistics,
  EnvFileSettings,
  SETTING_KEYS,
  SourceChatList,
  StorageAdapter,
} from '../../../core';
import { RUNTIME_SETTINGS, SOURCE_CHATS, STORAGE_ADAPTER } from '../constants';

/**
 * Channel Stats Service
 *
 * Per-source message counts with their display labels
 */
@Injectable()
export class ChannelStatsService {
  private readonly logger = new Logger(ChannelStatsService.name);

  constructor(
    @Inject(STORAGE_ADAPTER)
    private readonly storageAdapter: StorageAdapter,
    @Inject(SOURCE_CHATS)
    private readonly sources: SourceChatList,
    @Inject(RUNTIME_SETTINGS)
    private readonly settings: EnvFileSettings,
  ) {}

  /**
   * Configured sources first, in configured order, then any other source
   * that still has processed rows
   */
  async getChannelStats(): Promise<ChannelStatistics[]> {
    const [counts, labels] = await Promise.all([
      this.storageAdapter.countProcessedBySource(),
      this.storageAdapter.listChannelLabels(),
    ]);

    const countBySource = new Map(counts.map((row) => [row.sourceId, row.count]));
    const nameBySource = new Map(labels.map((label) => [label.sourceId, label.name]));
    const configured = this.sources.list();

    const result: ChannelStatistics[] = configured.map((sourceId) => ({
      sourceId,
      name: nameBySource.get(sourceId) ?? '',
      messages: countBySource.get(sourceId) ?? 0,
      configured: true,
    }));

    for (const { sourceId, count } of counts) {
      if (!configured.includes(sourceId)) {
        result.push({
          sourceId,
          name: nameBySource.get(sourceId) ?? '',
          messages: count,
          configured: false,
        });
      }
    }

    return result;
  }

  /**
   * Label a source and start relaying it if it is not configured yet
   */
  async upsertSource(sourceId: number, name: string): Promise<ChannelLabel> {
    const label = await this.storageAdapter.upsertChannelLabel(sourceId, name.trim());

    if (!this.sources.has(sourceId)) {
      // File first: a failed write leaves the running list unchanged
      await this.settings.update({
        [SETTING_KEYS.SOURCE_CHATS]: [...this.sources.list(), sourceId].join(','),
      });
      this.sources.add(sourceId);
    }

    this.logger.log(`Source chat added/updated: ${sourceId}`);
    return label;
  }
}
