import {
  Injectable,
  Inject,
  Logger,
  OnApplicationBootstrap,
  OnApplicationShutdown,
} from '@nestjs/common';
import type {
  ForwardingPipeline,
  InboundMessage,
  MessageTransport,
  ProcessingResult,
  RelayStats,
  StatsRecorder,
  StorageAdapter,
} from '../../../core';
import {
  FORWARDING_PIPELINE,
  MESSAGE_TRANSPORT,
  RELAY_CONFIG,
  STATS_RECORDER,
  STORAGE_ADAPTER,
} from '../constants';
import type { RelayModuleConfig } from '../relay.config';
import { RetentionService } from './retention.service';

/**
 * RelayService
 *
 * Owns the service lifecycle: stats status, the transport receive loop and
 * the retention scheduler. Shutdown order is transport, scheduler, store,
 * then the final `stopped` stats write.
 */
@Injectable()
export class RelayService implements OnApplicationBootstrap, OnApplicationShutdown {
  private readonly logger = new Logger(RelayService.name);
  private receiving = false;

  constructor(
    @Inject(RELAY_CONFIG)
    private readonly config: RelayModuleConfig,
    @Inject(MESSAGE_TRANSPORT)
    private readonly transport: MessageTransport,
    @Inject(FORWARDING_PIPELINE)
    private readonly pipeline: ForwardingPipeline,
    @Inject(STATS_RECORDER)
    private readonly stats: StatsRecorder,
    @Inject(STORAGE_ADAPTER)
    private readonly storageAdapter: StorageAdapter,
    private readonly retention: RetentionService,
  ) {}

  async onApplicationBootstrap(): Promise<void> {
    const loaded = await this.stats.load();
    this.logger.log(`Loaded stats: ${loaded.messages} forwarded, last status ${loaded.status}`);
    await this.stats.markRunning();

    if (this.config.retention?.enabled !== false) {
      this.retention.start();
    }

    if (this.config.autoStart !== false) {
      await this.startReceiving();
    }
  }

  async onApplicationShutdown(signal?: string): Promise<void> {
    this.logger.log(`Shutting down${signal ? ` (${signal})` : ''}`);
    await this.stopReceiving();
    await this.retention.stop();

    try {
      await this.storageAdapter.close();
    } catch (error) {
      this.logger.error(
        `Failed to close store: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    await this.stats.markStopped();
  }

  /**
   * Start the transport receive loop
   */
  async startReceiving(): Promise<void> {
    if (this.receiving) {
      return;
    }

    await this.transport.start(async (message) => {
      await this.processMessage(message);
    });
    this.receiving = true;
    this.logger.log(`Receiving from transport '${this.transport.name}'`);
  }

  /**
   * Stop receiving; resolves after the in-flight message finishes
   */
  async stopReceiving(): Promise<void> {
    if (!this.receiving) {
      return;
    }

    await this.transport.stop();
    this.receiving = false;
  }

  /**
   * Run one message through the forwarding pipeline
   */
  processMessage(message: InboundMessage): Promise<ProcessingResult> {
    return this.pipeline.process(message);
  }

  isReceiving(): boolean {
    return this.receiving;
  }

  getStats(): RelayStats {
    return this.stats.snapshot();
  }

  getPipelineStatistics(): ReturnType<ForwardingPipeline['getStatistics']> {
    return this.pipeline.getStatistics();
  }
}
