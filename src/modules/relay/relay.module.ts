import { DynamicModule, Global, Module, Provider } from '@nestjs/common';
import {
  RelayModuleConfig,
  RelayModuleAsyncConfig,
  mergeRelayConfig,
} from './relay.config';
import {
  StorageAdapter,
  MessageTransport,
  LinkExpander,
  HttpLinkExpander,
  LinkFilterChain,
  CodeExtractor,
  ForwardingPipeline,
  RetentionScheduler,
  StatsRecorder,
  EnvFileSettings,
  SourceChatList,
} from '../../core';
import { MockStorageAdapter } from '../../adapters/storage/mock';
import { TypeORMStorageAdapter, createDataSource } from '../../adapters/storage/typeorm';
import { MockTransportAdapter } from '../../adapters/transport/mock';
import { TelegramBotTransport } from '../../adapters/transport/telegram';
import {
  RELAY_CONFIG,
  STORAGE_ADAPTER,
  MESSAGE_TRANSPORT,
  RUNTIME_SETTINGS,
  SOURCE_CHATS,
  STATS_RECORDER,
  LINK_EXPANDER,
  FORWARDING_PIPELINE,
  RETENTION_SCHEDULER,
} from './constants';
import {
  HealthController,
  FiltersController,
  ChannelsController,
  SettingsController,
  MaintenanceController,
  QueryController,
  StatsController,
} from './controllers';
import {
  RelayService,
  RetentionService,
  SettingsService,
  FilterRulesService,
  ChannelStatsService,
  AdminQueryService,
} from './services';
import { AdminAuthGuard } from './guards';
import { AdminAuditInterceptor } from './interceptors';

const CONTROLLERS = [
  HealthController,
  FiltersController,
  ChannelsController,
  SettingsController,
  MaintenanceController,
  QueryController,
  StatsController,
];

const EXPORTS = [
  RELAY_CONFIG,
  STORAGE_ADAPTER,
  MESSAGE_TRANSPORT,
  FORWARDING_PIPELINE,
  STATS_RECORDER,
  RelayService,
  RetentionService,
];

/**
 * Relay Module - Main NestJS Module
 *
 * Wires the store, transport and pipeline from one configuration object
 * and exposes the admin HTTP surface
 */
@Global()
@Module({})
export class RelayModule {
  /**
   * Configure the relay synchronously
   */
  static forRoot(config: RelayModuleConfig): DynamicModule {
    return {
      module: RelayModule,
      providers: [
        {
          provide: RELAY_CONFIG,
          useValue: mergeRelayConfig(config),
        },
        ...this.createProviders(),
      ],
      controllers: CONTROLLERS,
      exports: EXPORTS,
    };
  }

  /**
   * Configure the relay asynchronously
   */
  static forRootAsync(options: RelayModuleAsyncConfig): DynamicModule {
    return {
      module: RelayModule,
      imports: options.imports || [],
      providers: [
        {
          provide: RELAY_CONFIG,
          useFactory: async (...args: unknown[]) =>
            mergeRelayConfig(await options.useFactory(...args)),
          inject: options.inject || [],
        },
        ...this.createProviders(),
      ],
      controllers: CONTROLLERS,
      exports: EXPORTS,
    };
  }

  /**
   * Providers that depend only on the resolved configuration
   */
  private static createProviders(): Provider[] {
    return [
      {
        provide: STORAGE_ADAPTER,
        useFactory: (config: RelayModuleConfig) => createStorageAdapter(config),
        inject: [RELAY_CONFIG],
      },
      {
        provide: SOURCE_CHATS,
        useFactory: (config: RelayModuleConfig) => new SourceChatList(config.sourceChats),
        inject: [RELAY_CONFIG],
      },
      {
        provide: MESSAGE_TRANSPORT,
        useFactory: (config: RelayModuleConfig, sources: SourceChatList) =>
          createTransport(config, sources),
        inject: [RELAY_CONFIG, SOURCE_CHATS],
      },
      {
        provide: RUNTIME_SETTINGS,
        useFactory: (config: RelayModuleConfig) => new EnvFileSettings(config.settingsPath),
        inject: [RELAY_CONFIG],
      },
      {
        provide: STATS_RECORDER,
        useFactory: (config: RelayModuleConfig) => new StatsRecorder(config.statsPath),
        inject: [RELAY_CONFIG],
      },
      {
        provide: LINK_EXPANDER,
        useFactory: (config: RelayModuleConfig): LinkExpander =>
          config.linkExpansion?.expander ??
          new HttpLinkExpander({ timeoutMs: config.linkExpansion?.timeoutMs }),
        inject: [RELAY_CONFIG],
      },
      {
        provide: FORWARDING_PIPELINE,
        useFactory: (
          storageAdapter: StorageAdapter,
          transport: MessageTransport,
          expander: LinkExpander,
          settings: EnvFileSettings,
          statsRecorder: StatsRecorder,
        ) =>
          new ForwardingPipeline({
            storageAdapter,
            transport,
            linkFilterChain: new LinkFilterChain(storageAdapter, expander),
            codeExtractor: new CodeExtractor(() => settings.getDuplicateCodePattern()),
            statsRecorder,
          }),
        inject: [STORAGE_ADAPTER, MESSAGE_TRANSPORT, LINK_EXPANDER, RUNTIME_SETTINGS, STATS_RECORDER],
      },
      {
        provide: RETENTION_SCHEDULER,
        useFactory: (storageAdapter: StorageAdapter, settings: EnvFileSettings) =>
          new RetentionScheduler(storageAdapter, settings),
        inject: [STORAGE_ADAPTER, RUNTIME_SETTINGS],
      },
      RelayService,
      RetentionService,
      SettingsService,
      FilterRulesService,
      ChannelStatsService,
      AdminQueryService,
      AdminAuthGuard,
      AdminAuditInterceptor,
    ];
  }
}

async function createStorageAdapter(config: RelayModuleConfig): Promise<StorageAdapter> {
  switch (config.storage.type) {
    case 'mock':
      return new MockStorageAdapter();

    case 'typeorm': {
      const dataSource = createDataSource(config.storage.options);
      await dataSource.initialize();
      return new TypeORMStorageAdapter(dataSource);
    }

    case 'custom':
      if (!config.storage.adapter) {
        throw new Error('Custom storage adapter not provided');
      }
      return config.storage.adapter;

    default:
      throw new Error(`Unknown storage type: ${String(config.storage.type)}`);
  }
}

function createTransport(config: RelayModuleConfig, sources: SourceChatList): MessageTransport {
  switch (config.transport.type) {
    case 'mock':
      return new MockTransportAdapter();

    case 'telegram': {
      const telegram = config.transport.telegram;
      if (!telegram) {
        throw new Error('Telegram transport options not provided');
      }
      return new TelegramBotTransport({
        token: telegram.token,
        destinationChat: telegram.destinationChat,
        pollTimeoutSeconds: telegram.pollTimeoutSeconds,
        sourceChats: sources,
      });
    }

    case 'custom':
      if (!config.transport.adapter) {
        throw new Error('Custom transport adapter not provided');
      }
      return config.transport.adapter;

    default:
      throw new Error(`Unknown transport type: ${String(config.transport.type)}`);
  }
}
