import { FactoryProvider, ModuleMetadata } from '@nestjs/common';
import { BetterSqlite3ConnectionOptions } from 'typeorm/driver/better-sqlite3/BetterSqlite3ConnectionOptions';
import { LinkExpander, MessageTransport, StorageAdapter } from '../../core';

/**
 * Relay Module Configuration
 */
export interface RelayModuleConfig {
  /**
   * State store
   */
  storage: {
    type: 'mock' | 'typeorm' | 'custom';
    options?: Partial<BetterSqlite3ConnectionOptions>;
    adapter?: StorageAdapter;
  };

  /**
   * Source and destination feeds
   */
  transport: {
    type: 'mock' | 'telegram' | 'custom';
    telegram?: {
      token: string;
      destinationChat: string;
      pollTimeoutSeconds?: number;
    };
    adapter?: MessageTransport;
  };

  /**
   * Source chats in display order
   */
  sourceChats: number[];

  /**
   * `.env` file holding the hot settings
   */
  settingsPath: string;

  /**
   * JSON stats file
   */
  statsPath: string;

  linkExpansion?: {
    timeoutMs?: number;
    expander?: LinkExpander;
  };

  admin: {
    password: string;
  };

  retention?: {
    enabled?: boolean;
  };

  /**
   * Start receiving from the transport once the application boots
   */
  autoStart?: boolean;
}

/**
 * Async configuration factory
 */
export interface RelayModuleAsyncConfig
  extends Pick<ModuleMetadata, 'imports'>,
    Pick<FactoryProvider<RelayModuleConfig>, 'useFactory' | 'inject'> {}

/**
 * Default configuration values
 */
export const defaultRelayConfig: Partial<RelayModuleConfig> = {
  linkExpansion: {
    timeoutMs: 10_000,
  },
  retention: {
    enabled: true,
  },
  autoStart: true,
};

export function mergeRelayConfig(config: RelayModuleConfig): RelayModuleConfig {
  return {
    ...defaultRelayConfig,
    ...config,
    linkExpansion: { ...defaultRelayConfig.linkExpansion, ...config.linkExpansion },
    retention: { ...defaultRelayConfig.retention, ...config.retention },
  };
}
