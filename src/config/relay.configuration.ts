import * as path from 'path';
import { registerAs } from '@nestjs/config';
import { parseChatIds } from '../core';
import type { RelayModuleConfig } from '../modules/relay/relay.config';
import { EnvironmentVariables, validateEnvironment } from './env.validation';

/**
 * Relay module configuration derived from the static environment
 */
export function createRelayConfig(env: EnvironmentVariables): RelayModuleConfig {
  return {
    storage: {
      type: 'typeorm',
      options: {
        database: path.join(env.DATA_DIR, 'state.db'),
        logging: env.DB_LOGGING,
      },
    },
    transport: {
      type: 'telegram',
      telegram: {
        token: env.TELEGRAM_BOT_TOKEN,
        destinationChat: env.DEST_CHAT.trim(),
        pollTimeoutSeconds: env.TELEGRAM_POLL_TIMEOUT_S,
      },
    },
    sourceChats: parseChatIds(env.SOURCE_CHATS),
    settingsPath: env.CONFIG_PATH,
    statsPath: path.join(env.DATA_DIR, 'stats.json'),
    linkExpansion: {
      timeoutMs: env.LINK_EXPANSION_TIMEOUT_MS,
    },
    admin: {
      password: env.ADMIN_PASSWORD,
    },
  };
}

export const relayConfiguration = registerAs('relay', () =>
  createRelayConfig(validateEnvironment(process.env)),
);
