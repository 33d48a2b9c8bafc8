import * as path from 'path';
import { DataSource } from 'typeorm';
import { BetterSqlite3ConnectionOptions } from 'typeorm/driver/better-sqlite3/BetterSqlite3ConnectionOptions';
import {
  ProcessedMessageEntity,
  ChannelLabelEntity,
  DuplicateCodeEntity,
  FilterRuleEntity,
} from './entities';
import { RELAY_MIGRATIONS } from './migrations';

export const RELAY_ENTITIES = [
  ProcessedMessageEntity,
  ChannelLabelEntity,
  DuplicateCodeEntity,
  FilterRuleEntity,
];

/**
 * TypeORM configuration for the relay state store (SQLite, WAL journal)
 *
 * The schema comes from the migrations, which run on initialize.
 */
export const createTypeORMConfig = (
  options?: Partial<BetterSqlite3ConnectionOptions>,
): BetterSqlite3ConnectionOptions => {
  const database =
    options?.database ??
    path.join(process.env.DATA_DIR || 'data', 'state.db');

  const defaultConfig: BetterSqlite3ConnectionOptions = {
    type: 'better-sqlite3',
    database,
    entities: RELAY_ENTITIES,
    synchronize: false,
    migrations: RELAY_MIGRATIONS,
    migrationsRun: true,
    logging: process.env.DB_LOGGING === 'true',
    prepareDatabase: (db) => {
      if (database !== ':memory:') {
        db.pragma('journal_mode = WAL');
      }
    },
  };

  return {
    ...defaultConfig,
    ...options,
    type: 'better-sqlite3',
    database,
  };
};

/**
 * Create TypeORM DataSource
 */
export const createDataSource = (
  options?: Partial<BetterSqlite3ConnectionOptions>,
): DataSource => {
  return new DataSource(createTypeORMConfig(options));
};
