/**
 * TypeORM Storage Adapter for SQLite (better-sqlite3)
 */

export { TypeORMStorageAdapter } from './typeorm-storage.adapter';
export { runReadOnlyQuery } from './read-only-query';
export {
  createDataSource,
  createTypeORMConfig,
  RELAY_ENTITIES,
} from './typeorm.config';
export * from './entities';
export * from './migrations';
