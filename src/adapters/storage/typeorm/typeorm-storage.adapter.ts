import { DataSource, EntityManager, In, Repository } from 'typeorm';
import {
  StorageAdapter,
  ChannelLabel,
  FilterRule,
  CreateFilterRuleDto,
  UpdateFilterRuleDto,
  FilterMoveDirection,
  QueryResult,
  SourceMessageCount,
  StorageStatistics,
  OperationLock,
  ReadOnlyQueryError,
  StoreUnavailableError,
  formatUtcTimestamp,
  normalizeCode,
} from '../../../core';
import {
  ProcessedMessageEntity,
  ChannelLabelEntity,
  DuplicateCodeEntity,
  FilterRuleEntity,
} from './entities';
import { runReadOnlyQuery } from './read-only-query';

/**
 * Large IN lists are split to stay under SQLite's variable limit
 */
const CODE_LOOKUP_CHUNK = 500;

/**
 * TypeORM implementation of StorageAdapter for SQLite
 *
 * All operations share one OperationLock, so each method (including
 * multi-statement ones like moveFilter) runs as one exclusive unit.
 */
export class TypeORMStorageAdapter implements StorageAdapter {
  private processedRepo: Repository<ProcessedMessageEntity>;
  private channelRepo: Repository<ChannelLabelEntity>;
  private codeRepo: Repository<DuplicateCodeEntity>;
  private filterRepo: Repository<FilterRuleEntity>;

  constructor(
    private readonly dataSource: DataSource,
    private readonly lock: OperationLock = new OperationLock(),
  ) {
    this.processedRepo = dataSource.getRepository(ProcessedMessageEntity);
    this.channelRepo = dataSource.getRepository(ChannelLabelEntity);
    this.codeRepo = dataSource.getRepository(DuplicateCodeEntity);
    this.filterRepo = dataSource.getRepository(FilterRuleEntity);
  }

  /**
   * Processed Messages
   */

  isProcessed(sourceId: number, messageId: number): Promise<boolean> {
    return this.exclusive('isProcessed', () =>
      this.processedRepo.exist({ where: { sourceId, messageId } }),
    );
  }

  markProcessed(sourceId: number, messageId: number, at: Date = new Date()): Promise<void> {
    return this.exclusive('markProcessed', async () => {
      await this.processedRepo
        .createQueryBuilder()
        .insert()
        .into(ProcessedMessageEntity)
        .values({ sourceId, messageId, createdAt: at })
        .orIgnore()
        .execute();
    });
  }

  deleteProcessedBefore(cutoff: Date): Promise<number> {
    return this.exclusive('deleteProcessedBefore', async () => {
      const result = await this.processedRepo
        .createQueryBuilder()
        .delete()
        .from(ProcessedMessageEntity)
        .where('created_at IS NOT NULL AND created_at < :cutoff', {
          cutoff: formatUtcTimestamp(cutoff),
        })
        .execute();
      return result.affected ?? 0;
    });
  }

  countProcessedBySource(): Promise<SourceMessageCount[]> {
    return this.exclusive('countProcessedBySource', async () => {
      const rows = await this.processedRepo
        .createQueryBuilder('p')
        .select('p.source_id', 'sourceId')
        .addSelect('COUNT(*)', 'count')
        .groupBy('p.source_id')
        .orderBy('p.source_id', 'ASC')
        .getRawMany<{ sourceId: number | string; count: number | string }>();

      return rows.map((row) => ({
        sourceId: Number(row.sourceId),
        count: Number(row.count),
      }));
    });
  }

  /**
   * Duplicate Codes
   */

  findExistingCodes(codes: string[]): Promise<string[]> {
    return this.exclusive('findExistingCodes', async () => {
      const normalized = [...new Set(codes.map(normalizeCode))];
      const found = new Set<string>();

      for (let i = 0; i < normalized.length; i += CODE_LOOKUP_CHUNK) {
        const chunk = normalized.slice(i, i + CODE_LOOKUP_CHUNK);
        const rows = await this.codeRepo.find({
          select: { code: true },
          where: { code: In(chunk) },
        });
        rows.forEach((row) => found.add(row.code));
      }

      return normalized.filter((code) => found.has(code));
    });
  }

  recordCodes(codes: string[], at: Date = new Date()): Promise<void> {
    return this.exclusive('recordCodes', async () => {
      const normalized = [...new Set(codes.map(normalizeCode))].filter(Boolean);
      if (normalized.length === 0) {
        return;
      }

      await this.dataSource.transaction(async (manager) => {
        for (let i = 0; i < normalized.length; i += CODE_LOOKUP_CHUNK) {
          await manager
            .createQueryBuilder()
            .insert()
            .into(DuplicateCodeEntity)
            .values(
              normalized
                .slice(i, i + CODE_LOOKUP_CHUNK)
                .map((code) => ({ code, createdAt: at })),
            )
            .orIgnore()
            .execute();
        }
      });
    });
  }

  clearCodes(): Promise<number> {
    return this.exclusive('clearCodes', async () => {
      const result = await this.codeRepo
        .createQueryBuilder()
        .delete()
        .from(DuplicateCodeEntity)
        .execute();
      return result.affected ?? 0;
    });
  }

  /**
   * Filter Rules
   */

  listFilters(): Promise<FilterRule[]> {
    return this.exclusive('listFilters', async () => {
      const entities = await this.filterRepo.find({
        order: { sortOrder: 'ASC', id: 'ASC' },
      });
      return entities.map((entity) => this.mapFilterEntityToDomain(entity));
    });
  }

  findFilter(id: number): Promise<FilterRule | null> {
    return this.exclusive('findFilter', async () => {
      const entity = await this.filterRepo.findOne({ where: { id } });
      return entity ? this.mapFilterEntityToDomain(entity) : null;
    });
  }

  createFilter(dto: CreateFilterRuleDto): Promise<FilterRule> {
    return this.exclusive('createFilter', () =>
      this.dataSource.transaction(async (manager) => {
        const raw = await manager
          .createQueryBuilder(FilterRuleEntity, 'f')
          .select('COALESCE(MAX(f.sort_order), 0)', 'maxOrder')
          .getRawOne<{ maxOrder: number | string | null }>();

        const entity = manager.create(FilterRuleEntity, {
          pattern: dto.pattern,
          replacement: dto.replacement ?? '',
          sortOrder: Number(raw?.maxOrder ?? 0) + 1,
        });
        const saved = await manager.save(entity);
        return this.mapFilterEntityToDomain(saved);
      }),
    );
  }

  updateFilter(id: number, dto: UpdateFilterRuleDto): Promise<FilterRule | null> {
    return this.exclusive('updateFilter', async () => {
      const entity = await this.filterRepo.findOne({ where: { id } });
      if (!entity) {
        return null;
      }

      entity.pattern = dto.pattern;
      entity.replacement = dto.replacement ?? '';
      const saved = await this.filterRepo.save(entity);
      return this.mapFilterEntityToDomain(saved);
    });
  }

  deleteFilter(id: number): Promise<boolean> {
    return this.exclusive('deleteFilter', async () => {
      const result = await this.filterRepo.delete({ id });
      return (result.affected ?? 0) > 0;
    });
  }

  moveFilter(id: number, direction: FilterMoveDirection): Promise<boolean> {
    return this.exclusive('moveFilter', () =>
      this.dataSource.transaction(async (manager) => {
        const current = await manager.findOne(FilterRuleEntity, { where: { id } });
        if (!current) {
          return false;
        }

        const neighbour = await this.findNeighbour(manager, current, direction);
        if (!neighbour) {
          return false;
        }

        const currentOrder = current.sortOrder;
        await manager.update(FilterRuleEntity, { id: current.id }, { sortOrder: neighbour.sortOrder });
        await manager.update(FilterRuleEntity, { id: neighbour.id }, { sortOrder: currentOrder });
        return true;
      }),
    );
  }

  /**
   * Channel Labels
   */

  listChannelLabels(): Promise<ChannelLabel[]> {
    return this.exclusive('listChannelLabels', async () => {
      const entities = await this.channelRepo.find({ order: { sourceId: 'ASC' } });
      return entities.map((entity) => new ChannelLabel(entity.sourceId, entity.name ?? ''));
    });
  }

  upsertChannelLabel(sourceId: number, name: string): Promise<ChannelLabel> {
    return this.exclusive('upsertChannelLabel', async () => {
      await this.channelRepo.upsert({ sourceId, name }, ['sourceId']);
      return new ChannelLabel(sourceId, name);
    });
  }

  /**
   * Maintenance
   */

  clearState(): Promise<void> {
    return this.exclusive('clearState', () =>
      this.dataSource.transaction(async (manager) => {
        await manager.createQueryBuilder().delete().from(ProcessedMessageEntity).execute();
        await manager.createQueryBuilder().delete().from(DuplicateCodeEntity).execute();
      }),
    );
  }

  getStatistics(): Promise<StorageStatistics> {
    return this.exclusive('getStatistics', async () => {
      const [processed, duplicateCodes, filters, channels] = await Promise.all([
        this.processedRepo.count(),
        this.codeRepo.count(),
        this.filterRepo.count(),
        this.channelRepo.count(),
      ]);
      return { processed, duplicateCodes, filters, channels };
    });
  }

  /**
   * The statement runs on its own read-only connection, but still inside the
   * store lock so it never overlaps a write
   */
  runReadOnlyQuery(sql: string): Promise<QueryResult> {
    return this.exclusive('runReadOnlyQuery', async () => {
      const options = this.dataSource.options;
      if (options.type !== 'better-sqlite3' || options.database === ':memory:') {
        throw new ReadOnlyQueryError('No SQLite database file is configured', 'unavailable');
      }
      return runReadOnlyQuery(options.database, sql);
    });
  }

  async isHealthy(): Promise<boolean> {
    if (!this.dataSource.isInitialized) {
      return false;
    }

    try {
      await this.lock.runExclusive(() => this.dataSource.query('SELECT 1'));
      return true;
    } catch {
      return false;
    }
  }

  async close(): Promise<void> {
    await this.lock.runExclusive(async () => {
      if (this.dataSource.isInitialized) {
        await this.dataSource.destroy();
      }
    });
  }

  /**
   * Helper Methods
   */

  /**
   * Run one exclusive store operation; any failure other than a rejected
   * query surfaces as StoreUnavailableError
   */
  private exclusive<T>(operation: string, work: () => Promise<T>): Promise<T> {
    return this.lock.runExclusive(async () => {
      try {
        return await work();
      } catch (error) {
        if (error instanceof ReadOnlyQueryError) {
          throw error;
        }
        throw new StoreUnavailableError(
          `Store operation '${operation}' failed: ${error instanceof Error ? error.message : String(error)}`,
          operation,
          error instanceof Error ? error : undefined,
        );
      }
    });
  }

  private findNeighbour(
    manager: EntityManager,
    current: FilterRuleEntity,
    direction: FilterMoveDirection,
  ): Promise<FilterRuleEntity | null> {
    const qb = manager.createQueryBuilder(FilterRuleEntity, 'f');

    if (direction === 'up') {
      qb.where('f.sort_order < :order', { order: current.sortOrder }).orderBy('f.sort_order', 'DESC');
    } else {
      qb.where('f.sort_order > :order', { order: current.sortOrder }).orderBy('f.sort_order', 'ASC');
    }

    return qb.limit(1).getOne();
  }

  private mapFilterEntityToDomain(entity: FilterRuleEntity): FilterRule {
    return new FilterRule(entity.id, entity.pattern, entity.replacement ?? '', entity.sortOrder);
  }
}
