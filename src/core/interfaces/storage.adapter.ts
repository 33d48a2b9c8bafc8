import { ChannelLabel, FilterRule } from '../domain/models';
import {
  CreateFilterRuleDto,
  FilterMoveDirection,
  QueryResult,
  SourceMessageCount,
  StorageStatistics,
  UpdateFilterRuleDto,
} from './common.types';

/**
 * Storage adapter interface - abstracts all state store operations
 *
 * Every method is one exclusive operation: implementations serialize them
 * behind a single lock shared by the pipeline, the retention scheduler and
 * the admin surface. Inserts are insert-if-absent throughout.
 */
export interface StorageAdapter {
  // ==================== Processed Messages ====================

  /**
   * Check whether a final decision was already recorded for this identity
   */
  isProcessed(sourceId: number, messageId: number): Promise<boolean>;

  /**
   * Record the identity as processed; no-op when already present
   */
  markProcessed(sourceId: number, messageId: number, at?: Date): Promise<void>;

  /**
   * Delete processed rows created strictly before the cutoff
   * @returns Number of rows removed
   */
  deleteProcessedBefore(cutoff: Date): Promise<number>;

  /**
   * Processed row count grouped by source
   */
  countProcessedBySource(): Promise<SourceMessageCount[]>;

  // ==================== Duplicate Codes ====================

  /**
   * Return the subset of (normalized) codes already stored
   */
  findExistingCodes(codes: string[]): Promise<string[]>;

  /**
   * Insert unseen codes with the given timestamp
   */
  recordCodes(codes: string[], at?: Date): Promise<void>;

  /**
   * Remove every stored code
   * @returns Number of rows removed
   */
  clearCodes(): Promise<number>;

  // ==================== Filter Rules ====================

  /**
   * All rules in application order (sortOrder, then id)
   */
  listFilters(): Promise<FilterRule[]>;

  findFilter(id: number): Promise<FilterRule | null>;

  /**
   * Append a rule after the current last one
   */
  createFilter(dto: CreateFilterRuleDto): Promise<FilterRule>;

  updateFilter(id: number, dto: UpdateFilterRuleDto): Promise<FilterRule | null>;

  deleteFilter(id: number): Promise<boolean>;

  /**
   * Swap sortOrder with the adjacent rule in the given direction
   * @returns false when the rule does not exist or is already at the edge
   */
  moveFilter(id: number, direction: FilterMoveDirection): Promise<boolean>;

  // ==================== Channel Labels ====================

  listChannelLabels(): Promise<ChannelLabel[]>;

  upsertChannelLabel(sourceId: number, name: string): Promise<ChannelLabel>;

  // ==================== Maintenance ====================

  /**
   * Drop all processed identities and duplicate codes
   */
  clearState(): Promise<void>;

  getStatistics(): Promise<StorageStatistics>;

  /**
   * Run one statement that the database itself reports as read-only
   * @throws ReadOnlyQueryError when the statement is rejected or fails
   */
  runReadOnlyQuery(sql: string): Promise<QueryResult>;

  isHealthy(): Promise<boolean>;

  close(): Promise<void>;
}
