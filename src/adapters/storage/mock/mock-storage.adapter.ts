import {
  StorageAdapter,
  ChannelLabel,
  FilterRule,
  ProcessedMessage,
  DuplicateCode,
  CreateFilterRuleDto,
  UpdateFilterRuleDto,
  FilterMoveDirection,
  QueryResult,
  SourceMessageCount,
  StorageStatistics,
  OperationLock,
  ReadOnlyQueryError,
  StoreUnavailableError,
  compareFilterRules,
  normalizeCode,
  processedKey,
} from '../../../core';

/**
 * Mock storage adapter for testing
 * Provides in-memory storage with deterministic behavior
 */
export class MockStorageAdapter implements StorageAdapter {
  private processed: Map<string, ProcessedMessage> = new Map();
  private codes: Map<string, DuplicateCode> = new Map();
  private filters: Map<number, FilterRule> = new Map();
  private channels: Map<number, ChannelLabel> = new Map();

  private failing: Set<string> = new Set();
  private idCounter = 0;

  private readonly lock = new OperationLock();

  constructor(private readonly options: MockStorageOptions = {}) {
    this.options = {
      simulateLatency: false,
      latencyMs: 10,
      ...options,
    };
    (options.failOn ?? []).forEach((operation) => this.failing.add(operation));
  }

  /**
   * Simulate I/O latency if configured
   */
  private async simulateLatency(): Promise<void> {
    if (this.options.simulateLatency && this.options.latencyMs) {
      await new Promise((resolve) => setTimeout(resolve, this.options.latencyMs));
    }
  }

  /**
   * Run one operation under the lock, failing it when configured to
   */
  private run<T>(operation: string, work: () => T): Promise<T> {
    return this.lock.runExclusive(async () => {
      await this.simulateLatency();
      if (this.failing.has(operation)) {
        throw new StoreUnavailableError(`Simulated failure in '${operation}'`, operation);
      }
      return work();
    });
  }

  // ==================== Processed Messages ====================

  isProcessed(sourceId: number, messageId: number): Promise<boolean> {
    return this.run('isProcessed', () => this.processed.has(processedKey(sourceId, messageId)));
  }

  markProcessed(sourceId: number, messageId: number, at: Date = new Date()): Promise<void> {
    return this.run('markProcessed', () => {
      const key = processedKey(sourceId, messageId);
      if (!this.processed.has(key)) {
        this.processed.set(key, new ProcessedMessage(sourceId, messageId, at));
      }
    });
  }

  deleteProcessedBefore(cutoff: Date): Promise<number> {
    return this.run('deleteProcessedBefore', () => {
      let removed = 0;
      for (const [key, message] of this.processed) {
        if (message.createdAt.getTime() < cutoff.getTime()) {
          this.processed.delete(key);
          removed++;
        }
      }
      return removed;
    });
  }

  countProcessedBySource(): Promise<SourceMessageCount[]> {
    return this.run('countProcessedBySource', () => {
      const counts = new Map<number, number>();
      for (const message of this.processed.values()) {
        counts.set(message.sourceId, (counts.get(message.sourceId) ?? 0) + 1);
      }
      return Array.from(counts, ([sourceId, count]) => ({ sourceId, count })).sort(
        (a, b) => a.sourceId - b.sourceId,
      );
    });
  }

  // ==================== Duplicate Codes ====================

  findExistingCodes(codes: string[]): Promise<string[]> {
    return this.run('findExistingCodes', () =>
      [...new Set(codes.map(normalizeCode))].filter((code) => this.codes.has(code)),
    );
  }

  recordCodes(codes: string[], at: Date = new Date()): Promise<void> {
    return this.run('recordCodes', () => {
      for (const code of codes.map(normalizeCode)) {
        if (code && !this.codes.has(code)) {
          this.codes.set(code, new DuplicateCode(code, at));
        }
      }
    });
  }

  clearCodes(): Promise<number> {
    return this.run('clearCodes', () => {
      const removed = this.codes.size;
      this.codes.clear();
      return removed;
    });
  }

  // ==================== Filter Rules ====================

  listFilters(): Promise<FilterRule[]> {
    return this.run('listFilters', () =>
      Array.from(this.filters.values(), (rule) => this.copyRule(rule)).sort(compareFilterRules),
    );
  }

  findFilter(id: number): Promise<FilterRule | null> {
    return this.run('findFilter', () => {
      const rule = this.filters.get(id);
      return rule ? this.copyRule(rule) : null;
    });
  }

  createFilter(dto: CreateFilterRuleDto): Promise<FilterRule> {
    return this.run('createFilter', () => {
      const maxOrder = Math.max(0, ...Array.from(this.filters.values(), (rule) => rule.sortOrder));
      const rule = new FilterRule(++this.idCounter, dto.pattern, dto.replacement ?? '', maxOrder + 1);
      this.filters.set(rule.id, rule);
      return this.copyRule(rule);
    });
  }

  updateFilter(id: number, dto: UpdateFilterRuleDto): Promise<FilterRule | null> {
    return this.run('updateFilter', () => {
      const rule = this.filters.get(id);
      if (!rule) {
        return null;
      }
      rule.pattern = dto.pattern;
      rule.replacement = dto.replacement ?? '';
      return this.copyRule(rule);
    });
  }

  deleteFilter(id: number): Promise<boolean> {
    return this.run('deleteFilter', () => this.filters.delete(id));
  }

  moveFilter(id: number, direction: FilterMoveDirection): Promise<boolean> {
    return this.run('moveFilter', () => {
      const ordered = Array.from(this.filters.values()).sort(compareFilterRules);
      const index = ordered.findIndex((rule) => rule.id === id);
      const neighbour = ordered[direction === 'up' ? index - 1 : index + 1];
      if (index < 0 || !neighbour) {
        return false;
      }

      const current = ordered[index];
      const currentOrder = current.sortOrder;
      current.sortOrder = neighbour.sortOrder;
      neighbour.sortOrder = currentOrder;
      return true;
    });
  }

  // ==================== Channel Labels ====================

  listChannelLabels(): Promise<ChannelLabel[]> {
    return this.run('listChannelLabels', () =>
      Array.from(this.channels.values(), (label) => new ChannelLabel(label.sourceId, label.name)).sort(
        (a, b) => a.sourceId - b.sourceId,
      ),
    );
  }

  upsertChannelLabel(sourceId: number, name: string): Promise<ChannelLabel> {
    return this.run('upsertChannelLabel', () => {
      this.channels.set(sourceId, new ChannelLabel(sourceId, name));
      return new ChannelLabel(sourceId, name);
    });
  }

  // ==================== Maintenance ====================

  clearState(): Promise<void> {
    return this.run('clearState', () => {
      this.processed.clear();
      this.codes.clear();
    });
  }

  getStatistics(): Promise<StorageStatistics> {
    return this.run('getStatistics', () => ({
      processed: this.processed.size,
      duplicateCodes: this.codes.size,
      filters: this.filters.size,
      channels: this.channels.size,
    }));
  }

  runReadOnlyQuery(sql: string): Promise<QueryResult> {
    return this.run('runReadOnlyQuery', () => {
      if (!this.options.queryResponder) {
        throw new ReadOnlyQueryError('No SQLite database is configured', 'unavailable');
      }
      return this.options.queryResponder(sql);
    });
  }

  async isHealthy(): Promise<boolean> {
    return !this.failing.has('isHealthy');
  }

  async close(): Promise<void> {
    await this.lock.runExclusive(() => undefined);
  }

  // ==================== Testing Utilities ====================

  /**
   * Make the named operation reject with StoreUnavailableError
   */
  failOperation(operation: keyof StorageAdapter): void {
    this.failing.add(operation);
  }

  restoreOperation(operation: keyof StorageAdapter): void {
    this.failing.delete(operation);
  }

  /**
   * Clear all data (for testing)
   */
  clear(): void {
    this.processed.clear();
    this.codes.clear();
    this.filters.clear();
    this.channels.clear();
    this.failing.clear();
    this.idCounter = 0;
  }

  /**
   * Get all data (for testing)
   */
  getAllData(): {
    processed: ProcessedMessage[];
    codes: DuplicateCode[];
    filters: FilterRule[];
    channels: ChannelLabel[];
  } {
    return {
      processed: Array.from(this.processed.values()),
      codes: Array.from(this.codes.values()),
      filters: Array.from(this.filters.values()).sort(compareFilterRules),
      channels: Array.from(this.channels.values()),
    };
  }

  /**
   * Inject test data
   */
  injectTestData(data: {
    processed?: ProcessedMessage[];
    codes?: DuplicateCode[];
    channels?: ChannelLabel[];
  }): void {
    data.processed?.forEach((message) => this.processed.set(message.key, message));
    data.codes?.forEach((code) => this.codes.set(normalizeCode(code.code), code));
    data.channels?.forEach((label) => this.channels.set(label.sourceId, label));
  }

  private copyRule(rule: FilterRule): FilterRule {
    return new FilterRule(rule.id, rule.pattern, rule.replacement, rule.sortOrder);
  }
}

/**
 * Mock storage configuration options
 */
export interface MockStorageOptions {
  simulateLatency?: boolean;
  latencyMs?: number;
  /**
   * Operations that reject from the start
   */
  failOn?: Array<keyof StorageAdapter>;
  /**
   * Answers runReadOnlyQuery; without it queries are rejected as unavailable
   */
  queryResponder?: (sql: string) => QueryResult;
}
