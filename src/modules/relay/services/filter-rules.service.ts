import {
  BadRequestException,
  Injectable,
  Inject,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import {
  FilterRule,
  FilterMoveDirection,
  StorageAdapter,
  isValidPattern,
} from '../../../core';
import { STORAGE_ADAPTER } from '../constants';

/**
 * Filter Rules Service
 *
 * Admin operations on the link filter chain. Patterns are checked when
 * written; the chain still skips any rule that fails to compile at read time.
 */
@Injectable()
export class FilterRulesService {
  private readonly logger = new Logger(FilterRulesService.name);

  constructor(
    @Inject(STORAGE_ADAPTER)
    private readonly storageAdapter: StorageAdapter,
  ) {}

  list(): Promise<FilterRule[]> {
    return this.storageAdapter.listFilters();
  }

  async create(pattern: string, replacement = ''): Promise<FilterRule> {
    this.assertPattern(pattern);
    const rule = await this.storageAdapter.createFilter({ pattern, replacement });
    this.logger.log(`Filter ${rule.id} added at position ${rule.sortOrder}`);
    return rule;
  }

  async update(id: number, pattern: string, replacement = ''): Promise<FilterRule> {
    this.assertPattern(pattern);
    const rule = await this.storageAdapter.updateFilter(id, { pattern, replacement });
    if (!rule) {
      throw new NotFoundException(`Filter not found: ${id}`);
    }
    return rule;
  }

  async remove(id: number): Promise<void> {
    const removed = await this.storageAdapter.deleteFilter(id);
    if (!removed) {
      throw new NotFoundException(`Filter not found: ${id}`);
    }
    this.logger.log(`Filter ${id} deleted`);
  }

  /**
   * Swap with the neighbouring rule; a rule already at the edge stays put
   */
  async move(id: number, direction: FilterMoveDirection): Promise<FilterRule[]> {
    const rule = await this.storageAdapter.findFilter(id);
    if (!rule) {
      throw new NotFoundException(`Filter not found: ${id}`);
    }

    await this.storageAdapter.moveFilter(id, direction);
    return this.storageAdapter.listFilters();
  }

  private assertPattern(pattern: string): void {
    if (!isValidPattern(pattern)) {
      throw new BadRequestException(`Invalid regular expression: ${pattern}`);
    }
  }
}
