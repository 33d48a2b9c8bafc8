import { Injectable, Inject, Logger } from '@nestjs/common';
import { QueryResult, StorageAdapter } from '../../../core';
import { STORAGE_ADAPTER } from '../constants';

/**
 * Admin Query Service
 *
 * Ad-hoc read-only SQL over the state database. The store adapter runs the
 * statement under the same lock as every other store operation.
 */
@Injectable()
export class AdminQueryService {
  private readonly logger = new Logger(AdminQueryService.name);

  constructor(
    @Inject(STORAGE_ADAPTER)
    private readonly storageAdapter: StorageAdapter,
  ) {}

  async execute(query: string): Promise<QueryResult> {
    try {
      return await this.storageAdapter.runReadOnlyQuery(query);
    } catch (error) {
      this.logger.error(`Query rejected: ${error instanceof Error ? error.message : String(error)}`);
      throw error;
    }
  }
}
