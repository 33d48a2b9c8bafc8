import { normalizeCode } from '../domain/models';
import { StorageAdapter } from '../interfaces';

/**
 * Store-backed set of codes already forwarded
 */
export class DuplicateCache {
  constructor(private readonly storage: StorageAdapter) {}

  /**
   * Subset of the given codes already known
   */
  async exists(codes: string[]): Promise<string[]> {
    const normalized = unique(codes);
    if (normalized.length === 0) {
      return [];
    }
    return this.storage.findExistingCodes(normalized);
  }

  async record(codes: string[], at: Date = new Date()): Promise<void> {
    const normalized = unique(codes);
    if (normalized.length === 0) {
      return;
    }
    await this.storage.recordCodes(normalized, at);
  }

  clear(): Promise<number> {
    return this.storage.clearCodes();
  }
}

function unique(codes: string[]): string[] {
  return [...new Set(codes.map(normalizeCode).filter((code) => code.length > 0))];
}
