export interface TimeOfDay {
  hour: number;
  minute: number;
}

/**
 * Settings that are re-read on every use so edits apply without restart
 */
export interface RuntimeSettings {
  /**
   * Retention window for processed identities; <= 0 disables the sweep
   */
  getCleanupDays(): number;

  /**
   * Local time of day the retention sweep runs
   */
  getCleanupTime(): TimeOfDay;

  /**
   * Whether the code cache is still cleared when the identity sweep is disabled
   */
  shouldClearCodesWhenDisabled(): boolean;

  /**
   * Source of the duplicate-code pattern
   */
  getDuplicateCodePattern(): string;
}

export const DEFAULT_CLEANUP_DAYS = 30;
export const DEFAULT_CLEANUP_TIME: TimeOfDay = { hour: 0, minute: 5 };
export const DEFAULT_DUPLICATE_CODE_PATTERN = '\\b[A-Za-z0-9]{6,}\\b';
