import * as fs from 'fs';
import * as path from 'path';
import { parse } from 'dotenv';
import {
  DEFAULT_DUPLICATE_CODE_PATTERN,
  RuntimeSettings,
  TimeOfDay,
} from '../interfaces';
import { OperationLock } from '../utils';
import {
  parseBooleanFlag,
  parseCleanupDays,
  parseCleanupTime,
} from './settings-parsers';

export const SETTING_KEYS = {
  CLEANUP_DAYS: 'CLEANUP_DAYS',
  CLEANUP_TIME: 'CLEANUP_TIME',
  CLEANUP_CODES_WHEN_DISABLED: 'CLEANUP_CODES_WHEN_DISABLED',
  DUP_CODE_REGEX: 'DUP_CODE_REGEX',
  SOURCE_CHATS: 'SOURCE_CHATS',
} as const;

/**
 * Runtime settings backed by the service's `.env` file
 *
 * Every getter reads the file again, so edits made through the admin
 * surface (or by hand) take effect on the next use. Writes rewrite the
 * whole file and are serialized.
 */
export class EnvFileSettings implements RuntimeSettings {
  private readonly writeLock = new OperationLock();

  constructor(private readonly filePath: string) {}

  get path(): string {
    return this.filePath;
  }

  /**
   * Current key/value pairs; an absent file reads as empty
   */
  read(): Record<string, string> {
    try {
      return parse(fs.readFileSync(this.filePath));
    } catch (error) {
      if (isMissingFile(error)) {
        return {};
      }
      throw error;
    }
  }

  get(key: string): string | undefined {
    const value = this.read()[key];
    return value === undefined || value.trim() === '' ? undefined : value;
  }

  getCleanupDays(): number {
    return parseCleanupDays(this.get(SETTING_KEYS.CLEANUP_DAYS));
  }

  getCleanupTime(): TimeOfDay {
    return parseCleanupTime(this.get(SETTING_KEYS.CLEANUP_TIME));
  }

  shouldClearCodesWhenDisabled(): boolean {
    return parseBooleanFlag(this.get(SETTING_KEYS.CLEANUP_CODES_WHEN_DISABLED), true);
  }

  getDuplicateCodePattern(): string {
    return this.get(SETTING_KEYS.DUP_CODE_REGEX) ?? DEFAULT_DUPLICATE_CODE_PATTERN;
  }

  /**
   * Merge keys into the file; a null value removes the key
   */
  update(patch: Record<string, string | null>): Promise<Record<string, string>> {
    return this.writeLock.runExclusive(async () => {
      const current = this.read();

      for (const [key, value] of Object.entries(patch)) {
        if (value === null) {
          delete current[key];
        } else {
          current[key] = value;
        }
      }

      await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
      const body = Object.entries(current)
        .map(([key, value]) => `${key}=${formatEnvValue(value)}\n`)
        .join('');
      await fs.promises.writeFile(this.filePath, body, 'utf8');

      return current;
    });
  }
}

function isMissingFile(error: unknown): boolean {
  return (
    error instanceof Error && 'code' in error && error.code === 'ENOENT'
  );
}

/**
 * Quote values that dotenv would otherwise trim or cut at `#`
 */
export function formatEnvValue(value: string): string {
  if (/^[^\s#'"`]*$/.test(value)) {
    return value;
  }
  for (const quote of ["'", '`']) {
    if (!value.includes(quote)) {
      return `${quote}${value}${quote}`;
    }
  }
  return `"${value}"`;
}
