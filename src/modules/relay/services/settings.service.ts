import { BadRequestException, Injectable, Inject, Logger } from '@nestjs/common';
import {
  EnvFileSettings,
  SETTING_KEYS,
  formatCleanupTime,
  isValidCleanupTime,
  isValidPattern,
} from '../../../core';
import { RUNTIME_SETTINGS } from '../constants';

export interface RetentionSettings {
  cleanupDays: number;
  cleanupTime: string;
  clearCodesWhenDisabled: boolean;
}

export interface RetentionSettingsPatch {
  cleanupDays?: number | null;
  cleanupTime?: string | null;
  clearCodesWhenDisabled?: boolean | null;
}

/**
 * Settings Service
 *
 * Reads and writes the hot settings in the `.env` file. A null value
 * removes the key so the built-in default applies again.
 */
@Injectable()
export class SettingsService {
  private readonly logger = new Logger(SettingsService.name);

  constructor(
    @Inject(RUNTIME_SETTINGS)
    private readonly settings: EnvFileSettings,
  ) {}

  getRetention(): RetentionSettings {
    return {
      cleanupDays: this.settings.getCleanupDays(),
      cleanupTime: formatCleanupTime(this.settings.getCleanupTime()),
      clearCodesWhenDisabled: this.settings.shouldClearCodesWhenDisabled(),
    };
  }

  async updateRetention(patch: RetentionSettingsPatch): Promise<RetentionSettings> {
    const update: Record<string, string | null> = {};

    if (patch.cleanupDays !== undefined) {
      update[SETTING_KEYS.CLEANUP_DAYS] =
        patch.cleanupDays === null ? null : String(patch.cleanupDays);
    }

    if (patch.cleanupTime !== undefined) {
      if (patch.cleanupTime !== null && !isValidCleanupTime(patch.cleanupTime)) {
        throw new BadRequestException(`Invalid cleanup time '${patch.cleanupTime}', expected HH:MM`);
      }
      update[SETTING_KEYS.CLEANUP_TIME] =
        patch.cleanupTime === null ? null : patch.cleanupTime.trim();
    }

    if (patch.clearCodesWhenDisabled !== undefined) {
      update[SETTING_KEYS.CLEANUP_CODES_WHEN_DISABLED] =
        patch.clearCodesWhenDisabled === null ? null : String(patch.clearCodesWhenDisabled);
    }

    await this.settings.update(update);
    this.logger.log(`Retention settings updated: ${Object.keys(update).join(', ') || 'none'}`);
    return this.getRetention();
  }

  getDuplicateCodePattern(): { pattern: string; custom: boolean } {
    return {
      pattern: this.settings.getDuplicateCodePattern(),
      custom: this.settings.get(SETTING_KEYS.DUP_CODE_REGEX) !== undefined,
    };
  }

  /**
   * Save a new duplicate-code pattern; empty restores the default
   */
  async updateDuplicateCodePattern(
    pattern: string | null | undefined,
  ): Promise<{ pattern: string; custom: boolean }> {
    const trimmed = pattern?.trim() ?? '';

    if (trimmed && !isValidPattern(trimmed)) {
      this.logger.warn(`Invalid regex pattern provided: ${trimmed}`);
      throw new BadRequestException(`Invalid regular expression: ${trimmed}`);
    }

    await this.settings.update({ [SETTING_KEYS.DUP_CODE_REGEX]: trimmed || null });
    return this.getDuplicateCodePattern();
  }
}
