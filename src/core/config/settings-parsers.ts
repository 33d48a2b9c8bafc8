import {
  DEFAULT_CLEANUP_DAYS,
  DEFAULT_CLEANUP_TIME,
  TimeOfDay,
} from '../interfaces';

const INTEGER = /^\s*[+-]?\d+\s*$/;
const TRUE_VALUES = ['1', 'true', 'yes', 'on'];
const FALSE_VALUES = ['0', 'false', 'no', 'off'];

/**
 * Parse `HH:MM`; anything out of range falls back to the default
 */
export function parseCleanupTime(value: string | undefined): TimeOfDay {
  if (!value) {
    return { ...DEFAULT_CLEANUP_TIME };
  }

  const [hourPart, minutePart] = value.trim().split(':', 2);
  if (
    hourPart === undefined ||
    minutePart === undefined ||
    !INTEGER.test(hourPart) ||
    !INTEGER.test(minutePart)
  ) {
    return { ...DEFAULT_CLEANUP_TIME };
  }

  const hour = parseInt(hourPart, 10);
  const minute = parseInt(minutePart, 10);
  if (hour < 0 || hour > 23 || minute < 0 || minute > 59) {
    return { ...DEFAULT_CLEANUP_TIME };
  }

  return { hour, minute };
}

export function isValidCleanupTime(value: string): boolean {
  const parts = value.trim().split(':');
  if (parts.length !== 2 || !parts.every((p) => /^\d{1,2}$/.test(p))) {
    return false;
  }
  const [hour, minute] = parts.map((p) => parseInt(p, 10));
  return hour <= 23 && minute <= 59;
}

export function parseCleanupDays(value: string | undefined): number {
  if (value === undefined || !INTEGER.test(value)) {
    return DEFAULT_CLEANUP_DAYS;
  }
  return parseInt(value, 10);
}

export function parseBooleanFlag(
  value: string | undefined,
  fallback: boolean,
): boolean {
  if (value === undefined) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.includes(normalized)) return true;
  if (FALSE_VALUES.includes(normalized)) return false;
  return fallback;
}

export function formatCleanupTime(time: TimeOfDay): string {
  return `${String(time.hour).padStart(2, '0')}:${String(time.minute).padStart(2, '0')}`;
}

/**
 * Comma separated chat ids; blanks are skipped, order is kept
 */
export function parseChatIds(value: string | undefined): number[] {
  if (!value) {
    return [];
  }

  const ids: number[] = [];
  for (const part of value.split(',')) {
    const trimmed = part.trim();
    if (!trimmed) continue;
    if (!INTEGER.test(trimmed)) {
      throw new Error(`Invalid chat id '${trimmed}'`);
    }
    const id = parseInt(trimmed, 10);
    if (!ids.includes(id)) {
      ids.push(id);
    }
  }
  return ids;
}
