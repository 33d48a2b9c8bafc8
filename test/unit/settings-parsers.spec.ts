import {
  parseCleanupTime,
  parseCleanupDays,
  parseBooleanFlag,
  parseChatIds,
  isValidCleanupTime,
  formatCleanupTime,
  secondsUntilNextRun,
  MIN_WAIT_SECONDS,
  SourceChatList,
} from '../../src';

describe('Settings Parsers', () => {
  describe('parseCleanupTime', () => {
    it('should parse HH:MM', () => {
      expect(parseCleanupTime('07:30')).toEqual({ hour: 7, minute: 30 });
      expect(parseCleanupTime(' 7:5 ')).toEqual({ hour: 7, minute: 5 });
    });

    it('should fall back to 00:05 for missing or invalid values', () => {
      expect(parseCleanupTime(undefined)).toEqual({ hour: 0, minute: 5 });
      expect(parseCleanupTime('24:00')).toEqual({ hour: 0, minute: 5 });
      expect(parseCleanupTime('12:60')).toEqual({ hour: 0, minute: 5 });
      expect(parseCleanupTime('noon')).toEqual({ hour: 0, minute: 5 });
    });
  });

  describe('isValidCleanupTime', () => {
    it('should accept in-range times', () => {
      expect(isValidCleanupTime('23:59')).toBe(true);
      expect(isValidCleanupTime('7:30')).toBe(true);
    });

    it('should reject malformed or out-of-range times', () => {
      expect(isValidCleanupTime('24:00')).toBe(false);
      expect(isValidCleanupTime('07:30:00')).toBe(false);
      expect(isValidCleanupTime('ab:cd')).toBe(false);
    });
  });

  describe('parseCleanupDays', () => {
    it('should parse integers including zero and negatives', () => {
      expect(parseCleanupDays('0')).toBe(0);
      expect(parseCleanupDays('-1')).toBe(-1);
      expect(parseCleanupDays(' 14 ')).toBe(14);
    });

    it('should default to 30', () => {
      expect(parseCleanupDays(undefined)).toBe(30);
      expect(parseCleanupDays('two weeks')).toBe(30);
    });
  });

  describe('parseBooleanFlag', () => {
    it('should read common spellings', () => {
      expect(parseBooleanFlag('false', true)).toBe(false);
      expect(parseBooleanFlag('YES', false)).toBe(true);
      expect(parseBooleanFlag('0', true)).toBe(false);
    });

    it('should use the fallback for unknown values', () => {
      expect(parseBooleanFlag('maybe', true)).toBe(true);
      expect(parseBooleanFlag(undefined, false)).toBe(false);
    });
  });

  describe('parseChatIds', () => {
    it('should keep order, skip blanks and drop repeats', () => {
      expect(parseChatIds('-1001, 42, ,-1001')).toEqual([-1001, 42]);
    });

    it('should return an empty list for no value', () => {
      expect(parseChatIds(undefined)).toEqual([]);
      expect(parseChatIds('')).toEqual([]);
    });

    it('should reject non-numeric ids', () => {
      expect(() => parseChatIds('42,abc')).toThrow("Invalid chat id 'abc'");
    });
  });

  it('should format times with two digits', () => {
    expect(formatCleanupTime({ hour: 7, minute: 5 })).toBe('07:05');
  });
});

describe('secondsUntilNextRun', () => {
  const now = new Date(2024, 0, 15, 10, 0, 0);

  it('should count down to a later time today', () => {
    expect(secondsUntilNextRun({ hour: 10, minute: 30 }, now)).toBe(1800);
  });

  it('should roll over to tomorrow when the time is now or past', () => {
    expect(secondsUntilNextRun({ hour: 10, minute: 0 }, now)).toBe(86400);
    expect(secondsUntilNextRun({ hour: 9, minute: 0 }, now)).toBe(23 * 3600);
  });

  it('should never wait less than the minimum', () => {
    const almost = new Date(2024, 0, 15, 9, 59, 30);
    expect(secondsUntilNextRun({ hour: 10, minute: 0 }, almost)).toBe(MIN_WAIT_SECONDS);
  });
});

describe('SourceChatList', () => {
  it('should keep insertion order and ignore repeats', () => {
    const list = new SourceChatList([-100, 5, -100]);

    expect(list.add(7)).toBe(true);
    expect(list.add(5)).toBe(false);
    expect(list.list()).toEqual([-100, 5, 7]);
    expect(list.size).toBe(3);
    expect(list.has(7)).toBe(true);
    expect(list.toString()).toBe('-100,5,7');
  });
});
