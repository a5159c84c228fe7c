/**
 * Unit tests for log-parser.ts
 */

import { epochToIso, localDateTimeToIso, parseLogLine } from './log-parser';
import { LogFormat, Severity } from '../types';

const YEAR = { referenceYear: 2026 };

describe('log-parser', () => {
  describe('parseLogLine - threadtime', () => {
    it('should parse a threadtime line', () => {
      const result = parseLogLine('01-01 12:00:00.000 1234 1235 I MyTag: hello world', 'threadtime', YEAR);

      expect(result).toEqual({
        ts_raw: '01-01 12:00:00.000',
        ts_iso: '2026-01-01T12:00:00.000000',
        pid: 1234,
        tid: 1235,
        level: 'I',
        tag: 'MyTag',
        msg: 'hello world',
      });
    });

    it('should trim padding around the tag', () => {
      const result = parseLogLine(
        '03-15 08:30:45.123  4321  4400 D ActivityManager  : Start proc 4321:com.example/u0a1',
        'threadtime',
        YEAR
      );

      expect(result).not.toBeNull();
      expect(result!.tag).toBe('ActivityManager');
      expect(result!.pid).toBe(4321);
      expect(result!.tid).toBe(4400);
      expect(result!.msg).toBe('Start proc 4321:com.example/u0a1');
      expect(result!.ts_iso).toBe('2026-03-15T08:30:45.123000');
    });

    it('should keep colons and inner whitespace in the message', () => {
      const result = parseLogLine('01-01 12:00:00.000 1 2 E Tag: a: b  ::  c ', 'threadtime', YEAR);

      expect(result!.msg).toBe('a: b  ::  c ');
    });

    it('should return null for a line in another format', () => {
      expect(parseLogLine('01-01 12:00:00.000 W Net: reset', 'threadtime', YEAR)).toBeNull();
      expect(parseLogLine('1700000000.123456 10 11 W Net: timeout', 'threadtime', YEAR)).toBeNull();
    });

    it('should return null for partial lines', () => {
      expect(parseLogLine('01-01 12:00:00.000 1234 1235 I', 'threadtime', YEAR)).toBeNull();
      expect(parseLogLine('', 'threadtime', YEAR)).toBeNull();
    });

    it('should return a frozen record', () => {
      const result = parseLogLine('01-01 12:00:00.000 1234 1235 I MyTag: hello', 'threadtime', YEAR);

      expect(Object.isFrozen(result)).toBe(true);
    });

    it('should default to the current calendar year', () => {
      const result = parseLogLine('06-15 00:00:01.5 1 1 V T: m', 'threadtime');

      expect(result!.ts_iso).toBe(`${new Date().getFullYear()}-06-15T00:00:01.500000`);
    });
  });

  describe('parseLogLine - time', () => {
    it('should parse a time line without pid and tid', () => {
      const result = parseLogLine('12-31 23:59:59.999 W Net: connection reset', 'time', YEAR);

      expect(result).toEqual({
        ts_raw: '12-31 23:59:59.999',
        ts_iso: '2026-12-31T23:59:59.999000',
        pid: null,
        tid: null,
        level: 'W',
        tag: 'Net',
        msg: 'connection reset',
      });
    });
  });

  describe('parseLogLine - epoch', () => {
    it('should convert epoch seconds to UTC', () => {
      const result = parseLogLine('1700000000.123456 10 11 W Net: timeout', 'epoch');

      expect(result).toEqual({
        ts_raw: '1700000000.123456',
        ts_iso: '2023-11-14T22:13:20.123456Z',
        pid: 10,
        tid: 11,
        level: 'W',
        tag: 'Net',
        msg: 'timeout',
      });
    });

    it('should not depend on the reference year', () => {
      const result = parseLogLine('0.000 1 1 F Boot: start', 'epoch', { referenceYear: 1999 });

      expect(result!.ts_iso).toBe('1970-01-01T00:00:00.000000Z');
    });
  });

  describe('impossible timestamps', () => {
    it.each([
      '13-01 12:00:00.000 1 2 I T: m',
      '00-10 12:00:00.000 1 2 I T: m',
      '02-30 12:00:00.000 1 2 I T: m',
      '02-29 12:00:00.000 1 2 I T: m',
      '04-31 12:00:00.000 1 2 I T: m',
      '01-01 24:00:00.000 1 2 I T: m',
      '01-01 12:60:00.000 1 2 I T: m',
    ])('should reject %s', line => {
      expect(parseLogLine(line, 'threadtime', YEAR)).toBeNull();
    });

    it('should accept February 29th in a leap year', () => {
      const result = parseLogLine('02-29 12:00:00.000 1 2 I T: m', 'threadtime', { referenceYear: 2028 });

      expect(result!.ts_iso).toBe('2028-02-29T12:00:00.000000');
    });
  });

  describe('process and thread ids', () => {
    it('should accept the largest safe integer', () => {
      const result = parseLogLine('01-01 12:00:00.000 9007199254740991 1 I T: m', 'threadtime', YEAR);

      expect(result!.pid).toBe(9007199254740991);
    });

    it.each([
      ['threadtime', '01-01 12:00:00.000 9007199254740993 1 I T: m'],
      ['threadtime', '01-01 12:00:00.000 1 99999999999999999999 I T: m'],
      ['epoch', '1700000000.123456 9007199254740993 11 W Net: timeout'],
    ] as const)('should reject a %s line whose id exceeds the safe integer range', (format, line) => {
      expect(parseLogLine(line, format, YEAR)).toBeNull();
    });
  });

  describe('field recovery', () => {
    const buildLine = (format: LogFormat, level: Severity, tag: string, msg: string): string => {
      switch (format) {
        case 'threadtime':
          return `05-05 10:11:12.131 321 654 ${level} ${tag}: ${msg}`;
        case 'time':
          return `05-05 10:11:12.131 ${level} ${tag}: ${msg}`;
        case 'epoch':
          return `1714903872.131 321 654 ${level} ${tag}: ${msg}`;
      }
    };

    const cases: [LogFormat, Severity, string, string][] = [
      ['threadtime', 'V', 'chatty', 'uid=1000(system) Binder:1_2 expire 3 lines'],
      ['threadtime', 'F', 'libc', 'Fatal signal 11 (SIGSEGV), code 1: addr 0x0'],
      ['time', 'D', 'Wifi HAL', 'key: value: other'],
      ['time', 'E', 'AndroidRuntime', 'FATAL EXCEPTION: main'],
      ['epoch', 'I', 'Net', 'GET https://example.com/path?q=1 -> 200'],
      ['epoch', 'W', 'x', ''],
    ];

    it.each(cases)('%s line should recover level %s, tag %s and message', (format, level, tag, msg) => {
      const result = parseLogLine(buildLine(format, level, tag, msg), format, YEAR);

      expect(result).not.toBeNull();
      expect(result!.level).toBe(level);
      expect(result!.tag).toBe(tag);
      expect(result!.msg).toBe(msg);
      if (format === 'time') {
        expect(result!.pid).toBeNull();
        expect(result!.tid).toBeNull();
      } else {
        expect(result!.pid).toBe(321);
        expect(result!.tid).toBe(654);
      }
    });
  });

  describe('epochToIso', () => {
    it('should pad short fractions to microseconds', () => {
      expect(epochToIso('1700000000.5')).toBe('2023-11-14T22:13:20.500000Z');
    });

    it('should truncate long fractions to microseconds', () => {
      expect(epochToIso('1700000000.1234567')).toBe('2023-11-14T22:13:20.123456Z');
    });

    it('should return null for values outside the date range', () => {
      expect(epochToIso('99999999999999999.0')).toBeNull();
    });
  });

  describe('localDateTimeToIso', () => {
    it('should pad the year to four digits', () => {
      expect(localDateTimeToIso('01-02', '03:04:05.6', 999)).toBe('0999-01-02T03:04:05.600000');
    });
  });
});
