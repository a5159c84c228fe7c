import { buildStreamOptions, parseInteger, parseSeverity, RawCliOptions } from './cli';

const defaults: RawCliOptions = {
  adbPath: 'adb',
  buffer: 'main',
  format: 'threadtime',
  color: true,
  logLevel: 'warn',
};

describe('cli', () => {
  describe('parseSeverity', () => {
    it('should accept every severity letter in either case', () => {
      expect(['v', 'D', 'i', 'W', 'e', 'F'].map(parseSeverity)).toEqual(['V', 'D', 'I', 'W', 'E', 'F']);
    });

    it('should trim surrounding whitespace', () => {
      expect(parseSeverity(' w ')).toBe('W');
    });

    it('should reject anything else', () => {
      expect(parseSeverity('X')).toBeUndefined();
      expect(parseSeverity('WARN')).toBeUndefined();
      expect(parseSeverity('')).toBeUndefined();
    });
  });

  describe('parseInteger', () => {
    it('should parse plain digits', () => {
      expect(parseInteger('1234')).toBe(1234);
      expect(parseInteger(' 0 ')).toBe(0);
    });

    it('should reject values beyond the safe integer range', () => {
      expect(parseInteger('9007199254740991')).toBe(9007199254740991);
      expect(parseInteger('9007199254740993')).toBeUndefined();
    });

    it('should reject signs, fractions and text', () => {
      expect(parseInteger('-1')).toBeUndefined();
      expect(parseInteger('1.5')).toBeUndefined();
      expect(parseInteger('12abc')).toBeUndefined();
      expect(parseInteger('')).toBeUndefined();
    });
  });

  describe('buildStreamOptions', () => {
    it('should build an adb source with default filters and console output', () => {
      const result = buildStreamOptions({ ...defaults, adb: true });

      expect(result).toEqual({
        success: true,
        logLevel: 'warn',
        options: {
          source: {
            type: 'adb',
            adbPath: 'adb',
            serial: undefined,
            buffer: 'main',
            format: 'threadtime',
            clear: false,
          },
          filter: {
            minLevel: undefined,
            tags: undefined,
            grep: undefined,
            contains: undefined,
            ignoreCase: false,
            pid: undefined,
          },
          output: {
            color: true,
            jsonPath: undefined,
            jsonIndent: undefined,
            csvPath: undefined,
            console: false,
          },
        },
      });
    });

    it('should build a followed file source with auto detection', () => {
      const result = buildStreamOptions({ ...defaults, input: 'device.log', follow: true, format: 'auto' });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.options.source).toEqual({
          type: 'file',
          path: 'device.log',
          follow: true,
          format: 'auto',
        });
      }
    });

    it('should carry filters and outputs through', () => {
      const result = buildStreamOptions({
        ...defaults,
        adb: true,
        serial: 'emulator-5554',
        clear: true,
        minLevel: 'w',
        tag: ['ActivityManager', 'Net'],
        grep: 'time(out)?',
        contains: 'socket',
        ignoreCase: true,
        pid: '4321',
        color: false,
        json: 'out.jsonl',
        jsonIndent: '2',
        csv: 'out.csv',
        console: true,
        logLevel: 'debug',
      });

      expect(result).toEqual({
        success: true,
        logLevel: 'debug',
        options: {
          source: {
            type: 'adb',
            adbPath: 'adb',
            serial: 'emulator-5554',
            buffer: 'main',
            format: 'threadtime',
            clear: true,
          },
          filter: {
            minLevel: 'W',
            tags: ['ActivityManager', 'Net'],
            grep: 'time(out)?',
            contains: 'socket',
            ignoreCase: true,
            pid: 4321,
          },
          output: {
            color: false,
            jsonPath: 'out.jsonl',
            jsonIndent: 2,
            csvPath: 'out.csv',
            console: true,
          },
        },
      });
    });

    it.each<[string, Partial<RawCliOptions>, string]>([
      ['an unknown log level', { adb: true, logLevel: 'trace' }, 'Invalid log level: trace'],
      ['both sources', { adb: true, input: 'a.log' }, '--adb and --input cannot be used together'],
      ['no source', {}, 'One of --adb or --input is required'],
      ['--clear with a file', { input: 'a.log', clear: true }, '--clear can only be used with --adb'],
      [
        'an unknown file format',
        { input: 'a.log', format: 'brief' },
        'Invalid format: brief (expected threadtime, time, epoch or auto)',
      ],
      ['--follow with adb', { adb: true, follow: true }, '--follow can only be used with --input'],
      [
        'auto with adb',
        { adb: true, format: 'auto' },
        'Invalid format: auto (expected threadtime, time or epoch; auto requires --input)',
      ],
      [
        'an unknown severity',
        { adb: true, minLevel: 'X' },
        'Invalid minimum level: X (expected one of V, D, I, W, E, F)',
      ],
      ['a non-numeric pid', { adb: true, pid: 'abc' }, 'Invalid pid: abc'],
      ['an oversized pid', { adb: true, pid: '9007199254740993' }, 'Invalid pid: 9007199254740993'],
      ['--json-indent without --json', { adb: true, jsonIndent: '2' }, '--json-indent requires --json'],
      ['a bad JSON indent', { adb: true, json: 'out.jsonl', jsonIndent: 'two' }, 'Invalid JSON indent: two'],
    ])('should reject %s', (_name, overrides, error) => {
      expect(buildStreamOptions({ ...defaults, ...overrides })).toEqual({ success: false, error });
    });
  });
});
