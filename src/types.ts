/**
 * Shared types for the logcat pipeline
 */

/** Verbosity of logtap's own diagnostics (stderr), not of the parsed logs */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Logcat severity letters, lowest to highest
 */
export const SEVERITIES = ['V', 'D', 'I', 'W', 'E', 'F'] as const;

export type Severity = (typeof SEVERITIES)[number];

/**
 * Wire formats understood by the parser (`adb logcat -v <format>`)
 */
export const LOG_FORMATS = ['threadtime', 'time', 'epoch'] as const;

export type LogFormat = (typeof LOG_FORMATS)[number];

export type DetectedFormat = LogFormat | 'unknown';

/** Format option accepted on the command line; `auto` is file-only */
export type FormatOption = LogFormat | 'auto';

/**
 * Canonical record produced by the parser.
 *
 * Field names are snake_case because they are also the JSON and CSV
 * column names.
 */
export interface LogRecord {
  readonly ts_raw: string;
  readonly ts_iso: string;
  readonly pid: number | null;
  readonly tid: number | null;
  readonly level: Severity;
  readonly tag: string;
  readonly msg: string;
}

/**
 * Options for launching `adb logcat`
 */
export interface AdbSourceConfig {
  type: 'adb';
  /** Path to the adb executable */
  adbPath: string;
  /** Device serial passed as `-s` */
  serial?: string;
  /** Logcat buffer (main, system, events, radio, crash, all) */
  buffer: string;
  /** Output format requested from logcat */
  format: LogFormat;
  /** Run `logcat -c` before streaming */
  clear: boolean;
}

/**
 * Options for reading a saved log file
 */
export interface FileSourceConfig {
  type: 'file';
  path: string;
  /** Keep reading as the file grows (like tail -f) */
  follow: boolean;
  format: FormatOption;
}

export type SourceConfig = AdbSourceConfig | FileSourceConfig;

/**
 * Independent filter criteria; anything left undefined imposes no constraint
 */
export interface FilterOptions {
  minLevel?: Severity;
  tags?: string[];
  grep?: string;
  contains?: string;
  ignoreCase?: boolean;
  pid?: number;
}

export interface OutputOptions {
  /** Colorize the console severity letter */
  color: boolean;
  /** JSON Lines output path */
  jsonPath?: string;
  /** Indent width for JSON output */
  jsonIndent?: number;
  /** CSV output path */
  csvPath?: string;
  /** Keep console output when a file sink is requested */
  console: boolean;
}
