/**
 * Record formatting for console, JSON and CSV output
 */

import chalk from 'chalk';
import { LogRecord, Severity } from '../types';

/**
 * Options for record formatting
 */
export interface LogFormatterOptions {
  /** Whether to colorize the severity letter. Defaults to true if stdout is TTY */
  colorize?: boolean;
  /** Indent width for JSON output; undefined means a single line */
  jsonIndent?: number;
}

const LEVEL_STYLES: Record<Severity, (text: string) => string> = {
  V: text => chalk.dim(text),
  D: text => text,
  I: text => chalk.green(text),
  W: text => chalk.yellow(text),
  E: text => chalk.red(text),
  F: text => chalk.bold.red(text),
};

/**
 * Formats records into output lines. Every method returns its text with
 * the trailing newline.
 */
export class LogFormatter {
  private colorize: boolean;
  private jsonIndent?: number;

  constructor(options: LogFormatterOptions = {}) {
    this.colorize = options.colorize ?? process.stdout.isTTY ?? false;
    this.jsonIndent = options.jsonIndent;
  }

  /**
   * Formats a record as `<HH:MM:SS.mmm> <pid>/<tid> <level> <tag>: <msg>`,
   * with `-` for a missing pid or tid
   */
  formatConsole(record: LogRecord): string {
    const time = timeOfDay(record.ts_iso);
    const pid = record.pid ?? '-';
    const tid = record.tid ?? '-';
    const level = this.colorize ? LEVEL_STYLES[record.level](record.level) : record.level;

    return `${time} ${pid}/${tid} ${level} ${record.tag}: ${record.msg}\n`;
  }

  /**
   * Formats a record as JSON, keys in record order and null for a missing pid or tid
   */
  formatJson(record: LogRecord): string {
    const ordered: LogRecord = {
      ts_raw: record.ts_raw,
      ts_iso: record.ts_iso,
      pid: record.pid,
      tid: record.tid,
      level: record.level,
      tag: record.tag,
      msg: record.msg,
    };
    return JSON.stringify(ordered, null, this.jsonIndent) + '\n';
  }

  /**
   * Formats a CSV header row
   */
  formatCsvHeader(columns: readonly string[]): string {
    return columns.map(escapeCsvField).join(',') + '\n';
  }

  /**
   * Formats a CSV data row; null and undefined become empty cells
   */
  formatCsvRow(values: readonly unknown[]): string {
    return values.map(v => escapeCsvField(v === null || v === undefined ? '' : String(v))).join(',') + '\n';
  }
}

/**
 * Extracts HH:MM:SS.mmm from an ISO timestamp
 */
export function timeOfDay(tsIso: string): string {
  const tIndex = tsIso.indexOf('T');
  return tsIso.substring(tIndex + 1, tIndex + 13);
}

/**
 * Quotes a CSV field if it contains a comma, quote or line break (RFC 4180)
 */
export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}
