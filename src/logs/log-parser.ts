/**
 * Parser for logcat lines in threadtime, time and epoch formats
 *
 * Example lines:
 * 01-01 12:00:00.000  1234  1235 I MyTag: hello world
 * 1700000000.123456 10 11 W Net: timeout
 */

import { LogFormat, LogRecord } from '../types';
import { LOG_PATTERNS } from './log-patterns';
import { isSeverity } from './severity';

/**
 * Options for parsing a single line
 */
export interface ParseOptions {
  /**
   * Year used to complete MM-DD dates. Defaults to the current calendar year,
   * so logs that span New Year's Eve land in the wrong year.
   */
  referenceYear?: number;
}

const FRACTION_DIGITS = 6;

/**
 * Parses a single logcat line into a record
 *
 * @param line - Raw line without its terminator
 * @param format - Format the line is expected to be in
 * @param options - Parse options
 * @returns Frozen record, or null if the line does not match the format's grammar
 */
export function parseLogLine(
  line: string,
  format: LogFormat,
  options: ParseOptions = {}
): LogRecord | null {
  const match = LOG_PATTERNS[format].exec(line);
  if (!match?.groups) {
    return null;
  }

  const { date, time, epoch, pid, tid, level, tag, msg } = match.groups;

  let tsRaw: string;
  let tsIso: string | null;
  if (format === 'epoch') {
    tsRaw = epoch;
    tsIso = epochToIso(epoch);
  } else {
    tsRaw = `${date} ${time}`;
    tsIso = localDateTimeToIso(date, time, options.referenceYear ?? new Date().getFullYear());
  }

  const pidValue = parseId(pid);
  const tidValue = parseId(tid);
  if (tsIso === null || !isSeverity(level) || pidValue === undefined || tidValue === undefined) {
    return null;
  }

  return Object.freeze({
    ts_raw: tsRaw,
    ts_iso: tsIso,
    pid: pidValue,
    tid: tidValue,
    level,
    tag: tag.trim(),
    msg,
  });
}

/**
 * Parses a pid or tid group: null when the format has none, undefined when
 * the digits do not fit in a safe integer
 */
function parseId(digits: string | undefined): number | null | undefined {
  if (digits === undefined) {
    return null;
  }
  const value = parseInt(digits, 10);
  return Number.isSafeInteger(value) ? value : undefined;
}

/**
 * Converts "seconds.fraction" to a UTC ISO timestamp with microsecond precision.
 * The fraction is taken from the text rather than from a float so that
 * 1700000000.123456 stays .123456.
 */
export function epochToIso(epoch: string): string | null {
  const [secondsStr, fractionStr = ''] = epoch.split('.');
  const date = new Date(parseInt(secondsStr, 10) * 1000);
  if (isNaN(date.getTime())) {
    return null;
  }

  const whole = date.toISOString().replace(/\.\d{3}Z$/, '');
  return `${whole}.${toMicros(fractionStr)}Z`;
}

/**
 * Builds "YYYY-MM-DDTHH:MM:SS.ffffff" from logcat's "MM-DD" and
 * "HH:MM:SS.frac". The result carries no zone: logcat prints device-local time.
 *
 * @returns The ISO string, or null if the date or time of day is impossible
 */
export function localDateTimeToIso(date: string, time: string, year: number): string | null {
  const [monthStr, dayStr] = date.split('-');
  const [clock, fraction = ''] = time.split('.');
  const [hourStr, minuteStr, secondStr] = clock.split(':');

  const month = parseInt(monthStr, 10);
  const day = parseInt(dayStr, 10);
  const hour = parseInt(hourStr, 10);
  const minute = parseInt(minuteStr, 10);
  const second = parseInt(secondStr, 10);

  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  if (hour > 23 || minute > 59 || second > 59) return null;

  const yyyy = String(year).padStart(4, '0');
  return `${yyyy}-${monthStr}-${dayStr}T${clock}.${toMicros(fraction)}`;
}

function daysInMonth(year: number, month: number): number {
  // Day 0 of the next month is the last day of this one
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function toMicros(fraction: string): string {
  return fraction.slice(0, FRACTION_DIGITS).padEnd(FRACTION_DIGITS, '0');
}
