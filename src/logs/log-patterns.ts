/**
 * Grammars for the logcat output formats and format detection
 *
 * Example lines:
 * threadtime: 01-01 12:00:00.000  1234  1235 I MyTag: hello world
 * time:       01-01 12:00:00.000 I MyTag: hello world
 * epoch:      1700000000.123456 10 11 W Net: timeout
 *
 * Only the space-separated `time` layout is recognized; logcat's classic
 * `I/Tag(pid)` rendering is not.
 */

import { DetectedFormat, LOG_FORMATS, LogFormat } from '../types';

/**
 * Anchored patterns with named groups.
 *
 * Groups shared by all formats: level, tag, msg.
 * threadtime/time: date (MM-DD), time (HH:MM:SS.frac)
 * threadtime/epoch: pid, tid
 * epoch: epoch (seconds.fraction)
 */
export const LOG_PATTERNS: Readonly<Record<LogFormat, RegExp>> = {
  threadtime:
    /^(?<date>\d\d-\d\d)\s+(?<time>\d\d:\d\d:\d\d\.\d+)\s+(?<pid>\d+)\s+(?<tid>\d+)\s+(?<level>[VDIWEF])\s+(?<tag>[^:]+):\s+(?<msg>.*)$/,
  time:
    /^(?<date>\d\d-\d\d)\s+(?<time>\d\d:\d\d:\d\d\.\d+)\s+(?<level>[VDIWEF])\s+(?<tag>[^:]+):\s+(?<msg>.*)$/,
  epoch:
    /^(?<epoch>\d+\.\d+)\s+(?<pid>\d+)\s+(?<tid>\d+)\s+(?<level>[VDIWEF])\s+(?<tag>[^:]+):\s+(?<msg>.*)$/,
};

/** Order in which formats are tried during detection */
export const DETECTION_ORDER: readonly LogFormat[] = ['threadtime', 'time', 'epoch'];

/**
 * Determines which format a line is written in
 *
 * @param line - Raw line without its terminator
 * @returns The first format whose grammar matches the whole line, or 'unknown'
 */
export function detectFormat(line: string): DetectedFormat {
  for (const format of DETECTION_ORDER) {
    if (LOG_PATTERNS[format].test(line)) {
      return format;
    }
  }
  return 'unknown';
}

const FORMAT_NAMES: readonly string[] = LOG_FORMATS;

/**
 * Type guard for format names coming from user input
 */
export function isLogFormat(value: string): value is LogFormat {
  return FORMAT_NAMES.includes(value);
}
