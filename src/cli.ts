#!/usr/bin/env node

import { Command } from 'commander';
import { LogLevel, Severity, SourceConfig } from './types';
import { logger } from './logger';
import { isLogFormat, isSeverity } from './logs';
import { streamCommand, StreamCommandOptions } from './commands/stream';

/**
 * Options as commander hands them over, before validation
 */
export interface RawCliOptions {
  adb?: boolean;
  input?: string;
  serial?: string;
  adbPath: string;
  buffer: string;
  format: string;
  clear?: boolean;
  follow?: boolean;
  minLevel?: string;
  tag?: string[];
  grep?: string;
  contains?: string;
  ignoreCase?: boolean;
  pid?: string;
  color: boolean;
  json?: string;
  jsonIndent?: string;
  csv?: string;
  console?: boolean;
  logLevel: string;
}

export interface BuildOptionsResult {
  success: true;
  options: StreamCommandOptions;
  logLevel: LogLevel;
}

export interface BuildOptionsError {
  success: false;
  error: string;
}

const LOG_LEVELS: readonly string[] = ['debug', 'info', 'warn', 'error'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.includes(value);
}

/**
 * Parses a severity letter, case-insensitively
 * @param input - One of V, D, I, W, E, F
 * @returns The uppercase severity, or undefined if the letter is not a severity
 */
export function parseSeverity(input: string): Severity | undefined {
  const upper = input.trim().toUpperCase();
  return isSeverity(upper) ? upper : undefined;
}

/**
 * Parses a non-negative decimal integer
 * @param input - Digits only, e.g. "1234"
 * @returns The number, or undefined if the input is not a plain integer or
 * is too large to represent exactly
 */
export function parseInteger(input: string): number | undefined {
  const trimmed = input.trim();
  if (!/^\d+$/.test(trimmed)) {
    return undefined;
  }
  const value = parseInt(trimmed, 10);
  return Number.isSafeInteger(value) ? value : undefined;
}

/**
 * Validates raw CLI options into stream command options
 * @param raw - Options as parsed by commander
 * @returns BuildOptionsResult on success, or BuildOptionsError describing the first problem
 */
export function buildStreamOptions(raw: RawCliOptions): BuildOptionsResult | BuildOptionsError {
  if (!isLogLevel(raw.logLevel)) {
    return { success: false, error: `Invalid log level: ${raw.logLevel}` };
  }

  if (raw.adb && raw.input !== undefined) {
    return { success: false, error: '--adb and --input cannot be used together' };
  }
  if (!raw.adb && raw.input === undefined) {
    return { success: false, error: 'One of --adb or --input is required' };
  }

  let source: SourceConfig;
  if (raw.input !== undefined) {
    if (raw.clear) {
      return { success: false, error: '--clear can only be used with --adb' };
    }
    if (raw.format !== 'auto' && !isLogFormat(raw.format)) {
      return {
        success: false,
        error: `Invalid format: ${raw.format} (expected threadtime, time, epoch or auto)`,
      };
    }
    source = {
      type: 'file',
      path: raw.input,
      follow: raw.follow ?? false,
      format: raw.format,
    };
  } else {
    if (raw.follow) {
      return { success: false, error: '--follow can only be used with --input' };
    }
    if (!isLogFormat(raw.format)) {
      return {
        success: false,
        error: `Invalid format: ${raw.format} (expected threadtime, time or epoch; auto requires --input)`,
      };
    }
    source = {
      type: 'adb',
      adbPath: raw.adbPath,
      serial: raw.serial,
      buffer: raw.buffer,
      format: raw.format,
      clear: raw.clear ?? false,
    };
  }

  let minLevel: Severity | undefined;
  if (raw.minLevel !== undefined) {
    minLevel = parseSeverity(raw.minLevel);
    if (minLevel === undefined) {
      return {
        success: false,
        error: `Invalid minimum level: ${raw.minLevel} (expected one of V, D, I, W, E, F)`,
      };
    }
  }

  let pid: number | undefined;
  if (raw.pid !== undefined) {
    pid = parseInteger(raw.pid);
    if (pid === undefined) {
      return { success: false, error: `Invalid pid: ${raw.pid}` };
    }
  }

  let jsonIndent: number | undefined;
  if (raw.jsonIndent !== undefined) {
    if (raw.json === undefined) {
      return { success: false, error: '--json-indent requires --json' };
    }
    jsonIndent = parseInteger(raw.jsonIndent);
    if (jsonIndent === undefined) {
      return { success: false, error: `Invalid JSON indent: ${raw.jsonIndent}` };
    }
  }

  return {
    success: true,
    logLevel: raw.logLevel,
    options: {
      source,
      filter: {
        minLevel,
        tags: raw.tag,
        grep: raw.grep,
        contains: raw.contains,
        ignoreCase: raw.ignoreCase ?? false,
        pid,
      },
      output: {
        color: raw.color,
        jsonPath: raw.json,
        jsonIndent,
        csvPath: raw.csv,
        console: raw.console ?? false,
      },
    },
  };
}

const program = new Command();

program
  .name('logtap')
  .description('Stream, filter and export Android logcat output from adb or a log file')
  .version('0.1.0')
  .option('--adb', 'Read from a device through adb logcat')
  .option('--input <path>', 'Read from a saved log file')
  .option('--serial <serial>', 'Device serial passed to adb -s')
  .option('--adb-path <path>', 'Path to the adb executable', 'adb')
  .option('--buffer <name>', 'Logcat buffer: main, system, events, radio, crash, all', 'main')
  .option(
    '--format <format>',
    'Line format: threadtime, time, epoch (auto detects it, --input only)',
    'threadtime'
  )
  .option('--clear', 'Clear the logcat buffer before streaming (--adb only)')
  .option('-f, --follow', 'Keep reading as the input file grows (--input only)')
  .option('--min-level <level>', 'Minimum severity: V, D, I, W, E, F')
  .option('--tag <tags...>', 'Only show these exact tags')
  .option('--grep <regex>', 'Only show messages matching a regular expression')
  .option('--contains <text>', 'Only show messages containing this text')
  .option('-i, --ignore-case', 'Case-insensitive --grep and --contains')
  .option('--pid <pid>', 'Only show records from this process id')
  .option('--no-color', 'Disable colored console output')
  .option('--json <path>', 'Write records to a JSON Lines file')
  .option('--json-indent <n>', 'Indent JSON output by n spaces')
  .option('--csv <path>', 'Write records to a CSV file')
  .option('--console', 'Keep console output when writing --json or --csv')
  .option('--log-level <level>', 'Diagnostic log level: debug, info, warn, error', 'warn')
  .action(async (raw: RawCliOptions) => {
    const built = buildStreamOptions(raw);
    if (!built.success) {
      logger.error(built.error);
      process.exit(1);
    }

    logger.setLevel(built.logLevel);
    logger.debug('Configuration:', JSON.stringify(built.options, null, 2));

    await streamCommand(built.options);
  });

// Only parse arguments if this file is run directly (not imported as a module)
if (require.main === module) {
  program.parseAsync().catch(error => {
    logger.error('Fatal error:', error);
    process.exit(1);
  });
}
