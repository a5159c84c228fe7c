/**
 * Diagnostics for logtap itself, written to stderr so stdout carries only
 * log records
 */

import debug from 'debug';
import chalk from 'chalk';
import { LogLevel } from './types';

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/** Namespaces printed at each level; `success` shares info's threshold */
const LEVEL_NAMESPACES: Record<LogLevel, string[]> = {
  debug: ['logtap:debug'],
  info: ['logtap:info', 'logtap:success'],
  warn: ['logtap:warn'],
  error: ['logtap:error'],
};

const channels = {
  debug: debug('logtap:debug'),
  info: debug('logtap:info'),
  success: debug('logtap:success'),
  warn: debug('logtap:warn'),
  error: debug('logtap:error'),
};

debug.log = (...args: unknown[]) => console.error(...args);

class Logger {
  private level: LogLevel;

  constructor(level: LogLevel = 'warn') {
    this.level = level;
    this.enableNamespaces();
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
    this.enableNamespaces();
  }

  private enableNamespaces(): void {
    const threshold = LEVEL_ORDER[this.level];
    const enabled = LEVELS.filter(level => LEVEL_ORDER[level] >= threshold).flatMap(
      level => LEVEL_NAMESPACES[level]
    );

    // Overrides DEBUG from the environment
    debug.enable(enabled.join(','));
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.enabled('debug')) {
      channels.debug(chalk.gray(`[DEBUG] ${message}`), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.enabled('info')) {
      channels.info(chalk.blue(`[INFO] ${message}`), ...args);
    }
  }

  success(message: string, ...args: unknown[]): void {
    if (this.enabled('info')) {
      channels.success(chalk.green(`[SUCCESS] ${message}`), ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.enabled('warn')) {
      channels.warn(chalk.yellow(`[WARN] ${message}`), ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.enabled('error')) {
      channels.error(chalk.red(`[ERROR] ${message}`), ...args);
    }
  }
}

export const logger = new Logger();
