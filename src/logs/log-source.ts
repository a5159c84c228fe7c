/**
 * Line sources: a running `adb logcat` process or a log file
 */

import * as fs from 'fs';
import * as readline from 'readline';
import { StringDecoder } from 'string_decoder';
import { ChildProcess } from 'child_process';
import execa, { ExecaChildProcess } from 'execa';
import { AdbSourceConfig, FileSourceConfig, SourceConfig } from '../types';
import { logger } from '../logger';

/** Delay between reads at end of file in follow mode */
export const FOLLOW_POLL_INTERVAL_MS = 200;

const READ_CHUNK_SIZE = 64 * 1024;

/**
 * Ordered sequence of raw lines (terminators stripped) that owns its
 * underlying resource. A source can be iterated once; `close()` releases the
 * resource, ends the sequence and may be called any number of times.
 */
export interface LineSource extends AsyncIterable<string> {
  close(): Promise<void>;
}

/**
 * Opens the line source described by the config
 *
 * @throws Error if the file cannot be opened or adb cannot be launched
 */
export async function openLineSource(config: SourceConfig): Promise<LineSource> {
  if (config.type === 'adb') {
    return spawnLogcat(config);
  }
  return openFileSource(config.path, { follow: config.follow });
}

/**
 * Builds the adb argument list, e.g. `-s emulator-5554 logcat -v threadtime -b radio`
 */
export function buildLogcatArgs(config: AdbSourceConfig): string[] {
  const args: string[] = [];
  if (config.serial) {
    args.push('-s', config.serial);
  }
  args.push('logcat', '-v', config.format);
  if (config.buffer !== 'main') {
    args.push('-b', config.buffer);
  }
  return args;
}

/**
 * Launches `adb logcat` and exposes its stdout as a line source
 *
 * @throws Error if the clear step fails or adb cannot be launched
 */
export async function spawnLogcat(config: AdbSourceConfig): Promise<LineSource> {
  const args = buildLogcatArgs(config);

  if (config.clear) {
    const clearArgs = [...args, '-c'];
    logger.debug(`Clearing log buffer: ${config.adbPath} ${clearArgs.join(' ')}`);
    try {
      await execa(config.adbPath, clearArgs);
    } catch (error) {
      throw new Error(
        `Failed to clear log buffer: ${error instanceof Error ? error.message : error}`
      );
    }
  }

  logger.debug(`Starting: ${config.adbPath} ${args.join(' ')}`);

  // Output is unbounded: stream it instead of buffering, and let adb's own
  // errors reach the terminal
  const proc = execa(config.adbPath, args, {
    reject: false,
    buffer: false,
    stderr: 'inherit',
  });

  await waitForSpawn(proc, config.adbPath);
  return new ProcessLineSource(proc);
}

function waitForSpawn(child: ChildProcess, command: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const onSpawn = () => {
      child.off('error', onError);
      resolve();
    };
    const onError = (error: Error) => {
      child.off('spawn', onSpawn);
      reject(new Error(`Failed to launch ${command}: ${error.message}`));
    };
    child.once('spawn', onSpawn);
    child.once('error', onError);
  });
}

class ProcessLineSource implements LineSource {
  private readonly lines: readline.Interface;
  private started = false;
  private closed = false;

  constructor(private readonly proc: ExecaChildProcess) {
    if (!proc.stdout) {
      throw new Error('adb process has no stdout');
    }
    this.lines = readline.createInterface({
      input: proc.stdout,
      crlfDelay: Infinity,
    });
  }

  async *[Symbol.asyncIterator](): AsyncIterator<string> {
    if (this.started) {
      throw new Error('Line source can only be iterated once');
    }
    this.started = true;

    try {
      for await (const line of this.lines) {
        yield line;
      }
      const result = await this.proc;
      logger.debug(`adb exited with code ${result.exitCode}`);
    } finally {
      await this.close();
    }
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.lines.close();
    this.proc.kill('SIGTERM');
    await this.proc;
  }
}

/**
 * Options for reading a log file
 */
export interface FileSourceOptions {
  /** Keep polling at end of file instead of ending the sequence */
  follow: FileSourceConfig['follow'];
  /** Poll interval in follow mode */
  pollIntervalMs?: number;
}

/**
 * Opens a log file as a line source. Invalid UTF-8 is replaced with U+FFFD.
 *
 * @throws Error if the file does not exist, cannot be read or is not a regular file
 */
export async function openFileSource(
  filePath: string,
  options: FileSourceOptions
): Promise<LineSource> {
  let handle: fs.promises.FileHandle;
  try {
    handle = await fs.promises.open(filePath, 'r');
  } catch (error) {
    throw new Error(
      `Cannot open log file ${filePath}: ${error instanceof Error ? error.message : error}`
    );
  }

  const stat = await handle.stat();
  if (!stat.isFile()) {
    await handle.close();
    throw new Error(`Not a regular file: ${filePath}`);
  }

  logger.debug(`Reading logs from file: ${filePath}${options.follow ? ' (follow)' : ''}`);
  return new FileLineSource(
    handle,
    options.follow,
    options.pollIntervalMs ?? FOLLOW_POLL_INTERVAL_MS
  );
}

class FileLineSource implements LineSource {
  private started = false;
  private closed = false;

  constructor(
    private readonly handle: fs.promises.FileHandle,
    private readonly follow: boolean,
    private readonly pollIntervalMs: number
  ) {}

  async *[Symbol.asyncIterator](): AsyncIterator<string> {
    if (this.started) {
      throw new Error('Line source can only be iterated once');
    }
    this.started = true;

    const decoder = new StringDecoder('utf8');
    const buffer = Buffer.alloc(READ_CHUNK_SIZE);
    let position = 0;
    let partial = '';

    try {
      while (!this.closed) {
        const { bytesRead } = await this.handle.read(buffer, 0, buffer.length, position);

        if (bytesRead === 0) {
          if (!this.follow) {
            break;
          }
          // In follow mode an unterminated last line waits for its newline
          await new Promise(resolve => setTimeout(resolve, this.pollIntervalMs));
          continue;
        }

        position += bytesRead;
        partial += decoder.write(buffer.subarray(0, bytesRead));

        let newline: number;
        while ((newline = partial.indexOf('\n')) !== -1) {
          const line = partial.slice(0, newline);
          partial = partial.slice(newline + 1);
          yield stripCarriageReturn(line);
          if (this.closed) {
            return;
          }
        }
      }

      partial += decoder.end();
      if (!this.closed && partial.length > 0) {
        yield stripCarriageReturn(partial);
      }
    } finally {
      await this.close();
    }
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.handle.close();
  }
}

function stripCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}
