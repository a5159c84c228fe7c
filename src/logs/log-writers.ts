/**
 * Output writers (sinks) and the fan-out that feeds them
 */

import * as fs from 'fs';
import { LogRecord } from '../types';
import { LogFormatter } from './log-formatter';
import { logger } from '../logger';

/**
 * A destination for accepted records. `close()` flushes and releases the
 * writer; it is safe to call before any write and more than once.
 */
export interface LogWriter {
  write(record: LogRecord): void;
  close(): void;
}

/**
 * Minimal stream interface used by the console writer
 */
export interface TextOutput {
  write(chunk: string): unknown;
}

/**
 * Human-readable output, one line per record
 */
export class ConsoleWriter implements LogWriter {
  constructor(
    private readonly formatter: LogFormatter,
    private readonly output: TextOutput = process.stdout
  ) {}

  write(record: LogRecord): void {
    this.output.write(this.formatter.formatConsole(record));
  }

  close(): void {
    // stdout is not ours to close
  }
}

/**
 * Base class for writers that own an output file. The file is created (or
 * truncated) when the writer is constructed.
 */
abstract class FileWriter implements LogWriter {
  private fd: number | null;

  constructor(readonly filePath: string) {
    try {
      this.fd = fs.openSync(filePath, 'w');
    } catch (error) {
      throw new Error(
        `Cannot open output file ${filePath}: ${error instanceof Error ? error.message : error}`
      );
    }
  }

  abstract write(record: LogRecord): void;

  protected append(text: string): void {
    if (this.fd === null) {
      throw new Error(`Output file already closed: ${this.filePath}`);
    }
    fs.writeSync(this.fd, text);
  }

  close(): void {
    if (this.fd === null) {
      return;
    }
    const fd = this.fd;
    this.fd = null;
    fs.closeSync(fd);
  }
}

/**
 * JSON Lines output: one JSON object per record
 */
export class JsonLinesWriter extends FileWriter {
  constructor(filePath: string, private readonly formatter: LogFormatter) {
    super(filePath);
  }

  write(record: LogRecord): void {
    this.append(this.formatter.formatJson(record));
  }
}

/**
 * CSV output. The column set is taken from the first record and stays fixed;
 * a record with different fields is rejected.
 */
export class CsvWriter extends FileWriter {
  private columns: string[] | null = null;

  constructor(filePath: string, private readonly formatter: LogFormatter) {
    super(filePath);
  }

  write(record: LogRecord): void {
    const fields = Object.keys(record);

    if (this.columns === null) {
      this.append(this.formatter.formatCsvHeader(fields));
      this.columns = fields;
    } else if (!sameFields(this.columns, fields)) {
      throw new Error(
        `Record fields [${fields.join(', ')}] do not match CSV columns [${this.columns.join(', ')}]`
      );
    }

    const values: unknown[] = Object.values(record);
    this.append(this.formatter.formatCsvRow(values));
  }
}

function sameFields(columns: readonly string[], fields: readonly string[]): boolean {
  return columns.length === fields.length && columns.every((c, i) => c === fields[i]);
}

/**
 * Delivers each record to every registered writer in registration order.
 * One writer's failure never stops delivery to the others.
 */
export class WriterFanout {
  private readonly writers: { name: string; writer: LogWriter; failures: number }[] = [];
  private closed = false;

  add(name: string, writer: LogWriter): void {
    this.writers.push({ name, writer, failures: 0 });
  }

  get size(): number {
    return this.writers.length;
  }

  /** Total number of failed writes across all writers */
  get failureCount(): number {
    return this.writers.reduce((sum, w) => sum + w.failures, 0);
  }

  write(record: LogRecord): void {
    for (const entry of this.writers) {
      try {
        entry.writer.write(record);
      } catch (error) {
        entry.failures++;
        const message = `Failed to write to ${entry.name}: ${error instanceof Error ? error.message : error}`;
        if (entry.failures === 1) {
          logger.error(message);
        } else {
          logger.debug(message);
        }
      }
    }
  }

  /**
   * Closes every writer once, even if some of them fail to close
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    for (const entry of this.writers) {
      try {
        entry.writer.close();
      } catch (error) {
        logger.error(
          `Failed to close ${entry.name}: ${error instanceof Error ? error.message : error}`
        );
      }
    }
  }
}
