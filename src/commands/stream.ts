/**
 * Command handler for streaming logcat output through the filter pipeline
 */

import { FilterOptions, OutputOptions, SourceConfig } from '../types';
import { logger } from '../logger';
import {
  buildFilterChain,
  ConsoleWriter,
  CsvWriter,
  FilterChain,
  JsonLinesWriter,
  LineSource,
  LogFormatter,
  openLineSource,
  WriterFanout,
} from '../logs';
import { runPipeline } from '../pipeline';

/**
 * Validated options for the stream command
 */
export interface StreamCommandOptions {
  source: SourceConfig;
  filter: FilterOptions;
  output: OutputOptions;
}

/**
 * Creates the writers requested by the output options. The console writer
 * is added when no file output is requested, or when explicitly kept.
 *
 * @throws Error if an output file cannot be opened; writers opened so far are closed
 */
export function createWriters(output: OutputOptions): WriterFanout {
  const fanout = new WriterFanout();

  try {
    if (output.jsonPath) {
      const formatter = new LogFormatter({ jsonIndent: output.jsonIndent });
      fanout.add(`JSON output ${output.jsonPath}`, new JsonLinesWriter(output.jsonPath, formatter));
    }
    if (output.csvPath) {
      fanout.add(`CSV output ${output.csvPath}`, new CsvWriter(output.csvPath, new LogFormatter()));
    }
  } catch (error) {
    fanout.close();
    throw error;
  }

  if (fanout.size === 0 || output.console) {
    // Without --no-color, color follows whether stdout is a terminal
    const formatter = new LogFormatter({ colorize: output.color ? undefined : false });
    fanout.add('console', new ConsoleWriter(formatter));
  }

  return fanout;
}

/**
 * Main handler for the stream command
 *
 * Startup failures (bad filter, unreadable file, adb not launchable, output
 * file not writable, undetectable format) exit with status 1. An interrupt
 * stops the pipeline, closes every writer and returns normally.
 *
 * @param options - Validated command options
 */
export async function streamCommand(options: StreamCommandOptions): Promise<void> {
  let filter: FilterChain;
  try {
    filter = buildFilterChain(options.filter);
  } catch (error) {
    logger.error(`Invalid filter: ${error instanceof Error ? error.message : error}`);
    process.exit(1);
  }

  // Before opening the source, so the clear step and the adb spawn are covered
  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, stopping...`);
    controller.abort();
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  try {
    let source: LineSource;
    try {
      source = await openLineSource(options.source);
    } catch (error) {
      logger.error(error instanceof Error ? error.message : String(error));
      process.exit(1);
    }

    await runStream(source, options, filter, controller.signal);
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }
}

async function runStream(
  source: LineSource,
  options: StreamCommandOptions,
  filter: FilterChain,
  signal: AbortSignal
): Promise<void> {
  try {
    const result = await runPipeline(source, {
      format: options.source.format,
      filter,
      createWriters: () => createWriters(options.output),
      logger,
      signal,
    });

    logger.debug(
      `Read ${result.linesRead} lines: ${result.emitted} emitted, ${result.filtered} filtered, ${result.skipped} unparseable`
    );
    if (result.writeFailures > 0) {
      logger.warn(`${result.writeFailures} record(s) could not be written to every output`);
    }
    const files = [options.output.jsonPath, options.output.csvPath].filter(
      (file): file is string => file !== undefined
    );
    if (files.length > 0) {
      logger.success(`Wrote ${result.emitted} record(s) to ${files.join(', ')}`);
    }
  } catch (error) {
    logger.error(`Failed to stream logs: ${error instanceof Error ? error.message : error}`);
    process.exit(1);
  }
}
