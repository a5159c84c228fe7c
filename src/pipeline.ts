import { FormatOption, LogFormat } from './types';
import { LineSource } from './logs/log-source';
import { detectFormat } from './logs/log-patterns';
import { parseLogLine, ParseOptions } from './logs/log-parser';
import { FilterChain } from './logs/log-filter';
import { WriterFanout } from './logs/log-writers';

export interface PipelineLogger {
  debug: (message: string, ...args: unknown[]) => void;
  info: (message: string, ...args: unknown[]) => void;
}

export interface PipelineOptions {
  /** Wire format, or 'auto' to detect it from the first recognizable line */
  format: FormatOption;
  filter: FilterChain;
  /** Called once the format is known, before the first record */
  createWriters: () => WriterFanout;
  logger: PipelineLogger;
  /** Stops the pipeline; pending reads are abandoned */
  signal?: AbortSignal;
  parseOptions?: ParseOptions;
}

export interface PipelineResult {
  /** Null when interrupted before the format was detected */
  format: LogFormat | null;
  linesRead: number;
  /** Lines that did not match the format's grammar */
  skipped: number;
  /** Records rejected by the filter chain */
  filtered: number;
  emitted: number;
  writeFailures: number;
  interrupted: boolean;
}

const ABORTED = Symbol('aborted');

/**
 * Pulls lines from the source one at a time and pushes each through
 * parse, filter and fan-out before pulling the next. The source and the
 * writers are closed when the pipeline ends, fails or is interrupted.
 *
 * @throws Error if the format cannot be detected, or if the source fails mid-stream
 */
export async function runPipeline(
  source: LineSource,
  options: PipelineOptions
): Promise<PipelineResult> {
  const { filter, createWriters, logger, signal, parseOptions } = options;
  const iterator = source[Symbol.asyncIterator]();
  const abort = whenAborted(signal);

  const pull = async (): Promise<IteratorResult<string> | typeof ABORTED> => {
    if (signal?.aborted) {
      return ABORTED;
    }
    const pending = iterator.next();
    const next = await Promise.race([pending, abort.promise]);
    if (next === ABORTED) {
      void pending.catch(error => {
        logger.debug(`Source failed after interruption: ${error instanceof Error ? error.message : error}`);
      });
    }
    return next;
  };

  let writers: WriterFanout | undefined;
  let format: LogFormat | undefined = options.format === 'auto' ? undefined : options.format;
  const probed: string[] = [];
  const counts = { linesRead: 0, skipped: 0, filtered: 0, emitted: 0 };

  const finish = (interrupted: boolean): PipelineResult => ({
    format: format ?? null,
    ...counts,
    writeFailures: writers?.failureCount ?? 0,
    interrupted,
  });

  try {
    while (format === undefined) {
      const next = await pull();
      if (next === ABORTED) {
        return finish(true);
      }
      if (next.done) {
        throw new Error('Could not determine log format: no line matches threadtime, time or epoch');
      }
      probed.push(next.value);
      const detected = detectFormat(next.value);
      if (detected !== 'unknown') {
        format = detected;
        logger.info(`Detected log format: ${format}`);
      }
    }

    const resolvedFormat = format;
    const fanout = createWriters();
    writers = fanout;

    const processLine = (line: string): void => {
      counts.linesRead++;
      const record = parseLogLine(line, resolvedFormat, parseOptions);
      if (!record) {
        counts.skipped++;
        logger.debug(`Skipping unparseable line: ${line}`);
        return;
      }
      if (!filter.accepts(record)) {
        counts.filtered++;
        return;
      }
      fanout.write(record);
      counts.emitted++;
    };

    // Lines consumed while probing are replayed first so none is lost
    for (const line of probed) {
      processLine(line);
    }

    for (;;) {
      const next = await pull();
      if (next === ABORTED) {
        return finish(true);
      }
      if (next.done) {
        return finish(false);
      }
      processLine(next.value);
    }
  } finally {
    abort.dispose();
    // Writers first: closing an adb source waits for the process to exit
    writers?.close();
    await source.close();
  }
}

function whenAborted(signal: AbortSignal | undefined): {
  promise: Promise<typeof ABORTED>;
  dispose: () => void;
} {
  if (!signal) {
    return { promise: new Promise(() => undefined), dispose: () => undefined };
  }

  let onAbort: () => void = () => undefined;
  const promise = new Promise<typeof ABORTED>(resolve => {
    onAbort = () => resolve(ABORTED);
    if (signal.aborted) {
      resolve(ABORTED);
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
  });

  return {
    promise,
    dispose: () => signal.removeEventListener('abort', onAbort),
  };
}
