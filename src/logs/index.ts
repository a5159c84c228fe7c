/**
 * Logcat parsing, filtering and output
 */

export { LOG_PATTERNS, detectFormat, isLogFormat } from './log-patterns';
export { parseLogLine, ParseOptions } from './log-parser';
export { isSeverity, severityRank } from './severity';
export { FilterChain, FilterCriterion, buildFilterChain, createFilterChain } from './log-filter';
export { LogFormatter, LogFormatterOptions } from './log-formatter';
export {
  LogWriter,
  ConsoleWriter,
  JsonLinesWriter,
  CsvWriter,
  WriterFanout,
} from './log-writers';
export {
  LineSource,
  FOLLOW_POLL_INTERVAL_MS,
  openLineSource,
  openFileSource,
  spawnLogcat,
  buildLogcatArgs,
} from './log-source';
