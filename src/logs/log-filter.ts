/**
 * Filter chain for parsed log records
 */

import { FilterOptions, LogRecord, Severity } from '../types';
import { isSeverity, severityRank } from './severity';

/**
 * A single, independent filter criterion
 */
export type FilterCriterion =
  | { kind: 'minLevel'; level: Severity }
  | { kind: 'tags'; tags: ReadonlySet<string> }
  | { kind: 'regex'; pattern: RegExp }
  | { kind: 'substring'; needle: string; ignoreCase: boolean }
  | { kind: 'pid'; pid: number };

/**
 * Conjunction of criteria. A chain without criteria accepts every record.
 */
export interface FilterChain {
  readonly criteria: readonly FilterCriterion[];
  accepts(record: LogRecord): boolean;
}

/**
 * Evaluates one criterion against a record
 */
export function matchesCriterion(criterion: FilterCriterion, record: LogRecord): boolean {
  switch (criterion.kind) {
    case 'minLevel':
      return severityRank(record.level) >= severityRank(criterion.level);
    case 'tags':
      return criterion.tags.has(record.tag);
    case 'regex':
      return criterion.pattern.test(record.msg);
    case 'substring':
      return criterion.ignoreCase
        ? record.msg.toLowerCase().includes(criterion.needle)
        : record.msg.includes(criterion.needle);
    case 'pid':
      return record.pid === criterion.pid;
  }
}

/**
 * Wraps criteria into a chain with short-circuiting AND semantics
 */
export function createFilterChain(criteria: readonly FilterCriterion[]): FilterChain {
  return {
    criteria,
    accepts: (record: LogRecord) => criteria.every(c => matchesCriterion(c, record)),
  };
}

/**
 * Builds a filter chain from user options
 *
 * @param options - Filter options; undefined and empty values impose no constraint
 * @throws Error if the level, pattern or pid is invalid
 */
export function buildFilterChain(options: FilterOptions): FilterChain {
  const criteria: FilterCriterion[] = [];
  const ignoreCase = options.ignoreCase ?? false;

  if (options.minLevel !== undefined) {
    if (!isSeverity(options.minLevel)) {
      throw new Error(`Invalid minimum level: ${options.minLevel} (expected one of V, D, I, W, E, F)`);
    }
    criteria.push({ kind: 'minLevel', level: options.minLevel });
  }

  if (options.tags && options.tags.length > 0) {
    criteria.push({ kind: 'tags', tags: new Set(options.tags) });
  }

  if (options.grep) {
    let pattern: RegExp;
    try {
      // No g/y flags: test() must not carry lastIndex between records
      pattern = new RegExp(options.grep, ignoreCase ? 'i' : '');
    } catch (error) {
      throw new Error(
        `Invalid regular expression: ${error instanceof Error ? error.message : error}`
      );
    }
    criteria.push({ kind: 'regex', pattern });
  }

  if (options.contains) {
    criteria.push({
      kind: 'substring',
      needle: ignoreCase ? options.contains.toLowerCase() : options.contains,
      ignoreCase,
    });
  }

  if (options.pid !== undefined) {
    if (!Number.isInteger(options.pid)) {
      throw new Error(`Invalid pid: ${options.pid}`);
    }
    criteria.push({ kind: 'pid', pid: options.pid });
  }

  return createFilterChain(criteria);
}
