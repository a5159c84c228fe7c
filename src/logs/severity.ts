import { SEVERITIES, Severity } from '../types';

const SEVERITY_LETTERS: readonly string[] = SEVERITIES;

/**
 * Type guard for logcat severity letters
 */
export function isSeverity(value: string): value is Severity {
  return SEVERITY_LETTERS.includes(value);
}

/**
 * Position of a severity in V < D < I < W < E < F
 */
export function severityRank(level: Severity): number {
  return SEVERITIES.indexOf(level);
}
