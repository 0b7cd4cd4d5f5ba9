/**
 * Log severities and the filter rules applied to tailed and paged logs.
 */

import type { LogEntry, LogFilters, LogLevel } from './types';

/** Severities in ascending order. */
export const LOG_LEVELS: readonly LogLevel[] = ['DEBUG', 'INFO', 'WARNING', 'ERROR', 'CRITICAL'];

const ALIASES: Record<string, LogLevel> = {
  WARN: 'WARNING',
  FATAL: 'CRITICAL',
  ERR: 'ERROR',
};

/** Parse a user-supplied level name (case-insensitive, common aliases). */
export function parseLogLevel(value: string): LogLevel | null {
  const upper = value.trim().toUpperCase();
  const match = LOG_LEVELS.find(l => l === upper);
  return match ?? ALIASES[upper] ?? null;
}

export function levelRank(level: string): number {
  const parsed = parseLogLevel(level);
  return parsed ? LOG_LEVELS.indexOf(parsed) : -1;
}

/** True if `logger` equals `filter` or sits below it in the dotted hierarchy. */
export function loggerMatches(logger: string, filter: string): boolean {
  return logger === filter || logger.startsWith(filter + '.');
}

export function matchesFilters(entry: LogEntry, filters: LogFilters): boolean {
  if (filters.level && levelRank(entry.level) < LOG_LEVELS.indexOf(filters.level)) {
    return false;
  }
  if (filters.logger && !loggerMatches(entry.logger, filters.logger)) {
    return false;
  }
  return true;
}
