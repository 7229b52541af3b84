/**
 * Severity levels and threshold filtering
 */

import { ConfigurationError } from '../errors.js';

/** Severity levels, lowest first. `off` as a threshold suppresses everything. */
export type SeverityLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'critical' | 'off';

/** Ordered list of every level */
export const SEVERITY_LEVELS: readonly SeverityLevel[] = [
  'trace',
  'debug',
  'info',
  'warn',
  'error',
  'critical',
  'off'
];

/**
 * Level hierarchy for comparison
 * Higher numbers indicate higher priority
 */
export const LEVEL_PRIORITY: Readonly<Record<SeverityLevel, number>> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  critical: 5,
  off: 6
};

/** Fixed-width short codes used by `%level` */
export const LEVEL_CODES: Readonly<Record<SeverityLevel, string>> = {
  trace: 'TRACE',
  debug: 'DEBUG',
  info: 'INFO',
  warn: 'WARN',
  error: 'ERROR',
  critical: 'CRIT',
  off: 'OFF'
};

/** Width every level code is padded to */
export const LEVEL_CODE_WIDTH = 5;

const LEVEL_ALIASES: ReadonlyMap<string, SeverityLevel> = new Map<string, SeverityLevel>([
  ['warning', 'warn'],
  ['err', 'error'],
  ['crit', 'critical'],
  ['fatal', 'critical']
]);

/**
 * Checks if a message at `level` passes a `threshold`
 *
 * @returns True iff level >= threshold
 */
export function passes(level: SeverityLevel, threshold: SeverityLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[threshold];
}

/** Type guard for level names */
export function isSeverityLevel(value: string): value is SeverityLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_PRIORITY, value);
}

/**
 * Parses a level name, case-insensitively, accepting common aliases
 *
 * @throws {ConfigurationError} for unknown names
 */
export function parseLevel(text: string): SeverityLevel {
  const normalized = text.trim().toLowerCase();
  if (isSeverityLevel(normalized)) return normalized;

  const alias = LEVEL_ALIASES.get(normalized);
  if (alias !== undefined) return alias;

  throw new ConfigurationError(`Invalid log level: ${text}`);
}

/** Upper-case short code padded to the fixed level width */
export function levelCode(level: SeverityLevel): string {
  return LEVEL_CODES[level].padEnd(LEVEL_CODE_WIDTH);
}
