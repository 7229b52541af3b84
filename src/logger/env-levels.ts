/**
 * Threshold configuration from the environment
 *
 * `LINEWRIGHT_LEVEL` takes a comma-separated list. A bare level sets every
 * logger; `name=level` sets one logger, now or when it is registered later:
 *
 * ```text
 * LINEWRIGHT_LEVEL=info,console=debug,net=off
 * ```
 */

import { ConfigurationError } from '../errors.js';
import type { LevelSettings, LoggerRegistry } from './logger-registry.js';
import { parseLevel, type SeverityLevel } from './severity.js';

/** Variable read by `loadEnvLevels` */
export const LEVEL_ENV_VAR = 'LINEWRIGHT_LEVEL';

/**
 * Parses a level list
 *
 * @throws {ConfigurationError} For unknown levels or empty logger names
 */
export function parseLevelSettings(text: string): LevelSettings {
  let global: SeverityLevel | undefined;
  const loggers = new Map<string, SeverityLevel>();

  for (const entry of text.split(',')) {
    const trimmed = entry.trim();
    if (trimmed === '') continue;

    const separator = trimmed.indexOf('=');
    if (separator < 0) {
      global = parseLevel(trimmed);
      continue;
    }

    const name = trimmed.slice(0, separator).trim();
    if (name === '') {
      throw new ConfigurationError(`Missing logger name in "${trimmed}"`);
    }
    loggers.set(name, parseLevel(trimmed.slice(separator + 1)));
  }

  const byName = Object.fromEntries(loggers);
  return global === undefined ? { loggers: byName } : { global, loggers: byName };
}

/**
 * Applies `LINEWRIGHT_LEVEL` (or another variable) to a registry
 *
 * @returns The applied settings, or undefined when the variable is unset
 */
export function loadEnvLevels(
  registry: LoggerRegistry,
  env: NodeJS.ProcessEnv = process.env,
  variable: string = LEVEL_ENV_VAR
): LevelSettings | undefined {
  const value = env[variable];
  if (value === undefined || value.trim() === '') return undefined;

  const settings = parseLevelSettings(value);
  registry.applyLevels(settings);
  return settings;
}
