/**
 * Logger configuration types and default values
 */

import { defaultEngine } from '../format/format-engine.js';
import type { LoggerConfig } from './types.js';
import type { SeverityLevel } from './severity.js';

/**
 * Default threshold for new loggers
 */
export const DEFAULT_LOG_LEVEL: SeverityLevel = 'info';

/**
 * Pattern for named loggers
 */
export const DEFAULT_PATTERN = '[{%time:%Y-%m-%d %H:%M:%S.%L}] [{%name}] [{%level}] {%message}';

/**
 * Pattern for the registry's default logger, which has no name
 */
export const DEFAULT_UNNAMED_PATTERN = '[{%time:%Y-%m-%d %H:%M:%S.%L}] [{%level}] {%message}';

/** Name of the registry's default logger */
export const DEFAULT_LOGGER_NAME = '';

/**
 * Default logger configuration
 */
export const DEFAULT_LOGGER_CONFIG: Required<LoggerConfig> = {
  level: DEFAULT_LOG_LEVEL,
  pattern: DEFAULT_PATTERN,
  sinks: [],
  engine: defaultEngine,
  clock: () => new Date()
};

/**
 * Merges user configuration with defaults
 *
 * @param userConfig - User-provided configuration
 * @returns Complete configuration with defaults applied
 */
export function mergeConfig(userConfig: LoggerConfig = {}): Required<LoggerConfig> {
  return {
    level: userConfig.level ?? DEFAULT_LOGGER_CONFIG.level,
    pattern: userConfig.pattern ?? DEFAULT_LOGGER_CONFIG.pattern,
    sinks: [...(userConfig.sinks ?? DEFAULT_LOGGER_CONFIG.sinks)],
    engine: userConfig.engine ?? DEFAULT_LOGGER_CONFIG.engine,
    clock: userConfig.clock ?? DEFAULT_LOGGER_CONFIG.clock
  };
}
