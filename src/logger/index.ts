/**
 * linewright logger - named loggers, patterns and a registry
 *
 * @example
 * ```typescript
 * import { LoggerRegistry, ColorConsoleSink } from 'linewright';
 *
 * const registry = new LoggerRegistry();
 * const logger = registry.register('app', {
 *   level: 'debug',
 *   pattern: '[{%time:%H:%M:%S.%L}] [{%level}] [{%name}] {%message}',
 *   sinks: [new ColorConsoleSink()]
 * });
 *
 * logger.info('Formatted: {} + {} = {}', 1, 2, 3);
 * ```
 */

// Core logger functionality
export * from './types.js';
export * from './severity.js';
export * from './logger-config.js';
export * from './logger-configuration.js';
export * from './logger-impl.js';
export * from './pattern-renderer.js';
export * from './sink-dispatch.js';

// Registry
export * from './logger-registry.js';
export * from './env-levels.js';

/** Current version of the logger package */
export const LOGGER_VERSION = '0.1.0';
