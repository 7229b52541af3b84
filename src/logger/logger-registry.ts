/**
 * Logger registry
 *
 * A name-to-logger directory with a lazily created default logger. Registries
 * are ordinary objects passed to the code that needs them;
 * `getDefaultRegistry()` hands out one process-wide instance for programs
 * that want a single shared directory.
 *
 * @example
 * ```typescript
 * import { LoggerRegistry, ColorConsoleSink } from 'linewright';
 *
 * const registry = new LoggerRegistry();
 * const console = registry.register('console', { sinks: [new ColorConsoleSink()] });
 *
 * registry.lookup('console').setLevel('debug');
 * console.debug('visible through every reference');
 * ```
 */

import { ConfigurationError, DuplicateNameError, NotFoundError } from '../errors.js';
import type { SinkWriteError } from '../errors.js';
import { ConsoleSink } from '../sinks/console-sink.js';
import {
  DEFAULT_LOGGER_NAME,
  DEFAULT_UNNAMED_PATTERN
} from './logger-config.js';
import { LoggerImpl } from './logger-impl.js';
import type { SeverityLevel } from './severity.js';
import type { Logger, LoggerConfig, Sink } from './types.js';

/**
 * Registry options
 */
export interface RegistryOptions {
  /** Reject registration of names already in use (default: false) */
  strict?: boolean;

  /** Sinks for the default logger (default: one plain stdout sink) */
  defaultSinks?: () => Sink[];

  /** Extra configuration applied to the default logger */
  defaultConfig?: Omit<LoggerConfig, 'sinks'>;
}

/** Per-call registration options */
export interface RegisterOptions {
  strict?: boolean;
}

/**
 * Threshold settings applied across a registry, typically parsed from the
 * environment
 */
export interface LevelSettings {
  /** Threshold for every logger without its own entry */
  global?: SeverityLevel;

  /** Thresholds by logger name */
  loggers: Readonly<Record<string, SeverityLevel>>;
}

function checkName(name: string): void {
  if (name === DEFAULT_LOGGER_NAME) {
    throw new ConfigurationError('The empty logger name is reserved for the default logger');
  }
}

/**
 * Name-to-logger directory
 */
export class LoggerRegistry {
  private readonly loggers = new Map<string, Logger>();
  private readonly levelOverrides = new Map<string, SeverityLevel>();
  private readonly strict: boolean;
  private readonly defaultSinks: () => Sink[];
  private readonly defaultConfig: Omit<LoggerConfig, 'sinks'>;
  private globalLevel?: SeverityLevel;
  private defaultLogger?: Logger;

  constructor(options: RegistryOptions = {}) {
    this.strict = options.strict ?? false;
    this.defaultSinks = options.defaultSinks ?? (() => [new ConsoleSink()]);
    this.defaultConfig = options.defaultConfig ?? {};
  }

  /**
   * Returns the default logger, creating it on first use
   *
   * The first call creates it; every later call returns the same instance.
   */
  getOrCreateDefault(): Logger {
    if (this.defaultLogger === undefined) {
      this.defaultLogger = new LoggerImpl(DEFAULT_LOGGER_NAME, {
        pattern: DEFAULT_UNNAMED_PATTERN,
        ...this.defaultConfig,
        level: this.initialLevel(DEFAULT_LOGGER_NAME, this.defaultConfig.level),
        sinks: this.defaultSinks()
      });
    }
    return this.defaultLogger;
  }

  /**
   * Creates a logger, or reconfigures the one already registered under
   * `name` and returns that same instance
   *
   * @throws {DuplicateNameError} In strict mode when the name is taken
   * @throws {ConfigurationError} For the empty name, which belongs to the
   * default logger
   * @throws {FormatError} If the pattern is invalid; an existing logger keeps
   * its previous configuration
   */
  register(name: string, config: LoggerConfig = {}, options: RegisterOptions = {}): Logger {
    checkName(name);
    const existing = this.loggers.get(name);
    const strict = options.strict ?? this.strict;

    if (existing !== undefined) {
      if (strict) throw new DuplicateNameError(name);
      existing.reconfigure({ ...config, level: this.initialLevel(name, config.level) });
      return existing;
    }

    const logger = new LoggerImpl(name, {
      ...config,
      level: this.initialLevel(name, config.level)
    });
    this.loggers.set(name, logger);
    return logger;
  }

  /**
   * Adds an externally constructed logger; the caller keeps its reference
   *
   * @throws {DuplicateNameError} If another logger already holds the name
   * @throws {ConfigurationError} For the empty name
   */
  registerLogger(logger: Logger): Logger {
    checkName(logger.name);
    const existing = this.loggers.get(logger.name);
    if (existing === logger) return logger;
    if (existing !== undefined) throw new DuplicateNameError(logger.name);

    const override = this.levelOverrides.get(logger.name) ?? this.globalLevel;
    if (override !== undefined) logger.setLevel(override);

    this.loggers.set(logger.name, logger);
    return logger;
  }

  /**
   * Returns the logger registered under `name`
   *
   * @throws {NotFoundError} If no logger has that name
   */
  lookup(name: string): Logger {
    const logger = this.loggers.get(name);
    if (logger === undefined) throw new NotFoundError(name);
    return logger;
  }

  /** Returns the logger registered under `name`, if any */
  get(name: string): Logger | undefined {
    return this.loggers.get(name);
  }

  /** Whether `name` is registered */
  has(name: string): boolean {
    return this.loggers.has(name);
  }

  /** Removes a logger from the registry without closing it */
  drop(name: string): boolean {
    return this.loggers.delete(name);
  }

  /** Registered names, in registration order */
  names(): string[] {
    return [...this.loggers.keys()];
  }

  /**
   * Sets the threshold of every logger, including the default one, and of
   * loggers registered later
   */
  setLevel(level: SeverityLevel): void {
    this.globalLevel = level;
    this.levelOverrides.clear();
    this.defaultLogger?.setLevel(level);
    this.loggers.forEach(logger => logger.setLevel(level));
  }

  /**
   * Applies thresholds by name; names not yet registered take theirs when
   * they are
   */
  applyLevels(settings: LevelSettings): void {
    if (settings.global !== undefined) {
      this.setLevel(settings.global);
    }

    for (const [name, level] of Object.entries(settings.loggers)) {
      this.levelOverrides.set(name, level);
      if (name === DEFAULT_LOGGER_NAME) {
        this.defaultLogger?.setLevel(level);
      }
      this.loggers.get(name)?.setLevel(level);
    }
  }

  /** Flushes every logger, resolving with the sinks that failed */
  async flushAll(): Promise<SinkWriteError[]> {
    const results = await Promise.all(this.allLoggers().map(logger => logger.flush()));
    return results.flat();
  }

  /** Closes every logger and empties the registry */
  async shutdown(): Promise<SinkWriteError[]> {
    const results = await Promise.all(this.allLoggers().map(logger => logger.close()));
    this.loggers.clear();
    this.defaultLogger = undefined;
    return results.flat();
  }

  private allLoggers(): Logger[] {
    const all = [...this.loggers.values()];
    if (this.defaultLogger !== undefined) all.unshift(this.defaultLogger);
    return all;
  }

  private initialLevel(name: string, configured: SeverityLevel | undefined): SeverityLevel | undefined {
    return this.levelOverrides.get(name) ?? configured ?? this.globalLevel;
  }
}

let defaultRegistry: LoggerRegistry | undefined;

/**
 * Process-wide registry, created on first call
 */
export function getDefaultRegistry(): LoggerRegistry {
  if (defaultRegistry === undefined) {
    defaultRegistry = new LoggerRegistry();
  }
  return defaultRegistry;
}
