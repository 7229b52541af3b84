/**
 * Logger Configuration Management Component
 *
 * Holds a logger's threshold, pattern and sinks as one frozen snapshot.
 * Log calls read the snapshot once and use it for the whole call; every
 * update builds and validates a replacement and swaps it in with a single
 * assignment, so a failed update leaves the previous snapshot active and a
 * call in flight never sees a half-applied change.
 *
 * @example
 * ```typescript
 * import { LoggerConfiguration } from './logger-configuration';
 *
 * const config = new LoggerConfiguration({ level: 'debug' });
 *
 * const snapshot = config.snapshot;
 * if (passes('debug', snapshot.level)) {
 *   // render with snapshot.pattern, write to snapshot.sinks
 * }
 *
 * config.setLevel('warn');
 * config.setPattern('[{%level}] {%message}');
 * ```
 */

import { ConfigurationError } from '../errors.js';
import type { FormatEngine } from '../format/format-engine.js';
import { compilePattern, type CompiledPattern } from './pattern-renderer.js';
import { mergeConfig } from './logger-config.js';
import { isSeverityLevel, type SeverityLevel } from './severity.js';
import { validateSinks } from './sink-dispatch.js';
import type { LoggerConfig, Sink } from './types.js';

/**
 * Immutable view of a logger's configuration
 */
export interface LoggerSnapshot {
  readonly level: SeverityLevel;
  readonly pattern: CompiledPattern;
  readonly sinks: readonly Sink[];
  readonly engine: FormatEngine;
  readonly clock: () => Date;
}

function freezeSnapshot(snapshot: LoggerSnapshot): LoggerSnapshot {
  return Object.freeze({ ...snapshot, sinks: Object.freeze([...snapshot.sinks]) });
}

function checkLevel(level: SeverityLevel): void {
  if (!isSeverityLevel(level)) {
    throw new ConfigurationError(`Invalid log level: ${String(level)}`);
  }
}

/**
 * Configuration management for logger instances
 */
export class LoggerConfiguration {
  private current: LoggerSnapshot;

  /**
   * Creates a new configuration manager
   *
   * @param userConfig - User-provided configuration
   * @throws {FormatError} If the pattern is invalid
   */
  constructor(userConfig: LoggerConfig = {}) {
    this.current = LoggerConfiguration.build(userConfig);
  }

  /**
   * Current snapshot; read once per log call
   */
  get snapshot(): LoggerSnapshot {
    return this.current;
  }

  /**
   * Set the threshold
   *
   * @param level - New threshold
   */
  setLevel(level: SeverityLevel): void {
    checkLevel(level);
    this.swap({ ...this.current, level });
  }

  /**
   * Validate and set the pattern
   *
   * @param pattern - New pattern
   * @throws {FormatError} If the pattern is invalid; nothing changes
   */
  setPattern(pattern: string): void {
    const compiled = compilePattern(pattern, this.current.engine);
    this.swap({ ...this.current, pattern: compiled });
  }

  /**
   * Replace the sink list
   *
   * @throws {ConfigurationError} If a sink is invalid or names repeat
   */
  setSinks(sinks: readonly Sink[]): void {
    validateSinks(sinks);
    this.swap({ ...this.current, sinks });
  }

  /**
   * Append a sink
   */
  addSink(sink: Sink): void {
    this.setSinks([...this.current.sinks, sink]);
  }

  /**
   * Remove a sink by name
   *
   * @returns True if a sink was removed
   */
  removeSink(sinkName: string): boolean {
    const remaining = this.current.sinks.filter(sink => sink.name !== sinkName);
    if (remaining.length === this.current.sinks.length) return false;
    this.swap({ ...this.current, sinks: remaining });
    return true;
  }

  /**
   * Replace the whole configuration; unspecified fields take defaults
   *
   * @throws {FormatError | ConfigurationError} If the new configuration is
   * invalid; nothing changes
   */
  replace(userConfig: LoggerConfig): void {
    this.current = LoggerConfiguration.build(userConfig);
  }

  private swap(next: LoggerSnapshot): void {
    this.current = freezeSnapshot(next);
  }

  private static build(userConfig: LoggerConfig): LoggerSnapshot {
    const merged = mergeConfig(userConfig);
    checkLevel(merged.level);
    validateSinks(merged.sinks);
    return freezeSnapshot({
      level: merged.level,
      pattern: compilePattern(merged.pattern, merged.engine),
      sinks: merged.sinks,
      engine: merged.engine,
      clock: merged.clock
    });
  }
}
