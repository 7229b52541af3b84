/** Core Logger Implementation - named logger with a sink list */

import type { SinkWriteError } from '../errors.js';
import type { ArgumentInput } from '../format/types.js';
import { LoggerConfiguration } from './logger-configuration.js';
import { renderLine } from './pattern-renderer.js';
import { passes, type SeverityLevel } from './severity.js';
import { SUPPRESSED, closeAll, flushAll, writeToAll } from './sink-dispatch.js';
import type {
  DispatchReport,
  LevelMethods,
  Logger,
  LoggerConfig,
  Sink,
  SourceLocation
} from './types.js';

/** Core logger implementation */
export class LoggerImpl implements Logger {
  private readonly configuration: LoggerConfiguration;
  private closed = false;

  /**
   * Creates a new logger instance
   *
   * @throws {FormatError} If the configured pattern is invalid
   */
  constructor(
    private readonly loggerName: string = 'default',
    config: LoggerConfig = {}
  ) {
    this.configuration = new LoggerConfiguration(config);
  }

  /** Logger name/identifier */
  get name(): string {
    return this.loggerName;
  }

  /** Current threshold */
  get level(): SeverityLevel {
    return this.configuration.snapshot.level;
  }

  /** Current pattern source */
  get pattern(): string {
    return this.configuration.snapshot.pattern.source;
  }

  /** Current sinks */
  get sinks(): readonly Sink[] {
    return this.configuration.snapshot.sinks;
  }

  /** Logs a trace-level message */
  trace(template: string, ...args: readonly ArgumentInput[]): DispatchReport {
    return this.dispatch('trace', template, args);
  }

  /** Logs a debug-level message */
  debug(template: string, ...args: readonly ArgumentInput[]): DispatchReport {
    return this.dispatch('debug', template, args);
  }

  /** Logs an info-level message */
  info(template: string, ...args: readonly ArgumentInput[]): DispatchReport {
    return this.dispatch('info', template, args);
  }

  /** Logs a warning-level message */
  warn(template: string, ...args: readonly ArgumentInput[]): DispatchReport {
    return this.dispatch('warn', template, args);
  }

  /** Logs an error-level message */
  error(template: string, ...args: readonly ArgumentInput[]): DispatchReport {
    return this.dispatch('error', template, args);
  }

  /** Logs a critical-level message */
  critical(template: string, ...args: readonly ArgumentInput[]): DispatchReport {
    return this.dispatch('critical', template, args);
  }

  /** Logs at an explicit level */
  log(level: SeverityLevel, template: string, ...args: readonly ArgumentInput[]): DispatchReport {
    return this.dispatch(level, template, args);
  }

  /** Logs with an explicit call-site */
  logAt(
    source: SourceLocation,
    level: SeverityLevel,
    template: string,
    ...args: readonly ArgumentInput[]
  ): DispatchReport {
    return this.dispatch(level, template, args, source);
  }

  /** Leveled methods that record the given call-site */
  at(source: SourceLocation): LevelMethods {
    const bound = (level: SeverityLevel) =>
      (template: string, ...args: readonly ArgumentInput[]): DispatchReport =>
        this.dispatch(level, template, args, source);

    return {
      trace: bound('trace'),
      debug: bound('debug'),
      info: bound('info'),
      warn: bound('warn'),
      error: bound('error'),
      critical: bound('critical')
    };
  }

  /** Whether a message at `level` would currently be dispatched */
  shouldLog(level: SeverityLevel): boolean {
    return !this.closed && level !== 'off' && passes(level, this.configuration.snapshot.level);
  }

  /** Sets the threshold for subsequent calls */
  setLevel(level: SeverityLevel): void {
    this.configuration.setLevel(level);
  }

  /** Validates and sets the pattern */
  setPattern(pattern: string): void {
    this.configuration.setPattern(pattern);
  }

  /** Replaces every sink */
  setSinks(sinks: readonly Sink[]): void {
    this.configuration.setSinks(sinks);
  }

  /** Adds a sink after the existing ones */
  addSink(sink: Sink): void {
    this.configuration.addSink(sink);
  }

  /** Removes a sink from this logger */
  removeSink(sinkName: string): boolean {
    return this.configuration.removeSink(sinkName);
  }

  /** Replaces the configuration, keeping this instance */
  reconfigure(config: LoggerConfig): void {
    this.configuration.replace(config);
  }

  /** Flushes all sinks */
  async flush(): Promise<readonly SinkWriteError[]> {
    return flushAll(this.configuration.snapshot.sinks);
  }

  /** Flushes and closes all sinks */
  async close(): Promise<readonly SinkWriteError[]> {
    if (this.closed) return [];

    this.closed = true;
    const sinks = this.configuration.snapshot.sinks;
    const flushFailures = await flushAll(sinks);
    const closeFailures = await closeAll(sinks);
    return [...flushFailures, ...closeFailures];
  }

  /** Core logging method that handles all levels */
  private dispatch(
    level: SeverityLevel,
    template: string,
    args: readonly ArgumentInput[],
    source?: SourceLocation
  ): DispatchReport {
    const snapshot = this.configuration.snapshot;

    // Filtered calls return before the engine is touched
    if (this.closed || level === 'off' || !passes(level, snapshot.level)) {
      return SUPPRESSED;
    }

    const message = snapshot.engine.render(template, args);
    const line = renderLine(
      snapshot.pattern,
      level,
      this.loggerName,
      message,
      snapshot.clock(),
      snapshot.pattern.usesSource ? source : undefined,
      snapshot.engine
    );

    return writeToAll(snapshot.sinks, line, { level, logger: this.loggerName });
  }
}

/** Creates a new logger instance */
export function createLogger(name: string, config?: LoggerConfig): Logger {
  return new LoggerImpl(name, config);
}
