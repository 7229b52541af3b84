/**
 * Core Logger Types and Interface Definitions
 *
 * Type definitions for loggers, sinks and their configuration. A logger owns
 * a threshold, an ordered list of sinks and a compiled pattern; sinks are
 * capabilities that accept fully rendered lines and may be shared between
 * loggers.
 *
 * @example
 * ```typescript
 * import type { LoggerConfig, Sink } from 'linewright';
 *
 * const memory: Sink = {
 *   name: 'memory',
 *   colorEnabled: false,
 *   write: (line) => { lines.push(line); },
 *   flush: () => {},
 *   close: () => {}
 * };
 *
 * const config: LoggerConfig = {
 *   level: 'debug',
 *   pattern: '[{%level}] {%message}',
 *   sinks: [memory]
 * };
 * ```
 */

import type { SinkWriteError } from '../errors.js';
import type { ArgumentInput } from '../format/types.js';
import type { FormatEngine } from '../format/format-engine.js';
import type { SeverityLevel } from './severity.js';

/**
 * Extra information passed with every rendered line
 */
export interface LineHint {
  /** Level of the message that produced the line */
  level: SeverityLevel;

  /** Name of the logger that rendered the line */
  logger: string;
}

/**
 * Sink interface for log output
 */
export interface Sink {
  /** Sink name for identification */
  readonly name: string;

  /** Whether escape sequences reach the destination */
  readonly colorEnabled: boolean;

  /** Minimum level this sink accepts; lines below it are not written */
  readonly level?: SeverityLevel;

  /** Write one rendered line (without terminator) */
  write(line: string, hint?: LineHint): void;

  /** Deliver everything buffered so far */
  flush(): Promise<void> | void;

  /** Release the destination */
  close(): Promise<void> | void;
}

/** Call-site recorded by `logAt` and `at` */
export interface SourceLocation {
  file: string;
  line: number;
  function?: string;
}

/**
 * Logger configuration options
 */
export interface LoggerConfig {
  /** Minimum level to render and dispatch */
  level?: SeverityLevel;

  /** Line pattern using the reserved `%time`, `%level`, `%name`, `%message` and `%source` fields */
  pattern?: string;

  /** Destinations, written in order */
  sinks?: Sink[];

  /** Engine used for message bodies and pattern fields */
  engine?: FormatEngine;

  /** Wall-clock source for `%time` */
  clock?: () => Date;
}

/**
 * Outcome of a single log call
 */
export interface DispatchReport {
  /** False when the call was filtered out before any formatting */
  readonly dispatched: boolean;

  /** Sinks that wrote the line; sinks whose own level filtered it are not counted */
  readonly delivered: number;

  /** Sinks whose write failed, in sink order */
  readonly failures: readonly SinkWriteError[];
}

/** Leveled entry points sharing one signature */
export interface LevelMethods {
  trace(template: string, ...args: readonly ArgumentInput[]): DispatchReport;
  debug(template: string, ...args: readonly ArgumentInput[]): DispatchReport;
  info(template: string, ...args: readonly ArgumentInput[]): DispatchReport;
  warn(template: string, ...args: readonly ArgumentInput[]): DispatchReport;
  error(template: string, ...args: readonly ArgumentInput[]): DispatchReport;
  critical(template: string, ...args: readonly ArgumentInput[]): DispatchReport;
}

/**
 * Logger interface - main logging API
 */
export interface Logger extends LevelMethods {
  /** Logger name, unique within a registry */
  readonly name: string;

  /** Current threshold */
  readonly level: SeverityLevel;

  /** Current pattern source */
  readonly pattern: string;

  /** Current sinks, in write order */
  readonly sinks: readonly Sink[];

  /** Log at an explicit level */
  log(level: SeverityLevel, template: string, ...args: readonly ArgumentInput[]): DispatchReport;

  /** Log with an explicit call-site */
  logAt(
    source: SourceLocation,
    level: SeverityLevel,
    template: string,
    ...args: readonly ArgumentInput[]
  ): DispatchReport;

  /** Leveled methods bound to a call-site */
  at(source: SourceLocation): LevelMethods;

  /** Whether a message at `level` would currently be dispatched */
  shouldLog(level: SeverityLevel): boolean;

  /** Set the threshold */
  setLevel(level: SeverityLevel): void;

  /** Validate and set the pattern; the old one stays on failure */
  setPattern(pattern: string): void;

  /** Replace every sink */
  setSinks(sinks: readonly Sink[]): void;

  /** Append a sink */
  addSink(sink: Sink): void;

  /** Remove a sink by name */
  removeSink(sinkName: string): boolean;

  /** Replace the whole configuration, keeping this instance */
  reconfigure(config: LoggerConfig): void;

  /** Flush all sinks, resolving with the sinks that failed */
  flush(): Promise<readonly SinkWriteError[]>;

  /** Flush and close all sinks; later calls are suppressed */
  close(): Promise<readonly SinkWriteError[]>;
}
