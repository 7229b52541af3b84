/**
 * Sink interfaces and utilities for linewright
 */

import { SinkWriteError } from '../errors.js';
import { stripStyles } from '../format/style.js';
import { passes, type SeverityLevel } from '../logger/severity.js';
import type { LineHint, Sink } from '../logger/types.js';

/** Level accepted by a sink created without options */
export const DEFAULT_SINK_LEVEL: SeverityLevel = 'trace';

/**
 * Line-oriented text destination. `process.stdout`, `process.stderr` and any
 * Node.js Writable satisfy it.
 */
export interface OutputStream {
  write(chunk: string): boolean;
  on?(event: 'error', listener: (error: Error) => void): unknown;
  once?(event: 'drain' | 'close', listener: () => void): unknown;
  removeListener?(event: 'drain' | 'close', listener: () => void): unknown;
  readonly writableNeedDrain?: boolean;
  /** Set by Node.js Writables once a write or the stream itself failed */
  readonly errored?: Error | null;
  readonly destroyed?: boolean;
  readonly isTTY?: boolean;
}

/** How a colorized sink decides whether to keep escape sequences */
export type ColorMode = 'auto' | 'always' | 'never';

/**
 * Decides whether a stream can show color
 *
 * `NO_COLOR` (non-empty) disables color, `FORCE_COLOR` other than `0`
 * enables it, otherwise the stream must be a TTY whose `TERM` is not `dumb`.
 */
export function detectColorSupport(stream: OutputStream, env: NodeJS.ProcessEnv = process.env): boolean {
  if (env.NO_COLOR !== undefined && env.NO_COLOR !== '') return false;
  if (env.FORCE_COLOR !== undefined) return env.FORCE_COLOR !== '0';
  return stream.isTTY === true && env.TERM !== 'dumb';
}

/**
 * Common sink options
 */
export interface SinkOptions {
  /** Sink name (defaults differ per sink) */
  name?: string;

  /** Minimum level this sink writes, independent of the logger's (default: trace) */
  level?: SeverityLevel;
}

/**
 * Base sink class with common functionality
 *
 * Applies the sink's own level, strips escape sequences when color is off
 * and wraps destination failures in `SinkWriteError`.
 */
export abstract class BaseSink implements Sink {
  public readonly name: string;
  public readonly level: SeverityLevel;
  public readonly colorEnabled: boolean;

  constructor(name: string, level: SeverityLevel, colorEnabled: boolean) {
    this.name = name;
    this.level = level;
    this.colorEnabled = colorEnabled;
  }

  /**
   * Write one rendered line
   *
   * @throws {SinkWriteError} If the destination rejects the line
   */
  write(line: string, hint?: LineHint): void {
    if (hint !== undefined && !passes(hint.level, this.level)) {
      return;
    }

    const text = this.colorEnabled ? line : stripStyles(line);
    try {
      this.writeLine(text, hint);
    } catch (error) {
      throw new SinkWriteError(this.name, error);
    }
  }

  /**
   * Deliver the line to the destination
   */
  protected abstract writeLine(text: string, hint?: LineHint): void;

  /**
   * Flush any pending output (default: no-op)
   */
  flush(): Promise<void> | void {
    // Default implementation - no buffering
  }

  /**
   * Close the sink and clean up resources (default: no-op)
   */
  close(): Promise<void> | void {
    // Default implementation - no cleanup needed
  }
}
