/**
 * In-memory sink
 *
 * Collects rendered lines in an array; useful for tests and for embedding
 * log output in another document.
 */

import type { LineHint } from '../logger/types.js';
import { BaseSink, DEFAULT_SINK_LEVEL, type SinkOptions } from './sink-interface.js';

/**
 * Memory sink configuration
 */
export interface MemorySinkOptions extends SinkOptions {
  /** Keep escape sequences (default: false) */
  colors?: boolean;

  /** Oldest lines are dropped past this count (default: unbounded) */
  maxLines?: number;
}

/** A captured line with its hint */
export interface CapturedLine {
  text: string;
  hint?: LineHint;
}

/**
 * Sink that keeps lines in memory
 */
export class MemorySink extends BaseSink {
  private readonly captured: CapturedLine[] = [];
  private readonly maxLines: number;

  constructor(options: MemorySinkOptions = {}) {
    super(options.name ?? 'memory', options.level ?? DEFAULT_SINK_LEVEL, options.colors ?? false);
    this.maxLines = options.maxLines ?? Number.POSITIVE_INFINITY;
  }

  /** Captured line texts, oldest first */
  get lines(): string[] {
    return this.captured.map(entry => entry.text);
  }

  /** Captured lines with their hints */
  get entries(): readonly CapturedLine[] {
    return [...this.captured];
  }

  /** Drop every captured line */
  clear(): void {
    this.captured.length = 0;
  }

  protected writeLine(text: string, hint?: LineHint): void {
    this.captured.push({ text, hint });
    if (this.captured.length > this.maxLines) {
      this.captured.shift();
    }
  }
}
