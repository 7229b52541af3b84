/**
 * Console sink
 *
 * Writes each line plus a terminator to a line-oriented stream, stdout by
 * default. The plain variant never emits escape sequences; see
 * `ColorConsoleSink` for colored output.
 *
 * Each line goes out in one `write` call, so a sink shared by several
 * loggers never interleaves two lines.
 *
 * Node.js Writables report failures through their `'error'` event. The sink
 * listens for it and, once the stream has failed, rejects every later write
 * and flush with the stream's error.
 *
 * @example
 * ```typescript
 * import { ConsoleSink } from 'linewright/sinks';
 *
 * const stdout = new ConsoleSink();
 * const stderr = new ConsoleSink({ name: 'stderr', stream: process.stderr, level: 'warn' });
 * ```
 */

import {
  BaseSink,
  DEFAULT_SINK_LEVEL,
  type OutputStream,
  type SinkOptions
} from './sink-interface.js';

/**
 * Console sink configuration
 */
export interface ConsoleSinkOptions extends SinkOptions {
  /** Destination (default: process.stdout) */
  stream?: OutputStream;

  /** Line terminator (default: '\n') */
  eol?: string;
}

/**
 * Sink that writes lines to a stream
 */
export class ConsoleSink extends BaseSink {
  protected readonly stream: OutputStream;
  private readonly eol: string;
  private streamError?: Error;

  constructor(options: ConsoleSinkOptions = {}, colorEnabled = false) {
    super(options.name ?? 'console', options.level ?? DEFAULT_SINK_LEVEL, colorEnabled);
    this.stream = options.stream ?? process.stdout;
    this.eol = options.eol ?? '\n';

    this.stream.on?.('error', error => {
      this.streamError ??= error;
    });
  }

  /** The stream's failure, if it has failed */
  get failure(): Error | undefined {
    if (this.streamError) return this.streamError;
    if (this.stream.errored) return this.stream.errored;
    if (this.stream.destroyed) return new Error('Stream is destroyed');
    return undefined;
  }

  protected writeLine(text: string): void {
    this.throwIfFailed();
    this.stream.write(text + this.eol);
    // Writables that fail synchronously mark themselves errored before returning
    this.throwIfFailed();
  }

  /**
   * Resolves once the stream has accepted everything written so far
   *
   * Rejects with the stream's error if it fails or closes first.
   */
  flush(): Promise<void> {
    const failure = this.failure;
    if (failure) return Promise.reject(failure);

    const stream = this.stream;
    if (!stream.writableNeedDrain || stream.once === undefined) {
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const onDrain = (): void => {
        stream.removeListener?.('close', onClose);
        resolve();
      };
      const onClose = (): void => {
        stream.removeListener?.('drain', onDrain);
        const closedWith = this.failure;
        if (closedWith) reject(closedWith);
        else resolve();
      };
      stream.once?.('drain', onDrain);
      stream.once?.('close', onClose);
    });
  }

  private throwIfFailed(): void {
    const failure = this.failure;
    if (failure) throw failure;
  }
}

/**
 * Create a plain console sink
 */
export function createConsoleSink(options?: ConsoleSinkOptions): ConsoleSink {
  return new ConsoleSink(options);
}
