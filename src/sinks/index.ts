/**
 * Sinks for linewright
 *
 * Destinations that accept fully rendered lines:
 * - ConsoleSink: plain text to stdout, stderr or any Writable
 * - ColorConsoleSink: keeps ANSI color when the destination supports it
 * - MemorySink: captures lines in memory
 *
 * Custom destinations implement the `Sink` interface or extend `BaseSink`.
 *
 * @example
 * ```typescript
 * import { ColorConsoleSink, ConsoleSink } from 'linewright/sinks';
 *
 * const sinks = [
 *   new ColorConsoleSink(),
 *   new ConsoleSink({ name: 'stderr', stream: process.stderr, level: 'error' })
 * ];
 * ```
 */

export * from './sink-interface.js';
export * from './console-sink.js';
export * from './color-console-sink.js';
export * from './memory-sink.js';

/** Current version of the sinks module */
export const SINKS_VERSION = '0.1.0';
