/**
 * Sink dispatch for a logger's sink list
 *
 * Writes, flushes and closes every sink with error isolation: one failing
 * sink never stops the others. Failures are collected and returned, never
 * logged, so a broken destination cannot recurse into the logger.
 *
 * @example
 * ```typescript
 * const report = writeToAll(sinks, '[INFO ] ready', { level: 'info', logger: 'app' });
 * if (report.failures.length > 0) {
 *   // inspect report.failures[0].sinkName
 * }
 * ```
 */

import { ConfigurationError, SinkWriteError } from '../errors.js';
import { passes } from './severity.js';
import type { DispatchReport, LineHint, Sink } from './types.js';

/** Report returned for calls filtered out before formatting */
export const SUPPRESSED: DispatchReport = Object.freeze({
  dispatched: false,
  delivered: 0,
  failures: Object.freeze([])
});

function toSinkError(sink: Sink, error: unknown): SinkWriteError {
  return error instanceof SinkWriteError ? error : new SinkWriteError(sink.name, error);
}

/**
 * Checks a sink list before it is installed
 *
 * @throws {ConfigurationError} If a sink is invalid or two share a name
 */
export function validateSinks(sinks: readonly Sink[]): void {
  const seen = new Set<string>();
  for (const sink of sinks) {
    if (typeof sink.write !== 'function') {
      throw new ConfigurationError('Sink must have a write method');
    }
    if (!sink.name) {
      throw new ConfigurationError('Sink must have a valid name');
    }
    if (seen.has(sink.name)) {
      throw new ConfigurationError(`Sink with name '${sink.name}' already exists`);
    }
    seen.add(sink.name);
  }
}

/** Whether a sink's own level admits the line */
export function accepts(sink: Sink, hint: LineHint): boolean {
  return sink.level === undefined || passes(hint.level, sink.level);
}

/**
 * Write a line to every sink in order
 *
 * Sinks whose own level rejects the line are skipped and not counted.
 *
 * @returns How many sinks wrote the line and which ones failed
 */
export function writeToAll(sinks: readonly Sink[], line: string, hint: LineHint): DispatchReport {
  const failures: SinkWriteError[] = [];
  let delivered = 0;

  for (const sink of sinks) {
    if (!accepts(sink, hint)) continue;
    try {
      sink.write(line, hint);
      delivered++;
    } catch (error) {
      failures.push(toSinkError(sink, error));
    }
  }

  return { dispatched: true, delivered, failures };
}

/**
 * Flush every sink in parallel
 *
 * @returns Failures, in sink order
 */
export async function flushAll(sinks: readonly Sink[]): Promise<SinkWriteError[]> {
  const results = await Promise.all(
    sinks.map(async sink => {
      try {
        await sink.flush();
        return undefined;
      } catch (error) {
        return toSinkError(sink, error);
      }
    })
  );
  return results.filter((result): result is SinkWriteError => result !== undefined);
}

/**
 * Close every sink in parallel
 *
 * @returns Failures, in sink order
 */
export async function closeAll(sinks: readonly Sink[]): Promise<SinkWriteError[]> {
  const results = await Promise.all(
    sinks.map(async sink => {
      try {
        await sink.close();
        return undefined;
      } catch (error) {
        return toSinkError(sink, error);
      }
    })
  );
  return results.filter((result): result is SinkWriteError => result !== undefined);
}
