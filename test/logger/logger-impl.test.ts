/**
 * Unit tests for LoggerImpl
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { LoggerImpl, createLogger } from '../../src/logger/logger-impl.js';
import { SUPPRESSED } from '../../src/logger/sink-dispatch.js';
import { FormatEngine } from '../../src/format/format-engine.js';
import { arg } from '../../src/format/types.js';
import { MemorySink } from '../../src/sinks/memory-sink.js';
import { FormatError, SinkWriteError } from '../../src/errors.js';
import type { Sink } from '../../src/logger/types.js';
import { FIXED_TIME, TEST_CONSTANTS, UTC_ENGINE, fixedClock } from '../test-constants.js';

const { LOGGER_NAMES, SINK_NAMES, PATTERNS, STAMPS } = TEST_CONSTANTS;

function brokenSink(name: string = SINK_NAMES.BROKEN): Sink {
  return {
    name,
    colorEnabled: false,
    write: () => {
      throw new Error('disk full');
    },
    flush: () => {
      throw new Error('flush refused');
    },
    close: () => Promise.reject(new Error('close refused'))
  };
}

describe('LoggerImpl', () => {
  let memory: MemorySink;
  let logger: LoggerImpl;

  beforeEach(() => {
    memory = new MemorySink();
    logger = new LoggerImpl(LOGGER_NAMES.APP, {
      sinks: [memory],
      engine: UTC_ENGINE,
      clock: fixedClock
    });
  });

  describe('Configuration', () => {
    it('starts at info with the default pattern', () => {
      expect(logger.name).toBe('app');
      expect(logger.level).toBe('info');
      expect(logger.pattern).toBe('[{%time:%Y-%m-%d %H:%M:%S.%L}] [{%name}] [{%level}] {%message}');
      expect(logger.sinks).toEqual([memory]);
    });

    it('uses a default name', () => {
      expect(new LoggerImpl().name).toBe('default');
      expect(createLogger('made').name).toBe('made');
    });

    it('rejects an invalid pattern at construction', () => {
      expect(() => new LoggerImpl('bad', { pattern: '{%nope}' })).toThrow(FormatError);
    });
  });

  describe('Rendering', () => {
    it('renders the default pattern', () => {
      const report = logger.info('hello');

      expect(memory.lines).toEqual([`${STAMPS.FULL} [app] [INFO ] hello`]);
      expect(report).toEqual({ dispatched: true, delivered: 1, failures: [] });
    });

    it('formats the message with its arguments', () => {
      logger.setPattern(PATTERNS.MESSAGE_ONLY);

      logger.info('Formatted: {} + {} = {}', 1, 2, 3);
      logger.info('Name: {name}, Age: {age}', arg.named('name', 'Alice'), arg.named('age', 30));
      logger.warn('Hex: {:#x}', 255);

      expect(memory.lines).toEqual(['Formatted: 1 + 2 = 3', 'Name: Alice, Age: 30', 'Hex: 0xff']);
    });

    it('passes the level and logger name to sinks', () => {
      logger.error('boom');
      expect(memory.entries[0]?.hint).toEqual({ level: 'error', logger: 'app' });
    });

    it('renders the call-site when the pattern asks for it', () => {
      logger.setPattern(PATTERNS.WITH_SOURCE);

      logger.logAt({ file: 'main.ts', line: 7 }, 'info', 'direct');
      logger.at({ file: 'main.ts', line: 9, function: 'start' }).warn('bound {}', 1);
      logger.info('none');

      expect(memory.lines).toEqual(['main.ts:7 direct', 'main.ts:9 (start) bound 1', ' none']);
    });

    it('reads the clock once per call', () => {
      const clock = vi.fn(() => FIXED_TIME);
      logger.reconfigure({ sinks: [memory], engine: UTC_ENGINE, clock, pattern: PATTERNS.CUSTOM });

      logger.info('x');

      expect(clock).toHaveBeenCalledTimes(1);
      expect(memory.lines).toEqual([`${STAMPS.SHORT} [INFO ] [app] x`]);
    });
  });

  describe('Filtering', () => {
    it('suppresses calls below the threshold', () => {
      expect(logger.debug('hidden')).toBe(SUPPRESSED);
      expect(logger.trace('hidden')).toBe(SUPPRESSED);
      expect(memory.lines).toEqual([]);
    });

    it('does not format suppressed calls', () => {
      const onRender = vi.fn();
      const engine = new FormatEngine({ timeZone: 'utc', onRender });
      const quiet = new LoggerImpl('quiet', { level: 'warn', sinks: [memory], engine });

      quiet.info('never {}', 1);
      quiet.debug('never');
      expect(onRender).not.toHaveBeenCalled();

      quiet.error('shown');
      expect(onRender).toHaveBeenCalledTimes(1);
    });

    it('does not format suppressed calls with bad templates', () => {
      expect(logger.debug('{5}')).toBe(SUPPRESSED);
    });

    it('treats off as silence', () => {
      expect(logger.log('off', 'never')).toBe(SUPPRESSED);

      logger.setLevel('off');
      expect(logger.critical('never')).toBe(SUPPRESSED);
      expect(logger.shouldLog('critical')).toBe(false);
    });

    it('applies level changes to the next call', () => {
      logger.setLevel('debug');
      expect(logger.shouldLog('debug')).toBe(true);
      logger.debug('now visible');

      expect(memory.lines).toHaveLength(1);
    });

    it('honors per-sink levels', () => {
      const errorsOnly = new MemorySink({ name: SINK_NAMES.SECOND, level: 'error' });
      logger.addSink(errorsOnly);

      logger.info('a');
      logger.error('b');

      expect(memory.lines).toHaveLength(2);
      expect(errorsOnly.lines).toEqual([`${STAMPS.FULL} [app] [ERROR] b`]);
    });

    it('does not count sinks that filtered the line as delivered', () => {
      const errorsOnly = new MemorySink({ level: 'error' });
      const quiet = new LoggerImpl(LOGGER_NAMES.APP, { sinks: [errorsOnly] });

      expect(quiet.info('x')).toEqual({ dispatched: true, delivered: 0, failures: [] });
      expect(quiet.error('y').delivered).toBe(1);
      expect(errorsOnly.lines).toHaveLength(1);
    });
  });

  describe('Sinks', () => {
    it('writes to every sink in order', () => {
      const order: string[] = [];
      const tracking = (name: string): Sink => ({
        name,
        colorEnabled: false,
        write: () => {
          order.push(name);
        },
        flush: () => {},
        close: () => {}
      });
      logger.setSinks([tracking('first'), tracking('second')]);

      logger.info('x');

      expect(order).toEqual(['first', 'second']);
    });

    it('isolates a failing sink', () => {
      const second = new MemorySink({ name: SINK_NAMES.SECOND });
      logger.setSinks([brokenSink(), second]);

      const report = logger.info('still delivered');

      expect(second.lines).toHaveLength(1);
      expect(report.delivered).toBe(1);
      expect(report.failures).toHaveLength(1);
      expect(report.failures[0]).toBeInstanceOf(SinkWriteError);
      expect(report.failures[0]?.sinkName).toBe('broken');
      expect(report.failures[0]?.message).toBe("Sink 'broken' write failed: disk full");
    });

    it('removes sinks by name', () => {
      expect(logger.removeSink(SINK_NAMES.MEMORY)).toBe(true);
      expect(logger.removeSink(SINK_NAMES.MEMORY)).toBe(false);

      expect(logger.info('nowhere')).toEqual({ dispatched: true, delivered: 0, failures: [] });
    });

    it('shares a sink between loggers', () => {
      const other = new LoggerImpl(LOGGER_NAMES.NETWORK, {
        sinks: [memory],
        pattern: '{%name}: {%message}'
      });
      logger.setPattern('{%name}: {%message}');

      logger.info('one');
      other.info('two');

      expect(memory.lines).toEqual(['app: one', 'net: two']);
    });
  });

  describe('Errors', () => {
    it('surfaces format errors and writes nothing', () => {
      expect(() => logger.info('{2}', 'a')).toThrow(FormatError);
      expect(memory.lines).toEqual([]);
    });

    it('keeps the old pattern when a new one is invalid', () => {
      expect(() => logger.setPattern('{%level:.2d}')).toThrow(FormatError);
      expect(logger.pattern).toBe('[{%time:%Y-%m-%d %H:%M:%S.%L}] [{%name}] [{%level}] {%message}');
    });
  });

  describe('Lifecycle', () => {
    it('reports flush failures', async () => {
      logger.addSink(brokenSink());

      const failures = await logger.flush();

      expect(failures).toHaveLength(1);
      expect(failures[0]?.message).toBe("Sink 'broken' write failed: flush refused");
    });

    it('flushes and closes every sink once', async () => {
      logger.addSink(brokenSink());

      const failures = await logger.close();
      const again = await logger.close();

      expect(failures.map(failure => failure.message)).toEqual([
        "Sink 'broken' write failed: flush refused",
        "Sink 'broken' write failed: close refused"
      ]);
      expect(again).toEqual([]);
    });

    it('suppresses calls after close', async () => {
      await logger.close();
      expect(logger.error('late')).toBe(SUPPRESSED);
      expect(logger.shouldLog('error')).toBe(false);
    });
  });
});
