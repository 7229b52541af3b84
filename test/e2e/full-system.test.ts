/**
 * End-to-end tests: format engine, registry, loggers and sinks together
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  ColorConsoleSink,
  LoggerRegistry,
  MemorySink,
  arg,
  loadEnvLevels,
  style,
  type OutputStream
} from '../../src/index.js';
import { FIXED_TIME, TEST_CONSTANTS, UTC_ENGINE, fixedClock } from '../test-constants.js';

const { PATTERNS, STAMPS, ANSI } = TEST_CONSTANTS;

function recordingStream(chunks: string[]): OutputStream {
  return {
    write: chunk => {
      chunks.push(chunk);
      return true;
    }
  };
}

describe('Full System', () => {
  let registry: LoggerRegistry;
  let defaultSink: MemorySink;

  beforeEach(() => {
    defaultSink = new MemorySink();
    registry = new LoggerRegistry({
      defaultSinks: () => [defaultSink],
      defaultConfig: { engine: UTC_ENGINE, clock: fixedClock }
    });
  });

  it('renders templates directly', () => {
    const lines = [
      UTC_ENGINE.render('Hello, {}!', ['World']),
      UTC_ENGINE.render('{1} comes before {0}', ['second', 'first']),
      UTC_ENGINE.render('Name: {name}, Age: {age}', [arg.named('name', 'Alice'), arg.named('age', 30)]),
      UTC_ENGINE.render('Integer: {:>10d}', [42]),
      UTC_ENGINE.render('Float:   {:>10.2f}', [3.14159]),
      UTC_ENGINE.render('Hex:     {:#x}', [255]),
      UTC_ENGINE.render('Binary:  {:#b}', [42]),
      UTC_ENGINE.render('{}', [style('This is bold red!', 'red', 'bold')]),
      UTC_ENGINE.render('Current time: {:%Y-%m-%d %H:%M:%S}', [FIXED_TIME])
    ];

    expect(lines).toEqual([
      'Hello, World!',
      'first comes before second',
      'Name: Alice, Age: 30',
      'Integer:         42',
      'Float:         3.14',
      'Hex:     0xff',
      'Binary:  0b101010',
      `${ANSI.RED}${ANSI.BOLD}This is bold red!${ANSI.RESET}`,
      'Current time: 2024-03-05 14:07:09'
    ]);
  });

  it('logs through the default logger', () => {
    const log = registry.getOrCreateDefault();

    log.info('Welcome!');
    log.warn('This is a warning message');
    log.error('This is an error message');
    log.info('Formatted: {} + {} = {}', 1, 2, 3);
    log.info('Float value: {:.4f}', 3.14159265359);

    registry.setLevel('debug');
    log.debug('This debug message is now visible!');
    log.trace('But trace is still hidden');

    expect(defaultSink.lines).toEqual([
      `${STAMPS.FULL} [INFO ] Welcome!`,
      `${STAMPS.FULL} [WARN ] This is a warning message`,
      `${STAMPS.FULL} [ERROR] This is an error message`,
      `${STAMPS.FULL} [INFO ] Formatted: 1 + 2 = 3`,
      `${STAMPS.FULL} [INFO ] Float value: 3.1416`,
      `${STAMPS.FULL} [DEBUG] This debug message is now visible!`
    ]);
  });

  it('logs in color through a named logger', () => {
    const chunks: string[] = [];
    const console = registry.register('console', {
      engine: UTC_ENGINE,
      clock: fixedClock,
      sinks: [new ColorConsoleSink({ stream: recordingStream(chunks), colorMode: 'always' })]
    });

    console.info('This is from a named logger');
    console.setPattern(PATTERNS.CUSTOM);
    console.info('With custom pattern!');

    expect(chunks).toEqual([
      `${STAMPS.FULL} [console] [${ANSI.GREEN}INFO ${ANSI.RESET}] This is from a named logger\n`,
      `${STAMPS.SHORT} [${ANSI.GREEN}INFO ${ANSI.RESET}] [console] With custom pattern!\n`
    ]);
  });

  it('records call-sites', () => {
    const sink = new MemorySink();
    const logger = registry.register('app', { sinks: [sink], pattern: PATTERNS.WITH_SOURCE });

    logger.at({ file: 'main.ts', line: 42, function: 'main' }).info('Logging with source location');

    expect(sink.lines).toEqual(['main.ts:42 (main) Logging with source location']);
  });

  it('reports progress through a shared sink', () => {
    const shared = new MemorySink();
    const worker = registry.register('worker', { sinks: [shared], pattern: '[{%name}] {%message}' });
    const monitor = registry.register('monitor', { sinks: [shared], pattern: '[{%name}] {%message}' });
    const tasks = ['Loading config', 'Connecting', 'Processing', 'Saving'];

    tasks.forEach((task, i) => worker.info('[{}/{}] {}...', i + 1, tasks.length, task));
    monitor.info('All tasks completed!');

    expect(shared.lines).toEqual([
      '[worker] [1/4] Loading config...',
      '[worker] [2/4] Connecting...',
      '[worker] [3/4] Processing...',
      '[worker] [4/4] Saving...',
      '[monitor] All tasks completed!'
    ]);
  });

  it('reconfigures from the environment', () => {
    const sink = new MemorySink();
    const app = registry.register('app', { sinks: [sink], pattern: PATTERNS.LEVEL_MESSAGE });

    loadEnvLevels(registry, { LINEWRIGHT_LEVEL: 'warn,app=trace' });
    app.trace('deep detail');
    registry.getOrCreateDefault().info('filtered');

    expect(sink.lines).toEqual(['[TRACE] deep detail']);
    expect(defaultSink.lines).toEqual([]);
  });

  it('keeps logging when one sink fails', async () => {
    const healthy = new MemorySink({ name: 'healthy' });
    const app = registry.register('app', {
      pattern: PATTERNS.MESSAGE_ONLY,
      sinks: [
        {
          name: 'broken',
          colorEnabled: false,
          write: () => {
            throw new Error('disk full');
          },
          flush: () => {},
          close: () => {}
        },
        healthy
      ]
    });

    const report = app.error('still here');

    expect(report.failures.map(failure => failure.sinkName)).toEqual(['broken']);
    expect(healthy.lines).toEqual(['still here']);
    expect(await registry.shutdown()).toEqual([]);
  });
});
