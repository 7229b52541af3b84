/**
 * Unit tests for MemorySink
 */

import { describe, it, expect } from 'vitest';
import { MemorySink } from '../../src/sinks/memory-sink.js';
import { style } from '../../src/format/style.js';

describe('MemorySink', () => {
  it('captures lines with their hints', () => {
    const sink = new MemorySink();

    sink.write('one', { level: 'info', logger: 'app' });
    sink.write('two');

    expect(sink.lines).toEqual(['one', 'two']);
    expect(sink.entries).toEqual([
      { text: 'one', hint: { level: 'info', logger: 'app' } },
      { text: 'two', hint: undefined }
    ]);
  });

  it('strips or keeps escape sequences', () => {
    const styled = style('x', 'red');
    const plain = new MemorySink();
    const colored = new MemorySink({ name: 'colored', colors: true });

    plain.write(styled);
    colored.write(styled);

    expect(plain.lines).toEqual(['x']);
    expect(colored.lines).toEqual(['\x1b[31mx\x1b[0m']);
  });

  it('drops the oldest lines past its capacity', () => {
    const sink = new MemorySink({ maxLines: 2 });

    sink.write('a');
    sink.write('b');
    sink.write('c');

    expect(sink.lines).toEqual(['b', 'c']);
  });

  it('filters by its own level', () => {
    const sink = new MemorySink({ level: 'error' });

    sink.write('warn', { level: 'warn', logger: 'app' });
    sink.write('critical', { level: 'critical', logger: 'app' });

    expect(sink.lines).toEqual(['critical']);
  });

  it('clears captured lines', () => {
    const sink = new MemorySink();
    sink.write('a');
    sink.clear();
    expect(sink.lines).toEqual([]);
  });
});
