/**
 * Colorized console sink
 *
 * Keeps the escape sequences the pattern renderer and `style()` put into a
 * line when the destination can show color, and strips them otherwise. The
 * decision is made once, when the sink is constructed.
 *
 * @example
 * ```typescript
 * import { ColorConsoleSink } from 'linewright/sinks';
 *
 * // Color when stdout is a terminal, honoring NO_COLOR and FORCE_COLOR
 * const sink = new ColorConsoleSink();
 *
 * // Always color, e.g. when piping into a pager that understands ANSI
 * const forced = new ColorConsoleSink({ colorMode: 'always' });
 * ```
 */

import { ConsoleSink, type ConsoleSinkOptions } from './console-sink.js';
import { detectColorSupport, type ColorMode } from './sink-interface.js';

/**
 * Colorized console sink configuration
 */
export interface ColorConsoleSinkOptions extends ConsoleSinkOptions {
  /** Color policy (default: 'auto') */
  colorMode?: ColorMode;

  /** Environment consulted by 'auto' (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

function resolveColor(options: ColorConsoleSinkOptions): boolean {
  switch (options.colorMode ?? 'auto') {
    case 'always':
      return true;
    case 'never':
      return false;
    case 'auto':
      return detectColorSupport(options.stream ?? process.stdout, options.env);
  }
}

/**
 * Console sink that honors color and emphasis escape sequences
 */
export class ColorConsoleSink extends ConsoleSink {
  constructor(options: ColorConsoleSinkOptions = {}) {
    super({ ...options, name: options.name ?? 'color-console' }, resolveColor(options));
  }
}

/**
 * Create a colorized console sink
 */
export function createColorConsoleSink(options?: ColorConsoleSinkOptions): ColorConsoleSink {
  return new ColorConsoleSink(options);
}
