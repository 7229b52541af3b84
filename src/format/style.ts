/**
 * Terminal color and emphasis wrapping
 *
 * A pure text transform: `style()` surrounds already-rendered text with ANSI
 * SGR sequences and `stripStyles()` removes them again. Whether the bytes
 * reach the terminal is decided by the sink, never by the engine.
 *
 * @example
 * ```typescript
 * import { style, render } from 'linewright/format';
 *
 * render('{}', [style('This is bold red!', 'red', 'bold')]);
 * ```
 */

/** ANSI SGR codes keyed by token */
export const Colors = {
  // Foreground
  black: '\x1b[30m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
  gray: '\x1b[90m',
  brightRed: '\x1b[91m',
  brightGreen: '\x1b[92m',
  brightYellow: '\x1b[93m',
  brightBlue: '\x1b[94m',
  brightMagenta: '\x1b[95m',
  brightCyan: '\x1b[96m',
  brightWhite: '\x1b[97m',

  // Background
  bgBlack: '\x1b[40m',
  bgRed: '\x1b[41m',
  bgGreen: '\x1b[42m',
  bgYellow: '\x1b[43m',
  bgBlue: '\x1b[44m',
  bgMagenta: '\x1b[45m',
  bgCyan: '\x1b[46m',
  bgWhite: '\x1b[47m',

  // Emphasis
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  italic: '\x1b[3m',
  underline: '\x1b[4m',
  blink: '\x1b[5m',
  reverse: '\x1b[7m',
  strikethrough: '\x1b[9m',

  reset: '\x1b[0m'
} as const;

export type StyleToken = Exclude<keyof typeof Colors, 'reset'>;

// eslint-disable-next-line no-control-regex
const SGR_PATTERN = /\x1b\[[0-9;]*m/g;
// eslint-disable-next-line no-control-regex
const SGR_PROBE = /\x1b\[[0-9;]*m/;
// eslint-disable-next-line no-control-regex
const SGR_SPLIT = /(\x1b\[[0-9;]*m)/;

/** Wraps text in the escape sequences of the given tokens */
export function style(text: string, ...tokens: readonly StyleToken[]): string {
  if (tokens.length === 0 || text === '') return text;
  const open = tokens.map(token => Colors[token]).join('');
  return `${open}${text}${Colors.reset}`;
}

/** Removes every SGR escape sequence */
export function stripStyles(text: string): string {
  return text.includes('\x1b[') ? text.replace(SGR_PATTERN, '') : text;
}

/** Checks whether text carries any SGR escape sequence */
export function hasStyles(text: string): boolean {
  return SGR_PROBE.test(text);
}

/** Number of characters a terminal shows, ignoring escape sequences */
export function visibleLength(text: string): number {
  return Array.from(stripStyles(text)).length;
}

/**
 * Keeps the first `count` visible characters. Escape sequences are kept
 * wherever they appear, so a trailing reset survives truncation.
 */
export function sliceVisible(text: string, count: number): string {
  if (!hasStyles(text)) return Array.from(text).slice(0, count).join('');

  let remaining = count;
  let out = '';
  for (const part of text.split(SGR_SPLIT)) {
    if (SGR_PROBE.test(part)) {
      out += part;
      continue;
    }
    const kept = Array.from(part).slice(0, remaining);
    remaining -= kept.length;
    out += kept.join('');
  }
  return out;
}
