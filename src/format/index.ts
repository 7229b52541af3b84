/**
 * Format engine for linewright
 *
 * `{}`-style templates with positional, named and implicit fields, numeric
 * bases, fill and alignment, float precision and strftime timestamps.
 *
 * @example
 * ```typescript
 * import { render, arg, style } from 'linewright/format';
 *
 * render('Hello, {}!', ['World']);              // 'Hello, World!'
 * render('{1} comes before {0}', ['second', 'first']);
 * render('Name: {name}', [arg.named('name', 'Alice')]);
 * render('Binary:  {:#b}', [42]);                // 'Binary:  0b101010'
 * render('Now: {:%Y-%m-%d %H:%M:%S}', [new Date()]);
 * render('{}', [style('This is green!', 'green')]);
 * ```
 */

export * from './types.js';
export * from './format-engine.js';
export { parseTemplate, parseSpec } from './template-parser.js';
export { formatTime, DEFAULT_TIME_PATTERN } from './time-format.js';
export * from './style.js';
