/**
 * linewright - format strings and leveled, multi-sink logging
 *
 * A zero-dependency library pairing a `{}`-style format engine with named
 * loggers that filter by severity, compose lines from patterns and write to
 * any number of sinks.
 *
 * ## Core Features
 *
 * ### Format Engine
 * - **Positional, named and implicit fields**: `{1}`, `{name}`, `{}`
 * - **Specifiers**: fill, alignment, width, sign, `#`, precision, bases
 * - **Timestamps**: strftime sub-patterns such as `{:%Y-%m-%d %H:%M:%S}`
 * - **Color**: `style()` wraps text in ANSI sequences
 *
 * ### Loggers
 * - **Severity filtering**: trace, debug, info, warn, error, critical, off
 * - **Patterns**: `%time`, `%level`, `%name`, `%message`, `%source`
 * - **Sinks**: plain and colorized console, memory, custom
 * - **Registry**: name lookup, in-place reconfiguration, lazy default logger
 *
 * ## Quick Start
 *
 * @example
 * ```typescript
 * import { LoggerRegistry, ColorConsoleSink, arg } from 'linewright';
 *
 * const registry = new LoggerRegistry();
 *
 * const log = registry.getOrCreateDefault();
 * log.info('Welcome!');
 * log.info('Float value: {:.4f}', 3.14159265359);
 *
 * const console = registry.register('console', { sinks: [new ColorConsoleSink()] });
 * console.setPattern('[{%time:%H:%M:%S.%L}] [{%level}] [{%name}] {%message}');
 * console.info('Name: {name}', arg.named('name', 'Alice'));
 * console.at({ file: 'main.ts', line: 42 }).warn('with call-site');
 * ```
 *
 * ## Sub-path Exports
 *
 * @example
 * ```typescript
 * import { render } from 'linewright/format';
 * import { createLogger } from 'linewright/logger';
 * import { ConsoleSink } from 'linewright/sinks';
 * ```
 */

export * from './errors.js';
export * from './format/index.js';
export * from './logger/index.js';
export * from './sinks/index.js';
