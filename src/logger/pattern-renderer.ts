/**
 * Pattern Renderer
 *
 * Composes one log line from a pattern using the reserved fields `%time`,
 * `%level`, `%name`, `%message` and `%source`. Patterns are ordinary
 * templates, so every field takes the usual specifier:
 *
 * ```text
 * [{%time:%H:%M:%S.%L}] [{%level}] [{%name:<8}] {%message}
 * ```
 *
 * Patterns are compiled and validated once, when a logger is configured;
 * the hot path only walks the compiled segments.
 */

import { FormatError } from '../errors.js';
import { defaultEngine, type FormatEngine } from '../format/format-engine.js';
import { style, type StyleToken } from '../format/style.js';
import { arg } from '../format/types.js';
import type { CompiledTemplate, FormatArgument } from '../format/types.js';
import { LEVEL_CODES, levelCode, type SeverityLevel } from './severity.js';
import type { SourceLocation } from './types.js';

/** Reserved pattern fields */
export const RESERVED_FIELDS = ['%time', '%level', '%name', '%message', '%source'] as const;

export type ReservedField = (typeof RESERVED_FIELDS)[number];

/** Level-to-color policy applied to `%level` */
export const LEVEL_STYLES: Readonly<Record<SeverityLevel, readonly StyleToken[]>> = {
  trace: ['white'],
  debug: ['cyan'],
  info: ['green'],
  warn: ['yellow', 'bold'],
  error: ['red', 'bold'],
  critical: ['bold', 'bgRed'],
  off: []
};

/** A pattern parsed and validated against the reserved fields */
export interface CompiledPattern {
  readonly source: string;
  readonly template: CompiledTemplate;
  /** Whether `%source` appears in the pattern */
  readonly usesSource: boolean;
}

const RESERVED = new Set<string>(RESERVED_FIELDS);
const VALIDATION_TIME = new Date(0);

function isReservedField(name: string): name is ReservedField {
  return RESERVED.has(name);
}

/** Renders a call-site as `file:line` or `file:line (function)` */
export function formatSource(source: SourceLocation | undefined): string {
  if (!source) return '';
  const location = `${source.file}:${source.line}`;
  return source.function ? `${location} (${source.function})` : location;
}

function fieldArgument(
  field: ReservedField,
  level: SeverityLevel,
  loggerName: string,
  message: string,
  now: Date,
  source: SourceLocation | undefined
): FormatArgument {
  switch (field) {
    case '%time':
      return arg.time(now);
    case '%level':
      return arg.str(LEVEL_CODES[level]);
    case '%name':
      return arg.str(loggerName);
    case '%message':
      return arg.str(message);
    case '%source':
      return arg.str(formatSource(source));
  }
}

/**
 * Renders one line from a compiled pattern
 *
 * @throws {FormatError} when a field specifier does not fit its value
 */
export function renderLine(
  pattern: CompiledPattern | string,
  level: SeverityLevel,
  loggerName: string,
  message: string,
  now: Date,
  source?: SourceLocation,
  engine: FormatEngine = defaultEngine
): string {
  const compiled = typeof pattern === 'string' ? compilePattern(pattern, engine) : pattern;
  let line = '';

  for (const segment of compiled.template.segments) {
    if (segment.kind === 'literal') {
      line += segment.text;
      continue;
    }

    const name = segment.ref.mode === 'name' ? segment.ref.name : '';
    if (!isReservedField(name)) {
      throw new FormatError('UnresolvedPlaceholder', `Unknown pattern field "${name}"`, compiled.source);
    }

    if (name === '%level') {
      const text = segment.spec.raw === ''
        ? levelCode(level)
        : engine.formatField(arg.str(LEVEL_CODES[level]), segment.spec);
      line += style(text, ...LEVEL_STYLES[level]);
      continue;
    }

    line += engine.formatField(
      fieldArgument(name, level, loggerName, message, now, source),
      segment.spec
    );
  }

  return line;
}

/**
 * Parses and validates a pattern
 *
 * Every field must name a reserved field, and every specifier must fit the
 * field's value; a sample line is rendered to prove it.
 *
 * @throws {FormatError} UnresolvedPlaceholder for unknown or positional
 * fields, MalformedSpecifier or TypeMismatch for bad specifiers
 */
export function compilePattern(pattern: string, engine: FormatEngine = defaultEngine): CompiledPattern {
  const template = engine.compile(pattern);
  let usesSource = false;

  for (const segment of template.segments) {
    if (segment.kind !== 'field') continue;
    if (segment.ref.mode !== 'name' || !isReservedField(segment.ref.name)) {
      const label = segment.ref.mode === 'name'
        ? segment.ref.name
        : segment.ref.mode === 'index' ? String(segment.ref.index) : '';
      throw new FormatError(
        'UnresolvedPlaceholder',
        `Pattern field "{${label}}" is not one of ${RESERVED_FIELDS.join(', ')}`,
        pattern
      );
    }
    if (segment.ref.name === '%source') usesSource = true;
  }

  const compiled: CompiledPattern = { source: pattern, template, usesSource };

  try {
    renderLine(compiled, 'info', '', '', VALIDATION_TIME, undefined, engine);
  } catch (error) {
    if (error instanceof FormatError && error.template === undefined) {
      throw new FormatError(error.kind, error.message, pattern);
    }
    throw error;
  }

  return compiled;
}
