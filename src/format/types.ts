/**
 * Format Engine Types
 *
 * Arguments are a tagged union with an explicit `kind` discriminant, built
 * through the `arg` helpers or converted from plain values by `toArgument`.
 * Templates are parsed once into segments that the engine walks left to
 * right.
 *
 * @example
 * ```typescript
 * import { arg, render } from 'linewright/format';
 *
 * render('Name: {name}, Age: {age}', [arg.named('name', 'Alice'), arg.named('age', 30)]);
 * // => 'Name: Alice, Age: 30'
 * ```
 */

import { FormatError } from '../errors.js';

interface ArgumentBase {
  /** Binding name for `{name}` placeholders */
  readonly name?: string;
}

export interface IntegerArgument extends ArgumentBase {
  readonly kind: 'integer';
  readonly value: number | bigint;
}

export interface FloatArgument extends ArgumentBase {
  readonly kind: 'float';
  readonly value: number;
}

export interface StringArgument extends ArgumentBase {
  readonly kind: 'string';
  readonly value: string;
}

export interface BooleanArgument extends ArgumentBase {
  readonly kind: 'boolean';
  readonly value: boolean;
}

export interface TimestampArgument extends ArgumentBase {
  readonly kind: 'timestamp';
  readonly value: Date;
}

/** A single value bound to a template */
export type FormatArgument =
  | IntegerArgument
  | FloatArgument
  | StringArgument
  | BooleanArgument
  | TimestampArgument;

export type ArgumentKind = FormatArgument['kind'];

/** Plain values accepted wherever an argument is expected */
export type ArgumentValue = number | bigint | string | boolean | Date;

/** What callers may pass to `render` and to logging calls */
export type ArgumentInput = ArgumentValue | FormatArgument;

/** Alignment inside the field width */
export type Alignment = '<' | '>' | '^';

/** Sign policy for numeric values */
export type SignPolicy = '-' | '+' | ' ';

export type IntegerPresentation = 'd' | 'x' | 'X' | 'b' | 'B' | 'o' | 'c';
export type FloatPresentation = 'f' | 'F' | 'e' | 'E' | 'g' | 'G';
export type PresentationType = IntegerPresentation | FloatPresentation | 's';

/** Parsed `[[fill]align][sign][#][0][width][.precision][type]` specifier */
export interface FormatSpec {
  readonly fill: string;
  readonly align?: Alignment;
  readonly sign: SignPolicy;
  readonly alternate: boolean;
  readonly zeroPad: boolean;
  readonly width?: number;
  readonly precision?: number;
  readonly type?: PresentationType;
  /** strftime sub-pattern, only valid for timestamps */
  readonly timePattern?: string;
  /** Specifier text as written in the template */
  readonly raw: string;
}

/** How a placeholder selects its argument */
export type ArgumentRef =
  | { readonly mode: 'implicit' }
  | { readonly mode: 'index'; readonly index: number }
  | { readonly mode: 'name'; readonly name: string };

export type TemplateSegment =
  | { readonly kind: 'literal'; readonly text: string }
  | { readonly kind: 'field'; readonly ref: ArgumentRef; readonly spec: FormatSpec };

/** A template parsed once and reusable across renders */
export interface CompiledTemplate {
  readonly source: string;
  readonly segments: readonly TemplateSegment[];
  /** Number of `{}` placeholders */
  readonly implicitCount: number;
}

/** Time zone used for timestamp expansion */
export type TimeZone = 'local' | 'utc';

function checkInteger(value: number | bigint): number | bigint {
  if (typeof value === 'number' && !Number.isInteger(value)) {
    throw new FormatError('TypeMismatch', `Integer argument expected, got ${value}`);
  }
  return value;
}

function withName<T extends FormatArgument>(argument: T, name: string | undefined): T {
  return name === undefined ? argument : { ...argument, name };
}

/**
 * Argument builders
 *
 * @example
 * ```typescript
 * render('{} {:.2f} {:>5}', [arg.int(1), arg.float(2), arg.str('x')]);
 * ```
 */
export const arg = {
  int(value: number | bigint, name?: string): IntegerArgument {
    return withName({ kind: 'integer', value: checkInteger(value) }, name);
  },

  float(value: number, name?: string): FloatArgument {
    return withName({ kind: 'float', value }, name);
  },

  str(value: string, name?: string): StringArgument {
    return withName({ kind: 'string', value }, name);
  },

  bool(value: boolean, name?: string): BooleanArgument {
    return withName({ kind: 'boolean', value }, name);
  },

  time(value: Date, name?: string): TimestampArgument {
    return withName({ kind: 'timestamp', value }, name);
  },

  /** Binds a plain value or an argument to `{name}` placeholders */
  named(name: string, value: ArgumentInput): FormatArgument {
    return { ...toArgument(value), name };
  }
} as const;

/** Checks whether an input is already a tagged argument */
export function isFormatArgument(input: ArgumentInput): input is FormatArgument {
  return typeof input === 'object' && !(input instanceof Date);
}

/**
 * Converts a plain value to its tagged form. Integral numbers become
 * integers, other numbers floats.
 */
export function toArgument(input: ArgumentInput): FormatArgument {
  if (isFormatArgument(input)) return input;
  if (input instanceof Date) return { kind: 'timestamp', value: input };

  if (typeof input === 'bigint') return { kind: 'integer', value: input };
  if (typeof input === 'number') {
    return Number.isInteger(input)
      ? { kind: 'integer', value: input }
      : { kind: 'float', value: input };
  }
  if (typeof input === 'string') return { kind: 'string', value: input };
  return { kind: 'boolean', value: input };
}
