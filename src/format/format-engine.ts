/**
 * Format Engine
 *
 * Renders `{}`-style templates against a list of tagged arguments. Fields
 * resolve by explicit index, then by name, then by the next implicit slot.
 * Output is built in memory and returned only when every field rendered, so
 * a failing render never produces partial text.
 *
 * @example
 * ```typescript
 * import { FormatEngine } from 'linewright/format';
 *
 * const engine = new FormatEngine({ timeZone: 'utc' });
 * engine.render('{1} comes before {0}', ['second', 'first']);
 * // => 'first comes before second'
 * engine.render('{:>10.2f}', [3.14159]);
 * // => '      3.14'
 * ```
 */

import { FormatError } from '../errors.js';
import { parseTemplate, parseSpec, EMPTY_SPEC } from './template-parser.js';
import { formatTime, DEFAULT_TIME_PATTERN } from './time-format.js';
import { sliceVisible, visibleLength } from './style.js';
import { toArgument } from './types.js';
import type {
  Alignment,
  ArgumentInput,
  ArgumentRef,
  CompiledTemplate,
  FormatArgument,
  FormatSpec,
  TimeZone
} from './types.js';

/** Engine options */
export interface FormatEngineOptions {
  /** Zone used for timestamp fields (default: local) */
  timeZone?: TimeZone;

  /** Called once per `render` call, before any work is done */
  onRender?: (template: string) => void;
}

const MAX_PRECISION = 100;

/** Magnitude from which `toFixed` switches to exponent notation */
const TO_FIXED_LIMIT = 1e21;

const ALTERNATE_PREFIXES: Partial<Record<string, string>> = {
  x: '0x',
  X: '0X',
  b: '0b',
  B: '0B',
  o: '0'
};

const RADIX: Partial<Record<string, number>> = {
  d: 10,
  x: 16,
  X: 16,
  b: 2,
  B: 2,
  o: 8
};

/**
 * Pads text to the field width using the fill and alignment. Width counts
 * visible characters, so escape sequences from `style()` take no room.
 */
export function align(text: string, spec: FormatSpec, defaultAlign: Alignment): string {
  const width = spec.width ?? 0;
  const length = visibleLength(text);
  if (length >= width) return text;

  const padding = width - length;
  const alignment = spec.align ?? defaultAlign;
  if (alignment === '<') return text + spec.fill.repeat(padding);
  if (alignment === '>') return spec.fill.repeat(padding) + text;

  const left = Math.floor(padding / 2);
  return spec.fill.repeat(left) + text + spec.fill.repeat(padding - left);
}

function typeMismatch(argument: FormatArgument, spec: FormatSpec): FormatError {
  return new FormatError(
    'TypeMismatch',
    `Specifier "${spec.raw}" cannot format a ${argument.kind} argument`
  );
}

function signOf(negative: boolean, spec: FormatSpec): string {
  if (negative) return '-';
  return spec.sign === '-' ? '' : spec.sign;
}

/** Joins sign, prefix and digits, honoring the `0` flag */
function composeNumber(sign: string, prefix: string, digits: string, spec: FormatSpec): string {
  if (spec.zeroPad && spec.align === undefined && spec.width !== undefined) {
    const zeros = spec.width - sign.length - prefix.length - digits.length;
    if (zeros > 0) {
      return sign + prefix + '0'.repeat(zeros) + digits;
    }
  }
  return align(sign + prefix + digits, spec, '>');
}

function widenExponent(text: string): string {
  return text.replace(/e([+-])(\d)$/, 'e$10$2');
}

/** Fixed-point digits of a non-negative finite value, never in exponent form */
function fixedDigits(abs: number, precision: number): string {
  if (abs < TO_FIXED_LIMIT) return abs.toFixed(precision);
  const whole = BigInt(abs).toString();
  return precision === 0 ? whole : `${whole}.${'0'.repeat(precision)}`;
}

function trimFractionZeros(text: string): string {
  if (!text.includes('.')) return text;
  return text.replace(/\.?0+$/, '');
}

function generalFloat(abs: number, precision: number, keepZeros: boolean): string {
  const p = precision === 0 ? 1 : precision;
  const exponential = abs.toExponential(p - 1);
  const exponent = Number(exponential.slice(exponential.indexOf('e') + 1));

  if (exponent < -4 || exponent >= p) {
    const [mantissa = '', power = ''] = exponential.split('e');
    const body = keepZeros ? mantissa : trimFractionZeros(mantissa);
    return widenExponent(`${body}e${power}`);
  }

  const fixed = fixedDigits(abs, Math.max(0, p - 1 - exponent));
  return keepZeros ? fixed : trimFractionZeros(fixed);
}

function formatFloat(value: number, spec: FormatSpec): string {
  const precision = spec.precision;
  if (precision !== undefined && precision > MAX_PRECISION) {
    throw new FormatError('MalformedSpecifier', `Precision ${precision} exceeds ${MAX_PRECISION}`);
  }

  const type = spec.type;
  const upper = type === 'F' || type === 'E' || type === 'G';
  const negative = value < 0 || Object.is(value, -0);
  const sign = signOf(negative, spec);

  if (!Number.isFinite(value)) {
    const text = Number.isNaN(value) ? 'nan' : 'inf';
    return align(sign + (upper ? text.toUpperCase() : text), spec, '>');
  }

  const abs = Math.abs(value);
  let digits: string;
  switch (type) {
    case 'f':
    case 'F':
      digits = fixedDigits(abs, precision ?? 6);
      break;
    case 'e':
    case 'E':
      digits = widenExponent(abs.toExponential(precision ?? 6));
      break;
    case 'g':
    case 'G':
      digits = generalFloat(abs, precision ?? 6, spec.alternate);
      break;
    default:
      digits = precision === undefined ? widenExponent(String(abs)) : fixedDigits(abs, precision);
  }

  if (upper) digits = digits.toUpperCase();
  if (spec.alternate && !digits.includes('.') && !/[eE]/.test(digits)) {
    digits += '.';
  }
  return composeNumber(sign, '', digits, spec);
}

function formatInteger(value: number | bigint, spec: FormatSpec): string {
  const type = spec.type ?? 'd';

  if (type === 'c') {
    const codePoint = Number(value);
    if (codePoint < 0 || codePoint > 0x10ffff) {
      throw new FormatError('TypeMismatch', `Code point ${value} out of range for "${spec.raw}"`);
    }
    return align(String.fromCodePoint(codePoint), spec, '<');
  }

  const radix = RADIX[type] ?? 10;
  const negative = value < 0;
  const abs = typeof value === 'bigint' ? (negative ? -value : value) : Math.abs(value);
  let digits = abs.toString(radix);
  if (type === 'X' || type === 'B') digits = digits.toUpperCase();

  let prefix = spec.alternate ? ALTERNATE_PREFIXES[type] ?? '' : '';
  if (type === 'o' && digits === '0') prefix = '';

  return composeNumber(signOf(negative, spec), prefix, digits, spec);
}

function rejectNumericFlags(argument: FormatArgument, spec: FormatSpec): void {
  if (spec.sign !== '-' || spec.alternate || spec.zeroPad) {
    throw typeMismatch(argument, spec);
  }
}

function formatText(text: string, spec: FormatSpec): string {
  const truncated = spec.precision === undefined ? text : sliceVisible(text, spec.precision);
  return align(truncated, spec, '<');
}

/**
 * Format engine with a fixed time zone and an optional render hook
 */
export class FormatEngine {
  private readonly zone: TimeZone;
  private readonly onRender?: (template: string) => void;

  constructor(options: FormatEngineOptions = {}) {
    this.zone = options.timeZone ?? 'local';
    this.onRender = options.onRender;
  }

  /** Zone used for timestamp fields */
  get timeZone(): TimeZone {
    return this.zone;
  }

  /** Parses a template once for repeated rendering */
  compile(template: string): CompiledTemplate {
    return parseTemplate(template);
  }

  /**
   * Renders a template against arguments
   *
   * @throws {FormatError} when a field cannot be resolved or formatted
   */
  render(template: string | CompiledTemplate, args: readonly ArgumentInput[] = []): string {
    const compiled = typeof template === 'string' ? parseTemplate(template) : template;
    this.onRender?.(compiled.source);

    if (compiled.segments.length === 0) return '';

    const resolved = args.map(toArgument);
    let next = 0;
    let out = '';

    try {
      for (const segment of compiled.segments) {
        if (segment.kind === 'literal') {
          out += segment.text;
          continue;
        }

        const argument = this.resolve(segment.ref, resolved, next);
        if (segment.ref.mode === 'implicit') next++;
        out += this.formatField(argument, segment.spec);
      }
    } catch (error) {
      if (error instanceof FormatError && error.template === undefined) {
        throw new FormatError(error.kind, error.message, compiled.source);
      }
      throw error;
    }

    return out;
  }

  /**
   * Formats one argument with a parsed or raw specifier
   *
   * @throws {FormatError} TypeMismatch or MalformedSpecifier
   */
  formatField(argument: FormatArgument, spec: FormatSpec | string = EMPTY_SPEC): string {
    const parsed = typeof spec === 'string' ? parseSpec(spec) : spec;

    if (argument.kind === 'timestamp') {
      if (parsed.type !== undefined || parsed.precision !== undefined) {
        throw typeMismatch(argument, parsed);
      }
      rejectNumericFlags(argument, parsed);
      const text = formatTime(parsed.timePattern ?? DEFAULT_TIME_PATTERN, argument.value, this.zone);
      return align(text, parsed, '<');
    }

    if (parsed.timePattern !== undefined) {
      throw typeMismatch(argument, parsed);
    }

    switch (argument.kind) {
      case 'integer':
        return this.formatIntegerArgument(argument.value, argument, parsed);

      case 'float':
        if (parsed.type !== undefined && !'fFeEgG'.includes(parsed.type)) {
          throw typeMismatch(argument, parsed);
        }
        return formatFloat(argument.value, parsed);

      case 'boolean':
        if (parsed.type !== undefined && parsed.type !== 's') {
          return this.formatIntegerArgument(argument.value ? 1 : 0, argument, parsed);
        }
        rejectNumericFlags(argument, parsed);
        return formatText(String(argument.value), parsed);

      case 'string':
        if (parsed.type !== undefined && parsed.type !== 's') {
          throw typeMismatch(argument, parsed);
        }
        rejectNumericFlags(argument, parsed);
        return formatText(argument.value, parsed);
    }
  }

  private formatIntegerArgument(
    value: number | bigint,
    argument: FormatArgument,
    spec: FormatSpec
  ): string {
    const type = spec.type;
    if (type === 's') throw typeMismatch(argument, spec);
    if (type !== undefined && 'fFeEgG'.includes(type)) {
      return formatFloat(Number(value), spec);
    }
    if (spec.precision !== undefined) {
      throw new FormatError('MalformedSpecifier', `Precision not allowed in "${spec.raw}" for integers`);
    }
    return formatInteger(value, spec);
  }

  private resolve(ref: ArgumentRef, args: readonly FormatArgument[], next: number): FormatArgument {
    switch (ref.mode) {
      case 'index': {
        const found = args[ref.index];
        if (found === undefined) {
          throw new FormatError(
            'ArgumentIndexOutOfRange',
            `Argument index ${ref.index} out of range (${args.length} supplied)`
          );
        }
        return found;
      }
      case 'name': {
        const found = args.find(candidate => candidate.name === ref.name);
        if (found === undefined) {
          throw new FormatError('UnresolvedPlaceholder', `No argument named "${ref.name}"`);
        }
        return found;
      }
      case 'implicit': {
        const found = args[next];
        if (found === undefined) {
          throw new FormatError(
            'ArgumentIndexOutOfRange',
            `Template needs argument ${next} but only ${args.length} supplied`
          );
        }
        return found;
      }
    }
  }
}

/** Engine shared by callers that need no hook and the local time zone */
export const defaultEngine = new FormatEngine();

/**
 * Renders a template with the shared engine
 *
 * @example
 * ```typescript
 * render('{:#x}', [255]); // => '0xff'
 * ```
 */
export function render(template: string, args: readonly ArgumentInput[] = []): string {
  return defaultEngine.render(template, args);
}
