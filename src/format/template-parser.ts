/**
 * Template and specifier parsing
 *
 * Templates are scanned left to right into literal and field segments.
 * `{{` and `}}` are literal braces; anything else between braces is a
 * field of the form `[arg-id][:spec]`.
 */

import { FormatError } from '../errors.js';
import type {
  Alignment,
  ArgumentRef,
  CompiledTemplate,
  FormatSpec,
  PresentationType,
  SignPolicy,
  TemplateSegment
} from './types.js';

const ALIGNMENTS = new Set<string>(['<', '>', '^']);
const SIGNS = new Set<string>(['+', '-', ' ']);
const PRESENTATION_TYPES = new Set<string>([
  'd', 'x', 'X', 'b', 'B', 'o', 'c',
  'f', 'F', 'e', 'E', 'g', 'G',
  's'
]);

const INDEX_PATTERN = /^\d+$/;
const NAME_PATTERN = /^%?[A-Za-z_][A-Za-z0-9_]*$/;

/** Specifier of a bare `{}` field */
export const EMPTY_SPEC: FormatSpec = Object.freeze({
  fill: ' ',
  sign: '-',
  alternate: false,
  zeroPad: false,
  raw: ''
});

function isAlignment(value: string): value is Alignment {
  return ALIGNMENTS.has(value);
}

function isSign(value: string): value is SignPolicy {
  return SIGNS.has(value);
}

function isPresentationType(value: string): value is PresentationType {
  return PRESENTATION_TYPES.has(value);
}

/**
 * Parses a `[[fill]align][sign][#][0][width][.precision][type]` specifier.
 * A trailing part starting with `%` is kept as a strftime pattern.
 */
export function parseSpec(raw: string, template?: string): FormatSpec {
  if (raw === '') return EMPTY_SPEC;

  const malformed = (reason: string): FormatError =>
    new FormatError('MalformedSpecifier', `Invalid format specifier "${raw}": ${reason}`, template);

  let pos = 0;
  let fill = ' ';
  let align: Alignment | undefined;
  let sign: SignPolicy = '-';
  let alternate = false;
  let zeroPad = false;
  let width: number | undefined;
  let precision: number | undefined;

  const first = raw.charAt(0);
  const second = raw.charAt(1);
  if (raw.length >= 2 && isAlignment(second)) {
    fill = first;
    align = second;
    pos = 2;
  } else if (isAlignment(first)) {
    align = first;
    pos = 1;
  }

  const signChar = raw.charAt(pos);
  if (isSign(signChar)) {
    sign = signChar;
    pos++;
  }

  if (raw.charAt(pos) === '#') {
    alternate = true;
    pos++;
  }

  if (raw.charAt(pos) === '0') {
    zeroPad = true;
    pos++;
  }

  const widthMatch = /^\d+/.exec(raw.slice(pos));
  if (widthMatch) {
    width = Number(widthMatch[0]);
    pos += widthMatch[0].length;
  }

  if (raw.charAt(pos) === '.') {
    const precisionMatch = /^\d+/.exec(raw.slice(pos + 1));
    if (!precisionMatch) {
      throw malformed('missing precision after "."');
    }
    precision = Number(precisionMatch[0]);
    pos += 1 + precisionMatch[0].length;
  }

  const rest = raw.slice(pos);
  const base = { fill, align, sign, alternate, zeroPad, width, precision, raw };

  if (rest.startsWith('%')) {
    return { ...base, timePattern: rest };
  }
  if (rest === '') {
    return base;
  }
  if (rest.length === 1 && isPresentationType(rest)) {
    return { ...base, type: rest };
  }
  throw malformed(`unknown presentation type "${rest}"`);
}

function parseRef(id: string, template: string): ArgumentRef {
  if (id === '') return { mode: 'implicit' };
  if (INDEX_PATTERN.test(id)) return { mode: 'index', index: Number(id) };
  if (NAME_PATTERN.test(id)) return { mode: 'name', name: id };
  throw new FormatError('MalformedSpecifier', `Invalid argument id "${id}"`, template);
}

/**
 * Parses a template into segments
 *
 * @throws {FormatError} MalformedSpecifier on unbalanced braces, invalid
 * specifiers, or a template that mixes `{}` with indexed or named fields
 */
export function parseTemplate(template: string): CompiledTemplate {
  const segments: TemplateSegment[] = [];
  let literal = '';
  let implicitCount = 0;
  let explicitCount = 0;
  let i = 0;

  while (i < template.length) {
    const ch = template.charAt(i);

    if (ch === '}') {
      if (template.charAt(i + 1) !== '}') {
        throw new FormatError('MalformedSpecifier', `Unmatched '}' at position ${i}`, template);
      }
      literal += '}';
      i += 2;
      continue;
    }

    if (ch !== '{') {
      literal += ch;
      i++;
      continue;
    }

    if (template.charAt(i + 1) === '{') {
      literal += '{';
      i += 2;
      continue;
    }

    const close = template.indexOf('}', i + 1);
    if (close < 0) {
      throw new FormatError('MalformedSpecifier', `Unmatched '{' at position ${i}`, template);
    }

    const body = template.slice(i + 1, close);
    if (body.includes('{')) {
      throw new FormatError('MalformedSpecifier', `Nested '{' in field "${body}"`, template);
    }

    const colon = body.indexOf(':');
    const id = colon < 0 ? body : body.slice(0, colon);
    const rawSpec = colon < 0 ? '' : body.slice(colon + 1);
    const ref = parseRef(id, template);

    if (ref.mode === 'implicit') implicitCount++;
    else explicitCount++;

    if (literal) {
      segments.push({ kind: 'literal', text: literal });
      literal = '';
    }
    segments.push({ kind: 'field', ref, spec: parseSpec(rawSpec, template) });
    i = close + 1;
  }

  if (literal) {
    segments.push({ kind: 'literal', text: literal });
  }

  if (implicitCount > 0 && explicitCount > 0) {
    throw new FormatError(
      'MalformedSpecifier',
      'Cannot mix automatic {} fields with indexed or named fields',
      template
    );
  }

  return { source: template, segments, implicitCount };
}
