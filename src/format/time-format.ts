/**
 * strftime-style timestamp expansion
 *
 * Supported conversions: `%Y %y %C %m %d %e %H %I %M %S %L %p %a %A %b %h
 * %B %j %u %w %F %T %R %D %z %n %t %%`. `%L` is milliseconds.
 */

import { FormatError } from '../errors.js';
import type { TimeZone } from './types.js';

/** Pattern used for timestamps rendered through a bare `{}` */
export const DEFAULT_TIME_PATTERN = '%Y-%m-%d %H:%M:%S';

const WEEKDAYS = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'];
const MONTHS = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December'
];

const MS_PER_DAY = 86_400_000;

interface DateParts {
  year: number;
  month: number;
  day: number;
  hours: number;
  minutes: number;
  seconds: number;
  milliseconds: number;
  weekday: number;
  offsetMinutes: number;
}

function toParts(date: Date, timeZone: TimeZone): DateParts {
  if (timeZone === 'utc') {
    return {
      year: date.getUTCFullYear(),
      month: date.getUTCMonth() + 1,
      day: date.getUTCDate(),
      hours: date.getUTCHours(),
      minutes: date.getUTCMinutes(),
      seconds: date.getUTCSeconds(),
      milliseconds: date.getUTCMilliseconds(),
      weekday: date.getUTCDay(),
      offsetMinutes: 0
    };
  }
  return {
    year: date.getFullYear(),
    month: date.getMonth() + 1,
    day: date.getDate(),
    hours: date.getHours(),
    minutes: date.getMinutes(),
    seconds: date.getSeconds(),
    milliseconds: date.getMilliseconds(),
    weekday: date.getDay(),
    offsetMinutes: -date.getTimezoneOffset()
  };
}

function pad(value: number, width: number, fill = '0'): string {
  return String(value).padStart(width, fill);
}

function dayOfYear(parts: DateParts): number {
  const start = Date.UTC(parts.year, 0, 1);
  const current = Date.UTC(parts.year, parts.month - 1, parts.day);
  return Math.floor((current - start) / MS_PER_DAY) + 1;
}

function formatOffset(offsetMinutes: number): string {
  const sign = offsetMinutes < 0 ? '-' : '+';
  const abs = Math.abs(offsetMinutes);
  return `${sign}${pad(Math.floor(abs / 60), 2)}${pad(abs % 60, 2)}`;
}

function expand(conversion: string, parts: DateParts): string | undefined {
  const hours12 = parts.hours % 12 === 0 ? 12 : parts.hours % 12;

  switch (conversion) {
    case 'Y': return String(parts.year);
    case 'y': return pad(parts.year % 100, 2);
    case 'C': return pad(Math.floor(parts.year / 100), 2);
    case 'm': return pad(parts.month, 2);
    case 'd': return pad(parts.day, 2);
    case 'e': return pad(parts.day, 2, ' ');
    case 'H': return pad(parts.hours, 2);
    case 'I': return pad(hours12, 2);
    case 'M': return pad(parts.minutes, 2);
    case 'S': return pad(parts.seconds, 2);
    case 'L': return pad(parts.milliseconds, 3);
    case 'p': return parts.hours < 12 ? 'AM' : 'PM';
    case 'a': return WEEKDAYS[parts.weekday]?.slice(0, 3);
    case 'A': return WEEKDAYS[parts.weekday];
    case 'b':
    case 'h': return MONTHS[parts.month - 1]?.slice(0, 3);
    case 'B': return MONTHS[parts.month - 1];
    case 'j': return pad(dayOfYear(parts), 3);
    case 'u': return String(parts.weekday === 0 ? 7 : parts.weekday);
    case 'w': return String(parts.weekday);
    case 'F': return `${parts.year}-${pad(parts.month, 2)}-${pad(parts.day, 2)}`;
    case 'T': return `${pad(parts.hours, 2)}:${pad(parts.minutes, 2)}:${pad(parts.seconds, 2)}`;
    case 'R': return `${pad(parts.hours, 2)}:${pad(parts.minutes, 2)}`;
    case 'D': return `${pad(parts.month, 2)}/${pad(parts.day, 2)}/${pad(parts.year % 100, 2)}`;
    case 'z': return formatOffset(parts.offsetMinutes);
    case 'n': return '\n';
    case 't': return '\t';
    case '%': return '%';
    default: return undefined;
  }
}

/**
 * Expands a strftime pattern against a date
 *
 * @throws {FormatError} MalformedSpecifier for unknown conversions or a
 * trailing `%`, TypeMismatch for an invalid date
 */
export function formatTime(pattern: string, date: Date, timeZone: TimeZone = 'local'): string {
  if (Number.isNaN(date.getTime())) {
    throw new FormatError('TypeMismatch', 'Cannot format an invalid date');
  }
  const parts = toParts(date, timeZone);
  let out = '';

  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern.charAt(i);
    if (ch !== '%') {
      out += ch;
      continue;
    }

    const conversion = pattern.charAt(i + 1);
    const expanded = conversion === '' ? undefined : expand(conversion, parts);
    if (expanded === undefined) {
      throw new FormatError(
        'MalformedSpecifier',
        conversion === ''
          ? `Time pattern "${pattern}" ends with '%'`
          : `Unknown time conversion "%${conversion}" in "${pattern}"`
      );
    }
    out += expanded;
    i++;
  }

  return out;
}
