/**
 * Shared constants for test files to avoid string duplication
 */

import { FormatEngine } from '../src/format/format-engine.js';

/** 2024-03-05 14:07:09.045 UTC, a Tuesday */
export const FIXED_TIME = new Date(Date.UTC(2024, 2, 5, 14, 7, 9, 45));

/** Engine rendering timestamps in UTC so expectations do not depend on TZ */
export const UTC_ENGINE = new FormatEngine({ timeZone: 'utc' });

export const fixedClock = (): Date => FIXED_TIME;

export const TEST_CONSTANTS = {
  LOGGER_NAMES: {
    APP: 'app',
    CONSOLE: 'console',
    NETWORK: 'net'
  },

  SINK_NAMES: {
    MEMORY: 'memory',
    SECOND: 'second',
    BROKEN: 'broken'
  },

  PATTERNS: {
    MESSAGE_ONLY: '{%message}',
    LEVEL_MESSAGE: '[{%level}] {%message}',
    CUSTOM: '[{%time:%H:%M:%S.%L}] [{%level}] [{%name}] {%message}',
    WITH_SOURCE: '{%source} {%message}'
  },

  STAMPS: {
    FULL: '[2024-03-05 14:07:09.045]',
    SHORT: '[14:07:09.045]'
  },

  ANSI: {
    GREEN: '\x1b[32m',
    YELLOW: '\x1b[33m',
    RED: '\x1b[31m',
    CYAN: '\x1b[36m',
    BOLD: '\x1b[1m',
    BG_RED: '\x1b[41m',
    RESET: '\x1b[0m'
  }
} as const;
