/**
 * Unit tests for severity levels
 */

import { describe, it, expect } from 'vitest';
import {
  SEVERITY_LEVELS,
  isSeverityLevel,
  levelCode,
  parseLevel,
  passes
} from '../../src/logger/severity.js';
import { ConfigurationError } from '../../src/errors.js';

describe('Severity', () => {
  describe('passes', () => {
    it('admits levels at or above the threshold', () => {
      expect(passes('info', 'info')).toBe(true);
      expect(passes('error', 'warn')).toBe(true);
      expect(passes('debug', 'info')).toBe(false);
    });

    it('admits everything at trace', () => {
      for (const level of SEVERITY_LEVELS) {
        expect(passes(level, 'trace')).toBe(true);
      }
    });

    it('admits nothing below off', () => {
      expect(passes('critical', 'off')).toBe(false);
    });
  });

  describe('parseLevel', () => {
    it('parses names case-insensitively', () => {
      expect(parseLevel('DEBUG')).toBe('debug');
      expect(parseLevel(' Warn ')).toBe('warn');
    });

    it('accepts aliases', () => {
      expect(parseLevel('warning')).toBe('warn');
      expect(parseLevel('err')).toBe('error');
      expect(parseLevel('crit')).toBe('critical');
      expect(parseLevel('fatal')).toBe('critical');
    });

    it('rejects unknown names', () => {
      expect(() => parseLevel('verbose')).toThrow(ConfigurationError);
      expect(() => parseLevel('verbose')).toThrow('Invalid log level: verbose');
    });

    it('rejects prototype keys', () => {
      expect(() => parseLevel('constructor')).toThrow(ConfigurationError);
      expect(isSeverityLevel('toString')).toBe(false);
    });
  });

  describe('levelCode', () => {
    it('pads every code to five characters', () => {
      expect(SEVERITY_LEVELS.map(levelCode)).toEqual([
        'TRACE',
        'DEBUG',
        'INFO ',
        'WARN ',
        'ERROR',
        'CRIT ',
        'OFF  '
      ]);
    });
  });
});
