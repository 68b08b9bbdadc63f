import { describe, it, expect } from 'vitest';
import {
  createReplacer,
  escapeMeasurement,
  escapeString,
  escapeStringField,
  escapeTag,
  unescapeString,
  unescapeTag,
} from '../../src/protocol/escape';

describe('escape', () => {
  describe('escapeString', () => {
    it('should escape every reserved character', () => {
      expect(escapeString('a,b"c d=e')).toBe('a\\,b\\"c\\ d\\=e');
    });

    it('should leave plain text untouched', () => {
      expect(escapeString('temperature')).toBe('temperature');
    });

    it('should not escape backslashes', () => {
      expect(escapeString('a\\b')).toBe('a\\b');
    });
  });

  describe('unescapeString', () => {
    it('should invert escapeString', () => {
      const input = 'room 1,floor="2"';
      expect(unescapeString(escapeString(input))).toBe(input);
    });

    it('should return input without backslashes unchanged', () => {
      const input = 'no escapes, here';
      expect(unescapeString(input)).toBe(input);
    });

    it('should keep unknown escape sequences', () => {
      expect(unescapeString('a\\nb')).toBe('a\\nb');
    });
  });

  describe('element escapers', () => {
    it('should escape commas and spaces in measurements', () => {
      expect(escapeMeasurement('cpu load,avg=1')).toBe('cpu\\ load\\,avg=1');
    });

    it('should escape commas, equals signs and spaces in tags', () => {
      expect(escapeTag('a b,c=d')).toBe('a\\ b\\,c\\=d');
      expect(unescapeTag('a\\ b\\,c\\=d')).toBe('a b,c=d');
    });

    it('should escape backslashes in measurements and tags', () => {
      expect(escapeMeasurement('dir\\')).toBe('dir\\\\');
      expect(escapeTag('a\\')).toBe('a\\\\');
      expect(unescapeTag('a\\\\\\,b')).toBe('a\\,b');
    });

    it('should escape backslashes and quotes in string fields', () => {
      expect(escapeStringField('say "hi" \\o/')).toBe('say \\"hi\\" \\\\o/');
    });
  });

  describe('createReplacer', () => {
    it('should prefer the longest key at a position', () => {
      const replace = createReplacer([
        ['a', '1'],
        ['ab', '2'],
      ]);
      expect(replace('abac')).toBe('21c');
    });
  });
});
