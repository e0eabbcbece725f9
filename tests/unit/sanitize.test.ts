/**
 * Unit Tests for input sanitization
 */

import { MAX_INPUT_LENGTH, normalizeString, parseOptionIndex, sanitizeInput } from '../../src/utils/sanitize';

describe('Sanitize Utils', () => {
  describe('normalizeString', () => {
    it('should lowercase, strip accents and collapse whitespace', () => {
      expect(normalizeString('  Ćañón   Room ')).toBe('canon room');
      expect(normalizeString('Billiard\tRoom')).toBe('billiard room');
    });
  });

  describe('sanitizeInput', () => {
    it('should trim and cap input', () => {
      expect(sanitizeInput('  rope  ')).toBe('rope');
      expect(sanitizeInput('x'.repeat(100))).toHaveLength(MAX_INPUT_LENGTH);
    });
  });

  describe('parseOptionIndex', () => {
    it('should convert to a 0-based index', () => {
      expect(parseOptionIndex('3', 5)).toEqual({ valid: true, index: 2 });
      expect(parseOptionIndex(' 1 ', 1)).toEqual({ valid: true, index: 0 });
    });

    it('should reject anything else', () => {
      expect(parseOptionIndex('two', 5)).toEqual({ valid: false, error: 'Not a number' });
      expect(parseOptionIndex('-1', 5)).toEqual({ valid: false, error: 'Not a number' });
      expect(parseOptionIndex('6', 5)).toEqual({ valid: false, error: 'Choose a number between 1 and 5' });
    });
  });
});
