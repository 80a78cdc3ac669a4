import { describe, it, expect } from '@jest/globals';
import { mask } from '../../../cli/utils/logger.js';

describe('logger', () => {
  describe('mask', () => {
    it('should keep the first four characters', () => {
      expect(mask('AKIAEXAMPLE')).toBe('AKIA*******');
    });

    it('should cap the number of asterisks', () => {
      expect(mask('A'.repeat(40))).toBe(`AAAA${'*'.repeat(12)}`);
    });

    it('should hide short values completely', () => {
      expect(mask('abcd')).toBe('****');
      expect(mask('')).toBe('');
    });
  });
});
