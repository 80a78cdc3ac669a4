import { describe, it, expect } from '@jest/globals';
import {
  PathValidator,
  MAX_INVALIDATION_PATHS,
  ensureLeadingSlash,
  toPathCandidate,
} from '../../../core/paths/path-validator.js';

describe('PathValidator', () => {
  const validator = new PathValidator();

  describe('sanitize', () => {
    it('should add missing leading slashes', () => {
      const result = validator.sanitize(['blog/*', 'images/logo.png']);

      expect(result).toEqual({ success: true, data: ['/blog/*', '/images/logo.png'] });
    });

    it('should keep absolute paths unchanged', () => {
      const result = validator.sanitize(['/*', '/assets/app.js']);

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data).toEqual(['/*', '/assets/app.js']);
      }
    });

    it('should remove duplicates keeping first occurrence order', () => {
      const result = validator.sanitize(['/b', 'a', '/a', 'b', '/c']);

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data).toEqual(['/b', '/a', '/c']);
      }
    });

    it('should trim entries and drop blank strings', () => {
      const result = validator.sanitize(['  /blog/  ', '', '   ', 'about']);

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data).toEqual(['/blog/', '/about']);
      }
    });

    it('should skip non-string entries', () => {
      const result = validator.sanitize([42, null, '/ok', { path: '/x' }, undefined]);

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data).toEqual(['/ok']);
      }
    });

    it('should reject a non-array value', () => {
      const result = validator.sanitize('/blog/*');

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('InvalidPaths');
        expect(result.error.message).toBe('Invalidation paths must be a non-empty array.');
      }
    });

    it('should reject an empty array', () => {
      const result = validator.sanitize([]);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('InvalidPaths');
      }
    });

    it('should reject a list with no usable entries', () => {
      const result = validator.sanitize(['', '  ', 7]);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('NoValidPaths');
        expect(result.error.message).toBe('No valid invalidation paths provided.');
      }
    });

    it('should accept exactly the maximum number of paths', () => {
      const paths = Array.from({ length: MAX_INVALIDATION_PATHS }, (_, i) => `/page-${i}`);
      const result = validator.sanitize(paths);

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data).toHaveLength(3000);
      }
    });

    it('should reject more than the maximum number of paths', () => {
      const paths = Array.from({ length: 3001 }, (_, i) => `/page-${i}`);
      const result = validator.sanitize(paths);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('TooManyPaths');
        expect(result.error.message).toBe(
          'CloudFront allows a maximum of 3000 paths per invalidation request. You provided 3001 paths.'
        );
      }
    });

    it('should count paths after removing duplicates', () => {
      const paths = Array.from({ length: 3001 }, (_, i) => `/page-${i % 3000}`);
      const result = validator.sanitize(paths);

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data).toHaveLength(3000);
      }
    });
  });

  describe('helpers', () => {
    it('should classify strings and other values', () => {
      expect(toPathCandidate('/a')).toEqual({ kind: 'path', value: '/a' });
      expect(toPathCandidate(1)).toEqual({ kind: 'other' });
    });

    it('should prefix a slash only when missing', () => {
      expect(ensureLeadingSlash('a/b')).toBe('/a/b');
      expect(ensureLeadingSlash('/a/b')).toBe('/a/b');
    });
  });
});
