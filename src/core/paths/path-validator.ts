/**
 * Invalidation path validation
 *
 * Turns caller-supplied path candidates into the list CloudFront accepts:
 * absolute, unique, and at most 3000 entries.
 */

import { fail, ok, type ValidationResult } from '../errors.js';

/**
 * CloudFront limit on paths per invalidation batch
 */
export const MAX_INVALIDATION_PATHS = 3000;

/**
 * A single entry of a caller-supplied path list
 */
export type PathCandidate =
  | { kind: 'path'; value: string }
  | { kind: 'other' };

/**
 * Classify an arbitrary value at the boundary
 */
export function toPathCandidate(value: unknown): PathCandidate {
  return typeof value === 'string'
    ? { kind: 'path', value }
    : { kind: 'other' };
}

/**
 * Prefix a path with `/` when it lacks one
 */
export function ensureLeadingSlash(path: string): string {
  return path.startsWith('/') ? path : `/${path}`;
}

export class PathValidator {
  /**
   * Validate and normalize invalidation paths.
   *
   * Non-string entries and blank strings are dropped, missing leading
   * slashes are added, and duplicates are removed keeping the first
   * occurrence.
   */
  sanitize(paths: unknown): ValidationResult<string[]> {
    if (!Array.isArray(paths) || paths.length === 0) {
      return fail('InvalidPaths', 'Invalidation paths must be a non-empty array.');
    }

    const unique = new Set<string>();

    for (const entry of paths) {
      const candidate = toPathCandidate(entry);
      if (candidate.kind === 'other') {
        continue;
      }

      const trimmed = candidate.value.trim();
      if (trimmed === '') {
        continue;
      }

      unique.add(ensureLeadingSlash(trimmed));
    }

    if (unique.size === 0) {
      return fail('NoValidPaths', 'No valid invalidation paths provided.');
    }

    if (unique.size > MAX_INVALIDATION_PATHS) {
      return fail(
        'TooManyPaths',
        `CloudFront allows a maximum of ${MAX_INVALIDATION_PATHS} paths per invalidation request. You provided ${unique.size} paths.`
      );
    }

    return ok([...unique]);
  }
}
