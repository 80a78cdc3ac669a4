/**
 * Path handling module
 */

export {
  PathValidator,
  MAX_INVALIDATION_PATHS,
  toPathCandidate,
  ensureLeadingSlash,
  type PathCandidate,
} from './path-validator.js';

export { pathsForUrl, collectContentPaths } from './content-paths.js';
