/**
 * Invalidation module
 */

export {
  InvalidationRequestBuilder,
  DEFAULT_TOKEN_PREFIX,
  randomSuffix,
  type RequestBuilderOptions,
} from './request-builder.js';

export {
  Invalidator,
  type InvalidatorOptions,
  type InvalidationOutcome,
  type ClientFactory,
} from './invalidator.js';
