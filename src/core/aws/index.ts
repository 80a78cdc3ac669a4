/**
 * AWS integration module
 *
 * CloudFront client creation and invalidation calls
 */

// Client creation
export {
  createCloudFrontClient,
  createCredentialProvider,
} from './client.js';

// CloudFront Invalidation
export {
  createInvalidation,
  getInvalidation,
  waitForInvalidationCompleted,
  isInvalidationComplete,
  getInvalidationStatus,
  toInvalidationBatch,
} from './cloudfront-invalidation.js';
