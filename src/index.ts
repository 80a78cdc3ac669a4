/**
 * cloudfront-invalidator
 *
 * Encrypted CloudFront credentials and validated, deduplicated
 * invalidation requests.
 */

// Export types
export * from './types/config.js';
export * from './types/credentials.js';
export * from './types/invalidation.js';
export * from './types/settings.js';

// Export core functionality
export * from './core/errors.js';
export * from './core/config/index.js';
export * from './core/paths/index.js';
export * from './core/credentials/index.js';
export * from './core/settings/index.js';
export * from './core/invalidation/index.js';
export * from './core/aws/index.js';
