/**
 * Invalidation request types
 */

import type { ResolvedCredentials } from './credentials.js';

/**
 * How the transport authenticates
 */
export type AuthMode =
  | { readonly type: 'ambient' }
  | { readonly type: 'explicit'; readonly credentials: ResolvedCredentials };

/**
 * Request ready to be submitted to CloudFront
 */
export interface InvalidationRequest {
  readonly distributionId: string;

  /** Unique, absolute paths (at most 3000) */
  readonly paths: readonly string[];

  /** CallerReference for idempotency bookkeeping on the API side */
  readonly requestToken: string;

  readonly authMode: AuthMode;
}

/**
 * Payload of the "request built" signal
 */
export interface RequestBuiltEvent {
  distributionId: string;
  paths: readonly string[];
}

/**
 * Payload of the "request failed" signal
 */
export interface RequestFailedEvent {
  request: InvalidationRequest;
  error: Error;
}

/**
 * Lifecycle hooks observed by external collaborators
 */
export interface InvalidationHooks {
  onRequestBuilt?: (event: RequestBuiltEvent) => void;
  onRequestFailed?: (event: RequestFailedEvent) => void;
}
