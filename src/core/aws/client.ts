/**
 * CloudFront client creation
 */

import { CloudFrontClient } from '@aws-sdk/client-cloudfront';
import { fromNodeProviderChain } from '@aws-sdk/credential-providers';
import type { AwsCredentialIdentityProvider } from '@aws-sdk/types';
import type { AuthMode } from '../../types/invalidation.js';
import { DEFAULT_REGION } from '../settings/codec.js';

/**
 * Credential provider for an auth mode.
 *
 * Explicit credentials are used as-is; the ambient mode defers to the
 * default provider chain (environment, profile, container or instance role).
 */
export function createCredentialProvider(authMode: AuthMode): AwsCredentialIdentityProvider {
  if (authMode.type === 'explicit') {
    const { accessKeyId, secretAccessKey } = authMode.credentials;
    return async () => ({ accessKeyId, secretAccessKey });
  }

  return fromNodeProviderChain();
}

/**
 * Create CloudFront client for an auth mode
 */
export function createCloudFrontClient(
  authMode: AuthMode,
  region: string = DEFAULT_REGION
): CloudFrontClient {
  return new CloudFrontClient({
    region: region || DEFAULT_REGION,
    credentials: createCredentialProvider(authMode),
  });
}
