/**
 * CloudFront cache invalidation
 */

import {
  CloudFrontClient,
  CreateInvalidationCommand,
  GetInvalidationCommand,
  waitUntilInvalidationCompleted,
  type Invalidation,
  type InvalidationBatch,
} from '@aws-sdk/client-cloudfront';
import type { InvalidationRequest } from '../../types/invalidation.js';

/**
 * Request body of CreateInvalidation
 */
export function toInvalidationBatch(request: InvalidationRequest): InvalidationBatch {
  return {
    Paths: {
      Quantity: request.paths.length,
      Items: [...request.paths],
    },
    CallerReference: request.requestToken,
  };
}

/**
 * Create cache invalidation
 */
export async function createInvalidation(
  client: CloudFrontClient,
  request: InvalidationRequest
): Promise<Invalidation> {
  const response = await client.send(
    new CreateInvalidationCommand({
      DistributionId: request.distributionId,
      InvalidationBatch: toInvalidationBatch(request),
    })
  );

  if (!response.Invalidation) {
    throw new Error('Failed to create invalidation: No invalidation returned');
  }

  return response.Invalidation;
}

/**
 * Get invalidation status
 */
export async function getInvalidation(
  client: CloudFrontClient,
  distributionId: string,
  invalidationId: string
): Promise<Invalidation | null> {
  try {
    const response = await client.send(
      new GetInvalidationCommand({
        DistributionId: distributionId,
        Id: invalidationId,
      })
    );

    return response.Invalidation || null;
  } catch (error: unknown) {
    if (
      error &&
      typeof error === 'object' &&
      (('name' in error && error.name === 'NoSuchInvalidation') ||
        ('$metadata' in error &&
          typeof error.$metadata === 'object' &&
          error.$metadata !== null &&
          'httpStatusCode' in error.$metadata &&
          error.$metadata.httpStatusCode === 404))
    ) {
      return null;
    }
    throw error;
  }
}

/**
 * Wait for invalidation to complete
 */
export async function waitForInvalidationCompleted(
  client: CloudFrontClient,
  distributionId: string,
  invalidationId: string,
  options: {
    maxWaitTime?: number; // seconds
    minDelay?: number; // seconds
    maxDelay?: number; // seconds
  } = {}
): Promise<void> {
  const { maxWaitTime = 600, minDelay = 20, maxDelay = 60 } = options;

  await waitUntilInvalidationCompleted(
    {
      client,
      maxWaitTime,
      minDelay,
      maxDelay,
    },
    {
      DistributionId: distributionId,
      Id: invalidationId,
    }
  );
}

/**
 * Check if invalidation is complete
 */
export function isInvalidationComplete(invalidation: Invalidation): boolean {
  return invalidation.Status === 'Completed';
}

/**
 * Get invalidation progress
 */
export function getInvalidationStatus(invalidation: Invalidation): string {
  return invalidation.Status || 'Unknown';
}
