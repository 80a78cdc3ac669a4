/**
 * Invalidation orchestration
 *
 * Loads the settings, builds a request, and submits it to CloudFront.
 */

import type { CloudFrontClient, Invalidation } from '@aws-sdk/client-cloudfront';
import type { EnvironmentLookup } from '../../types/credentials.js';
import type {
  AuthMode,
  InvalidationHooks,
  InvalidationRequest,
} from '../../types/invalidation.js';
import type { Settings } from '../../types/settings.js';
import { createCloudFrontClient } from '../aws/client.js';
import { createInvalidation } from '../aws/cloudfront-invalidation.js';
import { CredentialResolver } from '../credentials/credential-resolver.js';
import type { CredentialStore } from '../credentials/credential-store.js';
import {
  InvalidationFailedError,
  type ValidationError,
  type ValidationResult,
} from '../errors.js';
import { effectiveRegion } from '../settings/codec.js';
import type { SettingsRepository } from '../settings/repository.js';
import { InvalidationRequestBuilder } from './request-builder.js';

/**
 * Factory for the CloudFront client used to submit a request
 */
export type ClientFactory = (authMode: AuthMode, region: string) => CloudFrontClient;

/**
 * Invalidator dependencies
 */
export interface InvalidatorOptions {
  repository: SettingsRepository;
  store: CredentialStore;
  environment: EnvironmentLookup;
  hooks?: InvalidationHooks;
  tokenPrefix?: string;
  createClient?: ClientFactory;
}

/**
 * Outcome of an invalidation
 */
export type InvalidationOutcome =
  | { success: true; request: InvalidationRequest; invalidation: Invalidation }
  | { success: false; error: ValidationError | InvalidationFailedError };

export class Invalidator {
  private readonly createClient: ClientFactory;

  constructor(private readonly options: InvalidatorOptions) {
    this.createClient = options.createClient ?? createCloudFrontClient;
  }

  /**
   * Builder bound to a settings snapshot
   */
  createBuilder(settings: Settings): InvalidationRequestBuilder {
    const resolver = new CredentialResolver(
      this.options.store,
      this.options.environment,
      settings
    );

    return new InvalidationRequestBuilder(resolver, {
      tokenPrefix: this.options.tokenPrefix,
      hooks: this.options.hooks,
    });
  }

  /**
   * Build a request for the given paths without submitting it
   */
  prepare(paths: unknown): ValidationResult<InvalidationRequest> {
    const settings = this.options.repository.load();
    return this.createBuilder(settings).build(settings.distributionId, paths);
  }

  /**
   * Build a request for the configured default paths without submitting it
   */
  prepareAll(): ValidationResult<InvalidationRequest> {
    const settings = this.options.repository.load();
    return this.createBuilder(settings).build(settings.distributionId, settings.defaultPaths);
  }

  /**
   * Invalidate the given paths
   */
  async invalidate(paths: unknown): Promise<InvalidationOutcome> {
    const settings = this.options.repository.load();
    return this.submit(settings, paths);
  }

  /**
   * Invalidate the configured default paths
   */
  async invalidateAll(): Promise<InvalidationOutcome> {
    const settings = this.options.repository.load();
    return this.submit(settings, settings.defaultPaths);
  }

  private async submit(settings: Settings, paths: unknown): Promise<InvalidationOutcome> {
    const builder = this.createBuilder(settings);
    const built = builder.build(settings.distributionId, paths);

    if (!built.success) {
      return { success: false, error: built.error };
    }

    const request = built.data;

    try {
      const client = this.createClient(request.authMode, effectiveRegion(settings));
      const invalidation = await createInvalidation(client, request);
      return { success: true, request, invalidation };
    } catch (error: unknown) {
      const failure = new InvalidationFailedError(
        request.distributionId,
        request.requestToken,
        error
      );
      builder.reportFailure(request, failure);
      return { success: false, error: failure };
    }
  }
}
