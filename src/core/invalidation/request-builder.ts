/**
 * Invalidation request assembly
 */

import { randomInt } from 'node:crypto';
import type {
  AuthMode,
  InvalidationHooks,
  InvalidationRequest,
} from '../../types/invalidation.js';
import type { CredentialResolver } from '../credentials/credential-resolver.js';
import { fail, ok, type ValidationResult } from '../errors.js';
import { PathValidator } from '../paths/path-validator.js';

/**
 * Default request token prefix
 */
export const DEFAULT_TOKEN_PREFIX = 'cfi';

const TOKEN_ALPHABET =
  'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';

const TOKEN_SUFFIX_LENGTH = 6;

/**
 * Request builder options
 */
export interface RequestBuilderOptions {
  /** Token prefix (default: 'cfi') */
  tokenPrefix?: string;

  /** Lifecycle hooks */
  hooks?: InvalidationHooks;

  /** Path validator (default: new PathValidator()) */
  pathValidator?: PathValidator;

  /** Clock in milliseconds (default: Date.now) */
  now?: () => number;
}

/**
 * Random alphanumeric string
 */
export function randomSuffix(length: number = TOKEN_SUFFIX_LENGTH): string {
  let suffix = '';
  for (let i = 0; i < length; i++) {
    suffix += TOKEN_ALPHABET[randomInt(TOKEN_ALPHABET.length)];
  }
  return suffix;
}

export class InvalidationRequestBuilder {
  private readonly tokenPrefix: string;
  private readonly hooks: InvalidationHooks;
  private readonly pathValidator: PathValidator;
  private readonly now: () => number;

  constructor(
    private readonly resolver: CredentialResolver,
    options: RequestBuilderOptions = {}
  ) {
    this.tokenPrefix = options.tokenPrefix ?? DEFAULT_TOKEN_PREFIX;
    this.hooks = options.hooks ?? {};
    this.pathValidator = options.pathValidator ?? new PathValidator();
    this.now = options.now ?? Date.now;
  }

  /**
   * Build an invalidation request for a distribution.
   *
   * Fails with MissingDistribution for an empty ID, or with the path
   * validator's error. Missing explicit credentials are not a failure: the
   * request then uses the ambient credential chain.
   */
  build(distributionId: string, rawPaths: unknown): ValidationResult<InvalidationRequest> {
    if (!distributionId) {
      return fail(
        'MissingDistribution',
        'CloudFront Distribution ID not configured.',
        'distributionId'
      );
    }

    const validated = this.pathValidator.sanitize(rawPaths);
    if (!validated.success) {
      return validated;
    }

    const paths = Object.freeze([...validated.data]);
    const request: InvalidationRequest = Object.freeze({
      distributionId,
      paths,
      requestToken: this.createRequestToken(),
      authMode: this.resolveAuthMode(),
    });

    this.hooks.onRequestBuilt?.({ distributionId, paths });

    return ok(request);
  }

  /**
   * Signal that the transport rejected a request
   */
  reportFailure(request: InvalidationRequest, error: Error): void {
    this.hooks.onRequestFailed?.({ request, error });
  }

  /**
   * `<prefix>-<unix seconds>-<6 alphanumerics>`
   */
  createRequestToken(): string {
    const seconds = Math.floor(this.now() / 1000);
    return `${this.tokenPrefix}-${seconds}-${randomSuffix()}`;
  }

  private resolveAuthMode(): AuthMode {
    if (this.resolver.isAmbientMode()) {
      return { type: 'ambient' };
    }

    const credentials = this.resolver.resolveCredentials();
    if (credentials) {
      const explicit: AuthMode = {
        type: 'explicit',
        credentials: Object.freeze(credentials),
      };
      return Object.freeze(explicit);
    }

    return { type: 'ambient' };
  }
}
