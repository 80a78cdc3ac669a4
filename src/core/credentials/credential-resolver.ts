/**
 * Credential resolution
 *
 * Priority order for each key:
 * 1. Deployment constant (cfi.config.ts `constants`)
 * 2. Environment variable
 * 3. Encrypted value from the stored settings
 */

import type {
  CredentialResolution,
  EnvironmentLookup,
  ResolvedCredentials,
} from '../../types/credentials.js';
import type { Settings } from '../../types/settings.js';
import type { CredentialStore } from './credential-store.js';

/**
 * Constant / environment variable name of the access key
 */
export const ACCESS_KEY_NAME = 'CLOUDFRONT_AWS_ACCESS_KEY';

/**
 * Constant / environment variable name of the secret key
 */
export const SECRET_KEY_NAME = 'CLOUDFRONT_AWS_SECRET_KEY';

/**
 * Settings fields holding encrypted credentials
 */
export type CiphertextField = 'accessKeyCiphertext' | 'secretKeyCiphertext';

export class CredentialResolver {
  constructor(
    private readonly store: CredentialStore,
    private readonly environment: EnvironmentLookup,
    private readonly settings: Settings
  ) {}

  /**
   * Resolve a value and report which tier supplied it
   */
  resolveValueWithSource(
    overrideName: string,
    envName: string,
    field: CiphertextField
  ): CredentialResolution | null {
    const constant = this.environment.constant(overrideName);
    if (constant) {
      return { value: constant, source: 'constant' };
    }

    const envValue = this.environment.env(envName);
    if (envValue) {
      return { value: envValue, source: 'environment' };
    }

    const decrypted = this.store.decrypt(this.settings[field]);
    if (decrypted) {
      return { value: decrypted, source: 'settings' };
    }

    return null;
  }

  /**
   * Resolve a value from constant, environment, or encrypted settings.
   * Empty values fall through to the next tier.
   */
  resolveValue(
    overrideName: string,
    envName: string,
    field: CiphertextField
  ): string | null {
    return this.resolveValueWithSource(overrideName, envName, field)?.value ?? null;
  }

  /**
   * Resolve the access key pair. Partial credentials resolve to null.
   */
  resolveCredentials(): ResolvedCredentials | null {
    const accessKeyId = this.resolveValue(
      ACCESS_KEY_NAME,
      ACCESS_KEY_NAME,
      'accessKeyCiphertext'
    );
    const secretAccessKey = this.resolveValue(
      SECRET_KEY_NAME,
      SECRET_KEY_NAME,
      'secretKeyCiphertext'
    );

    if (accessKeyId && secretAccessKey) {
      return { accessKeyId, secretAccessKey };
    }

    return null;
  }

  /**
   * Whether explicit credentials are available
   */
  hasCredentials(): boolean {
    return this.resolveCredentials() !== null;
  }

  /**
   * Whether the ambient credential is switched on
   */
  isAmbientMode(): boolean {
    return this.settings.useAmbientCredential;
  }
}
