/**
 * Credential-related type definitions
 */

/**
 * Explicit access key pair resolved for a single request
 */
export interface ResolvedCredentials {
  accessKeyId: string;
  secretAccessKey: string;
}

/**
 * Decoded form of an encrypted secret. Both fields are base64.
 */
export interface EncryptedSecret {
  iv: string;
  value: string;
}

/**
 * Where a resolved credential value came from
 */
export type CredentialSource = 'constant' | 'environment' | 'settings';

/**
 * Credential value with its source
 */
export interface CredentialResolution {
  value: string;
  source: CredentialSource;
}

/**
 * Process-wide secrets used for key derivation
 */
export interface SecretSource {
  /** Secret strings, concatenated in order */
  readonly keys: readonly string[];

  /** Used only when `keys` is empty */
  readonly salt?: string;
}

/**
 * Read-only lookup of deployment constants and environment variables
 */
export interface EnvironmentLookup {
  constant(name: string): string | undefined;
  env(name: string): string | undefined;
}
