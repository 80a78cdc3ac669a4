/**
 * Credential module
 *
 * Encryption, legacy migration and resolution of CloudFront credentials
 */

export {
  CredentialStore,
  deriveKey,
  hasSecrets,
  CIPHER,
  IV_LENGTH,
  type MigrationResult,
} from './credential-store.js';

export {
  CredentialResolver,
  ACCESS_KEY_NAME,
  SECRET_KEY_NAME,
  type CiphertextField,
} from './credential-resolver.js';

export {
  createEnvironmentLookup,
  createSecretSource,
  requireSecrets,
  SECRET_KEY_ENV_NAMES,
  SALT_ENV_NAME,
} from './environment.js';
