/**
 * Environment and secret collaborators backed by the loaded config
 */

import type {
  EnvironmentLookup,
  SecretSource,
} from '../../types/credentials.js';
import type { ResolvedConfig } from '../../types/config.js';
import { hasSecrets } from './credential-store.js';

/**
 * Environment variables read for key derivation, in concatenation order
 */
export const SECRET_KEY_ENV_NAMES = ['CFI_AUTH_KEY', 'CFI_SECURE_AUTH_KEY'] as const;

/**
 * Environment variable holding the fallback salt
 */
export const SALT_ENV_NAME = 'CFI_SALT';

/**
 * Lookup over deployment constants and a process environment
 */
export function createEnvironmentLookup(
  constants: Record<string, string> = {},
  env: NodeJS.ProcessEnv = process.env
): EnvironmentLookup {
  return {
    constant: (name) => constants[name],
    env: (name) => env[name],
  };
}

/**
 * Secret source from config secrets, then CFI_AUTH_KEY / CFI_SECURE_AUTH_KEY,
 * falling back to the config salt or CFI_SALT. The source may be empty;
 * see `requireSecrets`.
 */
export function createSecretSource(
  config: Pick<ResolvedConfig, 'secrets'>,
  env: NodeJS.ProcessEnv = process.env
): SecretSource {
  const keys = config.secrets.keys.filter((key) => key !== '');

  for (const name of SECRET_KEY_ENV_NAMES) {
    const value = env[name];
    if (value) {
      keys.push(value);
    }
  }

  const salt = config.secrets.salt || env[SALT_ENV_NAME] || undefined;

  return { keys, salt };
}

/**
 * @throws Error when neither keys nor a salt are configured
 */
export function requireSecrets(source: SecretSource): void {
  if (hasSecrets(source)) {
    return;
  }

  throw new Error(
    `No encryption secrets configured.\n` +
      `Please configure one of:\n` +
      `  1. Config file (secrets.keys or secrets.salt)\n` +
      `  2. Environment variables (${SECRET_KEY_ENV_NAMES.join(', ')})\n` +
      `  3. Environment variable ${SALT_ENV_NAME}`
  );
}
