/**
 * Conversion between stored settings and the Settings value
 */

import type { Settings } from '../../types/settings.js';
import type { StoredSettings } from './schema.js';

/**
 * Region used when none is stored
 */
export const DEFAULT_REGION = 'us-east-1';

/**
 * Paths used when none are stored
 */
export const DEFAULT_PATHS: readonly string[] = ['/*'];

/**
 * Canonical "on" value of the persisted ambient flag
 */
export const FLAG_ON = '1';
export const FLAG_OFF = '0';

function splitPaths(value: string | string[]): string[] {
  const lines = Array.isArray(value) ? value : value.split('\n');
  return lines.map((line) => line.trim()).filter((line) => line !== '');
}

/**
 * Default settings, used when nothing is stored yet
 */
export function defaultSettings(): Settings {
  return {
    useAmbientCredential: false,
    credentialsStored: false,
    region: DEFAULT_REGION,
    distributionId: '',
    defaultPaths: [...DEFAULT_PATHS],
  };
}

/**
 * Decode a stored blob
 */
export function decodeSettings(stored: StoredSettings): Settings {
  const settings = defaultSettings();

  settings.useAmbientCredential = stored.use_iam_role === FLAG_ON;

  if (stored.aws_access_key_enc) {
    settings.accessKeyCiphertext = stored.aws_access_key_enc;
  }
  if (stored.aws_secret_key_enc) {
    settings.secretKeyCiphertext = stored.aws_secret_key_enc;
  }
  settings.credentialsStored = Boolean(
    settings.accessKeyCiphertext && settings.secretKeyCiphertext
  );

  if (stored.aws_region !== undefined) {
    settings.region = stored.aws_region;
  }
  if (stored.distribution_id !== undefined) {
    settings.distributionId = stored.distribution_id;
  }
  if (stored.invalidation_paths !== undefined) {
    const paths = splitPaths(stored.invalidation_paths);
    if (paths.length > 0) {
      settings.defaultPaths = paths;
    }
  }

  return settings;
}

/**
 * Encode settings for persistence. Plaintext fields are never written.
 */
export function encodeSettings(settings: Settings): StoredSettings {
  const stored: StoredSettings = {
    use_iam_role: settings.useAmbientCredential ? FLAG_ON : FLAG_OFF,
    aws_region: settings.region,
    distribution_id: settings.distributionId,
    invalidation_paths: settings.defaultPaths.join('\n'),
  };

  if (settings.accessKeyCiphertext && settings.secretKeyCiphertext) {
    stored.aws_access_key_enc = settings.accessKeyCiphertext;
    stored.aws_secret_key_enc = settings.secretKeyCiphertext;
    stored.credentials_stored = true;
  }

  return stored;
}

/**
 * Region to use for API calls
 */
export function effectiveRegion(settings: Settings): string {
  return settings.region || DEFAULT_REGION;
}
