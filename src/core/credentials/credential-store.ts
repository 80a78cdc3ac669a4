/**
 * Credential encryption
 *
 * AES-256-CBC with a key derived from the process secrets. Every encryption
 * uses a fresh IV, so equal plaintexts never produce equal payloads.
 */

import {
  createCipheriv,
  createDecipheriv,
  createHash,
  randomBytes,
} from 'node:crypto';
import { z } from 'zod';
import type { EncryptedSecret, SecretSource } from '../../types/credentials.js';
import type { StoredSettings } from '../settings/schema.js';

/**
 * Cipher used for stored credentials
 */
export const CIPHER = 'aes-256-cbc';

/**
 * IV length in bytes
 */
export const IV_LENGTH = 16;

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

const encryptedSecretSchema = z.object({
  iv: z.string().min(1),
  value: z.string().min(1),
});

/**
 * Result of a legacy credential migration
 */
export interface MigrationResult {
  settings: StoredSettings;
  /** True when the stored blob changed and must be persisted */
  migrated: boolean;
}

/**
 * Derive the 256-bit key from the configured secrets
 */
export function deriveKey(secrets: SecretSource): Buffer {
  const parts = secrets.keys.filter((key) => key !== '');

  if (parts.length === 0) {
    if (!secrets.salt) {
      throw new Error('No encryption secrets configured');
    }
    parts.push(secrets.salt);
  }

  return createHash('sha256').update(parts.join(''), 'utf8').digest();
}

/**
 * Strict base64 decoding; Buffer.from alone ignores invalid characters
 */
function decodeBase64(value: string): Buffer | null {
  if (!BASE64_PATTERN.test(value)) {
    return null;
  }
  return Buffer.from(value, 'base64');
}

/**
 * Whether a key can be derived from the secrets
 */
export function hasSecrets(secrets: SecretSource): boolean {
  return secrets.keys.some((key) => key !== '') || Boolean(secrets.salt);
}

export class CredentialStore {
  private key: Buffer | null = null;

  /** The key is derived on first use */
  constructor(private readonly secrets: SecretSource) {}

  /**
   * Whether encryption secrets are configured
   */
  canEncrypt(): boolean {
    return hasSecrets(this.secrets);
  }

  private getKey(): Buffer {
    if (!this.key) {
      this.key = deriveKey(this.secrets);
    }
    return this.key;
  }

  /**
   * Encrypt a secret for storage.
   *
   * @returns JSON payload with base64 `iv` and `value`, or null for an empty plaintext
   * @throws Error when no encryption secrets are configured
   */
  encrypt(plaintext: string): string | null {
    if (plaintext === '') {
      return null;
    }

    const iv = randomBytes(IV_LENGTH);
    const cipher = createCipheriv(CIPHER, this.getKey(), iv);
    const ciphertext = Buffer.concat([
      cipher.update(plaintext, 'utf8'),
      cipher.final(),
    ]);

    const payload: EncryptedSecret = {
      iv: iv.toString('base64'),
      value: ciphertext.toString('base64'),
    };

    return JSON.stringify(payload);
  }

  /**
   * Decrypt a payload produced by `encrypt`.
   *
   * Every failure returns null, including missing secrets; callers cannot
   * tell a corrupted payload from one encrypted under another key.
   */
  decrypt(payload: string | null | undefined): string | null {
    if (!payload || !this.canEncrypt()) {
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(payload);
    } catch {
      return null;
    }

    const result = encryptedSecretSchema.safeParse(parsed);
    if (!result.success) {
      return null;
    }

    const iv = decodeBase64(result.data.iv);
    const ciphertext = decodeBase64(result.data.value);
    if (!iv || !ciphertext) {
      return null;
    }

    try {
      const decipher = createDecipheriv(CIPHER, this.getKey(), iv);
      return Buffer.concat([
        decipher.update(ciphertext),
        decipher.final(),
      ]).toString('utf8');
    } catch {
      return null;
    }
  }

  /**
   * Move plaintext credentials left by older releases into the encrypted
   * fields. Plaintext fields are dropped from the returned settings;
   * `migrated` is set only when a value was encrypted. Without secrets the
   * settings are returned unchanged.
   */
  migrateLegacy(stored: StoredSettings): MigrationResult {
    const settings: StoredSettings = { ...stored };

    if (!this.canEncrypt()) {
      return { settings, migrated: false };
    }

    let migrated = false;

    if (settings.aws_access_key !== undefined) {
      const encrypted = this.encrypt(settings.aws_access_key);
      if (encrypted !== null) {
        settings.aws_access_key_enc = encrypted;
        settings.credentials_stored = true;
        migrated = true;
      }
      delete settings.aws_access_key;
    }

    if (settings.aws_secret_key !== undefined) {
      const encrypted = this.encrypt(settings.aws_secret_key);
      if (encrypted !== null) {
        settings.aws_secret_key_enc = encrypted;
        settings.credentials_stored = true;
        migrated = true;
      }
      delete settings.aws_secret_key;
    }

    return { settings, migrated };
  }
}
