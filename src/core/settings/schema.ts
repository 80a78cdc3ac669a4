/**
 * Zod schema for the persisted settings blob
 */

import { z } from 'zod';

/**
 * Persisted field names
 */
export const STORED_FIELDS = {
  useAmbientCredential: 'use_iam_role',
  accessKeyCiphertext: 'aws_access_key_enc',
  secretKeyCiphertext: 'aws_secret_key_enc',
  credentialsStored: 'credentials_stored',
  region: 'aws_region',
  distributionId: 'distribution_id',
  defaultPaths: 'invalidation_paths',
} as const;

/**
 * Plaintext credential fields written by older releases
 */
export const LEGACY_FIELDS = {
  accessKey: 'aws_access_key',
  secretKey: 'aws_secret_key',
} as const;

/**
 * Stored settings. Unknown keys are dropped on read.
 */
export const storedSettingsSchema = z.object({
  use_iam_role: z.unknown(),
  aws_access_key: z.string().optional(),
  aws_secret_key: z.string().optional(),
  aws_access_key_enc: z.string().optional(),
  aws_secret_key_enc: z.string().optional(),
  credentials_stored: z.unknown(),
  aws_region: z.string().optional(),
  distribution_id: z.string().optional(),
  invalidation_paths: z.union([z.string(), z.array(z.string())]).optional(),
});

export type StoredSettings = z.infer<typeof storedSettingsSchema>;

/**
 * Parse a stored blob, throwing with the offending fields listed
 */
export function parseStoredSettings(raw: unknown): StoredSettings {
  const result = storedSettingsSchema.safeParse(raw ?? {});

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid stored settings:\n${issues}`);
  }

  return result.data;
}
