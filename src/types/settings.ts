/**
 * Settings types
 */

/**
 * Persisted invalidator settings.
 *
 * Stored under the field names listed in `STORED_FIELDS`; see
 * core/settings/codec.ts for the mapping.
 */
export interface Settings {
  /** Use the ambient (instance / container role) credential */
  useAmbientCredential: boolean;

  /** Encrypted access key payload */
  accessKeyCiphertext?: string;

  /** Encrypted secret key payload */
  secretKeyCiphertext?: string;

  /** True iff both ciphertext fields are present */
  credentialsStored: boolean;

  /** AWS region. Empty means the default region downstream. */
  region: string;

  /** CloudFront distribution ID, or empty when not configured */
  distributionId: string;

  /** Paths used when invalidating everything */
  defaultPaths: string[];
}

/**
 * Raw settings submission, as posted by an administrator.
 *
 * Only present fields are evaluated, with one exception: the
 * ambient toggle follows checkbox semantics, so leaving it out
 * switches it off.
 */
export interface SettingsSubmission {
  /** Any value other than null or false switches the ambient credential on */
  useAmbientCredential?: string | boolean | null;
  accessKey?: string;
  secretKey?: string;
  region?: string;
  distributionId?: string;
  /** Newline separated list of paths */
  defaultPaths?: string;
}

/**
 * Channel the submission arrived on
 */
export interface SubmissionContext {
  /** Whether the channel guarantees confidentiality (e.g. HTTPS) */
  secure: boolean;
}

/**
 * Settings field names used in validation errors
 */
export type SettingsField =
  | 'useAmbientCredential'
  | 'credentials'
  | 'region'
  | 'distributionId'
  | 'defaultPaths';
