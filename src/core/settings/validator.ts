/**
 * Settings validation
 *
 * Validates an administrator's submission field by field. A failing field
 * keeps its previous value and records an error; the other fields are still
 * applied.
 */

import type {
  Settings,
  SettingsSubmission,
  SubmissionContext,
} from '../../types/settings.js';
import type { CredentialStore } from '../credentials/credential-store.js';
import { ValidationError, fail, ok, type ValidationResult } from '../errors.js';
import { DEFAULT_REGION } from './codec.js';

/**
 * AWS region format, e.g. us-east-1, ap-southeast-2
 */
export const REGION_PATTERN = /^[a-z]{2,3}-[a-z]+-\d+$/;

/**
 * CloudFront distribution ID format
 */
export const DISTRIBUTION_ID_PATTERN = /^[A-Z0-9]{13,14}$/;

/**
 * Outcome of a settings submission
 */
export interface SettingsValidationResult {
  settings: Settings;
  errors: ValidationError[];
}

/**
 * Normalize and validate a region. Empty is accepted.
 */
export function validateRegion(region: string): ValidationResult<string> {
  const normalized = region.trim().toLowerCase();

  if (normalized === '') {
    return ok(normalized);
  }

  if (!REGION_PATTERN.test(normalized)) {
    return fail(
      'InvalidRegion',
      'Invalid AWS region format. Please use format like: us-east-1, eu-west-2, ap-southeast-1',
      'region'
    );
  }

  return ok(normalized);
}

/**
 * Normalize and validate a distribution ID. Empty is accepted and clears it.
 */
export function validateDistributionId(distributionId: string): ValidationResult<string> {
  const normalized = distributionId.trim().toUpperCase();

  if (normalized === '') {
    return ok(normalized);
  }

  if (!DISTRIBUTION_ID_PATTERN.test(normalized)) {
    return fail(
      'InvalidDistributionId',
      'Invalid CloudFront Distribution ID. Expected 13-14 uppercase alphanumeric characters (e.g., E1ABCDEFGHIJKL)',
      'distributionId'
    );
  }

  return ok(normalized);
}

/**
 * Validate newline separated default paths.
 *
 * Unlike PathValidator, a path without a leading slash rejects the whole list.
 */
export function validateDefaultPaths(text: string): ValidationResult<string[]> {
  const paths = text
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line !== '');

  if (paths.length === 0) {
    return fail(
      'EmptyPaths',
      'At least one invalidation path is required.',
      'defaultPaths'
    );
  }

  const invalid = paths.find((path) => !path.startsWith('/'));
  if (invalid !== undefined) {
    return fail(
      'InvalidPath',
      `Invalidation path "${invalid}" must start with /. Example: /*, /blog/*, /images/`,
      'defaultPaths'
    );
  }

  return ok(paths);
}

export class SettingsValidator {
  constructor(private readonly store: CredentialStore) {}

  /**
   * Merge a submission into the current settings.
   *
   * Invalid input never throws; errors are returned next to the merged
   * settings. Submitting a key without encryption secrets does.
   */
  validate(
    current: Settings,
    input: SettingsSubmission,
    context: SubmissionContext
  ): SettingsValidationResult {
    const settings: Settings = {
      ...current,
      defaultPaths: [...current.defaultPaths],
    };
    const errors: ValidationError[] = [];

    // Checkbox semantics: a missing value or false means off
    settings.useAmbientCredential =
      input.useAmbientCredential !== undefined &&
      input.useAmbientCredential !== null &&
      input.useAmbientCredential !== false;

    this.applyCredentials(settings, input, context, errors);

    if (input.region !== undefined) {
      const result = validateRegion(input.region);
      if (result.success) {
        settings.region = result.data;
      } else {
        errors.push(result.error);
        settings.region = current.region || DEFAULT_REGION;
      }
    }

    if (input.distributionId !== undefined) {
      const result = validateDistributionId(input.distributionId);
      if (result.success) {
        settings.distributionId = result.data;
      } else {
        errors.push(result.error);
      }
    }

    if (input.defaultPaths !== undefined) {
      const result = validateDefaultPaths(input.defaultPaths);
      if (result.success) {
        settings.defaultPaths = result.data;
      } else {
        errors.push(result.error);
      }
    }

    return { settings, errors };
  }

  private applyCredentials(
    settings: Settings,
    input: SettingsSubmission,
    context: SubmissionContext,
    errors: ValidationError[]
  ): void {
    const accessKey = input.accessKey?.trim() ?? '';
    const secretKey = input.secretKey?.trim() ?? '';

    if (!context.secure && (accessKey !== '' || secretKey !== '')) {
      errors.push(
        new ValidationError(
          'HttpsRequired',
          'AWS credentials cannot be saved over an insecure (HTTP) connection. Please use HTTPS.',
          'credentials'
        )
      );
    } else {
      // Blank means keep the stored value
      if (accessKey !== '') {
        const encrypted = this.store.encrypt(accessKey);
        if (encrypted !== null) {
          settings.accessKeyCiphertext = encrypted;
        }
      }

      if (secretKey !== '') {
        const encrypted = this.store.encrypt(secretKey);
        if (encrypted !== null) {
          settings.secretKeyCiphertext = encrypted;
        }
      }
    }

    // Half-configured credentials are cleared
    if (!settings.accessKeyCiphertext || !settings.secretKeyCiphertext) {
      delete settings.accessKeyCiphertext;
      delete settings.secretKeyCiphertext;
      settings.credentialsStored = false;
    } else {
      settings.credentialsStored = true;
    }
  }
}
