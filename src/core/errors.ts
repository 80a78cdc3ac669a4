/**
 * Error types shared by the validators and the request builder
 */

/**
 * Validation failure codes
 */
export type ValidationErrorCode =
  // Path validation
  | 'InvalidPaths'
  | 'NoValidPaths'
  | 'TooManyPaths'
  // Settings validation
  | 'HttpsRequired'
  | 'InvalidRegion'
  | 'InvalidDistributionId'
  | 'EmptyPaths'
  | 'InvalidPath'
  // Request building
  | 'MissingDistribution';

/**
 * Uniform validation failure
 */
export class ValidationError extends Error {
  readonly code: ValidationErrorCode;
  readonly field?: string;

  constructor(code: ValidationErrorCode, message: string, field?: string) {
    super(message);
    this.name = 'ValidationError';
    this.code = code;
    this.field = field;
  }
}

/**
 * Result of a validating operation, shaped like zod's safeParse result
 */
export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: ValidationError };

/**
 * Build a successful result
 */
export function ok<T>(data: T): ValidationResult<T> {
  return { success: true, data };
}

/**
 * Build a failed result
 */
export function fail<T>(
  code: ValidationErrorCode,
  message: string,
  field?: string
): ValidationResult<T> {
  return { success: false, error: new ValidationError(code, message, field) };
}

/**
 * Transport failure reported after a request was built
 */
export class InvalidationFailedError extends Error {
  readonly distributionId: string;
  readonly requestToken: string;

  constructor(
    distributionId: string,
    requestToken: string,
    cause: unknown
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Invalidation request ${requestToken} failed: ${detail}`, { cause });
    this.name = 'InvalidationFailedError';
    this.distributionId = distributionId;
    this.requestToken = requestToken;
  }
}
