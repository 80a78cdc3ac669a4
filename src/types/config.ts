/**
 * Configuration types for cfi
 */

/**
 * Encryption secrets used to derive the credential key
 */
export interface SecretsConfig {
  /**
   * Long-lived, process-wide secret strings.
   * Concatenated in order before hashing.
   */
  keys?: string[];

  /** Fallback salt, used only when no keys are configured */
  salt?: string;
}

/**
 * Environment-specific configuration override
 */
export interface EnvironmentConfig {
  /** Settings directory override */
  settingsDir?: string;

  /** Request token prefix override */
  requestTokenPrefix?: string;

  /** Deployment constants merged over the base constants */
  constants?: Record<string, string>;

  /** Secrets merged over the base secrets */
  secrets?: SecretsConfig;
}

/**
 * Main cfi configuration interface (cfi.config.ts)
 */
export interface InvalidatorConfig {
  /**
   * Directory holding the persisted settings, relative to the working directory
   * @default '.cfi'
   */
  settingsDir?: string;

  /**
   * Prefix of the CallerReference sent with every invalidation
   * @default 'cfi'
   */
  requestTokenPrefix?: string;

  /**
   * Deployment constants. Take precedence over environment variables
   * when resolving credentials (e.g. CLOUDFRONT_AWS_ACCESS_KEY).
   */
  constants?: Record<string, string>;

  /** Encryption secrets */
  secrets?: SecretsConfig;

  /** Environment-specific configurations */
  environments?: Record<string, EnvironmentConfig>;
}

/**
 * Configuration after defaults are applied and the environment is merged
 */
export interface ResolvedConfig {
  settingsDir: string;
  requestTokenPrefix: string;
  constants: Record<string, string>;
  secrets: {
    keys: string[];
    salt?: string;
  };
}

/**
 * Config loading options
 */
export interface LoadConfigOptions {
  /** Config file path (default: auto-discover cfi.config.ts) */
  configPath?: string;

  /** Environment name (dev, staging, prod, etc.) */
  env?: string;

  /** Directory to start discovery from */
  cwd?: string;
}

/**
 * Helper function for type-safe config definition
 *
 * @example
 * ```ts
 * import { defineConfig } from 'cloudfront-invalidator';
 *
 * export default defineConfig({
 *   settingsDir: '.cfi',
 *   environments: {
 *     prod: { requestTokenPrefix: 'cfi-prod' },
 *   },
 * });
 * ```
 */
export function defineConfig(config: InvalidatorConfig): InvalidatorConfig {
  return config;
}
