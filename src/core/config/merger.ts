/**
 * Environment configuration merger
 */

import type {
  EnvironmentConfig,
  InvalidatorConfig,
} from '../../types/config.js';

/**
 * Merge environment-specific configuration.
 *
 * Scalars are replaced; `constants` and `secrets` are merged key by key.
 */
export function mergeEnvironment(
  baseConfig: InvalidatorConfig,
  environment?: string
): EnvironmentConfig {
  const { environments, ...baseWithoutEnv } = baseConfig;

  // If no environment specified, return base config
  if (!environment || !environments) {
    return baseWithoutEnv;
  }

  // Get environment-specific config
  const envConfig = environments[environment];

  if (!envConfig) {
    throw new Error(
      `Environment "${environment}" not found in config. Available environments: ${Object.keys(environments).join(', ')}`
    );
  }

  return {
    settingsDir: envConfig.settingsDir ?? baseWithoutEnv.settingsDir,
    requestTokenPrefix:
      envConfig.requestTokenPrefix ?? baseWithoutEnv.requestTokenPrefix,
    constants: {
      ...baseWithoutEnv.constants,
      ...envConfig.constants,
    },
    secrets: {
      ...baseWithoutEnv.secrets,
      ...envConfig.secrets,
    },
  };
}
