/**
 * Config system entry point
 */

import type {
  InvalidatorConfig,
  LoadConfigOptions,
  ResolvedConfig,
} from '../../types/config.js';
import { loadEnvFiles, type EnvLoadResult } from './env-loader.js';
import { discoverAndLoadConfig, loadConfigFile } from './loader.js';
import { mergeEnvironment } from './merger.js';
import { validateConfig } from './schema.js';

/**
 * Loaded configuration with where it came from
 */
export interface LoadedConfig {
  config: ResolvedConfig;

  /** Config file path, or null when running on defaults */
  configPath: string | null;

  /** .env files that were applied */
  env: EnvLoadResult;
}

/**
 * Load and validate cfi configuration
 *
 * @param options - Load config options
 * @returns Validated and merged configuration
 *
 * @example
 * ```ts
 * // Load default config
 * const { config } = await loadConfig();
 *
 * // Load with environment
 * const { config } = await loadConfig({ env: 'prod' });
 * ```
 */
export async function loadConfig(
  options: LoadConfigOptions = {}
): Promise<LoadedConfig> {
  const { configPath, env, cwd = process.cwd() } = options;

  try {
    // .env files first, so cfi.config.ts can read process.env
    const envResult = loadEnvFiles(env, cwd);

    let rawConfig: InvalidatorConfig;
    let resolvedConfigPath: string | null;

    if (configPath) {
      rawConfig = await loadConfigFile(configPath);
      resolvedConfigPath = configPath;
    } else {
      const result = await discoverAndLoadConfig(cwd);
      rawConfig = result.config;
      resolvedConfigPath = result.configPath;
    }

    const mergedConfig = mergeEnvironment(rawConfig, env);
    const config = validateConfig(mergedConfig);

    if (process.env.CFI_DEBUG === 'true') {
      console.log(
        `[cfi] Loaded environment files: ${envResult.loadedFiles.join(', ') || '(none)'}`
      );
      console.log(`[cfi] Config file: ${resolvedConfigPath ?? '(defaults)'}`);
    }

    return { config, configPath: resolvedConfigPath, env: envResult };
  } catch (error) {
    if (error instanceof Error) {
      throw new Error(`Failed to load configuration:\n${error.message}`);
    }
    throw error;
  }
}

// Re-export utilities for user config files
export { generateExampleConfig } from './utils.js';
export { loadEnvFiles, getEnvFilePaths, getEnvFileNames, type EnvLoadResult } from './env-loader.js';
export { findConfigFile, loadConfigFile, discoverAndLoadConfig, CONFIG_FILE_NAMES } from './loader.js';
export { mergeEnvironment } from './merger.js';
export { configSchema, configFileSchema, validateConfig, validateConfigSafe, validateConfigFile } from './schema.js';
