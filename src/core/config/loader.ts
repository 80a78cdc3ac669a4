/**
 * Config file loader using jiti for TypeScript runtime execution
 */

import jiti from "jiti";
import { existsSync } from "node:fs";
import { resolve, join, dirname } from "node:path";
import type { InvalidatorConfig } from "../../types/config.js";
import { validateConfigFile } from "./schema.js";

/**
 * Config file names to search for (in order of priority)
 */
export const CONFIG_FILE_NAMES = [
  "cfi.config.ts",
  "cfi.config.js",
  "cfi.config.mjs",
  "cfi.config.cjs",
] as const;

/**
 * Find config file in directory and parent directories
 */
export function findConfigFile(
  startDir: string = process.cwd()
): string | null {
  let currentDir = resolve(startDir);
  const root = resolve("/");

  while (currentDir !== root) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const configPath = join(currentDir, fileName);
      if (existsSync(configPath)) {
        return configPath;
      }
    }

    // Move up to parent directory
    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      break;
    }
    currentDir = parentDir;
  }

  return null;
}

/**
 * Unwrap default and function exports
 */
function unwrapConfigModule(configModule: unknown): unknown {
  let config = configModule;

  if (config && typeof config === "object" && "default" in config) {
    config = config.default;
  }

  if (typeof config === "function") {
    config = config();
  }

  return config;
}

/**
 * Load config file using jiti
 */
export async function loadConfigFile(
  configPath: string
): Promise<InvalidatorConfig> {
  if (!existsSync(configPath)) {
    throw new Error(`Config file not found: ${configPath}`);
  }

  let configModule: unknown;

  try {
    // The first argument must be an absolute file path (not a directory)
    const jitiInstance = jiti(__filename, {
      interopDefault: true,
      requireCache: false,
      esmResolve: true,
    });

    configModule = jitiInstance(resolve(configPath));
  } catch (error) {
    if (error instanceof Error) {
      throw new Error(
        `Failed to load config file: ${configPath}\n${error.message}`
      );
    }
    throw error;
  }

  return validateConfigFile(unwrapConfigModule(configModule));
}

/**
 * Discover and load config file.
 *
 * Returns an empty config when no file is found: every setting has a default.
 */
export async function discoverAndLoadConfig(
  startDir?: string
): Promise<{ config: InvalidatorConfig; configPath: string | null }> {
  const configPath = findConfigFile(startDir);

  if (!configPath) {
    return { config: {}, configPath: null };
  }

  const config = await loadConfigFile(configPath);

  return {
    config,
    configPath,
  };
}
