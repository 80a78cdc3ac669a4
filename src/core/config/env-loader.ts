/**
 * .env file loading
 *
 * Supplies credential overrides and encryption secrets from .env files.
 */

import { parse } from 'dotenv';
import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';

/**
 * Outcome of loading .env files
 */
export interface EnvLoadResult {
  /** Files that were loaded, highest priority first */
  loadedFiles: string[];

  /** Set when an environment was named but neither of its files exists */
  missingEnvironmentFile?: string;
}

/**
 * .env file names for an environment, highest priority first:
 * 1. .env.{environment}.local
 * 2. .env.{environment}
 * 3. .env.local
 * 4. .env
 */
export function getEnvFileNames(environment?: string): string[] {
  const names: string[] = [];

  if (environment) {
    names.push(`.env.${environment}.local`, `.env.${environment}`);
  }
  names.push('.env.local', '.env');

  return names;
}

/**
 * Load .env files into `target` (process.env by default).
 *
 * Files are applied from lowest to highest priority with override, so the
 * most specific file wins.
 *
 * @example
 * ```ts
 * loadEnvFiles('prod');
 * // Loads: .env.prod.local > .env.prod > .env.local > .env
 * ```
 */
export function loadEnvFiles(
  environment?: string,
  configDir: string = process.cwd(),
  target: NodeJS.ProcessEnv = process.env
): EnvLoadResult {
  const names = getEnvFileNames(environment);
  const loadedFiles: string[] = [];

  for (const file of [...names].reverse()) {
    const filePath = resolve(configDir, file);

    if (existsSync(filePath)) {
      let parsed: Record<string, string>;
      try {
        parsed = parse(readFileSync(filePath));
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        throw new Error(`Failed to load ${file}: ${message}`);
      }

      Object.assign(target, parsed);
      loadedFiles.unshift(file);
    }
  }

  const result: EnvLoadResult = { loadedFiles };

  if (environment && !loadedFiles.some((file) => file.startsWith(`.env.${environment}`))) {
    result.missingEnvironmentFile = `.env.${environment}`;
  }

  return result;
}

/**
 * Get the list of .env files that would be loaded for an environment
 * Useful for debugging and documentation
 */
export function getEnvFilePaths(
  environment?: string,
  configDir: string = process.cwd()
): { path: string; exists: boolean; priority: number }[] {
  const names = getEnvFileNames(environment);

  return names.map((file, index) => ({
    path: resolve(configDir, file),
    exists: existsSync(resolve(configDir, file)),
    priority: names.length - index, // Higher number = higher priority
  }));
}
