/**
 * Zod schemas for cfi configuration validation
 */

import { z } from "zod";
import type { InvalidatorConfig, ResolvedConfig } from "../../types/config.js";

/**
 * Secrets schema
 */
const secretsSchema = z.object({
  keys: z.array(z.string()).default([]),
  salt: z.string().optional(),
});

/**
 * Deployment constants schema
 */
const constantsSchema = z.record(z.string(), z.string());

/**
 * Request token prefix schema
 */
const tokenPrefixSchema = z
  .string()
  .min(1, "Request token prefix cannot be empty")
  .max(32, "Request token prefix must be at most 32 characters")
  .regex(
    /^[A-Za-z0-9-]+$/,
    "Request token prefix must contain only letters, numbers, and hyphens"
  );

/**
 * Environment override schema
 */
const environmentSchema = z.object({
  settingsDir: z.string().min(1, "Settings directory cannot be empty").optional(),
  requestTokenPrefix: tokenPrefixSchema.optional(),
  constants: constantsSchema.optional(),
  secrets: z
    .object({
      keys: z.array(z.string()).optional(),
      salt: z.string().optional(),
    })
    .optional(),
});

/**
 * Main cfi configuration schema (after environment merging)
 */
export const configSchema = z.object({
  settingsDir: z
    .string()
    .min(1, "Settings directory cannot be empty")
    .default(".cfi"),
  requestTokenPrefix: tokenPrefixSchema.default("cfi"),
  constants: constantsSchema.default({}),
  secrets: secretsSchema.default({}),
});

/**
 * Raw config file schema
 */
export const configFileSchema = environmentSchema.extend({
  environments: z.record(z.string(), environmentSchema).optional(),
});

/**
 * Load config options schema
 */
export const loadConfigOptionsSchema = z.object({
  configPath: z.string().optional(),
  env: z.string().optional(),
  cwd: z.string().optional(),
});

/**
 * Validate config and return typed result
 */
export function validateConfig(config: unknown): ResolvedConfig {
  return configSchema.parse(config);
}

/**
 * Validate a loaded config file
 */
export function validateConfigFile(config: unknown): InvalidatorConfig {
  const result = configFileSchema.safeParse(config);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  - ${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("\n");
    throw new Error(`Config validation failed:\n${issues}`);
  }

  return result.data;
}

/**
 * Validate config with safe parsing (returns result object)
 */
export function validateConfigSafe(config: unknown) {
  return configSchema.safeParse(config);
}
