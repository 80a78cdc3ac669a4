/**
 * Config utility functions
 */

/**
 * Generate example config file content
 */
export function generateExampleConfig(settingsDir: string = '.cfi'): string {
  return `/**
 * cfi configuration
 *
 * Environment variables are loaded from .env files:
 * - Default: .env
 * - Prod: .env.prod (use with --env prod)
 *
 * Encryption secrets are read from CFI_AUTH_KEY and CFI_SECURE_AUTH_KEY,
 * falling back to CFI_SALT. Keep them out of version control.
 */
import { defineConfig } from 'cloudfront-invalidator';

export default defineConfig({
  settingsDir: '${settingsDir}',
  requestTokenPrefix: 'cfi',

  // Deployment constants take precedence over environment variables
  // and stored settings when resolving credentials.
  constants: {
    // CLOUDFRONT_AWS_ACCESS_KEY: process.env.DEPLOY_ACCESS_KEY ?? '',
    // CLOUDFRONT_AWS_SECRET_KEY: process.env.DEPLOY_SECRET_KEY ?? '',
  },

  // Environment-specific configurations
  environments: {
    prod: {
      requestTokenPrefix: 'cfi-prod',
    },
  },
});
`;
}
