/**
 * Shared command setup: config, secrets, and settings repository
 */

import type { Command } from 'commander';
import { loadConfig, type LoadedConfig } from '../../core/config/index.js';
import { CredentialStore } from '../../core/credentials/credential-store.js';
import {
  createEnvironmentLookup,
  createSecretSource,
} from '../../core/credentials/environment.js';
import { FileSettingsRepository } from '../../core/settings/repository.js';
import type {
  EnvironmentLookup,
  SecretSource,
} from '../../types/credentials.js';
import * as logger from './logger.js';

/**
 * Options shared by every command
 */
export interface GlobalOptions {
  env?: string;
  config?: string;
}

/**
 * Everything a command needs to work on the settings
 */
export interface CommandContext extends LoadedConfig {
  /** May be empty; commands that write credentials check it */
  secrets: SecretSource;
  store: CredentialStore;
  repository: FileSettingsRepository;
  environment: EnvironmentLookup;
}

/**
 * Add --env and --config to a command
 */
export function withGlobalOptions(command: Command): Command {
  return command
    .option('-e, --env <environment>', 'Environment name (selects .env files and settings file)')
    .option('-c, --config <path>', 'Config file path');
}

/**
 * Load config and build the collaborators for a command
 */
export async function createCommandContext(
  options: GlobalOptions
): Promise<CommandContext> {
  const loaded = await loadConfig({
    configPath: options.config,
    env: options.env,
  });

  if (loaded.env.missingEnvironmentFile) {
    logger.warn(
      `${loaded.env.missingEnvironmentFile} file not found. Using values from .env and the config file`
    );
  }

  const secrets = createSecretSource(loaded.config);
  const store = new CredentialStore(secrets);
  const repository = new FileSettingsRepository(
    {
      settingsDir: loaded.config.settingsDir,
      environment: options.env,
    },
    store
  );

  return {
    ...loaded,
    secrets,
    store,
    repository,
    environment: createEnvironmentLookup(loaded.config.constants),
  };
}
