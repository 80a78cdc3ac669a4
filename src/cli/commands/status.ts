/**
 * Status command
 */

import { Command } from 'commander';
import chalk from 'chalk';
import * as logger from '../utils/logger.js';
import {
  ACCESS_KEY_NAME,
  SECRET_KEY_NAME,
  CredentialResolver,
} from '../../core/credentials/credential-resolver.js';
import { effectiveRegion } from '../../core/settings/codec.js';
import type { CredentialResolution } from '../../types/credentials.js';
import {
  createCommandContext,
  withGlobalOptions,
  type GlobalOptions,
} from '../utils/context.js';

/**
 * Status command options
 */
interface StatusOptions extends GlobalOptions {
  json?: boolean;
}

/**
 * Create status command
 */
export function createStatusCommand(): Command {
  const command = new Command('status');

  withGlobalOptions(command)
    .description('Show stored settings and credential sources')
    .option('--json', 'Output as JSON')
    .action(async (options: StatusOptions) => {
      try {
        await statusCommand(options);
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        logger.error(message);
        process.exit(1);
      }
    });

  return command;
}

function describeSource(resolution: CredentialResolution | null): string {
  if (!resolution) {
    return chalk.yellow('not configured');
  }

  switch (resolution.source) {
    case 'constant':
      return 'deployment constant';
    case 'environment':
      return 'environment variable';
    case 'settings':
      return 'encrypted settings';
  }
}

/**
 * Status command handler
 */
async function statusCommand(options: StatusOptions): Promise<void> {
  const { json = false } = options;
  const context = await createCommandContext(options);

  const settings = context.repository.load();
  const resolver = new CredentialResolver(context.store, context.environment, settings);

  const accessKey = resolver.resolveValueWithSource(
    ACCESS_KEY_NAME,
    ACCESS_KEY_NAME,
    'accessKeyCiphertext'
  );
  const secretKey = resolver.resolveValueWithSource(
    SECRET_KEY_NAME,
    SECRET_KEY_NAME,
    'secretKeyCiphertext'
  );

  const ambient = resolver.isAmbientMode();
  const authMode = ambient || !accessKey || !secretKey ? 'ambient' : 'explicit';

  // JSON output
  if (json) {
    console.log(
      JSON.stringify(
        {
          settingsFile: context.repository.filePath,
          configFile: context.configPath,
          region: effectiveRegion(settings),
          distributionId: settings.distributionId,
          defaultPaths: settings.defaultPaths,
          useAmbientCredential: ambient,
          credentialsStored: settings.credentialsStored,
          authMode,
          accessKeySource: accessKey?.source ?? null,
          secretKeySource: secretKey?.source ?? null,
        },
        null,
        2
      )
    );
    return;
  }

  logger.section('CloudFront Invalidation Settings');

  logger.keyValue('Settings File', chalk.cyan(context.repository.filePath));
  logger.keyValue('Config File', context.configPath ?? 'defaults');
  logger.keyValue('Region', effectiveRegion(settings));
  logger.keyValue(
    'Distribution',
    settings.distributionId ? chalk.cyan(settings.distributionId) : chalk.yellow('not configured')
  );
  logger.keyValue('Default Paths', settings.defaultPaths.join(', '));

  console.log();
  console.log(chalk.bold('Credentials:'));
  logger.keyValue('  Ambient Credential', ambient ? 'on' : 'off');
  logger.keyValue(
    '  Access Key',
    accessKey
      ? `${logger.mask(accessKey.value)} (${describeSource(accessKey)})`
      : describeSource(accessKey)
  );
  logger.keyValue('  Secret Key', describeSource(secretKey));
  logger.keyValue('  Auth Mode', authMode);

  if (!ambient && authMode === 'ambient') {
    console.log();
    logger.warn('Explicit credentials are incomplete; requests fall back to the default AWS credential chain');
  }

  console.log();
}
