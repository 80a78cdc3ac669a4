/**
 * Configure command - validate and store settings
 */

import { Command } from 'commander';
import inquirer from 'inquirer';
import chalk from 'chalk';
import { SettingsValidator } from '../../core/settings/validator.js';
import type { Settings, SettingsSubmission } from '../../types/settings.js';
import * as logger from '../utils/logger.js';
import {
  createCommandContext,
  withGlobalOptions,
  type GlobalOptions,
} from '../utils/context.js';
import { requireSecrets } from '../../core/credentials/environment.js';

/**
 * Configure command options
 */
interface ConfigureOptions extends GlobalOptions {
  accessKey?: string;
  secretKey?: string;
  region?: string;
  distributionId?: string;
  paths?: string[];
  ambient?: boolean;
  interactive?: boolean;
}

interface ConfigureAnswers {
  ambient: boolean;
  accessKey: string;
  secretKey: string;
  region: string;
  distributionId: string;
  paths: string;
}

/**
 * Create configure command
 */
export function createConfigureCommand(): Command {
  const command = new Command('configure');

  withGlobalOptions(command)
    .description('Validate and store CloudFront settings')
    .option('--access-key <key>', 'AWS access key ID (stored encrypted)')
    .option('--secret-key <key>', 'AWS secret access key (stored encrypted)')
    .option('--region <region>', 'AWS region (e.g. us-east-1)')
    .option('--distribution-id <id>', 'CloudFront distribution ID (empty string clears it)')
    .option('--paths <paths...>', 'Default invalidation paths')
    .option('--ambient', 'Use the ambient credential (instance or container role)')
    .option('--no-ambient', 'Use explicit access keys')
    .option('-i, --interactive', 'Prompt for each setting')
    .action(async (options: ConfigureOptions) => {
      try {
        const ok = await configureCommand(options);
        if (!ok) {
          process.exit(1);
        }
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        logger.error(message);
        process.exit(1);
      }
    });

  return command;
}

/**
 * Build a submission from command-line flags.
 *
 * The ambient toggle keeps its stored value unless a flag is given.
 */
export function submissionFromOptions(
  current: Settings,
  options: ConfigureOptions
): SettingsSubmission {
  const ambient = options.ambient ?? current.useAmbientCredential;

  return {
    useAmbientCredential: ambient ? '1' : undefined,
    accessKey: options.accessKey,
    secretKey: options.secretKey,
    region: options.region,
    distributionId: options.distributionId,
    defaultPaths: options.paths?.join('\n'),
  };
}

async function promptSubmission(current: Settings): Promise<SettingsSubmission> {
  const answers = await inquirer.prompt<ConfigureAnswers>([
    {
      type: 'confirm',
      name: 'ambient',
      message: 'Use the ambient credential (instance or container role)?',
      default: current.useAmbientCredential,
    },
    {
      type: 'password',
      name: 'accessKey',
      message: `AWS access key ID${current.credentialsStored ? ' (blank keeps stored)' : ''}:`,
      mask: '*',
      when: (answers: Partial<ConfigureAnswers>) => !answers.ambient,
    },
    {
      type: 'password',
      name: 'secretKey',
      message: `AWS secret access key${current.credentialsStored ? ' (blank keeps stored)' : ''}:`,
      mask: '*',
      when: (answers: Partial<ConfigureAnswers>) => !answers.ambient,
    },
    {
      type: 'input',
      name: 'region',
      message: 'AWS region:',
      default: current.region,
    },
    {
      type: 'input',
      name: 'distributionId',
      message: 'CloudFront distribution ID:',
      default: current.distributionId,
    },
    {
      type: 'input',
      name: 'paths',
      message: 'Default invalidation paths (space separated):',
      default: current.defaultPaths.join(' '),
    },
  ]);

  return {
    useAmbientCredential: answers.ambient ? '1' : undefined,
    accessKey: answers.accessKey,
    secretKey: answers.secretKey,
    region: answers.region,
    distributionId: answers.distributionId,
    defaultPaths: answers.paths.split(/\s+/).join('\n'),
  };
}

/**
 * Configure command handler
 *
 * @returns false when any field was rejected
 */
async function configureCommand(options: ConfigureOptions): Promise<boolean> {
  const context = await createCommandContext(options);
  requireSecrets(context.secrets);
  const current = context.repository.load();

  const submission = options.interactive
    ? await promptSubmission(current)
    : submissionFromOptions(current, options);

  // Local terminal input never crosses a network
  const validator = new SettingsValidator(context.store);
  const { settings, errors } = validator.validate(current, submission, {
    secure: true,
  });

  const changed = context.repository.save(settings);

  if (errors.length > 0) {
    logger.validationErrors(errors);
  }

  if (changed) {
    logger.success(`Settings saved to ${chalk.cyan(context.repository.filePath)}`);
  } else {
    logger.info('Settings unchanged');
  }

  return errors.length === 0;
}
