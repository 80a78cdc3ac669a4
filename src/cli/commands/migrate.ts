/**
 * Migrate command - encrypt plaintext credentials left by older releases
 */

import { Command } from 'commander';
import chalk from 'chalk';
import * as logger from '../utils/logger.js';
import {
  createCommandContext,
  withGlobalOptions,
  type GlobalOptions,
} from '../utils/context.js';
import { requireSecrets } from '../../core/credentials/environment.js';

/**
 * Create migrate command
 */
export function createMigrateCommand(): Command {
  const command = new Command('migrate');

  withGlobalOptions(command)
    .description('Encrypt plaintext credentials found in the stored settings')
    .action(async (options: GlobalOptions) => {
      try {
        await migrateCommand(options);
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        logger.error(message);
        process.exit(1);
      }
    });

  return command;
}

async function migrateCommand(options: GlobalOptions): Promise<void> {
  const context = await createCommandContext(options);
  requireSecrets(context.secrets);

  if (!context.repository.exists()) {
    logger.info(`No settings file at ${chalk.cyan(context.repository.filePath)}`);
    return;
  }

  const { migrated } = context.repository.migrate();

  if (migrated) {
    logger.success('Plaintext credentials moved to encrypted storage');
  } else {
    logger.info('No plaintext credentials found');
  }
}
