/**
 * Invalidate command
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { createCloudFrontClient } from '../../core/aws/client.js';
import {
  getInvalidationStatus,
  waitForInvalidationCompleted,
} from '../../core/aws/cloudfront-invalidation.js';
import { ValidationError } from '../../core/errors.js';
import { Invalidator } from '../../core/invalidation/invalidator.js';
import { collectContentPaths } from '../../core/paths/content-paths.js';
import { effectiveRegion } from '../../core/settings/codec.js';
import type { InvalidationRequest } from '../../types/invalidation.js';
import * as logger from '../utils/logger.js';
import {
  createCommandContext,
  withGlobalOptions,
  type GlobalOptions,
} from '../utils/context.js';

/**
 * Invalidate command options
 */
interface InvalidateOptions extends GlobalOptions {
  url?: string[];
  all?: boolean;
  dryRun?: boolean;
  wait?: boolean;
  json?: boolean;
  verbose?: boolean;
}

/**
 * Create invalidate command
 */
export function createInvalidateCommand(): Command {
  const command = new Command('invalidate');

  withGlobalOptions(command)
    .description('Invalidate CloudFront cache paths')
    .argument('[paths...]', 'Paths to invalidate (e.g. /blog/* /index.html)')
    .option('-u, --url <urls...>', 'Changed page URLs; invalidates each page and everything below it')
    .option('-a, --all', 'Invalidate the configured default paths')
    .option('--dry-run', 'Build and print the request without sending it')
    .option('-w, --wait', 'Wait for the invalidation to complete')
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Verbose output')
    .action(async (paths: string[], options: InvalidateOptions) => {
      try {
        const ok = await invalidateCommand(paths, options);
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
 * Paths requested on the command line, or null for the default paths
 */
export function requestedPaths(paths: string[], options: InvalidateOptions): string[] | null {
  if (options.all) {
    return null;
  }

  const requested = [...paths, ...collectContentPaths(options.url ?? [])];
  return requested.length > 0 ? requested : null;
}

/**
 * Request summary without credential material
 */
function describeRequest(request: InvalidationRequest): Record<string, unknown> {
  return {
    distributionId: request.distributionId,
    requestToken: request.requestToken,
    authMode: request.authMode.type,
    quantity: request.paths.length,
    paths: request.paths,
  };
}

function printRequest(request: InvalidationRequest): void {
  logger.keyValue('Distribution', chalk.cyan(request.distributionId));
  logger.keyValue('Caller Reference', request.requestToken);
  logger.keyValue('Auth', request.authMode.type);
  logger.keyValue('Paths', request.paths.length.toString());

  const maxPaths = 20;
  for (const path of request.paths.slice(0, maxPaths)) {
    console.log(chalk.gray(`  ${path}`));
  }
  if (request.paths.length > maxPaths) {
    console.log(chalk.gray(`  ... and ${request.paths.length - maxPaths} more paths`));
  }
}

/**
 * Invalidate command handler
 *
 * @returns false when the request could not be built or sent
 */
async function invalidateCommand(
  paths: string[],
  options: InvalidateOptions
): Promise<boolean> {
  const { json = false, verbose = false } = options;
  const context = await createCommandContext(options);

  const invalidator = new Invalidator({
    repository: context.repository,
    store: context.store,
    environment: context.environment,
    tokenPrefix: context.config.requestTokenPrefix,
    hooks: {
      onRequestBuilt: ({ distributionId, paths: built }) => {
        logger.verbose(`Built request for ${distributionId} with ${built.length} path(s)`, verbose);
      },
      onRequestFailed: ({ request, error }) => {
        logger.verbose(`Request ${request.requestToken} failed: ${error.message}`, verbose);
      },
    },
  });

  const requested = requestedPaths(paths, options);

  if (options.dryRun) {
    const built = requested ? invalidator.prepare(requested) : invalidator.prepareAll();

    if (!built.success) {
      logger.validationErrors([built.error]);
      return false;
    }

    if (json) {
      console.log(JSON.stringify(describeRequest(built.data), null, 2));
    } else {
      logger.section('Dry Run');
      printRequest(built.data);
      console.log();
    }
    return true;
  }

  const outcome = requested
    ? await invalidator.invalidate(requested)
    : await invalidator.invalidateAll();

  if (!outcome.success) {
    if (json) {
      console.log(JSON.stringify({ error: outcome.error.message }, null, 2));
    } else if (outcome.error instanceof ValidationError) {
      logger.validationErrors([outcome.error]);
    } else {
      logger.error(outcome.error.message);
    }
    return false;
  }

  const { request, invalidation } = outcome;

  if (options.wait && invalidation.Id) {
    const spinner = json ? null : ora('Waiting for invalidation to complete...').start();
    const settings = context.repository.load();
    const client = createCloudFrontClient(request.authMode, effectiveRegion(settings));

    try {
      await waitForInvalidationCompleted(client, request.distributionId, invalidation.Id);
      invalidation.Status = 'Completed';
      spinner?.succeed('Invalidation completed');
    } catch (error: unknown) {
      spinner?.fail('Invalidation did not complete in time');
      throw error;
    }
  }

  if (json) {
    console.log(
      JSON.stringify(
        {
          ...describeRequest(request),
          invalidationId: invalidation.Id,
          status: getInvalidationStatus(invalidation),
        },
        null,
        2
      )
    );
    return true;
  }

  logger.success(`Invalidation ${chalk.cyan(invalidation.Id ?? 'unknown')} created`);
  printRequest(request);
  logger.keyValue('Status', getInvalidationStatus(invalidation));
  return true;
}
