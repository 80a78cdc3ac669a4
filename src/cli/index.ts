#!/usr/bin/env node
import { createProgram } from './cli.js';
import * as logger from './utils/logger.js';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    logger.fatal(error instanceof Error ? error.message : String(error));
  });
