#!/usr/bin/env node
import { createCli } from './cli/index.js';
import { getErrorMessage } from './utils/errors.js';
import { logger } from './utils/logger.js';

createCli()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    logger.error(getErrorMessage(error));
    process.exitCode = 1;
  });
