#!/usr/bin/env node

import { createProgram } from './cli/program.js';
import { getLogLevel } from './config.js';
import { getUserMessage, installGlobalErrorHandlers, toCliError } from './lib/errors.js';
import { logger } from './lib/logger.js';
import { formatError } from './utils/display.js';

installGlobalErrorHandlers();
logger.configure({ level: getLogLevel() });

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    const cliError = toCliError(error);
    logger.debug('command failed', { code: cliError.code, context: cliError.context });
    console.error(formatError(getUserMessage(cliError)));
    process.exitCode = cliError.exitCode;
  });
