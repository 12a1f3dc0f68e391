#!/usr/bin/env node
import { buildProgram } from './cli.js';
import { logger } from './utils/logger.js';

buildProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    logger.fatal({ err }, 'Failed');
    process.exitCode = 1;
  });
