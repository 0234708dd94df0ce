#!/usr/bin/env node
import { describeError } from '@lk/core';
import { main } from './cli.js';
import { logger } from './lib/logger.js';

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    logger.error(describeError(err));
    process.exit(1);
  });
