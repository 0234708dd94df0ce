import chalk from 'chalk';
import { executeFunction, type ExecutionOptions, type ShellFunction } from '@lk/core';
import type { LkConfig } from './config.js';
import { logger } from './logger.js';

/** Run a function the way the user asked, returning its exit code */
export async function runFunction(fn: ShellFunction, args: readonly string[], config: LkConfig): Promise<number> {
  console.log(chalk.bgBlue(`lk: ${fn.script.path} -> ${fn.name}`));

  const options: ExecutionOptions = {
    shell: config.shell,
    logger,
  };
  if (config.tempDir !== undefined) options.tempDir = config.tempDir;

  const result = await executeFunction(fn, args, options);
  if (result.signal) {
    logger.verbose(`${fn.qualifiedName} was terminated by ${result.signal}`);
  }
  return result.exitCode;
}
