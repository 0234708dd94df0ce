import { Command } from 'commander';
import { runCommand, type RunOptions } from './commands/run.js';
import { doctorCommand } from './commands/doctor.js';

export const VERSION = '0.3.0';

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function parseLines(value: string): number {
  return parseInt(value, 10);
}

export function buildProgram(onExit: (code: number) => void): Command {
  const program = new Command();

  program
    .name('lk')
    .description('Find the functions in your bash scripts and run them')
    .version(VERSION)
    .enablePositionalOptions();

  // lk [script] [function] [params...]
  program
    .command('run [script] [function] [params...]', { isDefault: true })
    .description('List scripts and functions, or run one')
    .option('-f, --fuzzy', 'Search every function and pick one')
    .option('-l, --list', 'Browse scripts, then functions')
    .option('-d, --default [mode]', 'Set the mode used when no flag is given (list or fuzzy)')
    .option('-r, --root <path>', 'Directory to search for scripts (repeatable)', collect, [])
    .option('-i, --ignore <path>', 'Path to leave out of the search (repeatable)', collect, [])
    .option('-n, --number <lines>', 'Number of candidates the picker shows', parseLines)
    .option('-a, --all', 'Include private functions (names starting with _)')
    .option('-v, --verbose', 'Log skipped files and execution steps')
    .option('--no-history', "Don't add fuzzy picks to the shell history")
    .passThroughOptions()
    .action(async (script: string | undefined, fn: string | undefined, params: string[], options: RunOptions) => {
      onExit(await runCommand(script, fn, params, options));
    });

  // lk doctor
  program
    .command('doctor')
    .description('Check the shell, config and search roots')
    .action(async () => {
      onExit(await doctorCommand());
    });

  return program;
}

export async function main(argv: string[] = process.argv): Promise<number> {
  let exitCode = 0;
  const program = buildProgram((code) => {
    exitCode = code;
  });
  await program.parseAsync(argv);
  return exitCode;
}
