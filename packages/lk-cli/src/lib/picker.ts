import chalk from 'chalk';
import inquirer from 'inquirer';
import search from '@inquirer/search';
import { rankFunctions, type RankedCandidate, type ShellFunction } from '@lk/core';
import { DEFAULT_MODES, type DefaultMode } from './config.js';

export interface PickerOptions {
  message?: string;
  pageSize: number;
  /** Ranks the list until the user types something */
  initialQuery?: string;
}

/** Highlight matched characters of a function name */
export function highlightName(name: string, matches: readonly number[]): string {
  if (matches.length === 0) return chalk.green(name);
  const marked = new Set(matches);
  return [...name].map((ch, i) => (marked.has(i) ? chalk.bold.cyan(ch) : chalk.green(ch))).join('');
}

/** One picker row: name, owning script, description */
export function candidateLabel(candidate: RankedCandidate): string {
  const { fn } = candidate;
  const script = chalk.dim(`(${fn.script.relativePath})`);
  const description = fn.description ? ` ${chalk.gray('- ' + fn.description)}` : '';
  return `${highlightName(fn.name, candidate.nameMatches)} ${script}${description}`;
}

function isPromptExit(error: unknown): boolean {
  return error instanceof Error && error.name === 'ExitPromptError';
}

/**
 * Interactive fuzzy picker over `functions`, re-ranked as the user types.
 * Resolves to the chosen function id, or undefined when cancelled.
 */
export async function pickFunction(
  functions: readonly ShellFunction[],
  options: PickerOptions,
): Promise<string | undefined> {
  try {
    return await search<string>({
      message: options.message ?? 'Which function?',
      pageSize: options.pageSize,
      source: async (term) =>
        rankFunctions(functions, term || options.initialQuery || '').map((candidate) => ({
          name: candidateLabel(candidate),
          value: candidate.fn.id,
          short: candidate.fn.qualifiedName,
        })),
    });
  } catch (error) {
    if (isPromptExit(error)) return undefined;
    throw error;
  }
}

export async function askDefaultMode(current: DefaultMode): Promise<DefaultMode> {
  const answer = await inquirer.prompt<{ mode: DefaultMode }>([
    {
      type: 'list',
      name: 'mode',
      message: 'Which mode should lk use when run without --fuzzy or --list?',
      choices: DEFAULT_MODES.map((mode) => ({
        name: mode === 'fuzzy' ? 'fuzzy: search every function as you type' : 'list: browse scripts, then functions',
        value: mode,
      })),
      default: current,
    },
  ]);
  return answer.mode;
}
