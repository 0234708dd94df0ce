import { appendFile, mkdir } from 'fs/promises';
import { homedir } from 'os';
import path from 'path';
import { quoteShellArg, type Catalog, type ShellFunction } from '@lk/core';

export type ShellKind = 'bash' | 'zsh' | 'fish';

export interface ShellHistory {
  kind: ShellKind;
  file: string;
}

/** Work out which history file the user's interactive shell reads */
export function detectShellHistory(env: NodeJS.ProcessEnv = process.env, home: string = homedir()): ShellHistory | null {
  const shell = path.basename(env['SHELL'] ?? '');
  switch (shell) {
    case 'bash':
      return { kind: 'bash', file: env['HISTFILE'] ?? path.join(home, '.bash_history') };
    case 'zsh':
      return { kind: 'zsh', file: env['HISTFILE'] ?? path.join(home, '.zsh_history') };
    case 'fish': {
      const dataHome = env['XDG_DATA_HOME'] ?? path.join(home, '.local', 'share');
      return { kind: 'fish', file: path.join(dataHome, 'fish', 'fish_history') };
    }
    default:
      return null;
  }
}

export function formatHistoryEntry(kind: ShellKind, command: string, now: Date = new Date()): string {
  const epoch = Math.floor(now.getTime() / 1000);
  switch (kind) {
    case 'bash':
      return `${command}\n`;
    case 'zsh':
      // EXTENDED_HISTORY format
      return `: ${epoch}:0;${command}\n`;
    case 'fish':
      return `- cmd: ${command.replaceAll('\\', '\\\\').replaceAll('\n', '\\n')}\n  when: ${epoch}\n`;
  }
}

const PLAIN_WORD = /^[\w@%+=:,./-]+$/;

/** Quote a word only when the shell would otherwise interpret it */
export function shellWord(value: string): string {
  return PLAIN_WORD.test(value) ? value : quoteShellArg(value);
}

/**
 * The direct `lk <script> <function> [args...]` equivalent of a fuzzy pick.
 * The script is named by file name when that is unambiguous, otherwise by
 * its path relative to `cwd`.
 */
export function buildLkCommand(
  catalog: Catalog,
  fn: ShellFunction,
  args: readonly string[],
  cwd: string = process.cwd(),
): string {
  const sameName = catalog.scripts.filter((s) => s.displayName === fn.script.displayName);
  const scriptArg = sameName.length === 1 ? fn.script.displayName : path.relative(cwd, fn.script.path);
  return ['lk', scriptArg, fn.name, ...args].map(shellWord).join(' ');
}

export async function appendHistory(history: ShellHistory, command: string, now: Date = new Date()): Promise<void> {
  await mkdir(path.dirname(history.file), { recursive: true });
  await appendFile(history.file, formatHistoryEntry(history.kind, command, now), 'utf8');
}
