import path from 'path';
import chalk from 'chalk';
import type { Diagnostic, ScriptFile, ShellFunction } from '@lk/core';

const INDENT = 2;

export function describeDiagnostic(d: Diagnostic): string {
  switch (d.kind) {
    case 'unreadable-file':
      return `Couldn't read ${d.path}: ${d.message}`;
    case 'binary-file':
      return `Skipped binary file ${d.path}`;
    case 'empty-file':
      return `Skipped empty file ${d.path}`;
    case 'too-large':
      return `Skipped ${d.path}: ${d.size} bytes is over the ${d.limit} byte limit`;
    case 'not-executable':
      return `Skipped ${d.path}: not executable`;
    case 'symlink-cycle':
      return `Skipped ${d.path}: already visited ${d.target}`;
    case 'malformed-function':
      return `${d.path}:${d.line} function '${d.name}' has no closing brace; skipped`;
    case 'invalid-function-name':
      return `${d.path}:${d.line} '${d.name}' is not a valid function name; skipped`;
    case 'name-collision':
      return `Function '${d.name}' is defined in ${d.paths.length} files: ${d.paths.join(', ')}`;
  }
}

/** Problems the user should see without --verbose */
export function isWarning(d: Diagnostic): boolean {
  return d.kind === 'malformed-function' || d.kind === 'invalid-function-name' || d.kind === 'unreadable-file';
}

export function visibleFunctions(script: ScriptFile, showPrivate: boolean): ShellFunction[] {
  return showPrivate ? script.functions : script.functions.filter((fn) => !fn.isPrivate);
}

/** Lines listing every script that has something to run */
export function renderScriptList(scripts: readonly ScriptFile[], showPrivate: boolean, cwd: string = process.cwd()): string[] {
  const runnable = scripts.filter((s) => visibleFunctions(s, showPrivate).length > 0);
  if (runnable.length === 0) return [];

  const width = Math.max(...runnable.map((s) => s.displayName.length)) + INDENT;
  return runnable.map((script) => {
    const dir = path.relative(cwd, path.dirname(script.path)) || '.';
    const name = chalk.green(script.displayName.padStart(width));
    const description = script.description ? ` ${script.description}` : '';
    return `${name} ${chalk.dim(dir)}${description}`;
  });
}

/** Lines describing one script: its description, then each function */
export function renderScript(script: ScriptFile, showPrivate: boolean): string[] {
  const lines: string[] = [chalk.bold(script.displayName) + chalk.dim(`  ${script.path}`)];
  if (script.description) lines.push(`  ${script.description}`);

  const functions = visibleFunctions(script, showPrivate);
  if (functions.length === 0) {
    lines.push(chalk.yellow('  This script has no functions lk can run.'));
    lines.push(chalk.dim("  Declare them as `name() {` or `function name {`, with comments directly above."));
    return lines;
  }

  const width = Math.max(...functions.map((fn) => fn.name.length)) + INDENT;
  for (const fn of functions) {
    const name = chalk.green(fn.name.padStart(width));
    lines.push(fn.description ? `${name} ${fn.description}` : name);
  }
  return lines;
}
