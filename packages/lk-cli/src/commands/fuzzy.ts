import { findFunctionById, rankFunctions, type Catalog, type ShellFunction } from '@lk/core';
import type { LkConfig } from '../lib/config.js';
import { runFunction } from '../lib/execute.js';
import { appendHistory, buildLkCommand, detectShellHistory } from '../lib/history.js';
import { logger } from '../lib/logger.js';
import { pickFunction, type PickerOptions } from '../lib/picker.js';
import { selectableFunctions } from '../lib/catalog.js';

export interface FuzzyRequest {
  query?: string;
  params: string[];
  showPrivate: boolean;
  writeHistory: boolean;
  pageSize: number;
  interactive?: boolean;
  cwd?: string;
}

export type Resolution =
  | { kind: 'none' }
  | { kind: 'no-match'; query: string }
  | { kind: 'selected'; fn: ShellFunction }
  | { kind: 'ambiguous'; candidates: ShellFunction[] };

/**
 * Narrow the catalog with the query before any prompt: a unique exact name
 * or a single candidate is selected outright.
 */
export function resolveQuery(functions: readonly ShellFunction[], query: string | undefined): Resolution {
  if (functions.length === 0) return { kind: 'none' };
  if (!query || query.trim() === '') return { kind: 'ambiguous', candidates: [...functions] };

  const candidates = rankFunctions(functions, query);
  if (candidates.length === 0) return { kind: 'no-match', query };

  const exact = candidates.filter((c) => c.exactName);
  const only = exact.length === 1 ? exact[0] : candidates.length === 1 ? candidates[0] : undefined;
  if (only) return { kind: 'selected', fn: only.fn };

  return { kind: 'ambiguous', candidates: candidates.map((c) => c.fn) };
}

async function recordHistory(catalog: Catalog, fn: ShellFunction, params: readonly string[], cwd: string): Promise<void> {
  const history = detectShellHistory();
  if (!history) {
    logger.verbose("Not writing shell history: couldn't work out which shell you're using");
    return;
  }
  const command = buildLkCommand(catalog, fn, params, cwd);
  try {
    await appendHistory(history, command);
    logger.verbose(`Added '${command}' to ${history.file}`);
  } catch (error) {
    logger.warn(`Couldn't write to ${history.file}: ${error instanceof Error ? error.message : String(error)}`);
  }
}

/** `lk --fuzzy [query] [params...]` */
export async function fuzzyCommand(catalog: Catalog, request: FuzzyRequest, config: LkConfig): Promise<number> {
  const cwd = request.cwd ?? process.cwd();
  const functions = selectableFunctions(catalog, request.showPrivate);
  const resolution = resolveQuery(functions, request.query);

  let selected: ShellFunction | undefined;
  switch (resolution.kind) {
    case 'none':
      logger.warn(`No functions found under ${catalog.roots.join(', ')}`);
      logger.dim('lk looks for `name() {` and `function name {` declarations in text files.');
      return 0;

    case 'no-match':
      logger.error(`No function matches '${resolution.query}'`);
      return 1;

    case 'selected':
      selected = resolution.fn;
      break;

    case 'ambiguous': {
      const interactive = request.interactive ?? (process.stdin.isTTY === true && process.stdout.isTTY === true);
      if (!interactive) {
        logger.error('More than one function matches. Be more specific, or run lk in a terminal to pick one:');
        for (const fn of resolution.candidates) logger.dim(`${fn.name} (${fn.script.relativePath})`);
        return 1;
      }
      const pickerOptions: PickerOptions = { pageSize: request.pageSize };
      if (request.query) pickerOptions.initialQuery = request.query;
      const id = await pickFunction(resolution.candidates, pickerOptions);
      if (!id) return 0;
      selected = findFunctionById(catalog, id);
      if (!selected) {
        logger.error(`Function ${id} is no longer in the catalog`);
        return 1;
      }
    }
  }

  if (request.writeHistory) {
    await recordHistory(catalog, selected, request.params, cwd);
  }
  return runFunction(selected, request.params, config);
}
