import { findScripts, type Catalog } from '@lk/core';
import type { LkConfig } from '../lib/config.js';
import { runFunction } from '../lib/execute.js';
import { logger } from '../lib/logger.js';
import { renderScript, renderScriptList } from '../lib/render.js';

export interface ListRequest {
  script?: string;
  fn?: string;
  params: string[];
  showPrivate: boolean;
  cwd?: string;
}

function printScriptList(catalog: Catalog, showPrivate: boolean, cwd: string): void {
  const lines = renderScriptList(catalog.scripts, showPrivate, cwd);
  if (lines.length === 0) {
    logger.warn(`No scripts with functions found under ${catalog.roots.join(', ')}`);
    return;
  }
  logger.header('lk found these scripts. Run `lk <script>` to see their functions.');
  for (const line of lines) console.log(line);
  logger.blank();
}

/**
 * `lk`, `lk <script>` and `lk <script> <function> [params...]`: browse
 * scripts and functions, then run one.
 */
export async function listCommand(catalog: Catalog, request: ListRequest, config: LkConfig): Promise<number> {
  const cwd = request.cwd ?? process.cwd();

  if (!request.script) {
    printScriptList(catalog, request.showPrivate, cwd);
    return 0;
  }

  const matches = findScripts(catalog, request.script, cwd);
  if (matches.length === 0) {
    logger.error(`Couldn't find a script called '${request.script}'`);
    printScriptList(catalog, request.showPrivate, cwd);
    return 1;
  }
  if (matches.length > 1) {
    logger.error(`'${request.script}' matches more than one script. Use its path instead:`);
    for (const script of matches) logger.dim(script.relativePath);
    return 1;
  }

  const script = matches[0];
  if (!script) return 1;

  if (!request.fn) {
    for (const line of renderScript(script, request.showPrivate)) console.log(line);
    return 0;
  }

  // A private function can still be run by name
  const fn = script.functions.find((f) => f.name === request.fn);
  if (!fn) {
    logger.error(`Function '${request.fn}' does not exist in ${script.displayName}`);
    logger.blank();
    for (const line of renderScript(script, request.showPrivate)) console.log(line);
    return 1;
  }
  return runFunction(fn, request.params, config);
}
