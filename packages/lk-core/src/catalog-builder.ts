import { readdir, readFile, stat, realpath } from 'fs/promises';
import { createHash } from 'crypto';
import path from 'path';
import { DEFAULT_MAX_FILE_SIZE, PRIVATE_PREFIX } from './constants.js';
import { ConfigurationError, describeError } from './errors.js';
import { checkEligibility, isIgnoredDirName, isIgnoredPath } from './eligibility.js';
import { extractFunctions } from './function-extractor.js';
import type { Catalog, Diagnostic, EligibilityOptions, ScriptFile, ShellFunction } from './types.js';

export interface CatalogOptions extends EligibilityOptions {
  /** Absolute paths (or paths relative to `cwd`) left out of the walk */
  ignore?: string[];
  /** Base for relative roots and ignore paths */
  cwd?: string;
}

interface WalkState {
  root: string;
  ignore: string[];
  visitedFiles: Set<string>;
  diagnostics: Diagnostic[];
}

/** Stable identifier for a function: survives re-runs over an unchanged tree */
export function functionId(scriptPath: string, name: string): string {
  return createHash('sha1').update(`${scriptPath}\0${name}`).digest('hex').slice(0, 12);
}

function identity(stats: { dev: number; ino: number }): string {
  return `${stats.dev}:${stats.ino}`;
}

/**
 * Check every root before any work starts. A missing root, or one that is
 * not a directory, is a configuration error.
 */
export async function validateRoots(roots: readonly string[], cwd: string = process.cwd()): Promise<string[]> {
  if (roots.length === 0) {
    throw new ConfigurationError('No search roots configured', 'validate roots');
  }
  const resolved: string[] = [];
  for (const root of roots) {
    const absolute = path.resolve(cwd, root);
    let isDirectory: boolean;
    try {
      isDirectory = (await stat(absolute)).isDirectory();
    } catch (error) {
      throw new ConfigurationError(
        `Search root does not exist: ${absolute} (${describeError(error)})`,
        'validate roots',
        absolute,
        { cause: error },
      );
    }
    if (!isDirectory) {
      throw new ConfigurationError(`Search root is not a directory: ${absolute}`, 'validate roots', absolute);
    }
    if (!resolved.includes(absolute)) resolved.push(absolute);
  }
  return resolved;
}

/**
 * Enumerate candidate files under `dir`. Directories are entered through
 * symlinks; a link back to one of its own ancestors is a cycle.
 */
async function walk(dir: string, state: WalkState, ancestors: ReadonlySet<string>): Promise<string[]> {
  let dirStats;
  try {
    dirStats = await stat(dir);
  } catch (error) {
    state.diagnostics.push({ kind: 'unreadable-file', path: dir, message: describeError(error) });
    return [];
  }
  const id = identity(dirStats);
  if (ancestors.has(id)) {
    const target = await realpath(dir).catch(() => dir);
    state.diagnostics.push({ kind: 'symlink-cycle', path: dir, target });
    return [];
  }
  const lineage = new Set(ancestors).add(id);

  let entries;
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (error) {
    state.diagnostics.push({ kind: 'unreadable-file', path: dir, message: describeError(error) });
    return [];
  }
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  const results: string[] = [];
  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (isIgnoredPath(fullPath, state.ignore)) continue;

    let isDirectory = entry.isDirectory();
    if (entry.isSymbolicLink()) {
      try {
        isDirectory = (await stat(fullPath)).isDirectory();
      } catch (error) {
        state.diagnostics.push({ kind: 'unreadable-file', path: fullPath, message: describeError(error) });
        continue;
      }
    }

    if (isDirectory) {
      if (isIgnoredDirName(entry.name)) continue;
      results.push(...(await walk(fullPath, state, lineage)));
    } else {
      results.push(fullPath);
    }
  }
  return results;
}

async function loadScript(
  filePath: string,
  state: WalkState,
  options: EligibilityOptions,
): Promise<ScriptFile | null> {
  const verdict = await checkEligibility(filePath, options);
  if (!verdict.eligible) {
    switch (verdict.reason) {
      case 'unreadable-file':
        state.diagnostics.push({ kind: 'unreadable-file', path: filePath, message: verdict.detail ?? 'unreadable' });
        break;
      case 'too-large':
        state.diagnostics.push({
          kind: 'too-large',
          path: filePath,
          size: verdict.size ?? 0,
          limit: options.maxFileSize ?? DEFAULT_MAX_FILE_SIZE,
        });
        break;
      case 'symlink-cycle':
        state.diagnostics.push({ kind: 'symlink-cycle', path: filePath, target: verdict.detail ?? filePath });
        break;
      default:
        state.diagnostics.push({ kind: verdict.reason, path: filePath });
    }
    return null;
  }

  // The same file reached twice (two roots, or a symlink) is catalogued once
  const fileStats = await stat(filePath).catch(() => null);
  if (fileStats) {
    const id = identity(fileStats);
    if (state.visitedFiles.has(id)) return null;
    state.visitedFiles.add(id);
  }

  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (error) {
    state.diagnostics.push({ kind: 'unreadable-file', path: filePath, message: describeError(error) });
    return null;
  }

  const extraction = extractFunctions(text);
  for (const d of extraction.diagnostics) {
    state.diagnostics.push({ ...d, path: filePath });
  }

  const script: ScriptFile = {
    path: filePath,
    displayName: path.basename(filePath),
    relativePath: path.relative(state.root, filePath),
    root: state.root,
    functions: [],
  };
  if (extraction.description !== undefined) script.description = extraction.description;

  script.functions = extraction.functions.map((extracted) => {
    const fn: ShellFunction = {
      id: functionId(filePath, extracted.name),
      name: extracted.name,
      qualifiedName: `${script.displayName}:${extracted.name}`,
      script,
      startLine: extracted.startLine,
      endLine: extracted.endLine,
      isPrivate: extracted.name.startsWith(PRIVATE_PREFIX),
      order: 0,
    };
    if (extracted.description !== undefined) fn.description = extracted.description;
    return fn;
  });

  return script;
}

/** Record every function name defined in more than one file */
export function findCollisions(functions: readonly ShellFunction[]): Diagnostic[] {
  const byName = new Map<string, string[]>();
  for (const fn of functions) {
    const paths = byName.get(fn.name) ?? [];
    if (!paths.includes(fn.script.path)) paths.push(fn.script.path);
    byName.set(fn.name, paths);
  }
  const collisions: Diagnostic[] = [];
  for (const [name, paths] of byName) {
    if (paths.length > 1) collisions.push({ kind: 'name-collision', name, paths });
  }
  return collisions;
}

/**
 * Walk every root and assemble a fresh Catalog. Per-file problems become
 * diagnostics; only an invalid root stops the build.
 */
export async function buildCatalog(roots: readonly string[], options: CatalogOptions = {}): Promise<Catalog> {
  const cwd = options.cwd ?? process.cwd();
  const resolvedRoots = await validateRoots(roots, cwd);
  const ignore = (options.ignore ?? []).map((p) => path.resolve(cwd, p));

  const diagnostics: Diagnostic[] = [];
  const visitedFiles = new Set<string>();
  const scripts: ScriptFile[] = [];

  for (const root of resolvedRoots) {
    const state: WalkState = { root, ignore, visitedFiles, diagnostics };
    const files = await walk(root, state, new Set());
    files.sort();
    for (const file of files) {
      const script = await loadScript(file, state, options);
      if (script) scripts.push(script);
    }
  }

  const functions: ShellFunction[] = [];
  for (const script of scripts) {
    for (const fn of script.functions) {
      fn.order = functions.length;
      functions.push(fn);
    }
  }

  diagnostics.push(...findCollisions(functions));

  return { roots: resolvedRoots, scripts, functions, diagnostics };
}
