import path from 'path';
import type { Catalog, RankedCandidate, ScriptFile, ShellFunction } from './types.js';

// Score weights: any monotonic scheme works, these favour runs and word starts
const SCORE_MATCH = 1;
const BONUS_CONSECUTIVE = 5;
const BONUS_WORD_START = 8;
const BONUS_FIRST_CHAR = 4;
const BONUS_NAME_SUBSTRING = 20;

export interface FuzzyMatch {
  score: number;
  /** Positions in the haystack that matched, one per query character */
  indices: number[];
}

function isWordStart(haystack: string, index: number): boolean {
  if (index === 0) return true;
  const prev = haystack.charAt(index - 1);
  const curr = haystack.charAt(index);
  if (!/[a-z0-9]/i.test(prev)) return true;
  // camelCase boundary
  return prev === prev.toLowerCase() && curr !== curr.toLowerCase();
}

function greedyMatch(query: string, haystack: string, lowerHaystack: string, from: number): FuzzyMatch | null {
  const indices: number[] = [];
  let score = 0;
  let pos = from;
  for (const ch of query) {
    const found = lowerHaystack.indexOf(ch, pos);
    if (found < 0) return null;
    score += SCORE_MATCH;
    const last = indices[indices.length - 1];
    if (last !== undefined && found === last + 1) score += BONUS_CONSECUTIVE;
    if (isWordStart(haystack, found)) score += BONUS_WORD_START;
    if (found === 0) score += BONUS_FIRST_CHAR;
    indices.push(found);
    pos = found + 1;
  }
  return { score, indices };
}

/**
 * Case-insensitive subsequence match. Tries every start position for the
 * first query character and keeps the best-scoring alignment.
 */
export function fuzzyMatch(query: string, haystack: string): FuzzyMatch | null {
  const q = query.toLowerCase();
  if (q.length === 0) return { score: 0, indices: [] };

  const lower = haystack.toLowerCase();
  const first = q.charAt(0);
  let best: FuzzyMatch | null = null;
  for (let start = lower.indexOf(first); start >= 0; start = lower.indexOf(first, start + 1)) {
    const candidate = greedyMatch(q, haystack, lower, start);
    if (!candidate) break;
    if (!best || candidate.score > best.score) best = candidate;
  }
  return best;
}

/** Text a function is searched by: its name, description and file name */
export function searchText(fn: ShellFunction): string {
  return [fn.name, fn.description ?? '', fn.script.displayName].filter((s) => s.length > 0).join(' ');
}

function compareCandidates(a: RankedCandidate, b: RankedCandidate): number {
  if (a.exactName !== b.exactName) return a.exactName ? -1 : 1;
  if (a.score !== b.score) return b.score - a.score;
  if (a.fn.name.length !== b.fn.name.length) return a.fn.name.length - b.fn.name.length;
  return a.fn.order - b.fn.order;
}

/**
 * Rank a list of functions against a query. An empty query returns all of
 * them in discovery order; no match returns an empty list.
 */
export function rankFunctions(functions: readonly ShellFunction[], query: string): RankedCandidate[] {
  const trimmed = query.trim();
  if (trimmed.length === 0) {
    return [...functions]
      .sort((a, b) => a.order - b.order)
      .map((fn) => ({ fn, score: 0, exactName: false, nameMatches: [] }));
  }

  const lowerQuery = trimmed.toLowerCase();
  const ranked: RankedCandidate[] = [];
  for (const fn of functions) {
    const match = fuzzyMatch(trimmed, searchText(fn));
    if (!match) continue;

    const lowerName = fn.name.toLowerCase();
    let score = match.score;
    if (lowerName.includes(lowerQuery)) score += BONUS_NAME_SUBSTRING;

    ranked.push({
      fn,
      score,
      exactName: lowerName === lowerQuery,
      nameMatches: match.indices.filter((i) => i < fn.name.length),
    });
  }
  return ranked.sort(compareCandidates);
}

export function rank(catalog: Catalog, query: string): RankedCandidate[] {
  return rankFunctions(catalog.functions, query);
}

export function findFunctionsByName(catalog: Catalog, name: string): ShellFunction[] {
  return catalog.functions.filter((fn) => fn.name === name);
}

export function findFunctionById(catalog: Catalog, id: string): ShellFunction | undefined {
  return catalog.functions.find((fn) => fn.id === id);
}

/**
 * Scripts matching `name` by file name, by path relative to their root, or
 * by path relative to `cwd`.
 */
export function findScripts(catalog: Catalog, name: string, cwd: string = process.cwd()): ScriptFile[] {
  const absolute = path.resolve(cwd, name);
  return catalog.scripts.filter(
    (script) => script.displayName === name || script.relativePath === name || script.path === absolute,
  );
}
