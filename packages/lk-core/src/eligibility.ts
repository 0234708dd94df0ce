import { stat, access } from 'fs/promises';
import { constants } from 'fs';
import path from 'path';
import { isBinaryFile } from 'isbinaryfile';
import { IGNORED_DIRS, DEFAULT_MAX_FILE_SIZE } from './constants.js';
import { describeError } from './errors.js';
import type { EligibilityOptions, EligibilityVerdict } from './types.js';

/** True for directory names the walk never enters */
export function isIgnoredDirName(name: string): boolean {
  return (IGNORED_DIRS as readonly string[]).includes(name);
}

/**
 * True when `candidate` is one of `ignored` or lies underneath one of them.
 * Both sides are expected to be absolute.
 */
export function isIgnoredPath(candidate: string, ignored: readonly string[]): boolean {
  return ignored.some((prefix) => {
    const rel = path.relative(prefix, candidate);
    return rel === '' || (!rel.startsWith('..') && !path.isAbsolute(rel));
  });
}

/**
 * Decide whether a filesystem entry is a script worth parsing.
 * Symbolic links are followed. Never throws: anything that cannot be
 * inspected comes back ineligible with a reason.
 */
export async function checkEligibility(
  filePath: string,
  options: EligibilityOptions = {},
): Promise<EligibilityVerdict> {
  const maxFileSize = options.maxFileSize ?? DEFAULT_MAX_FILE_SIZE;

  let size: number;
  try {
    const stats = await stat(filePath);
    if (!stats.isFile()) {
      return { eligible: false, reason: 'unreadable-file', detail: 'not a regular file' };
    }
    size = stats.size;
  } catch (error) {
    return { eligible: false, reason: 'unreadable-file', detail: describeError(error) };
  }

  if (size === 0) {
    return { eligible: false, reason: 'empty-file' };
  }
  if (size > maxFileSize) {
    return { eligible: false, reason: 'too-large', size, detail: `${size} bytes exceeds ${maxFileSize}` };
  }

  if (options.executableOnly) {
    try {
      await access(filePath, constants.X_OK);
    } catch {
      return { eligible: false, reason: 'not-executable' };
    }
  }

  try {
    if (await isBinaryFile(filePath)) {
      return { eligible: false, reason: 'binary-file' };
    }
  } catch (error) {
    return { eligible: false, reason: 'unreadable-file', detail: describeError(error) };
  }

  return { eligible: true, size };
}
