import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { checkEligibility, isIgnoredDirName, isIgnoredPath } from '@lk/core';

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(path.join(tmpdir(), 'lk-eligibility-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe('checkEligibility', () => {
  it('accepts a text file and reports its size', async () => {
    const file = path.join(dir, 'tasks.sh');
    await writeFile(file, 'hello() { echo hi; }\n');
    expect(await checkEligibility(file)).toEqual({ eligible: true, size: 21 });
  });

  it('skips empty files', async () => {
    const file = path.join(dir, 'empty.sh');
    await writeFile(file, '');
    expect(await checkEligibility(file)).toEqual({ eligible: false, reason: 'empty-file' });
  });

  it('skips binary files', async () => {
    const file = path.join(dir, 'tool.bin');
    await writeFile(file, Buffer.from([0x7f, 0x45, 0x4c, 0x46, 0x00, 0x00, 0x01, 0x02, 0x00, 0xff]));
    expect(await checkEligibility(file)).toEqual({ eligible: false, reason: 'binary-file' });
  });

  it('skips files above the size limit', async () => {
    const file = path.join(dir, 'big.sh');
    await writeFile(file, '0123456789');
    const verdict = await checkEligibility(file, { maxFileSize: 4 });
    expect(verdict).toMatchObject({ eligible: false, reason: 'too-large', size: 10 });
  });

  it('requires the executable bit only when asked to', async () => {
    const file = path.join(dir, 'plain.sh');
    await writeFile(file, 'x() { :; }\n', { mode: 0o644 });
    expect(await checkEligibility(file, { executableOnly: true })).toEqual({
      eligible: false,
      reason: 'not-executable',
    });
    expect((await checkEligibility(file)).eligible).toBe(true);
  });

  it('reports directories and missing paths as unreadable', async () => {
    const sub = path.join(dir, 'sub');
    await mkdir(sub);
    expect(await checkEligibility(sub)).toEqual({
      eligible: false,
      reason: 'unreadable-file',
      detail: 'not a regular file',
    });
    expect(await checkEligibility(path.join(dir, 'missing.sh'))).toMatchObject({
      eligible: false,
      reason: 'unreadable-file',
    });
  });
});

describe('ignore rules', () => {
  it('knows the directories the walk never enters', () => {
    expect(isIgnoredDirName('.git')).toBe(true);
    expect(isIgnoredDirName('node_modules')).toBe(true);
    expect(isIgnoredDirName('scripts')).toBe(false);
  });

  it('matches a path and everything below it, but not siblings sharing a prefix', () => {
    expect(isIgnoredPath('/work/vendor', ['/work/vendor'])).toBe(true);
    expect(isIgnoredPath('/work/vendor/lib/x.sh', ['/work/vendor'])).toBe(true);
    expect(isIgnoredPath('/work/vendored/x.sh', ['/work/vendor'])).toBe(false);
    expect(isIgnoredPath('/work/x.sh', [])).toBe(false);
  });
});
