import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, realpath, rm, symlink, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { ConfigurationError, buildCatalog, functionId, validateRoots } from '@lk/core';

let root: string;

async function write(relative: string, contents: string): Promise<string> {
  const file = path.join(root, relative);
  await mkdir(path.dirname(file), { recursive: true });
  await writeFile(file, contents);
  return file;
}

beforeEach(async () => {
  root = await realpath(await mkdtemp(path.join(tmpdir(), 'lk-catalog-')));
  await write('a.sh', 'build() { :; }\n_priv() { :; }\n');
  await write('sub/b.sh', '# B script\n\ndeploy() { :; }\nbuild() { :; }\n');
  await write('node_modules/c.sh', 'skip() { :; }\n');
  await write('empty.sh', '');
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

describe('buildCatalog', () => {
  it('collects scripts and functions in path order', async () => {
    const catalog = await buildCatalog([root]);

    expect(catalog.roots).toEqual([root]);
    expect(catalog.scripts.map((s) => s.relativePath)).toEqual(['a.sh', path.join('sub', 'b.sh')]);
    expect(catalog.functions.map((f) => [f.qualifiedName, f.order])).toEqual([
      ['a.sh:build', 0],
      ['a.sh:_priv', 1],
      ['b.sh:deploy', 2],
      ['b.sh:build', 3],
    ]);
  });

  it('links functions back to their script', async () => {
    const catalog = await buildCatalog([root]);
    const deploy = catalog.functions.find((f) => f.name === 'deploy');

    expect(deploy?.script.path).toBe(path.join(root, 'sub', 'b.sh'));
    expect(deploy?.script.description).toBe('B script');
    expect(deploy?.script.functions).toContain(deploy);
    expect(deploy?.id).toBe(functionId(path.join(root, 'sub', 'b.sh'), 'deploy'));
  });

  it('marks underscore functions private', async () => {
    const catalog = await buildCatalog([root]);
    expect(catalog.functions.filter((f) => f.isPrivate).map((f) => f.name)).toEqual(['_priv']);
  });

  it('records skipped files and name collisions as diagnostics', async () => {
    const catalog = await buildCatalog([root]);

    expect(catalog.diagnostics).toContainEqual({ kind: 'empty-file', path: path.join(root, 'empty.sh') });
    expect(catalog.diagnostics).toContainEqual({
      kind: 'name-collision',
      name: 'build',
      paths: [path.join(root, 'a.sh'), path.join(root, 'sub', 'b.sh')],
    });
  });

  it('attaches the file path to parse diagnostics', async () => {
    const bad = await write('bad.sh', 'oops() {\n');
    const catalog = await buildCatalog([root]);
    expect(catalog.diagnostics).toContainEqual({ kind: 'malformed-function', path: bad, name: 'oops', line: 1 });
  });

  it('produces the same catalog when run twice over an unchanged tree', async () => {
    const first = await buildCatalog([root]);
    const second = await buildCatalog([root]);
    expect(second.functions.map((f) => [f.id, f.order])).toEqual(first.functions.map((f) => [f.id, f.order]));
    expect(second.diagnostics).toEqual(first.diagnostics);
  });

  it('leaves out ignored paths', async () => {
    const catalog = await buildCatalog(['.'], { cwd: root, ignore: ['sub'] });
    expect(catalog.scripts.map((s) => s.displayName)).toEqual(['a.sh']);
  });

  it('catalogues a file reachable from two roots once', async () => {
    const catalog = await buildCatalog([root, path.join(root, 'sub')]);
    expect(catalog.functions.filter((f) => f.name === 'deploy')).toHaveLength(1);
  });

  it('stops at a symlink that loops back to an ancestor', async () => {
    await symlink(root, path.join(root, 'loop'), 'dir');
    const catalog = await buildCatalog([root]);

    expect(catalog.diagnostics).toContainEqual({ kind: 'symlink-cycle', path: path.join(root, 'loop'), target: root });
    expect(catalog.functions).toHaveLength(4);
  });
});

describe('validateRoots', () => {
  it('rejects a missing root before walking', async () => {
    await expect(buildCatalog([path.join(root, 'nope')])).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('rejects a root that is a file', async () => {
    await expect(validateRoots([path.join(root, 'a.sh')])).rejects.toThrow(/not a directory/);
  });

  it('rejects an empty list of roots', async () => {
    await expect(validateRoots([])).rejects.toThrow('No search roots configured');
  });

  it('resolves relative roots and drops duplicates', async () => {
    expect(await validateRoots(['.', root, 'sub'], root)).toEqual([root, path.join(root, 'sub')]);
  });
});
