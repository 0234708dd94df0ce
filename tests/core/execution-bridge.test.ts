import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { closeSync, openSync } from 'fs';
import { mkdtemp, readdir, readFile, realpath, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import {
  SpawnError,
  WrapperIOError,
  WrapperScript,
  buildCatalog,
  executeFunction,
  forwardedSignals,
  quoteShellArg,
  rank,
  wrapperContents,
  type ExecutionPhase,
  type ScriptFile,
  type ShellFunction,
} from '@lk/core';

let work: string;
let wrappers: string;

beforeEach(async () => {
  work = await realpath(await mkdtemp(path.join(tmpdir(), 'lk-exec-')));
  wrappers = await mkdtemp(path.join(tmpdir(), 'lk-wrappers-'));
});

afterEach(async () => {
  await rm(work, { recursive: true, force: true });
  await rm(wrappers, { recursive: true, force: true });
});

function functionIn(scriptPath: string, name: string): ShellFunction {
  const owner: ScriptFile = {
    path: scriptPath,
    displayName: path.basename(scriptPath),
    relativePath: path.basename(scriptPath),
    root: path.dirname(scriptPath),
    functions: [],
  };
  const created: ShellFunction = {
    id: name,
    name,
    qualifiedName: `${owner.displayName}:${name}`,
    script: owner,
    startLine: 1,
    endLine: 1,
    isPrivate: false,
    order: 0,
  };
  owner.functions.push(created);
  return created;
}

async function scriptWith(body: string, name = 'tasks.sh'): Promise<string> {
  const file = path.join(work, name);
  await writeFile(file, body);
  return file;
}

function signalListenerCounts(): number[] {
  return (['SIGINT', 'SIGTERM', 'SIGHUP'] as const).map((signal) => process.listenerCount(signal));
}

/** Deliver `signal` to this process shortly after the child starts */
function signalOnceExecuting(signal: NodeJS.Signals, phases: ExecutionPhase[]) {
  return (phase: ExecutionPhase) => {
    phases.push(phase);
    if (phase === 'executing') setTimeout(() => process.emit(signal, signal), 300);
  };
}

describe('wrapper script', () => {
  it('quotes arguments so they pass through literally', () => {
    expect(quoteShellArg('plain')).toBe(`'plain'`);
    expect(quoteShellArg("it's")).toBe(`'it'\\''s'`);
    expect(quoteShellArg('$HOME; rm -rf /')).toBe(`'$HOME; rm -rf /'`);
  });

  it('sources the script and calls the function with its arguments', () => {
    const fn = functionIn('/work/tasks.sh', 'deploy');
    expect(wrapperContents(fn, ['prod', 'a b'], '/bin/bash')).toBe(
      [
        '#!/usr/bin/env bash',
        '#',
        '# Temporary lk file used to run a function from one of your scripts.',
        '# If you see it here you can delete it.',
        '',
        `source '/work/tasks.sh'`,
        `deploy 'prod' 'a b'`,
        '',
      ].join('\n'),
    );
  });

  it('creates a private file with a unique name and removes it on dispose', async () => {
    const first = await WrapperScript.create(wrappers, 'echo one\n');
    const second = await WrapperScript.create(wrappers, 'echo two\n');

    expect(first.path).not.toBe(second.path);
    expect(path.basename(first.path)).toMatch(/^lk-[0-9a-f]{16}\.sh$/);
    expect(await readFile(first.path, 'utf8')).toBe('echo one\n');

    expect(await first.dispose()).toBe(true);
    expect(await first.dispose()).toBe(true);
    await second.dispose();
    expect(await readdir(wrappers)).toEqual([]);
  });
});

describe('forwardedSignals', () => {
  it('only hands on SIGTERM when the child shares the terminal', () => {
    expect(forwardedSignals(true)).toEqual(['SIGTERM']);
    expect(forwardedSignals(false)).toEqual(['SIGINT', 'SIGTERM', 'SIGHUP']);
  });
});

describe('executeFunction', () => {
  it('forwards the exit status and removes the wrapper', async () => {
    const fn = functionIn(await scriptWith('fail() { exit 3; }\n'), 'fail');
    const phases: ExecutionPhase[] = [];
    const before = signalListenerCounts();

    const result = await executeFunction(fn, [], {
      tempDir: wrappers,
      stdio: 'ignore',
      onTransition: (phase) => phases.push(phase),
    });

    expect(result.exitCode).toBe(3);
    expect(result.signal).toBeNull();
    expect(path.dirname(result.wrapperPath)).toBe(wrappers);
    expect(await readdir(wrappers)).toEqual([]);
    expect(phases).toEqual(['idle', 'wrapper-written', 'executing', 'cleaned', 'succeeded']);
    expect(signalListenerCounts()).toEqual(before);
  });

  it('passes arguments and runs in the requested directory', async () => {
    const fn = functionIn(await scriptWith('show() { printf "%s|%s|%s" "$1" "$2" "$PWD" > out.txt; }\n'), 'show');

    const result = await executeFunction(fn, ["it's", 'two words'], { tempDir: wrappers, cwd: work, stdio: 'ignore' });

    expect(result.exitCode).toBe(0);
    expect(await readFile(path.join(work, 'out.txt'), 'utf8')).toBe(`it's|two words|${work}`);
  });

  it('reports a missing interpreter as a SpawnError and still cleans up', async () => {
    const fn = functionIn(await scriptWith('ok() { :; }\n'), 'ok');
    const phases: ExecutionPhase[] = [];

    await expect(
      executeFunction(fn, [], {
        shell: path.join(work, 'no-such-shell'),
        tempDir: wrappers,
        stdio: 'ignore',
        onTransition: (phase) => phases.push(phase),
      }),
    ).rejects.toBeInstanceOf(SpawnError);

    expect(await readdir(wrappers)).toEqual([]);
    expect(phases).toEqual(['idle', 'wrapper-written', 'executing', 'cleaned', 'failed']);
  });

  it('fails with a WrapperIOError before starting anything when the temp dir is missing', async () => {
    const fn = functionIn(await scriptWith('ok() { :; }\n'), 'ok');
    const phases: ExecutionPhase[] = [];

    const attempt = executeFunction(fn, [], {
      tempDir: path.join(wrappers, 'missing'),
      stdio: 'ignore',
      onTransition: (phase) => phases.push(phase),
    });

    await expect(attempt).rejects.toBeInstanceOf(WrapperIOError);
    await expect(attempt).rejects.toMatchObject({ kind: 'wrapper-io', operation: 'write wrapper' });
    expect(phases).toEqual(['idle', 'failed']);
  });

  it('forwards an interrupt to a child outside the terminal and cleans up', async () => {
    const fn = functionIn(await scriptWith('slow() { exec sleep 3; }\n'), 'slow');
    const phases: ExecutionPhase[] = [];
    const before = signalListenerCounts();

    const result = await executeFunction(fn, [], {
      tempDir: wrappers,
      stdio: 'ignore',
      sharesTerminal: false,
      onTransition: signalOnceExecuting('SIGINT', phases),
    });

    expect(result.signal).toBe('SIGINT');
    expect(result.exitCode).toBe(130);
    expect(await readdir(wrappers)).toEqual([]);
    expect(phases).toEqual(['idle', 'wrapper-written', 'executing', 'cleaned', 'succeeded']);
    expect(signalListenerCounts()).toEqual(before);
  });

  it('always forwards SIGTERM', async () => {
    const fn = functionIn(await scriptWith('slow() { exec sleep 3; }\n'), 'slow');
    const phases: ExecutionPhase[] = [];
    const before = signalListenerCounts();

    const result = await executeFunction(fn, [], {
      tempDir: wrappers,
      stdio: 'ignore',
      sharesTerminal: true,
      onTransition: signalOnceExecuting('SIGTERM', phases),
    });

    expect(result.signal).toBe('SIGTERM');
    expect(result.exitCode).toBe(143);
    expect(await readdir(wrappers)).toEqual([]);
    expect(signalListenerCounts()).toEqual(before);
  });

  it('leaves a terminal interrupt to the terminal when the child shares it', async () => {
    const fn = functionIn(await scriptWith('slow() { exec sleep 1; }\n'), 'slow');
    const phases: ExecutionPhase[] = [];

    const result = await executeFunction(fn, [], {
      tempDir: wrappers,
      stdio: 'ignore',
      sharesTerminal: true,
      onTransition: signalOnceExecuting('SIGINT', phases),
    });

    expect(result.signal).toBeNull();
    expect(result.exitCode).toBe(0);
    expect(await readdir(wrappers)).toEqual([]);
  });

  it('runs a function found through the catalog and the resolver', async () => {
    await scriptWith('# Deploys the app\ndeploy() { echo "deploying $1"; }\n', 'deploy.sh');
    const catalog = await buildCatalog([work]);
    const [best] = rank(catalog, 'dep');
    expect(best?.fn.qualifiedName).toBe('deploy.sh:deploy');
    expect(best?.fn.description).toBe('Deploys the app');

    const outFile = path.join(wrappers, 'stdout.txt');
    const fd = openSync(outFile, 'w');
    try {
      if (!best) throw new Error('no candidate');
      const result = await executeFunction(best.fn, ['staging'], { tempDir: work, stdio: ['ignore', fd, 'ignore'] });
      expect(result.exitCode).toBe(0);
    } finally {
      closeSync(fd);
    }

    expect(await readFile(outFile, 'utf8')).toBe('deploying staging\n');
    expect((await readdir(work)).filter((f) => f.startsWith('lk-'))).toEqual([]);
  });
});
