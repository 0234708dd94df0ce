import { spawn, type StdioOptions } from 'child_process';
import { writeFile, chmod, rm } from 'fs/promises';
import { rmSync } from 'fs';
import { randomBytes } from 'crypto';
import { constants as osConstants, tmpdir } from 'os';
import path from 'path';
import {
  DEFAULT_SHELL,
  FORWARDED_SIGNALS,
  WRAPPER_CREATE_ATTEMPTS,
  WRAPPER_EXTENSION,
  WRAPPER_MODE,
  WRAPPER_PREFIX,
  WRAPPER_SUFFIX_BYTES,
  type ExecutionPhase,
} from './constants.js';
import { SpawnError, WrapperIOError, describeError, errorCode } from './errors.js';
import type { CoreLogger, ExecutionResult, ShellFunction } from './types.js';

export interface ExecutionOptions {
  /** Working directory of the child; defaults to the caller's */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Interpreter used for the wrapper, looked up on PATH */
  shell?: string;
  /** Where the wrapper is written; defaults to the platform temp dir */
  tempDir?: string;
  stdio?: StdioOptions;
  /**
   * Whether the child is in the terminal's foreground process group with us.
   * Defaults to true when stdin is a TTY and stdio is inherited.
   */
  sharesTerminal?: boolean;
  logger?: CoreLogger;
  onTransition?: (phase: ExecutionPhase) => void;
}

const silentLogger: CoreLogger = {
  warn: () => undefined,
  verbose: () => undefined,
};

/** Quote one word for a POSIX shell so it is passed through literally */
export function quoteShellArg(value: string): string {
  return `'${value.replaceAll("'", `'\\''`)}'`;
}

export function wrapperContents(fn: ShellFunction, args: readonly string[], shell: string = DEFAULT_SHELL): string {
  const call = [fn.name, ...args.map(quoteShellArg)].join(' ');
  return [
    `#!/usr/bin/env ${path.basename(shell)}`,
    '#',
    '# Temporary lk file used to run a function from one of your scripts.',
    '# If you see it here you can delete it.',
    '',
    `source ${quoteShellArg(fn.script.path)}`,
    call,
    '',
  ].join('\n');
}

/**
 * A uniquely named file in the temp directory that lives for exactly one
 * execution. `dispose` is idempotent.
 */
export class WrapperScript {
  private disposed = false;

  private constructor(readonly path: string) {}

  static async create(dir: string, contents: string): Promise<WrapperScript> {
    for (let attempt = 1; ; attempt++) {
      const suffix = randomBytes(WRAPPER_SUFFIX_BYTES).toString('hex');
      const wrapperPath = path.join(dir, `${WRAPPER_PREFIX}${suffix}${WRAPPER_EXTENSION}`);
      try {
        // 'wx' never clobbers a file another invocation left behind
        await writeFile(wrapperPath, contents, { encoding: 'utf8', mode: WRAPPER_MODE, flag: 'wx' });
      } catch (error) {
        if (errorCode(error) === 'EEXIST' && attempt < WRAPPER_CREATE_ATTEMPTS) continue;
        throw new WrapperIOError(
          `Failed to write wrapper script ${wrapperPath}: ${describeError(error)}`,
          'write wrapper',
          wrapperPath,
          { cause: error },
        );
      }

      const wrapper = new WrapperScript(wrapperPath);
      try {
        await chmod(wrapperPath, WRAPPER_MODE);
      } catch (error) {
        await wrapper.dispose();
        throw new WrapperIOError(
          `Failed to make wrapper script executable ${wrapperPath}: ${describeError(error)}`,
          'chmod wrapper',
          wrapperPath,
          { cause: error },
        );
      }
      return wrapper;
    }
  }

  async dispose(logger: CoreLogger = silentLogger): Promise<boolean> {
    if (this.disposed) return true;
    try {
      await rm(this.path, { force: true });
      this.disposed = true;
      return true;
    } catch (error) {
      logger.warn(`Couldn't remove temporary file ${this.path}: ${describeError(error)}`);
      return false;
    }
  }

  /** Last-chance removal from a synchronous `exit` handler */
  disposeSync(): void {
    if (this.disposed) return;
    try {
      rmSync(this.path, { force: true });
      this.disposed = true;
    } catch {
      // the process is exiting; there is nowhere left to report this
    }
  }
}

function signalExitCode(signal: NodeJS.Signals): number {
  return 128 + (osConstants.signals[signal] ?? 0);
}

/**
 * Signals handed on to the child. A terminal already delivers Ctrl-C and
 * hangups to the whole foreground group, so those are only forwarded when
 * the child is detached from it.
 */
export function forwardedSignals(sharesTerminal: boolean): readonly NodeJS.Signals[] {
  return sharesTerminal ? FORWARDED_SIGNALS.filter((signal) => signal === 'SIGTERM') : FORWARDED_SIGNALS;
}

function waitForChild(
  shell: string,
  wrapperPath: string,
  options: ExecutionOptions,
  logger: CoreLogger,
): Promise<{ exitCode: number; signal: NodeJS.Signals | null }> {
  return new Promise((resolve, reject) => {
    const stdio = options.stdio ?? 'inherit';
    const sharesTerminal = options.sharesTerminal ?? (process.stdin.isTTY === true && stdio === 'inherit');
    const forwarded = forwardedSignals(sharesTerminal);

    const child = spawn(shell, [wrapperPath], {
      cwd: options.cwd ?? process.cwd(),
      env: options.env ?? process.env,
      stdio,
    });

    // The parent stays alive while the child runs so the wrapper can be removed
    const forwarders = FORWARDED_SIGNALS.map((signal) => {
      const handler = () => {
        if (!forwarded.includes(signal)) {
          logger.verbose(`Received ${signal}; child process ${child.pid ?? '?'} gets it from the terminal`);
          return;
        }
        logger.verbose(`Forwarding ${signal} to child process ${child.pid ?? '?'}`);
        child.kill(signal);
      };
      process.on(signal, handler);
      return { signal, handler };
    });
    const detach = () => {
      for (const { signal, handler } of forwarders) process.off(signal, handler);
    };

    child.once('error', (error) => {
      detach();
      reject(
        new SpawnError(`Failed to start ${shell}: ${describeError(error)}`, 'spawn interpreter', shell, {
          cause: error,
        }),
      );
    });

    child.once('close', (code, signal) => {
      detach();
      if (signal) {
        resolve({ exitCode: signalExitCode(signal), signal });
      } else {
        resolve({ exitCode: code ?? 1, signal: null });
      }
    });
  });
}

/**
 * Run one function with its arguments in a child shell and wait for it.
 * The wrapper is always removed, whichever way execution ends. A non-zero
 * exit from the function is returned, not thrown.
 */
export async function executeFunction(
  fn: ShellFunction,
  args: readonly string[],
  options: ExecutionOptions = {},
): Promise<ExecutionResult> {
  const logger = options.logger ?? silentLogger;
  const shell = options.shell ?? DEFAULT_SHELL;
  const transition = (phase: ExecutionPhase) => {
    logger.verbose(`execution: ${phase}`);
    options.onTransition?.(phase);
  };

  transition('idle');
  const wrapper = await WrapperScript.create(options.tempDir ?? tmpdir(), wrapperContents(fn, args, shell)).catch(
    (error: unknown) => {
      transition('failed');
      throw error;
    },
  );
  transition('wrapper-written');

  const onExit = () => wrapper.disposeSync();
  process.on('exit', onExit);

  let completed = false;
  try {
    transition('executing');
    const outcome = await waitForChild(shell, wrapper.path, options, logger);
    completed = true;
    return { ...outcome, wrapperPath: wrapper.path };
  } finally {
    process.off('exit', onExit);
    await wrapper.dispose(logger);
    transition('cleaned');
    transition(completed ? 'succeeded' : 'failed');
  }
}
