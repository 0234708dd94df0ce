import chalk from 'chalk';
import ora, { type Ora } from 'ora';

// Log levels: silent=0, error=1, warn=2, info=3, verbose=4
const LOG_LEVELS = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  verbose: 4,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

let override: LogLevel | undefined;

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

function getLogLevel(): number {
  if (override) return LOG_LEVELS[override];
  const envLevel = process.env['LK_LOG_LEVEL']?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return LOG_LEVELS[envLevel];
  }
  return LOG_LEVELS.info; // default: info
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] <= getLogLevel();
}

/** Force a level for the rest of this process, e.g. from --verbose */
export function setLogLevel(level: LogLevel | undefined): void {
  override = level;
}

export const logger = {
  /** Warning message */
  warn(message: string): void {
    if (shouldLog('warn')) {
      console.error(chalk.yellow('  ! ') + chalk.yellow(message));
    }
  },

  /** Error message */
  error(message: string): void {
    if (shouldLog('error')) {
      console.error(chalk.red('  x ') + chalk.red(message));
    }
  },

  /** Debug detail, only with --verbose or LK_LOG_LEVEL=verbose */
  verbose(message: string): void {
    if (shouldLog('verbose')) {
      console.error(chalk.gray('  · ' + message));
    }
  },

  success(message: string): void {
    if (shouldLog('info')) {
      console.log(chalk.green('  v ') + chalk.green(message));
    }
  },

  /** Dimmed / secondary information */
  dim(message: string): void {
    if (shouldLog('info')) {
      console.log(chalk.dim('    ' + message));
    }
  },

  /** Bold section header */
  header(message: string): void {
    if (shouldLog('info')) {
      console.log('\n' + chalk.bold.cyan(message));
      console.log(chalk.dim('─'.repeat(Math.min(message.length, 60))));
    }
  },

  done(message: string): void {
    if (shouldLog('info')) {
      console.log('\n' + chalk.bold.green('  Done! ') + message + '\n');
    }
  },

  blank(): void {
    if (shouldLog('info')) {
      console.log('');
    }
  },
};

/**
 * Create and start an ora spinner on stderr.
 * Returns the spinner instance so callers can `.stop()` / `.fail()` it.
 */
export function spinner(text: string): Ora {
  return ora({
    text,
    color: 'cyan',
    spinner: 'dots',
    stream: process.stderr,
    isEnabled: process.stderr.isTTY === true && shouldLog('info'),
  }).start();
}
