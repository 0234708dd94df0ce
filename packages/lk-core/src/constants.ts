// Directories that are never entered during a walk
export const IGNORED_DIRS = ['.git', '.hg', '.svn', 'node_modules', 'target', '.github', '.vscode'] as const;

// Shell identifier rule applied to every function name
export const SHELL_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

// Functions whose name starts with this are helpers, hidden by default
export const PRIVATE_PREFIX = '_';

export const DEFAULT_MAX_FILE_SIZE = 1024 * 1024;

export const DEFAULT_SHELL = 'bash';

// Wrapper files are named `${WRAPPER_PREFIX}${suffix}${WRAPPER_EXTENSION}`
export const WRAPPER_PREFIX = 'lk-';
export const WRAPPER_EXTENSION = '.sh';
export const WRAPPER_SUFFIX_BYTES = 8;
export const WRAPPER_CREATE_ATTEMPTS = 3;
export const WRAPPER_MODE = 0o700;

export const FORWARDED_SIGNALS = ['SIGINT', 'SIGTERM', 'SIGHUP'] as const;

export const EXECUTION_PHASES = ['idle', 'wrapper-written', 'executing', 'cleaned', 'succeeded', 'failed'] as const;
export type ExecutionPhase = (typeof EXECUTION_PHASES)[number];
