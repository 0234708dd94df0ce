import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { parse, stringify } from 'smol-toml';
import { ConfigurationError, DEFAULT_MAX_FILE_SIZE, DEFAULT_SHELL, describeError } from '@lk/core';
import { resolveConfigPath } from './paths.js';

export const DEFAULT_MODES = ['list', 'fuzzy'] as const;
export type DefaultMode = (typeof DEFAULT_MODES)[number];

export function isDefaultMode(value: string): value is DefaultMode {
  return (DEFAULT_MODES as readonly string[]).includes(value);
}

// Keys as they appear in lk.toml
export const ConfigFileSchema = z.object({
  default_mode: z.enum(DEFAULT_MODES).default('list'),
  roots: z.array(z.string().min(1)).min(1).default(['.']),
  ignore: z.array(z.string().min(1)).default([]),
  lines_to_show: z.number().int().positive().max(100).default(7),
  shell: z.string().min(1).default(DEFAULT_SHELL),
  temp_dir: z.string().min(1).optional(),
  write_history: z.boolean().default(true),
  show_private: z.boolean().default(false),
  executable_only: z.boolean().default(false),
  max_file_size: z.number().int().positive().default(DEFAULT_MAX_FILE_SIZE),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface LkConfig {
  /** Mode used when neither --fuzzy nor --list is given */
  defaultMode: DefaultMode;
  /** Directories searched for scripts; relative entries resolve against the cwd */
  roots: string[];
  /** Paths left out of the walk */
  ignore: string[];
  /** Page size of the fuzzy picker */
  linesToShow: number;
  /** Interpreter that runs the wrapper script */
  shell: string;
  /** Override for the wrapper directory */
  tempDir?: string;
  /** Append the equivalent `lk` command to the shell history after a fuzzy pick */
  writeHistory: boolean;
  /** Include functions whose names start with `_` */
  showPrivate: boolean;
  /** Only consider files with the executable bit set */
  executableOnly: boolean;
  maxFileSize: number;
}

function fromFile(file: ConfigFile): LkConfig {
  const config: LkConfig = {
    defaultMode: file.default_mode,
    roots: [...file.roots],
    ignore: [...file.ignore],
    linesToShow: file.lines_to_show,
    shell: file.shell,
    writeHistory: file.write_history,
    showPrivate: file.show_private,
    executableOnly: file.executable_only,
    maxFileSize: file.max_file_size,
  };
  if (file.temp_dir !== undefined) config.tempDir = file.temp_dir;
  return config;
}

function toFile(config: LkConfig): ConfigFile {
  const file: ConfigFile = {
    default_mode: config.defaultMode,
    roots: [...config.roots],
    ignore: [...config.ignore],
    lines_to_show: config.linesToShow,
    shell: config.shell,
    write_history: config.writeHistory,
    show_private: config.showPrivate,
    executable_only: config.executableOnly,
    max_file_size: config.maxFileSize,
  };
  if (config.tempDir !== undefined) file.temp_dir = config.tempDir;
  return file;
}

export function defaultConfig(): LkConfig {
  return fromFile(ConfigFileSchema.parse({}));
}

/**
 * Load `lk.toml`. Missing fields are filled with defaults and a missing
 * file means all defaults. An unreadable or invalid file is a
 * ConfigurationError.
 */
export function loadConfig(configPath: string = resolveConfigPath()): LkConfig {
  if (!fs.existsSync(configPath)) {
    return defaultConfig();
  }

  let raw: string;
  try {
    raw = fs.readFileSync(configPath, 'utf8');
  } catch (error) {
    throw new ConfigurationError(
      `Couldn't read config file ${configPath}: ${describeError(error)}`,
      'read config',
      configPath,
      { cause: error },
    );
  }

  let document: unknown;
  try {
    document = parse(raw);
  } catch (error) {
    throw new ConfigurationError(
      `Config file ${configPath} is not valid TOML: ${describeError(error)}`,
      'parse config',
      configPath,
      { cause: error },
    );
  }

  const result = ConfigFileSchema.safeParse(document);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new ConfigurationError(`Invalid config file ${configPath}: ${issues}`, 'validate config', configPath, {
      cause: result.error,
    });
  }
  return fromFile(result.data);
}

/**
 * Write the whole config back to `lk.toml`.
 * Creates the config directory if it does not exist.
 */
export function saveConfig(config: LkConfig, configPath: string = resolveConfigPath()): void {
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, stringify(toFile(config)) + '\n', 'utf8');
}
