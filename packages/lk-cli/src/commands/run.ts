import { loadConfig, type LkConfig } from '../lib/config.js';
import { loadCatalog } from '../lib/catalog.js';
import { logger, setLogLevel } from '../lib/logger.js';
import { listCommand, type ListRequest } from './list.js';
import { fuzzyCommand, type FuzzyRequest } from './fuzzy.js';
import { setDefaultCommand } from './set-default.js';

export interface RunOptions {
  fuzzy?: boolean;
  list?: boolean;
  default?: string | true;
  root: string[];
  ignore: string[];
  number?: number;
  all?: boolean;
  verbose?: boolean;
  history: boolean;
}

export type Mode = 'list' | 'fuzzy';

/** Explicit flags win over the stored default; naming a script means list mode */
export function selectMode(options: Pick<RunOptions, 'fuzzy' | 'list'>, script: string | undefined, config: LkConfig): Mode {
  if (options.fuzzy) return 'fuzzy';
  if (options.list || script !== undefined) return 'list';
  return config.defaultMode;
}

/** The default command: `lk [script] [function] [params...]` */
export async function runCommand(
  script: string | undefined,
  fn: string | undefined,
  params: string[],
  options: RunOptions,
): Promise<number> {
  if (options.verbose) setLogLevel('verbose');

  const config = loadConfig();

  if (options.default !== undefined) {
    return setDefaultCommand(options.default, config);
  }

  if (options.fuzzy && options.list) {
    logger.error('Use either --fuzzy or --list, not both');
    return 1;
  }

  if (options.number !== undefined && (!Number.isInteger(options.number) || options.number < 1)) {
    logger.error('--number must be a positive whole number');
    return 1;
  }

  const showPrivate = options.all === true || config.showPrivate;
  const catalog = await loadCatalog({ config, roots: options.root, ignore: options.ignore });

  if (selectMode(options, script, config) === 'fuzzy') {
    const rest = fn === undefined ? params : [fn, ...params];
    const fuzzyRequest: FuzzyRequest = {
      params: rest,
      showPrivate,
      writeHistory: options.history && config.writeHistory,
      pageSize: options.number ?? config.linesToShow,
    };
    if (script !== undefined) fuzzyRequest.query = script;
    return fuzzyCommand(catalog, fuzzyRequest, config);
  }

  const request: ListRequest = { params, showPrivate };
  if (script !== undefined) request.script = script;
  if (fn !== undefined) request.fn = fn;
  return listCommand(catalog, request, config);
}
