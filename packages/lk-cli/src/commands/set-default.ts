import chalk from 'chalk';
import { DEFAULT_MODES, isDefaultMode, saveConfig, type LkConfig } from '../lib/config.js';
import { logger } from '../lib/logger.js';
import { askDefaultMode } from '../lib/picker.js';
import { resolveConfigPath } from '../lib/paths.js';

/** `lk --default [mode]`: persist the mode used when no flag is given */
export async function setDefaultCommand(
  mode: string | true,
  config: LkConfig,
  configPath: string = resolveConfigPath(),
): Promise<number> {
  const chosen = mode === true ? await askDefaultMode(config.defaultMode) : mode;

  if (!isDefaultMode(chosen)) {
    logger.error(
      `Unknown default '${chosen}'. Please specify either ${DEFAULT_MODES.map((m) => chalk.green(m)).join(' or ')}. ` +
        'You can try either with the --fuzzy or --list flags.',
    );
    return 1;
  }

  saveConfig({ ...config, defaultMode: chosen }, configPath);
  logger.success(`Default mode set to ${chosen}`);
  logger.dim(configPath);
  return 0;
}
