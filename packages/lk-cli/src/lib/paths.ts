import { homedir } from 'os';
import path from 'path';

export const LK_CONFIG_FILE = 'lk.toml';

export function xdgConfigHome(env: NodeJS.ProcessEnv = process.env): string {
  return env['XDG_CONFIG_HOME'] ?? path.join(homedir(), '.config');
}

/** `$LK_CONFIG_DIR`, else `$XDG_CONFIG_HOME/lk`, else `~/.config/lk` */
export function resolveConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  return env['LK_CONFIG_DIR'] ?? path.join(xdgConfigHome(env), 'lk');
}

export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(resolveConfigDir(env), LK_CONFIG_FILE);
}
