import { execFileSync } from 'child_process';
import fs from 'fs';
import path from 'path';
import { tmpdir } from 'os';
import chalk from 'chalk';
import { validateRoots, describeError } from '@lk/core';
import { defaultConfig, loadConfig, type LkConfig } from '../lib/config.js';
import { detectShellHistory } from '../lib/history.js';
import { logger } from '../lib/logger.js';
import { resolveConfigPath } from '../lib/paths.js';

type CheckStatus = 'pass' | 'fail' | 'warn';

export interface CheckResult {
  label: string;
  status: CheckStatus;
  detail?: string;
}

function checkNodeVersion(): CheckResult {
  const major = parseInt(process.versions.node.split('.')[0] ?? '0', 10);
  if (major >= 20) {
    return { label: 'Node.js version', status: 'pass', detail: `v${process.versions.node}` };
  }
  return {
    label: 'Node.js version',
    status: 'fail',
    detail: `v${process.versions.node} (requires >= 20)`,
  };
}

export function checkShell(shell: string): CheckResult {
  const label = `shell (${shell})`;
  try {
    const out = execFileSync(shell, ['--version'], { encoding: 'utf8', timeout: 5000, stdio: 'pipe' }).trim();
    return { label, status: 'pass', detail: out.split('\n')[0] ?? '' };
  } catch {
    return { label, status: 'fail', detail: 'not found in PATH' };
  }
}

export function checkConfig(configPath: string): { result: CheckResult; config: LkConfig } {
  if (!fs.existsSync(configPath)) {
    return {
      result: { label: 'config file', status: 'warn', detail: `${configPath} not found, using defaults` },
      config: defaultConfig(),
    };
  }
  try {
    return { result: { label: 'config file', status: 'pass', detail: configPath }, config: loadConfig(configPath) };
  } catch (error) {
    return { result: { label: 'config file', status: 'fail', detail: describeError(error) }, config: defaultConfig() };
  }
}

export async function checkRoots(roots: readonly string[], cwd: string): Promise<CheckResult[]> {
  const results: CheckResult[] = [];
  for (const root of roots) {
    const label = `root ${root}`;
    try {
      const [resolved] = await validateRoots([root], cwd);
      results.push({ label, status: 'pass', detail: resolved ?? root });
    } catch (error) {
      results.push({ label, status: 'fail', detail: describeError(error) });
    }
  }
  return results;
}

export function checkTempDir(dir: string): CheckResult {
  const label = 'temp dir writable';
  try {
    const testFile = path.join(dir, `.lk-doctor-${process.pid}`);
    fs.writeFileSync(testFile, '');
    fs.unlinkSync(testFile);
    return { label, status: 'pass', detail: dir };
  } catch {
    return { label, status: 'fail', detail: `${dir} is not writable` };
  }
}

function checkHistory(): CheckResult {
  const history = detectShellHistory();
  if (!history) {
    return { label: 'shell history', status: 'warn', detail: 'unknown $SHELL, fuzzy picks are not added to history' };
  }
  return { label: 'shell history', status: 'pass', detail: `${history.kind}: ${history.file}` };
}

function statusIcon(status: CheckStatus): string {
  switch (status) {
    case 'pass':
      return chalk.green('✓');
    case 'fail':
      return chalk.red('✗');
    case 'warn':
      return chalk.yellow('⚠');
  }
}

function statusColor(status: CheckStatus, text: string): string {
  switch (status) {
    case 'pass':
      return chalk.green(text);
    case 'fail':
      return chalk.red(text);
    case 'warn':
      return chalk.yellow(text);
  }
}

/** `lk doctor`: check the environment lk runs functions in */
export async function doctorCommand(): Promise<number> {
  logger.header('lk doctor');

  const { result: configCheck, config } = checkConfig(resolveConfigPath());
  const checks: CheckResult[] = [
    checkNodeVersion(),
    checkShell(config.shell),
    configCheck,
    ...(await checkRoots(config.roots, process.cwd())),
    checkTempDir(config.tempDir ?? tmpdir()),
    checkHistory(),
  ];

  const labelWidth = Math.max(...checks.map((c) => c.label.length)) + 2;

  console.log('');
  for (const check of checks) {
    const label = check.label.padEnd(labelWidth);
    const icon = statusIcon(check.status);
    const detail = check.detail ? chalk.dim(` (${check.detail})`) : '';
    console.log(`  ${icon}  ${statusColor(check.status, label)}${detail}`);
  }
  console.log('');

  const failures = checks.filter((c) => c.status === 'fail');
  const warnings = checks.filter((c) => c.status === 'warn');

  if (failures.length > 0) {
    logger.error(`${failures.length} check(s) failed. Fix the issues above before using lk.`);
    return 1;
  }

  if (warnings.length > 0) {
    logger.warn(`${warnings.length} warning(s). lk will still work.`);
  } else {
    logger.done('All checks passed.');
  }
  return 0;
}
