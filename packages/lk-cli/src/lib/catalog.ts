import { buildCatalog, type Catalog, type ShellFunction } from '@lk/core';
import type { LkConfig } from './config.js';
import { logger, spinner } from './logger.js';
import { describeDiagnostic, isWarning } from './render.js';

export interface CatalogRequest {
  config: LkConfig;
  /** Overrides config.roots when non-empty */
  roots?: string[];
  /** Added to config.ignore */
  ignore?: string[];
  cwd?: string;
}

export function reportDiagnostics(catalog: Catalog): void {
  for (const d of catalog.diagnostics) {
    const message = describeDiagnostic(d);
    if (isWarning(d)) {
      logger.warn(message);
    } else {
      logger.verbose(message);
    }
  }
}

/** Walk the configured roots with a spinner and report what was skipped */
export async function loadCatalog(request: CatalogRequest): Promise<Catalog> {
  const { config } = request;
  const roots = request.roots && request.roots.length > 0 ? request.roots : config.roots;
  const cwd = request.cwd ?? process.cwd();

  const spin = spinner('Looking for scripts...');
  let catalog: Catalog;
  try {
    catalog = await buildCatalog(roots, {
      cwd,
      ignore: [...config.ignore, ...(request.ignore ?? [])],
      maxFileSize: config.maxFileSize,
      executableOnly: config.executableOnly,
    });
  } finally {
    spin.stop();
  }

  logger.verbose(
    `Found ${catalog.functions.length} function(s) in ${catalog.scripts.length} script(s) under ${catalog.roots.join(', ')}`,
  );
  reportDiagnostics(catalog);
  return catalog;
}

export function selectableFunctions(catalog: Catalog, showPrivate: boolean): ShellFunction[] {
  return showPrivate ? catalog.functions : catalog.functions.filter((fn) => !fn.isPrivate);
}
