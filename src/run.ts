import { loadContainerConfig } from './config/containers.js';
import { discoverScriptFiles, extractFromSources } from './extract.js';
import { loadInventory } from './load.js';
import { compareInventory } from './match.js';
import { pathExists } from './utils/fs.js';
import { log } from './utils/log.js';
import type { ComparisonReport, ContainerConfig } from './types/index.js';

export interface OrphanCheckOptions {
  scriptsPath: string;
  inventoryPath: string;
  equippableOnly?: boolean;
  containers?: ContainerConfig;
}

export async function runOrphanCheck(opts: OrphanCheckOptions): Promise<ComparisonReport> {
  if (!(await pathExists(opts.scriptsPath))) {
    throw new Error(`Script path not found: ${opts.scriptsPath}`);
  }
  if (!(await pathExists(opts.inventoryPath))) {
    throw new Error(`Inventory CSV not found: ${opts.inventoryPath}`);
  }

  const scriptFiles = await discoverScriptFiles(opts.scriptsPath);
  if (!scriptFiles.length) {
    log.warn('No .lua files found, every entry will be reported', { scriptsPath: opts.scriptsPath });
  }

  const extraction = await extractFromSources(scriptFiles);
  const entries = await loadInventory(opts.inventoryPath, {
    equippableOnly: opts.equippableOnly ?? true,
    containers: opts.containers ?? loadContainerConfig()
  });

  return compareInventory(entries, extraction.references, {
    sources: extraction.sources,
    failedSources: extraction.failures,
    inventorySource: opts.inventoryPath
  });
}
