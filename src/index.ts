#!/usr/bin/env node
import 'dotenv/config';
import { resolveCliOptions } from './config/cli.js';
import { writeJson } from './utils/fs.js';
import { log } from './utils/log.js';
import { runOrphanCheck } from './run.js';

process.on('uncaughtException', (error) => {
  log.error('Uncaught exception', error);
  process.exit(1);
});

async function main() {
  const { scriptsPath, inventoryPath, outputPath, equippableOnly } = resolveCliOptions(process.argv.slice(2));

  log.info('Orphan check started', { scriptsPath, inventoryPath, equippableOnly });

  const report = await runOrphanCheck({ scriptsPath, inventoryPath, equippableOnly });
  await writeJson(outputPath, report);

  if (report.failedSources.length) {
    log.warn('Some script files could not be read', report.failedSources);
  }
  log.info('Orphan check finished', { output: outputPath, ...report.stats });
}

main().catch((error) => {
  log.error('Orphan check failed', error);
  process.exitCode = 1;
});
