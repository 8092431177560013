#!/usr/bin/env npx tsx
/**
 * Master Catalog Check
 *
 * Loads both master catalogs the way a picking run does and reports entry
 * and duplicate counts, so a broken catalog export is caught before a run.
 *
 * Usage:
 *   npx tsx scripts/check-catalogs.ts
 */

import 'dotenv/config';
import { loadConfig } from '../src/config';
import { loadMasterCatalogs } from '../src/imports/master-catalogs';
import { createConsoleLogger } from '../src/logger';

async function main() {
  const config = loadConfig();
  const logger = createConsoleLogger({ level: 'warn' });

  console.log('Checking master catalogs...\n');
  console.log(`  CM master:      ${config.cmMaster.file} [${config.cmMaster.sheet}]`);
  console.log(`  A-parts master: ${config.aPartsMaster.file} [${config.aPartsMaster.sheet}]`);

  const result = await loadMasterCatalogs(config, logger);

  console.log('\n' + '─'.repeat(60));

  if (!result.ok) {
    console.log(`❌ ${result.error.message}`);
    process.exit(1);
  }

  for (const catalog of [result.value.cm, result.value.aParts]) {
    const duplicates = catalog.duplicateCount > 0 ? ` (${catalog.duplicateCount} duplicate(s) ignored)` : '';
    console.log(`✅ ${catalog.name}: ${catalog.size.toLocaleString()} part(s)${duplicates}`);
  }

  process.exit(0);
}

main().catch((error) => {
  console.error('Catalog check failed:', error);
  process.exit(1);
});
