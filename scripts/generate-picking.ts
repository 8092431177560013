#!/usr/bin/env npx tsx
/**
 * Picking List Generation Script
 *
 * Reads a matrix BOM workbook, resolves its parts against the CM and A-parts
 * master catalogs and writes the picking lists plus the legacy system input
 * sheet to a timestamped workbook under PICKING_OUTPUT_DIR.
 *
 * Usage:
 *   npx tsx scripts/generate-picking.ts data/input/FRAME-1001.xlsx
 *   npx tsx scripts/generate-picking.ts data/input/FRAME-1001.xlsx --line C  # CM only
 */

import 'dotenv/config';
import { existsSync } from 'fs';
import { USAGE, formatSummary, parseCliArgs } from '../src/cli';
import { loadConfig } from '../src/config';
import { createConsoleLogger } from '../src/logger';
import { runPicking } from '../src/pipeline';

async function main() {
  const parsed = parseCliArgs(process.argv.slice(2));
  if (!parsed.ok) {
    console.error(parsed.error);
    console.error(USAGE);
    process.exit(1);
  }

  const { inputFile, line } = parsed.args;
  if (!existsSync(inputFile)) {
    console.error(`Input file not found: ${inputFile}`);
    process.exit(1);
  }

  const config = loadConfig();
  const logger = createConsoleLogger({
    level: config.logLevel,
    file: config.logFile ?? undefined,
  });

  const result = await runPicking({ inputFile, line, config, logger });

  console.log('\n' + formatSummary(result).join('\n'));

  process.exit(result.success ? 0 : 1);
}

// Run
main().catch((error) => {
  console.error('Picking generation failed:', error);
  process.exit(1);
});
