#!/usr/bin/env node
/**
 * generateCategoryCsvs.ts
 *
 * Generate CSV overview files for every region/category of the catalog.
 *
 * Usage:
 *   npx tsx src/cli/generateCategoryCsvs.ts                    # Category CSVs under ./<region>/
 *   npx tsx src/cli/generateCategoryCsvs.ts --path ../catalog  # Different catalog root
 *   npx tsx src/cli/generateCategoryCsvs.ts --master           # Also write all_products.csv
 *   npx tsx src/cli/generateCategoryCsvs.ts --regions US,IN    # Only these regions
 *
 * Environment variables (.env in the package root):
 *   CATALOG_BASE_PATH     - default for --path
 *   CATALOG_REGIONS       - default for --regions
 *   CATALOG_MASTER_FILE   - default for --master-file
 */

import { config } from 'dotenv';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import { loadCatalogConfig, parseRegionList, type CatalogConfig } from '../config/catalogConfig.js';
import { generateAllCategoryCsvs, generateMasterCsv } from '../report/buildCsvReports.js';
import { readValue } from '../utils/cliArgs.js';
import { isMainModule } from '../utils/isMainModule.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

// ─────────────────────────────────────────────────────────────────────────────
// CLI Helpers
// ─────────────────────────────────────────────────────────────────────────────

export interface GenerateOptions {
  help: boolean;
  master: boolean;
  basePath?: string;
  regions?: string[];
  masterFile?: string;
}

function printUsage(): void {
  console.log(`
Generate CSV overview files for product categories

Usage:
  npx tsx src/cli/generateCategoryCsvs.ts [options]

Options:
  --path <dir>          Base path containing the region folders (default: .)
  --master              Also generate a master CSV with all products
  --master-file <name>  Master CSV file name (default: all_products.csv)
  --regions <list>      Comma-separated regions to process (default: US,IN,CN,EU)
  --help                Show this help message

Output:
  <path>/<region>/<region>-<category>.csv
  <path>/<region>/states/<region>-XX.csv   (two-character categories)
  <path>/all_products.csv                  (with --master)
`);
}

export function parseArgs(args: readonly string[]): GenerateOptions {
  const regions = readValue(args, '--regions');
  return {
    help: args.includes('--help') || args.includes('-h'),
    master: args.includes('--master'),
    basePath: readValue(args, '--path'),
    regions: regions !== undefined ? parseRegionList(regions) : undefined,
    masterFile: readValue(args, '--master-file'),
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Main
// ─────────────────────────────────────────────────────────────────────────────

export function run(options: GenerateOptions, catalog: CatalogConfig): void {
  console.log('Generating category CSV files...');
  const summary = generateAllCategoryCsvs(catalog.basePath, catalog.regions);

  if (options.master) {
    console.log('\nGenerating master CSV...');
    generateMasterCsv(catalog.basePath, summary.records, catalog.masterFile);
  }

  const csvCount = summary.regions.reduce(
    (n, r) => n + r.categories.filter(c => c.csvPath !== null).length,
    0
  );
  console.log('\n' + '='.repeat(60));
  console.log('📊 SUMMARY');
  console.log('='.repeat(60));
  console.log(`   Regions processed: ${summary.regions.length}`);
  console.log(`   Regions skipped:   ${summary.skippedRegions.length}`);
  console.log(`   Category CSVs:     ${csvCount}`);
  console.log(`   Products:          ${summary.productCount}`);
  console.log(`   Unreadable files:  ${summary.failedCount}`);
  console.log('\nDone!');
}

function main(): void {
  config({ path: resolve(__dirname, '../../.env') });

  const options = parseArgs(process.argv.slice(2));
  if (options.help) {
    printUsage();
    return;
  }

  const catalog = loadCatalogConfig({
    basePath: options.basePath,
    regions: options.regions,
    masterFile: options.masterFile,
  });
  run(options, catalog);
}

if (isMainModule(import.meta.url)) {
  try {
    main();
  } catch (err) {
    console.error('❌ CSV generation failed:', err);
    process.exit(1);
  }
}
