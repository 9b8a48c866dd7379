#!/usr/bin/env node
/**
 * renameYamlToShortId.ts
 *
 * Rename catalog YAML files from their long UUID file name to the short
 * top-level open_xpd_uuid. When <short_id>.yaml already exists, the long-named
 * file is DELETED.
 *
 * ⚠️  DESTRUCTIVE - duplicates are removed permanently. Preview with --dry-run.
 *
 * Usage:
 *   npx tsx src/cli/renameYamlToShortId.ts --dry-run            # Preview every action
 *   npx tsx src/cli/renameYamlToShortId.ts                      # Rename (asks for confirmation)
 *   npx tsx src/cli/renameYamlToShortId.ts --yes                # Rename without asking
 *   npx tsx src/cli/renameYamlToShortId.ts --path ../catalog    # Different catalog root
 */

import { config } from 'dotenv';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import { createInterface } from 'readline';
import { loadCatalogConfig, parseRegionList, type CatalogConfig } from '../config/catalogConfig.js';
import { formatTally, normalizeCatalog, type NormalizeRunResult } from '../rename/normalizeIdentifiers.js';
import { readValue } from '../utils/cliArgs.js';
import { isMainModule } from '../utils/isMainModule.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

// ─────────────────────────────────────────────────────────────────────────────
// CLI Helpers
// ─────────────────────────────────────────────────────────────────────────────

export interface RenameOptions {
  help: boolean;
  dryRun: boolean;
  yes: boolean;
  basePath?: string;
  regions?: string[];
}

function printUsage(): void {
  console.log(`
Rename YAML files from long UUID to short open_xpd_uuid

Usage:
  npx tsx src/cli/renameYamlToShortId.ts [options]

Options:
  --path <dir>       Base path containing the region folders (default: .)
  --yes              Skip confirmation prompt
  --dry-run          Show what would be done without renaming or deleting files
  --regions <list>   Comma-separated regions to process (default: US,IN,CN,EU)
  --help             Show this help message
`);
}

export function parseArgs(args: readonly string[]): RenameOptions {
  const regions = readValue(args, '--regions');
  return {
    help: args.includes('--help') || args.includes('-h'),
    dryRun: args.includes('--dry-run'),
    yes: args.includes('--yes') || args.includes('-y'),
    basePath: readValue(args, '--path'),
    regions: regions !== undefined ? parseRegionList(regions) : undefined,
  };
}

export function isAffirmative(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return normalized === 'yes' || normalized === 'y';
}

/** Resolves false on any answer other than yes/y, and when input closes first. */
export function promptConfirmation(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Promise<boolean> {
  const rl = createInterface({ input, output });

  console.log('\n' + '='.repeat(60));
  console.log('⚠️  WARNING: This script will rename YAML files');
  console.log('='.repeat(60));
  console.log('\nThis will:');
  console.log('  1. Read each YAML file');
  console.log('  2. Extract the top-level open_xpd_uuid field');
  console.log('  3. Rename the file from long UUID to short ID');
  console.log('  4. Delete old files if new ones already exist');
  console.log('\n' + '='.repeat(60));

  return new Promise(resolve => {
    let answered = false;
    rl.on('close', () => {
      if (!answered) resolve(false);
    });
    rl.question('\nDo you want to continue? (yes/no): ', answer => {
      answered = true;
      rl.close();
      resolve(isAffirmative(answer));
    });
  });
}

// ─────────────────────────────────────────────────────────────────────────────
// Main
// ─────────────────────────────────────────────────────────────────────────────

function printSummary(result: NormalizeRunResult): void {
  const deletions = result.categories.flatMap(c => c.actions).filter(a => a.outcome === 'DELETED');

  console.log('\n' + '='.repeat(60));
  console.log(result.dryRun ? '📊 DRY RUN SUMMARY' : '📊 SUMMARY');
  console.log('='.repeat(60));
  console.log(`   Categories: ${result.categories.length}`);
  console.log(`   Result:     ${formatTally(result.tally)}`);
  if (deletions.length > 0) {
    console.log(`\n   ${result.dryRun ? 'Would delete' : 'Deleted'} as duplicates:`);
    for (const action of deletions) {
      console.log(`     ${action.region}/${action.category}/${action.filename} (kept ${action.targetFilename})`);
    }
  }
}

export function run(options: RenameOptions, catalog: CatalogConfig): NormalizeRunResult {
  console.log('\n🚀 Starting YAML file renaming...\n');
  const result = normalizeCatalog(catalog.basePath, catalog.regions, { dryRun: options.dryRun });
  printSummary(result);

  if (options.dryRun) {
    console.log('\n✅ Dry run complete!');
    console.log('\nTo actually rename files, run without --dry-run flag');
  } else {
    console.log('\n✅ Done!');
  }
  return result;
}

async function main(): Promise<void> {
  config({ path: resolve(__dirname, '../../.env') });

  const options = parseArgs(process.argv.slice(2));
  if (options.help) {
    printUsage();
    return;
  }

  const catalog = loadCatalogConfig({ basePath: options.basePath, regions: options.regions });

  if (options.dryRun) {
    console.log('\n' + '='.repeat(60));
    console.log('🔍 DRY RUN MODE - No files will be modified');
    console.log('='.repeat(60));
  } else if (!options.yes) {
    const confirmed = await promptConfirmation();
    if (!confirmed) {
      console.log('\n❌ Operation cancelled.');
      return;
    }
  }

  run(options, catalog);
}

if (isMainModule(import.meta.url)) {
  main().catch(err => {
    console.error('❌ Rename failed:', err);
    process.exit(1);
  });
}
