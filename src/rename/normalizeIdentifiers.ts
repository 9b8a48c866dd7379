/**
 * Rename catalog YAML files from their long identifier to the short
 * `open_xpd_uuid` stored inside them.
 *
 * Collision policy: when `<short_id>.yaml` already exists, the existing file
 * is kept and the long-named file is DELETED. This discards the long-named
 * copy even if its content differs, and cannot be undone.
 */

import { join } from 'path';
import { CANONICAL_YAML_EXTENSION } from '../config/catalogConfig.js';
import { stripYamlExtension } from '../catalog/extractFields.js';
import { listCategories, listYamlFiles, regionExists, walkCategory } from '../catalog/walkCatalog.js';
import { CatalogError, describeError } from '../types/errors.js';
import type { CatalogEntry, LoadResult } from '../types/Product.js';
import { createDryRunDirectoryView, createLiveDirectoryView, type DirectoryView } from './directoryView.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type NormalizeOutcome =
  | 'RENAMED'
  | 'DELETED'
  | 'SKIPPED_INVALID'
  | 'SKIPPED_MISSING_ID'
  | 'SKIPPED_INVALID_ID'
  | 'SKIPPED_NOOP'
  | 'FAILED';

export interface NormalizePlan {
  outcome: NormalizeOutcome;
  /** `<short_id>.yaml` for RENAMED and DELETED */
  targetFilename?: string;
  error?: CatalogError;
}

export interface NormalizeAction extends NormalizePlan {
  region: string;
  category: string;
  filename: string;
  dryRun: boolean;
}

export interface NormalizeTally {
  renamed: number;
  deleted: number;
  skipped: number;
  errors: number;
}

export interface CategoryNormalizeResult {
  region: string;
  category: string;
  actions: NormalizeAction[];
  tally: NormalizeTally;
}

export interface NormalizeRunResult {
  dryRun: boolean;
  categories: CategoryNormalizeResult[];
  skippedRegions: string[];
  tally: NormalizeTally;
}

export interface NormalizeOptions {
  dryRun?: boolean;
}

// ─────────────────────────────────────────────────────────────────────────────
// Decision
// ─────────────────────────────────────────────────────────────────────────────

function isPlainFileStem(id: string): boolean {
  return id !== '.' && id !== '..' && !/[\\/\0]/.test(id);
}

/**
 * Decide what happens to one file. Reads the directory through `view` but
 * never mutates it.
 */
export function planNormalization(filename: string, filePath: string, load: LoadResult, view: DirectoryView): NormalizePlan {
  if (!load.success) {
    return { outcome: 'SKIPPED_INVALID', error: load.error };
  }

  const doc = load.document;
  if (!('open_xpd_uuid' in doc)) {
    return {
      outcome: 'SKIPPED_MISSING_ID',
      error: new CatalogError('MISSING_FIELD', 'no open_xpd_uuid field at top level', filePath),
    };
  }

  const shortId = doc.open_xpd_uuid;
  if (typeof shortId !== 'string' || shortId === '') {
    return {
      outcome: 'SKIPPED_INVALID_ID',
      error: new CatalogError('INVALID_FIELD_VALUE', 'invalid open_xpd_uuid value', filePath),
    };
  }
  if (!isPlainFileStem(shortId)) {
    return {
      outcome: 'SKIPPED_INVALID_ID',
      error: new CatalogError('INVALID_FIELD_VALUE', `open_xpd_uuid is not a usable file name: ${shortId}`, filePath),
    };
  }

  if (stripYamlExtension(filename) === shortId) {
    return { outcome: 'SKIPPED_NOOP' };
  }

  const targetFilename = `${shortId}${CANONICAL_YAML_EXTENSION}`;
  if (view.isOccupied(targetFilename, filename)) {
    return {
      outcome: 'DELETED',
      targetFilename,
      error: new CatalogError('COLLISION_CONFLICT', `${targetFilename} already exists`, filePath),
    };
  }
  return { outcome: 'RENAMED', targetFilename };
}

// ─────────────────────────────────────────────────────────────────────────────
// Tallies
// ─────────────────────────────────────────────────────────────────────────────

export function emptyTally(): NormalizeTally {
  return { renamed: 0, deleted: 0, skipped: 0, errors: 0 };
}

/** Unusable ids and failed mutations count as errors; empty or unparsable files as skipped. */
export function countOutcome(tally: NormalizeTally, outcome: NormalizeOutcome): void {
  switch (outcome) {
    case 'RENAMED':
      tally.renamed++;
      break;
    case 'DELETED':
      tally.deleted++;
      break;
    case 'SKIPPED_NOOP':
    case 'SKIPPED_INVALID':
      tally.skipped++;
      break;
    case 'SKIPPED_MISSING_ID':
    case 'SKIPPED_INVALID_ID':
    case 'FAILED':
      tally.errors++;
      break;
  }
}

export function addTally(into: NormalizeTally, from: NormalizeTally): void {
  into.renamed += from.renamed;
  into.deleted += from.deleted;
  into.skipped += from.skipped;
  into.errors += from.errors;
}

export function formatTally(tally: NormalizeTally): string {
  const parts: string[] = [];
  if (tally.renamed > 0) parts.push(`✓ ${tally.renamed} renamed`);
  if (tally.deleted > 0) parts.push(`🗑️  ${tally.deleted} deleted`);
  if (tally.skipped > 0) parts.push(`→ ${tally.skipped} skipped`);
  if (tally.errors > 0) parts.push(`❌ ${tally.errors} errors`);
  return parts.length > 0 ? parts.join(', ') : 'nothing to do';
}

// ─────────────────────────────────────────────────────────────────────────────
// Execution
// ─────────────────────────────────────────────────────────────────────────────

function logAction(action: NormalizeAction): void {
  const { filename, targetFilename, dryRun } = action;
  const where = `${action.region}/${action.category}/${filename}`;

  switch (action.outcome) {
    case 'RENAMED':
      console.log(dryRun ? `  🔍 Would rename: ${filename} → ${targetFilename}` : `  ✓ Renamed: ${filename} → ${targetFilename}`);
      break;
    case 'DELETED':
      if (dryRun) {
        console.log(`  🔍 Would delete (duplicate): ${filename} (keeps existing ${targetFilename})`);
      } else {
        console.warn(`  ⚠️  File already exists: ${targetFilename}, deleting old: ${filename}`);
        console.log(`  🗑️  Deleted: ${filename}`);
      }
      break;
    case 'SKIPPED_NOOP':
      break;
    case 'SKIPPED_INVALID':
    case 'SKIPPED_MISSING_ID':
    case 'SKIPPED_INVALID_ID':
      console.warn(`  ⚠️  Skipping ${where} - ${describeError(action.error)}`);
      break;
    case 'FAILED':
      console.error(`  ❌ Error processing ${where}: ${describeError(action.error)}`);
      break;
  }
}

function processEntry(entry: CatalogEntry, view: DirectoryView): NormalizeAction {
  const base = { region: entry.region, category: entry.category, filename: entry.filename, dryRun: view.dryRun };

  try {
    const plan = planNormalization(entry.filename, entry.filePath, entry.load, view);
    if (plan.outcome === 'RENAMED' && plan.targetFilename) {
      view.rename(entry.filename, plan.targetFilename);
    } else if (plan.outcome === 'DELETED') {
      view.remove(entry.filename);
    }
    return { ...base, ...plan };
  } catch (err) {
    return {
      ...base,
      outcome: 'FAILED',
      error: new CatalogError('FILESYSTEM_FAILURE', 'filesystem operation failed', entry.filePath, { cause: err }),
    };
  }
}

/** Normalize every YAML file of one category, in name order. */
export function normalizeCategory(
  basePath: string,
  region: string,
  category: string,
  options: NormalizeOptions = {}
): CategoryNormalizeResult {
  const categoryPath = join(basePath, region, category);
  const view = options.dryRun ? createDryRunDirectoryView(categoryPath) : createLiveDirectoryView(categoryPath);
  const actions: NormalizeAction[] = [];
  const tally = emptyTally();

  for (const entry of walkCategory(basePath, region, category)) {
    const action = processEntry(entry, view);
    logAction(action);
    countOutcome(tally, action.outcome);
    actions.push(action);
  }

  if (tally.renamed > 0 || tally.deleted > 0 || tally.errors > 0) {
    console.log(`  📊 ${formatTally(tally)}`);
  }
  return { region, category, actions, tally };
}

export function normalizeCatalog(
  basePath: string,
  regions: readonly string[],
  options: NormalizeOptions = {}
): NormalizeRunResult {
  const result: NormalizeRunResult = {
    dryRun: options.dryRun ?? false,
    categories: [],
    skippedRegions: [],
    tally: emptyTally(),
  };

  for (const region of regions) {
    if (!regionExists(basePath, region)) {
      console.log(`Skipping ${region} - directory not found`);
      result.skippedRegions.push(region);
      continue;
    }

    console.log(`\n${'='.repeat(60)}`);
    console.log(`Processing region: ${region}`);
    console.log('='.repeat(60));

    const categories = listCategories(join(basePath, region));
    if (categories.length === 0) {
      console.log('  ℹ️  No categories found');
      continue;
    }

    for (const category of categories) {
      console.log(`\n📁 Category: ${category}`);
      if (listYamlFiles(join(basePath, region, category)).length === 0) {
        console.log('  ℹ️  No YAML files found');
        continue;
      }
      try {
        const categoryResult = normalizeCategory(basePath, region, category, options);
        result.categories.push(categoryResult);
        addTally(result.tally, categoryResult.tally);
      } catch (err) {
        console.error(`  ❌ Could not read category ${region}/${category}: ${describeError(err)}`);
        result.tally.errors++;
      }
    }
  }

  return result;
}
