/**
 * Category and master CSV reports.
 *
 * OUTPUT:
 * - <base>/<region>/<region>-<category>.csv  (moved to <region>/states/ for
 *   two-character categories)
 * - <base>/all_products.csv                  (optional master file)
 */

import { join } from 'path';
import { extractName, extractOptionalField, extractShortId } from '../catalog/extractFields.js';
import { listCategories, regionExists, walkCategory } from '../catalog/walkCatalog.js';
import { describeError } from '../types/errors.js';
import type { CatalogDocument, CatalogEntry, ProductRecord } from '../types/Product.js';
import { formatCsv, sortByKeys, type CsvRow } from '../utils/csvFormat.js';
import { writeFileAtomic } from '../utils/writeFileAtomic.js';
import { archiveStateReports } from './archiveStateReports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export const CATEGORY_COLUMNS = ['uuid', 'name', 'gwp', 'declared_unit', 'category'] as const;
export const MASTER_COLUMNS = ['region', 'category', 'uuid', 'name', 'gwp', 'declared_unit'] as const;

export interface CategoryReportResult {
  region: string;
  category: string;
  productCount: number;
  failedCount: number;
  /** null when no file was written (no valid products) */
  csvPath: string | null;
  records: ProductRecord[];
}

export interface RegionReportResult {
  region: string;
  categories: CategoryReportResult[];
  archived: string[];
}

export interface CsvGenerationSummary {
  regions: RegionReportResult[];
  skippedRegions: string[];
  productCount: number;
  failedCount: number;
  records: ProductRecord[];
}

export interface MasterReportResult {
  csvPath: string | null;
  productCount: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Records
// ─────────────────────────────────────────────────────────────────────────────

export function toProductRecord(entry: CatalogEntry, doc: CatalogDocument): ProductRecord {
  return {
    identifier: extractShortId(doc, entry.filename),
    name: extractName(doc),
    globalWarmingPotential: extractOptionalField(doc, 'gwp'),
    declaredUnit: extractOptionalField(doc, 'declared_unit'),
    category: entry.category,
    region: entry.region,
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Serialization
// ─────────────────────────────────────────────────────────────────────────────

const byName = (r: ProductRecord) => r.name;

export function buildCategoryReport(region: string, category: string, records: readonly ProductRecord[]): string {
  const foreign = records.find(r => r.region !== region || r.category !== category);
  if (foreign) {
    throw new Error(
      `Record ${foreign.identifier} belongs to ${foreign.region}/${foreign.category}, not ${region}/${category}`
    );
  }

  const rows: CsvRow[] = sortByKeys(records, [byName]).map(r => ({
    uuid: r.identifier,
    name: r.name,
    gwp: r.globalWarmingPotential ?? '',
    declared_unit: r.declaredUnit ?? '',
    category: r.category,
  }));
  return formatCsv(CATEGORY_COLUMNS, rows);
}

export function buildMasterReport(records: readonly ProductRecord[]): string {
  const rows: CsvRow[] = sortByKeys(records, [r => r.region, r => r.category, byName]).map(r => ({
    region: r.region,
    category: r.category,
    uuid: r.identifier,
    name: r.name,
    gwp: r.globalWarmingPotential ?? '',
    declared_unit: r.declaredUnit ?? '',
  }));
  return formatCsv(MASTER_COLUMNS, rows);
}

export function categoryCsvFilename(region: string, category: string): string {
  return `${region}-${category}.csv`;
}

// ─────────────────────────────────────────────────────────────────────────────
// Generation
// ─────────────────────────────────────────────────────────────────────────────

export function generateCategoryCsv(basePath: string, region: string, category: string): CategoryReportResult {
  const records: ProductRecord[] = [];
  let failedCount = 0;

  for (const entry of walkCategory(basePath, region, category)) {
    if (!entry.load.success) {
      failedCount++;
      console.error(`    ❌ Error processing ${region}/${category}/${entry.filename}: ${describeError(entry.load.error)}`);
      continue;
    }
    records.push(toProductRecord(entry, entry.load.document));
  }

  if (records.length === 0) {
    console.log(`    No products found in ${join(basePath, region, category)}`);
    return { region, category, productCount: 0, failedCount, csvPath: null, records };
  }

  const csvPath = join(basePath, region, categoryCsvFilename(region, category));
  try {
    writeFileAtomic(csvPath, buildCategoryReport(region, category, records));
  } catch (err) {
    console.error(`    ❌ Could not write ${csvPath}: ${describeError(err)}`);
    return { region, category, productCount: records.length, failedCount, csvPath: null, records };
  }
  console.log(`    ✓ Generated: ${csvPath} (${records.length} products)`);

  return { region, category, productCount: records.length, failedCount, csvPath, records };
}

/** Generate every category CSV of one region, then archive the state reports. */
export function generateRegionCsvs(basePath: string, region: string): RegionReportResult {
  const regionPath = join(basePath, region);
  const categories: CategoryReportResult[] = [];

  for (const category of listCategories(regionPath)) {
    console.log(`  Category: ${category}`);
    try {
      categories.push(generateCategoryCsv(basePath, region, category));
    } catch (err) {
      console.error(`    ❌ Could not read category ${region}/${category}: ${describeError(err)}`);
      categories.push({ region, category, productCount: 0, failedCount: 0, csvPath: null, records: [] });
    }
  }

  let archived: string[] = [];
  try {
    archived = archiveStateReports(regionPath);
  } catch (err) {
    console.error(`  ❌ Could not archive state reports for ${region}: ${describeError(err)}`);
  }

  return { region, categories, archived };
}

export function generateAllCategoryCsvs(basePath: string, regions: readonly string[]): CsvGenerationSummary {
  const summary: CsvGenerationSummary = {
    regions: [],
    skippedRegions: [],
    productCount: 0,
    failedCount: 0,
    records: [],
  };

  for (const region of regions) {
    if (!regionExists(basePath, region)) {
      console.log(`Skipping ${region} - directory not found`);
      summary.skippedRegions.push(region);
      continue;
    }

    console.log(`\nProcessing region: ${region}`);
    const result = generateRegionCsvs(basePath, region);
    summary.regions.push(result);

    for (const category of result.categories) {
      summary.productCount += category.productCount;
      summary.failedCount += category.failedCount;
      summary.records.push(...category.records);
    }
  }

  return summary;
}

/**
 * Write the master CSV from records already collected by a category pass.
 * No file is written when there are no records.
 */
export function generateMasterCsv(basePath: string, records: readonly ProductRecord[], outputFile: string): MasterReportResult {
  if (records.length === 0) {
    console.log('No products found; master CSV not written');
    return { csvPath: null, productCount: 0 };
  }

  const csvPath = join(basePath, outputFile);
  writeFileAtomic(csvPath, buildMasterReport(records));
  console.log(`\nGenerated master CSV: ${csvPath} (${records.length} total products)`);
  return { csvPath, productCount: records.length };
}
