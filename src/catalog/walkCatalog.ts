/**
 * Catalog traversal.
 *
 * Layout: <basePath>/<region>/<category>/<file>.yaml
 *
 * Categories and files are visited in sorted order so CSV generation and
 * renaming log the same sequence on every platform.
 */

import { existsSync, readdirSync, statSync } from 'fs';
import { join } from 'path';
import { STATES_DIR } from '../config/catalogConfig.js';
import type { CatalogEntry } from '../types/Product.js';
import { isYamlFilename } from './extractFields.js';
import { loadCatalogDocument } from './loadCatalogDocument.js';

// statSync follows symlinks, so linked folders and files count as their targets.
function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

function isFile(path: string): boolean {
  try {
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

export function regionExists(basePath: string, region: string): boolean {
  return isDirectory(join(basePath, region));
}

/** Category folders of a region, excluding the reserved states folder. */
export function listCategories(regionPath: string): string[] {
  if (!existsSync(regionPath)) return [];
  return readdirSync(regionPath)
    .filter(name => name !== STATES_DIR && isDirectory(join(regionPath, name)))
    .sort();
}

/** YAML file names directly inside a category folder. */
export function listYamlFiles(categoryPath: string): string[] {
  if (!existsSync(categoryPath)) return [];
  return readdirSync(categoryPath)
    .filter(name => isYamlFilename(name) && isFile(join(categoryPath, name)))
    .sort();
}

export function* walkCategory(basePath: string, region: string, category: string): Generator<CatalogEntry> {
  const categoryPath = join(basePath, region, category);
  for (const filename of listYamlFiles(categoryPath)) {
    const filePath = join(categoryPath, filename);
    yield { region, category, filename, filePath, load: loadCatalogDocument(filePath) };
  }
}

/**
 * Lazily yield every YAML file of every region, in region order.
 * Unreadable or invalid files are yielded with a failed load result.
 */
export function* walkCatalog(basePath: string, regions: readonly string[]): Generator<CatalogEntry> {
  for (const region of regions) {
    if (!regionExists(basePath, region)) {
      console.log(`Skipping ${region} - directory not found`);
      continue;
    }
    for (const category of listCategories(join(basePath, region))) {
      yield* walkCategory(basePath, region, category);
    }
  }
}
