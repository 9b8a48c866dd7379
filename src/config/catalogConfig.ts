/**
 * Catalog layout constants and run configuration.
 *
 * Resolution order for each setting: CLI flag, then environment (.env is
 * loaded by the CLI entry points), then the defaults below.
 */

export const DEFAULT_REGIONS: readonly string[] = ['US', 'IN', 'CN', 'EU'];

/** Subfolder of a region that holds subdivision reports; never a category. */
export const STATES_DIR = 'states';

export const MASTER_CSV_FILENAME = 'all_products.csv';

export const YAML_EXTENSIONS = ['.yaml', '.yml'] as const;

/** Extension given to every renamed file, whatever it had before. */
export const CANONICAL_YAML_EXTENSION = '.yaml';

export const UNKNOWN_PRODUCT_NAME = 'Unknown Product';

export interface CatalogConfig {
  basePath: string;
  regions: string[];
  masterFile: string;
}

export interface CatalogConfigOverrides {
  basePath?: string;
  regions?: string[];
  masterFile?: string;
}

function isPlainSegment(value: string): boolean {
  return value !== '.' && value !== '..' && !/[\\/]/.test(value);
}

/**
 * Parse a comma-separated region list ("US, IN").
 * Region codes name folders directly under the base path, so separators are rejected.
 */
export function parseRegionList(raw: string): string[] {
  const regions = raw
    .split(',')
    .map(r => r.trim())
    .filter(Boolean);

  for (const region of regions) {
    if (!isPlainSegment(region)) {
      throw new Error(`Invalid region code: ${region}`);
    }
  }
  return regions;
}

export function loadCatalogConfig(
  overrides: CatalogConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): CatalogConfig {
  const basePath = overrides.basePath || env.CATALOG_BASE_PATH || '.';

  let regions = overrides.regions;
  if (!regions || regions.length === 0) {
    regions = env.CATALOG_REGIONS ? parseRegionList(env.CATALOG_REGIONS) : [...DEFAULT_REGIONS];
  }
  if (regions.length === 0) {
    throw new Error('No regions configured');
  }

  const masterFile = overrides.masterFile || env.CATALOG_MASTER_FILE || MASTER_CSV_FILENAME;
  if (!isPlainSegment(masterFile)) {
    throw new Error(`Master CSV name must be a plain file name: ${masterFile}`);
  }

  return { basePath, regions, masterFile };
}
