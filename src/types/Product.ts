import type { CatalogError } from './errors.js';

/** A parsed YAML catalog entry. Only the root mapping is assumed. */
export type CatalogDocument = Record<string, unknown>;

export interface ProductRecord {
  identifier: string;
  name: string;
  globalWarmingPotential?: string;
  declaredUnit?: string;
  category: string;
  region: string;
}

export type LoadResult =
  | { readonly success: true; readonly document: CatalogDocument }
  | { readonly success: false; readonly error: CatalogError };

/** One YAML file found by the walker, loaded or not. */
export interface CatalogEntry {
  readonly region: string;
  readonly category: string;
  readonly filename: string;
  readonly filePath: string;
  readonly load: LoadResult;
}
