import { readFileSync } from 'fs';
import { parse } from 'yaml';
import { CatalogError } from '../types/errors.js';
import type { CatalogDocument, LoadResult } from '../types/Product.js';

export function isMapping(value: unknown): value is CatalogDocument {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read and parse one catalog YAML file. Never throws: read errors, malformed
 * YAML, empty files or mappings and non-mapping roots all come back as a
 * failed result. Integers are kept exact as bigint.
 */
export function loadCatalogDocument(filePath: string): LoadResult {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (err) {
    return {
      success: false,
      error: new CatalogError('FILESYSTEM_FAILURE', 'Could not read file', filePath, { cause: err }),
    };
  }

  let parsed: unknown;
  try {
    parsed = parse(content, { intAsBigInt: true });
  } catch (err) {
    return {
      success: false,
      error: new CatalogError('PARSE_FAILURE', 'Malformed YAML', filePath, { cause: err }),
    };
  }

  if (parsed === null || parsed === undefined || (isMapping(parsed) && Object.keys(parsed).length === 0)) {
    return {
      success: false,
      error: new CatalogError('PARSE_FAILURE', 'Empty YAML document', filePath),
    };
  }
  if (!isMapping(parsed)) {
    return {
      success: false,
      error: new CatalogError('PARSE_FAILURE', `Expected a mapping at document root, got ${Array.isArray(parsed) ? 'list' : typeof parsed}`, filePath),
    };
  }

  return { success: true, document: parsed };
}
