import { UNKNOWN_PRODUCT_NAME, YAML_EXTENSIONS } from '../config/catalogConfig.js';
import type { CatalogDocument } from '../types/Product.js';
import { isMapping } from './loadCatalogDocument.js';

// ─────────────────────────────────────────────────────────────────────────────
// Filename helpers
// ─────────────────────────────────────────────────────────────────────────────

export function isYamlFilename(filename: string): boolean {
  return YAML_EXTENSIONS.some(ext => filename.endsWith(ext));
}

/** Remove one trailing .yaml/.yml; anything else is returned unchanged. */
export function stripYamlExtension(filename: string): string {
  for (const ext of YAML_EXTENSIONS) {
    if (filename.endsWith(ext)) {
      return filename.slice(0, -ext.length);
    }
  }
  return filename;
}

// ─────────────────────────────────────────────────────────────────────────────
// Field extraction
// ─────────────────────────────────────────────────────────────────────────────

function hasKey(doc: CatalogDocument, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(doc, key);
}

function hasValue(doc: CatalogDocument, key: string): boolean {
  return doc[key] !== undefined && doc[key] !== null;
}

function jsonReplacer(_key: string, value: unknown): unknown {
  if (typeof value !== 'bigint') return value;
  return Number.isSafeInteger(Number(value)) ? Number(value) : value.toString();
}

/**
 * Render a YAML value as a single cell/label string.
 * Mappings and lists become compact JSON.
 */
export function stringifyField(value: unknown): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  if (value instanceof Date) return value.toISOString();
  return JSON.stringify(value, jsonReplacer);
}

/**
 * Product name, first present key wins:
 * `name`, then `product_specific.product_name`, then `product_name`.
 * A key holding `null` still matches and yields an empty name.
 */
export function extractName(doc: CatalogDocument): string {
  if (hasKey(doc, 'name')) {
    return stringifyField(doc.name);
  }

  const specific = doc.product_specific;
  if (isMapping(specific) && hasKey(specific, 'product_name')) {
    return stringifyField(specific.product_name);
  }

  if (hasKey(doc, 'product_name')) {
    return stringifyField(doc.product_name);
  }

  return UNKNOWN_PRODUCT_NAME;
}

/** `open_xpd_uuid` when it is a non-empty string, else the filename stem. */
export function extractShortId(doc: CatalogDocument, filename: string): string {
  const shortId = doc.open_xpd_uuid;
  if (typeof shortId === 'string' && shortId !== '') {
    return shortId;
  }
  return stripYamlExtension(filename);
}

/** Optional scalar field, or undefined when absent/null. */
export function extractOptionalField(doc: CatalogDocument, key: string): string | undefined {
  return hasValue(doc, key) ? stringifyField(doc[key]) : undefined;
}
