/**
 * CSV serialization.
 *
 * Quoting follows RFC 4180 via d3-dsv: a cell is quoted only when it contains
 * a comma, quote or line break. Rows are joined with \n and the file ends
 * with a newline.
 */

import { csvFormat } from 'd3-dsv';

export type CsvRow = Record<string, string>;

export function formatCsv(columns: readonly string[], rows: readonly CsvRow[]): string {
  return `${csvFormat(rows, columns)}\n`;
}

/** Stable sort by a list of string keys, compared by UTF-16 code unit. */
export function sortByKeys<T>(items: readonly T[], keys: ReadonlyArray<(item: T) => string>): T[] {
  return [...items].sort((a, b) => {
    for (const key of keys) {
      const left = key(a);
      const right = key(b);
      if (left < right) return -1;
      if (left > right) return 1;
    }
    return 0;
  });
}
