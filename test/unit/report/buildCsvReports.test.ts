import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { existsSync } from 'fs';
import { join } from 'path';
import { parse } from 'csv-parse/sync';
import {
  buildCategoryReport,
  buildMasterReport,
  generateAllCategoryCsvs,
  generateCategoryCsv,
  generateMasterCsv,
} from '../../../src/report/buildCsvReports.js';
import type { ProductRecord } from '../../../src/types/Product.js';
import {
  createCatalogRoot,
  listNames,
  readCatalogFile,
  removeCatalogRoot,
  silenceConsole,
  writeCatalogFile,
} from '../../helpers/catalogFixture.js';

function record(identifier: string, name: string, extra: Partial<ProductRecord> = {}): ProductRecord {
  return { identifier, name, category: 'tiles', region: 'US', ...extra };
}

describe('buildCategoryReport', () => {
  it('sorts rows by name in code-unit order', () => {
    const csv = buildCategoryReport('US', 'tiles', [
      record('id-1', 'Banana Panel', { globalWarmingPotential: '8.1', declaredUnit: '1 m2' }),
      record('id-2', 'Apple Tile'),
      record('id-3', 'apple zest'),
    ]);

    expect(csv).toBe(
      'uuid,name,gwp,declared_unit,category\n' +
        'id-2,Apple Tile,,,tiles\n' +
        'id-1,Banana Panel,8.1,1 m2,tiles\n' +
        'id-3,apple zest,,,tiles\n'
    );
  });

  it('keeps encounter order for equal names', () => {
    const csv = buildCategoryReport('US', 'tiles', [
      record('second', 'Same'),
      record('first', 'Same'),
      record('zero', 'Earlier'),
    ]);
    const rows = parse(csv, { columns: true }) as Array<Record<string, string>>;

    expect(rows.map(r => r.uuid)).toEqual(['zero', 'second', 'first']);
  });

  it('quotes cells containing commas and quotes', () => {
    const csv = buildCategoryReport('US', 'tiles', [record('q1', 'Panel, 12mm "Pro"')]);

    expect(csv.split('\n')[1]).toBe('q1,"Panel, 12mm ""Pro""",,,tiles');
  });

  it('writes only the header for no records', () => {
    expect(buildCategoryReport('US', 'tiles', [])).toBe('uuid,name,gwp,declared_unit,category\n');
  });

  it('rejects records of another category', () => {
    expect(() => buildCategoryReport('US', 'tiles', [record('x', 'X', { category: 'roof' })])).toThrow(
      'Record x belongs to US/roof, not US/tiles'
    );
  });
});

describe('buildMasterReport', () => {
  it('orders rows by region, category, then name', () => {
    const csv = buildMasterReport([
      record('u2', 'Zinc Sheet', { region: 'US', category: 'metal' }),
      record('u1', 'Brick', { region: 'US', category: 'masonry' }),
      record('i1', 'Cement', { region: 'IN', category: 'masonry', declaredUnit: '1 t' }),
      record('u3', 'Aluminium Sheet', { region: 'US', category: 'metal' }),
    ]);

    expect(csv).toBe(
      'region,category,uuid,name,gwp,declared_unit\n' +
        'IN,masonry,i1,Cement,,1 t\n' +
        'US,masonry,u1,Brick,,\n' +
        'US,metal,u3,Aluminium Sheet,,\n' +
        'US,metal,u2,Zinc Sheet,,\n'
    );
  });
});

describe('CSV generation on disk', () => {
  let root: string;

  beforeEach(() => {
    root = createCatalogRoot();
    silenceConsole();
  });

  afterEach(() => {
    removeCatalogRoot(root);
    vi.restoreAllMocks();
  });

  it('writes <region>-<category>.csv inside the region folder', () => {
    writeCatalogFile(root, 'US/tiles/long-a.yaml', 'open_xpd_uuid: s-a\nname: Floor Tile\ngwp: 14.2\ndeclared_unit: 1 m2\n');
    writeCatalogFile(root, 'US/tiles/long-b.yaml', 'product_name: Accent Tile\n');

    const result = generateCategoryCsv(root, 'US', 'tiles');

    expect(result.productCount).toBe(2);
    expect(result.csvPath).toBe(join(root, 'US', 'US-tiles.csv'));
    expect(readCatalogFile(root, 'US/US-tiles.csv')).toBe(
      'uuid,name,gwp,declared_unit,category\n' + 'long-b,Accent Tile,,,tiles\n' + 's-a,Floor Tile,14.2,1 m2,tiles\n'
    );
  });

  it('writes no file when a category has no valid products', () => {
    writeCatalogFile(root, 'US/empty/blank.yaml', '');
    writeCatalogFile(root, 'US/empty/readme.md', '# docs');

    const result = generateCategoryCsv(root, 'US', 'empty');

    expect(result).toMatchObject({ productCount: 0, failedCount: 1, csvPath: null });
    expect(existsSync(join(root, 'US', 'US-empty.csv'))).toBe(false);
  });

  it('counts unreadable files and still writes the valid ones', () => {
    writeCatalogFile(root, 'IN/steel/bad.yaml', 'name: "unterminated\n');
    writeCatalogFile(root, 'IN/steel/good.yaml', 'name: Rebar\n');

    const result = generateCategoryCsv(root, 'IN', 'steel');

    expect(result.productCount).toBe(1);
    expect(result.failedCount).toBe(1);
    expect(readCatalogFile(root, 'IN/IN-steel.csv')).toBe('uuid,name,gwp,declared_unit,category\ngood,Rebar,,,steel\n');
  });

  it('leaves empty mappings out of the report', () => {
    writeCatalogFile(root, 'US/tiles/empty.yaml', '{}\n');
    writeCatalogFile(root, 'US/tiles/real.yaml', 'name: Wall Tile\ngwp: 9\n');

    const result = generateCategoryCsv(root, 'US', 'tiles');

    expect(result.productCount).toBe(1);
    expect(result.failedCount).toBe(1);
    expect(readCatalogFile(root, 'US/US-tiles.csv')).toBe('uuid,name,gwp,declared_unit,category\nreal,Wall Tile,9,,tiles\n');
  });

  it('moves two-character category reports into states/', () => {
    writeCatalogFile(root, 'US/CA/p1.yaml', 'name: Glazing\n');
    writeCatalogFile(root, 'US/glass/p2.yaml', 'name: Float Glass\n');

    const summary = generateAllCategoryCsvs(root, ['US', 'EU']);

    expect(summary.skippedRegions).toEqual(['EU']);
    expect(summary.productCount).toBe(2);
    expect(summary.regions[0].archived).toEqual(['US-CA.csv']);
    expect(listNames(root, 'US')).toEqual(['CA', 'US-glass.csv', 'glass', 'states']);
    expect(listNames(root, 'US/states')).toEqual(['US-CA.csv']);
  });

  it('does not read the states folder as a category on a rerun', () => {
    writeCatalogFile(root, 'US/CA/p1.yaml', 'name: Glazing\n');
    generateAllCategoryCsvs(root, ['US']);

    const rerun = generateAllCategoryCsvs(root, ['US']);

    expect(rerun.regions[0].categories.map(c => c.category)).toEqual(['CA']);
    expect(listNames(root, 'US/states')).toEqual(['US-CA.csv']);
  });

  it('writes the master CSV under the base path', () => {
    writeCatalogFile(root, 'US/wood/w.yaml', 'name: Plank\n');
    writeCatalogFile(root, 'IN/wood/w.yaml', 'name: Bamboo\n');
    const summary = generateAllCategoryCsvs(root, ['US', 'IN']);

    const master = generateMasterCsv(root, summary.records, 'all_products.csv');

    expect(master).toEqual({ csvPath: join(root, 'all_products.csv'), productCount: 2 });
    expect(readCatalogFile(root, 'all_products.csv')).toBe(
      'region,category,uuid,name,gwp,declared_unit\n' + 'IN,wood,w,Bamboo,,\n' + 'US,wood,w,Plank,,\n'
    );
  });

  it('skips the master CSV when there are no records', () => {
    const master = generateMasterCsv(root, [], 'all_products.csv');

    expect(master).toEqual({ csvPath: null, productCount: 0 });
    expect(existsSync(join(root, 'all_products.csv'))).toBe(false);
  });
});
