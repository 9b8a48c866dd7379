import { describe, it, expect } from 'vitest';
import {
  extractName,
  extractOptionalField,
  extractShortId,
  isYamlFilename,
  stripYamlExtension,
} from '../../../src/catalog/extractFields.js';

describe('extractName', () => {
  it('prefers top-level name over the nested product name', () => {
    expect(extractName({ name: 'Top Name', product_specific: { product_name: 'Nested Name' } })).toBe('Top Name');
  });

  it('uses product_specific.product_name when name is absent', () => {
    expect(extractName({ product_specific: { product_name: 'Nested Name' } })).toBe('Nested Name');
  });

  it('ranks the nested product name above top-level product_name', () => {
    expect(extractName({ product_specific: { product_name: 'Nested' }, product_name: 'Flat' })).toBe('Nested');
  });

  it('ignores product_specific when it is not a mapping', () => {
    expect(extractName({ product_specific: 'n/a', product_name: 'Flat' })).toBe('Flat');
    expect(extractName({ product_specific: ['x'], product_name: 'Flat' })).toBe('Flat');
  });

  it('falls through product_specific without a product_name', () => {
    expect(extractName({ product_specific: { plant: 'Pune' }, product_name: 'Flat' })).toBe('Flat');
  });

  it('returns the fallback when no name field exists', () => {
    expect(extractName({ gwp: 12 })).toBe('Unknown Product');
  });

  it('matches a name key holding null and yields an empty name', () => {
    expect(extractName({ name: null, product_name: 'Flat' })).toBe('');
    expect(extractName({ product_specific: { product_name: null }, product_name: 'Flat' })).toBe('');
  });

  it('stringifies non-string names', () => {
    expect(extractName({ name: 42 })).toBe('42');
  });
});

describe('extractShortId', () => {
  it('returns open_xpd_uuid verbatim regardless of filename', () => {
    expect(extractShortId({ open_xpd_uuid: 'ec3x7k2q' }, '1b2c3d4e-long-uuid.yaml')).toBe('ec3x7k2q');
  });

  it('falls back to the filename without its yaml extension', () => {
    expect(extractShortId({}, 'long-uuid-1.yaml')).toBe('long-uuid-1');
    expect(extractShortId({}, 'long-uuid-1.yml')).toBe('long-uuid-1');
  });

  it('strips only the trailing extension', () => {
    expect(extractShortId({}, 'a.yaml.yaml')).toBe('a.yaml');
    expect(extractShortId({}, 'part.yml.backup.yml')).toBe('part.yml.backup');
  });

  it('falls back when open_xpd_uuid is empty or not a string', () => {
    expect(extractShortId({ open_xpd_uuid: '' }, 'x1.yaml')).toBe('x1');
    expect(extractShortId({ open_xpd_uuid: 1234 }, 'x2.yaml')).toBe('x2');
    expect(extractShortId({ open_xpd_uuid: null }, 'x3.yml')).toBe('x3');
  });
});

describe('filename helpers', () => {
  it('matches yaml extensions case-sensitively', () => {
    expect(isYamlFilename('a.yaml')).toBe(true);
    expect(isYamlFilename('a.yml')).toBe(true);
    expect(isYamlFilename('a.YAML')).toBe(false);
    expect(isYamlFilename('a.yaml.bak')).toBe(false);
  });

  it('leaves non-yaml names unchanged', () => {
    expect(stripYamlExtension('notes.txt')).toBe('notes.txt');
    expect(stripYamlExtension('A.YML')).toBe('A.YML');
  });
});

describe('extractOptionalField', () => {
  it('stringifies scalars', () => {
    expect(extractOptionalField({ gwp: 12.5 }, 'gwp')).toBe('12.5');
    expect(extractOptionalField({ declared_unit: '1 m2' }, 'declared_unit')).toBe('1 m2');
  });

  it('returns undefined for absent or null values', () => {
    expect(extractOptionalField({}, 'gwp')).toBeUndefined();
    expect(extractOptionalField({ gwp: null }, 'gwp')).toBeUndefined();
  });

  it('writes structured values as compact JSON', () => {
    expect(extractOptionalField({ gwp: { amount: 3, unit: 'kgCO2e' } }, 'gwp')).toBe('{"amount":3,"unit":"kgCO2e"}');
  });

  it('writes exact integers, nested or not', () => {
    expect(extractOptionalField({ gwp: 12345678901234567891n }, 'gwp')).toBe('12345678901234567891');
    expect(extractOptionalField({ gwp: { amount: 3n, big: 12345678901234567891n } }, 'gwp')).toBe(
      '{"amount":3,"big":"12345678901234567891"}'
    );
  });
});
