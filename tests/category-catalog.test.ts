// tests/category-catalog.test.ts
// Category catalog - bundled table, alias resolution, validation of bad tables.

import { describe, it, expect, afterAll } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { buildCatalog, loadCategoryCatalog, MULTIPLIER_SCALE } from '../src/services/categoryCatalog.js';
import { ValidationError } from '../src/services/errors.js';
import { rawCatalog, testCatalog } from './helpers/setup.js';

const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'catalog-test-'));
afterAll(() => { fs.rmSync(tmpDir, { recursive: true, force: true }); });

describe('bundled catalog', () => {
  const catalog = testCatalog();

  it('lists the six categories in order with decompose as default', () => {
    expect(catalog.list().map(c => c.id)).toEqual([
      'decompose', 'notify', 'research', 'troubleshoot', 'consensus', 'parallel',
    ]);
    expect(catalog.defaultCategory).toBe('decompose');
  });

  it('carries multipliers and their integer form', () => {
    expect(catalog.list().map(c => c.efficiencyMultiplier)).toEqual([0.3, 0.9, 0.5, 0.7, 0.4, 0.25]);
    expect(catalog.get('notify').multiplierBasisPoints).toBe(9000);
    expect(catalog.get('parallel').multiplierBasisPoints).toBe(2500);
    expect(MULTIPLIER_SCALE).toBe(10_000);
  });

  it('assigns one specialty per category', () => {
    expect(catalog.list().map(c => c.specialty)).toEqual([
      'architect', 'messenger', 'explorer', 'debugger', 'facilitator', 'coordinator',
    ]);
  });
});

describe('CategoryCatalog.resolve', () => {
  const catalog = testCatalog();

  it('resolves ids and aliases case-insensitively', () => {
    expect(catalog.resolve('parallel')).toBe('parallel');
    expect(catalog.resolve('Waggle')).toBe('decompose');
    expect(catalog.resolve('round')).toBe('notify');
    expect(catalog.resolve('TREMBLE')).toBe('troubleshoot');
    expect(catalog.resolve(' scout ')).toBe('research');
    expect(catalog.resolve('converge')).toBe('consensus');
    expect(catalog.resolve('disperse')).toBe('parallel');
  });

  it('returns undefined for unknown names', () => {
    expect(catalog.resolve('nonexistent')).toBeUndefined();
    expect(catalog.resolve('')).toBeUndefined();
  });
});

describe('buildCatalog validation', () => {
  it('accepts the minimal fixture and lower-cases keywords', () => {
    const raw = rawCatalog();
    raw.categories[0].keywords = ['MiXed'];
    expect(buildCatalog(raw).get('decompose').keywords).toEqual(['mixed']);
  });

  it('rejects a duplicate category', () => {
    const raw = rawCatalog();
    raw.categories[1].id = 'decompose';
    expect(() => buildCatalog(raw)).toThrow('Invalid category catalog: duplicate category decompose');
  });

  it('rejects a catalog missing a category', () => {
    const raw = rawCatalog();
    raw.categories = raw.categories.filter(c => c.id !== 'parallel');
    expect(() => buildCatalog(raw)).toThrow('Invalid category catalog: missing parallel');
  });

  it('rejects an alias that names another category', () => {
    const raw = rawCatalog();
    raw.categories[1].aliases = ['Decompose'];
    expect(() => buildCatalog(raw)).toThrow('Invalid category catalog: name "decompose" used by decompose and notify');
  });

  it('rejects a multiplier above one', () => {
    const raw = rawCatalog();
    raw.categories[0].efficiencyMultiplier = 1.5;
    expect(() => buildCatalog(raw)).toThrow(/^Invalid category catalog at categories\.0\.efficiencyMultiplier/);
  });

  it('rejects multipliers finer than one basis point', () => {
    const raw = rawCatalog();
    raw.categories[0].efficiencyMultiplier = 0.00004;
    expect(() => buildCatalog(raw)).toThrow(
      'Invalid category catalog at categories.0.efficiencyMultiplier: efficiencyMultiplier must be a positive multiple of 1/10000',
    );
    raw.categories[0].efficiencyMultiplier = 0.12345;
    expect(() => buildCatalog(raw)).toThrow(/^Invalid category catalog at categories\.0\.efficiencyMultiplier/);
  });

  it('accepts the smallest whole basis point', () => {
    const raw = rawCatalog();
    raw.categories[0].efficiencyMultiplier = 0.0001;
    expect(buildCatalog(raw).get('decompose').multiplierBasisPoints).toBe(1);
  });

  it('rejects an empty template', () => {
    const raw = rawCatalog();
    raw.categories[2].template = [];
    expect(() => buildCatalog(raw)).toThrow(/^Invalid category catalog at categories\.2\.template/);
  });

  it('rejects an unknown category id', () => {
    expect(() => buildCatalog({ defaultCategory: 'waggle', categories: [] })).toThrow(ValidationError);
  });
});

describe('loadCategoryCatalog', () => {
  it('loads a catalog from an explicit path', () => {
    const raw = rawCatalog();
    raw.defaultCategory = 'notify';
    const file = path.join(tmpDir, 'custom.json');
    fs.writeFileSync(file, JSON.stringify(raw));
    const catalog = loadCategoryCatalog(file);
    expect(catalog.defaultCategory).toBe('notify');
    expect(catalog.get('notify').template).toEqual(['notify: {description}']);
  });

  it('reports unreadable files', () => {
    const file = path.join(tmpDir, 'missing.json');
    expect(() => loadCategoryCatalog(file)).toThrow(`Failed to read category catalog ${file}`);
  });

  it('reports malformed JSON', () => {
    const file = path.join(tmpDir, 'broken.json');
    fs.writeFileSync(file, '{ not json');
    expect(() => loadCategoryCatalog(file)).toThrow(ValidationError);
  });
});
