// mcp-task-delegator/src/services/categoryCatalog.ts
// Static category table: keywords, decomposition templates, efficiency multipliers.
// Loaded once from data/categories.json and validated before use.

import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { CATEGORY_IDS, DESCRIPTION_PLACEHOLDER } from '../types/index.js';
import type { CategoryDefinition, CategoryId } from '../types/index.js';
import { ValidationError } from './errors.js';
import { logger } from './logger.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/** Multipliers are held as integer parts of this scale */
export const MULTIPLIER_SCALE = 10_000;

/** Multiplier maps exactly onto at least one basis point */
function isWholeBasisPoints(multiplier: number): boolean {
  const scaled = multiplier * MULTIPLIER_SCALE;
  const rounded = Math.round(scaled);
  return rounded >= 1 && Math.abs(scaled - rounded) < 1e-9;
}

const categoryEntrySchema = z.object({
  id: z.enum(CATEGORY_IDS),
  description: z.string().default(''),
  keywords: z.array(z.string().trim().min(1)).min(1),
  template: z.array(z.string().min(1)).min(1),
  efficiencyMultiplier: z.number().gt(0).lte(1).refine(isWholeBasisPoints, {
    message: `efficiencyMultiplier must be a positive multiple of 1/${MULTIPLIER_SCALE}`,
  }),
  specialty: z.string().min(1),
  aliases: z.array(z.string().trim().min(1)).default([]),
});

const catalogFileSchema = z.object({
  defaultCategory: z.enum(CATEGORY_IDS),
  categories: z.array(categoryEntrySchema).min(1),
});

/** Ordered, immutable lookup over the category table */
export class CategoryCatalog {
  private readonly byId: Map<CategoryId, CategoryDefinition>;
  private readonly byName: Map<string, CategoryId>;

  constructor(
    private readonly ordered: readonly CategoryDefinition[],
    readonly defaultCategory: CategoryId,
  ) {
    this.byId = new Map(ordered.map(c => [c.id, c]));
    this.byName = new Map();
    for (const c of ordered) {
      this.byName.set(c.id, c.id);
      for (const alias of c.aliases) this.byName.set(alias.toLowerCase(), c.id);
    }
  }

  /** Categories in catalog order */
  list(): readonly CategoryDefinition[] {
    return this.ordered;
  }

  get(id: CategoryId): CategoryDefinition {
    const def = this.byId.get(id);
    if (!def) throw new ValidationError(`Category ${id} is not in the catalog`);
    return def;
  }

  /** Resolve an id or alias, case-insensitively. Undefined when unknown. */
  resolve(name: string): CategoryId | undefined {
    return this.byName.get(name.trim().toLowerCase());
  }
}

/** Validate raw catalog data and build the lookup. Throws ValidationError on a bad table. */
export function buildCatalog(raw: unknown): CategoryCatalog {
  const parsed = catalogFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(`Invalid category catalog at ${issue.path.join('.') || '<root>'}: ${issue.message}`);
  }

  const seen = new Set<CategoryId>();
  const names = new Map<string, CategoryId>();
  const definitions: CategoryDefinition[] = [];

  for (const entry of parsed.data.categories) {
    if (seen.has(entry.id)) {
      throw new ValidationError(`Invalid category catalog: duplicate category ${entry.id}`);
    }
    seen.add(entry.id);

    for (const name of [entry.id, ...entry.aliases.map(a => a.toLowerCase())]) {
      const owner = names.get(name);
      if (owner && owner !== entry.id) {
        throw new ValidationError(`Invalid category catalog: name "${name}" used by ${owner} and ${entry.id}`);
      }
      names.set(name, entry.id);
    }

    definitions.push({
      id: entry.id,
      description: entry.description,
      keywords: entry.keywords.map(k => k.toLowerCase()),
      template: entry.template,
      efficiencyMultiplier: entry.efficiencyMultiplier,
      multiplierBasisPoints: Math.round(entry.efficiencyMultiplier * MULTIPLIER_SCALE),
      specialty: entry.specialty,
      aliases: entry.aliases,
    });
  }

  const missing = CATEGORY_IDS.filter(id => !seen.has(id));
  if (missing.length > 0) {
    throw new ValidationError(`Invalid category catalog: missing ${missing.join(', ')}`);
  }

  for (const def of definitions) {
    if (!def.template.some(t => t.includes(DESCRIPTION_PLACEHOLDER))) {
      logger.debug(`Category ${def.id} template does not reference the task description`);
    }
  }

  return new CategoryCatalog(definitions, parsed.data.defaultCategory);
}

/** Locate data/categories.json from either src/services or dist/src/services */
export function resolveCatalogPath(): string {
  const candidates = [
    path.resolve(__dirname, '..', '..', 'data', 'categories.json'),
    path.resolve(__dirname, '..', '..', '..', 'data', 'categories.json'),
  ];
  return candidates.find(p => fs.existsSync(p)) ?? candidates[0];
}

/** Read and validate a catalog file */
export function loadCategoryCatalog(filePath = resolveCatalogPath()): CategoryCatalog {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ValidationError(`Failed to read category catalog ${filePath}: ${message}`);
  }
  const catalog = buildCatalog(raw);
  logger.debug(`Loaded ${catalog.list().length} categories from ${filePath}`);
  return catalog;
}
