// mcp-task-delegator/src/services/classifier.ts
// Keyword-scoring classifier. Pure: same description + catalog → same category.

import type { CategoryId, CategoryScore } from '../types/index.js';
import type { CategoryCatalog } from './categoryCatalog.js';
import { logger } from './logger.js';

/** Score every category in catalog order. Each keyword counts once. */
export function scoreCategories(description: string, catalog: CategoryCatalog): CategoryScore[] {
  const text = description.toLowerCase();
  return catalog.list().map(def => {
    const matchedKeywords = def.keywords.filter(keyword => text.includes(keyword));
    return { category: def.id, score: matchedKeywords.length, matchedKeywords };
  });
}

/**
 * Pick the category for a description.
 * A resolved override wins outright; otherwise the highest score, ties going to the
 * earliest category in catalog order, and the catalog default when nothing matches.
 */
export function classify(description: string, catalog: CategoryCatalog, override?: CategoryId): CategoryId {
  if (override) return override;

  let best: CategoryScore | undefined;
  for (const entry of scoreCategories(description, catalog)) {
    if (!best || entry.score > best.score) best = entry;
  }

  if (!best || best.score === 0) {
    logger.debug(`No keywords matched, defaulting to ${catalog.defaultCategory}`);
    return catalog.defaultCategory;
  }

  logger.debug(`Classified as ${best.category}`, { score: best.score, keywords: best.matchedKeywords });
  return best.category;
}
