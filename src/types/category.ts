// mcp-task-delegator/src/types/category.ts
// Category domain types - the closed set of task categories and their catalog entries

/** Catalog order is also the classifier's tie-break order */
export const CATEGORY_IDS = ['decompose', 'notify', 'research', 'troubleshoot', 'consensus', 'parallel'] as const;

export type CategoryId = typeof CATEGORY_IDS[number];

/** Placeholder replaced by the original task description in template entries */
export const DESCRIPTION_PLACEHOLDER = '{description}';

/** One row of the category catalog */
export interface CategoryDefinition {
  id: CategoryId;
  description: string;
  /** Lower-case substrings matched against the task description */
  keywords: readonly string[];
  /** Ordered sub-item patterns; at least one entry */
  template: readonly string[];
  /** Share of each worker's base budget expected to be used, in (0, 1] */
  efficiencyMultiplier: number;
  /** Multiplier as integer parts per ten thousand, used for exact allocation */
  multiplierBasisPoints: number;
  /** Label given to every worker of this category */
  specialty: string;
  /** Extra names accepted when a caller names a category explicitly */
  aliases: readonly string[];
}

/** Keyword score for one category */
export interface CategoryScore {
  category: CategoryId;
  score: number;
  matchedKeywords: string[];
}
