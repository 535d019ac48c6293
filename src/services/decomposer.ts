// mcp-task-delegator/src/services/decomposer.ts
// Turns a task into ordered sub-item descriptions

import { DESCRIPTION_PLACEHOLDER } from '../types/index.js';
import type { CategoryDefinition } from '../types/index.js';

/** Substitute the description into one template entry */
export function fillTemplate(template: string, description: string): string {
  return template.split(DESCRIPTION_PLACEHOLDER).join(description);
}

/**
 * Caller-supplied subtasks win when non-empty and are returned as given.
 * Otherwise the category template is instantiated in order.
 */
export function decompose(
  description: string,
  category: CategoryDefinition,
  explicitSubtasks?: readonly string[],
): string[] {
  if (explicitSubtasks && explicitSubtasks.length > 0) {
    return [...explicitSubtasks];
  }
  return category.template.map(entry => fillTemplate(entry, description));
}
