// mcp-task-delegator/src/types/index.ts
// Barrel re-export - all domain types

export * from './category.js';
export * from './task.js';
export * from './metrics.js';
