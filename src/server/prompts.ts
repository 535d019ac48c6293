// mcp-task-delegator/src/server/prompts.ts
// MCP prompt: explain how a task would be delegated

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { DelegationService } from '../services/delegationService.js';

/** Prompt text listing every category, its score for the task, and the pick */
export function buildAnalysisPrompt(service: DelegationService, description: string): string {
  const analysis = service.analyze(description);
  const lines = [
    'Analyze the following task and confirm the best delegation category:',
    '',
    `Task: ${description}`,
    '',
    'Categories:',
  ];
  const scores = analysis.ok ? analysis.value.scores : [];
  for (const def of service.listCategories()) {
    const score = scores.find(s => s.category === def.id);
    const matched = score && score.matchedKeywords.length > 0 ? ` (matched: ${score.matchedKeywords.join(', ')})` : '';
    lines.push(`- ${def.id}: ${def.description}. Score ${score?.score ?? 0}${matched}`);
  }
  lines.push('');
  if (analysis.ok) {
    lines.push(`Suggested category: ${analysis.value.category} (${analysis.value.specialty})`);
    lines.push('Proposed sub-items:');
    analysis.value.subtasks.forEach((s, i) => lines.push(`${i + 1}. ${s}`));
  } else {
    lines.push(`No suggestion: ${analysis.error.message}`);
  }
  return lines.join('\n');
}

export function registerPrompts(server: McpServer, service: DelegationService): void {
  server.prompt(
    'analyze_task_for_delegation',
    'Explain which category a task falls into and how it would be split',
    { description: z.string().describe('Task description') },
    ({ description }) => ({
      messages: [{
        role: 'user' as const,
        content: { type: 'text' as const, text: buildAnalysisPrompt(service, description) },
      }],
    })
  );
}
