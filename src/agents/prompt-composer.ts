/**
 * Prompt Composer
 * Composes an agent's effective system prompt from its base prompt and bound tools
 */

import type { Tool } from '../tools/types.js';

export const COLLABORATION_INSTRUCTION =
  'Always collaborate effectively with other agents and provide clear, actionable responses.';

export interface ComposedPrompt {
  content: string;
  parts: {
    base: string;
    catalog: string;
    instruction: string;
  };
}

/**
 * Numbered tool catalog, one line per tool in binding order
 */
export function composeToolCatalog(tools: readonly Pick<Tool, 'usage' | 'description'>[]): string {
  if (tools.length === 0) {
    return 'Available tools: none';
  }
  const lines = tools.map((tool, index) => `${index + 1}. ${tool.usage}: ${tool.description}`);
  return ['Available tools:', ...lines].join('\n');
}

/**
 * Rule: finalPrompt = base + "\n\n" + catalog + "\n\n" + collaboration instruction
 */
export function composePrompt(
  basePrompt: string,
  tools: readonly Pick<Tool, 'usage' | 'description'>[],
): ComposedPrompt {
  const parts: ComposedPrompt['parts'] = {
    base: basePrompt.trim(),
    catalog: composeToolCatalog(tools),
    instruction: COLLABORATION_INSTRUCTION,
  };

  return {
    content: [parts.base, parts.catalog, parts.instruction].join('\n\n'),
    parts,
  };
}
