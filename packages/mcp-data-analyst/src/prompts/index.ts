/**
 * MCP Prompt Registration
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { DATA_ANALYSIS_CONTRACT_PROMPT } from './data-analysis-contract.ts';

export const ALL_PROMPTS = [DATA_ANALYSIS_CONTRACT_PROMPT];

/**
 * Registers all prompts on the MCP server
 */
export function registerPrompts(server: McpServer): void {
  for (const prompt of ALL_PROMPTS) {
    server.registerPrompt(
      prompt.name,
      { description: prompt.description },
      async () => ({
        messages: [
          {
            role: 'user' as const,
            content: {
              type: 'text' as const,
              text: prompt.content,
            },
          },
        ],
      }),
    );
  }
}
