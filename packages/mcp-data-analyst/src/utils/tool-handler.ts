import type { TextContent, ImageContent } from '@modelcontextprotocol/sdk/types.js';
import { ZodError } from 'zod';
import { logger } from './logger.ts';
import { DataAnalystError, errorMessage } from './errors.ts';

type ToolResult = { content: Array<TextContent | ImageContent>; isError?: boolean };

export function withToolErrorHandler<TArgs extends unknown[], TResult extends ToolResult>(
  toolName: string,
  fn: (...args: TArgs) => Promise<TResult>,
): (...args: TArgs) => Promise<ToolResult> {
  return async (...args: TArgs): Promise<ToolResult> => {
    try {
      return await fn(...args);
    } catch (error) {
      logger.error({ tool: toolName, error: errorMessage(error) }, 'Tool execution failed');

      let message: string;
      if (error instanceof ZodError) {
        message = `Invalid input: ${error.issues.map((issue) => `${issue.path.join('.') || 'input'}: ${issue.message}`).join('; ')}`;
      } else if (error instanceof DataAnalystError) {
        message = `Error: ${error.message}`;
      } else {
        message = `Unexpected error: ${errorMessage(error)}`;
      }

      return {
        content: [{ type: 'text', text: message }],
        isError: true,
      };
    }
  };
}
