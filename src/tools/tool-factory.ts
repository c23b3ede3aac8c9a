import type { z } from 'zod';

import {
  ExternalServiceError,
  PathEscapeError,
  ToolExecutionError,
  errorMessage,
} from '../errors.js';
import type { Logger } from '../utils/logger.js';

import {
  TOOL_NAMES,
  type Tool,
  type ToolError,
  type ToolKind,
  type ToolOutcome,
  type ToolSpec,
} from './types.js';

export interface ToolDefinition<TParams extends z.ZodTypeAny> {
  kind: ToolKind;
  description: string;
  usage: string;
  failurePrefix: string;
  parameters: TParams;
  execute: (args: z.output<TParams>) => Promise<string>;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Build a ToolSpec whose arguments are validated against `parameters`
 */
export function defineTool<TParams extends z.ZodTypeAny>(
  definition: ToolDefinition<TParams>,
): ToolSpec {
  const name = TOOL_NAMES[definition.kind];
  return {
    kind: definition.kind,
    name,
    description: definition.description,
    usage: definition.usage,
    failurePrefix: definition.failurePrefix,
    inputSchema: definition.parameters,
    execute: async (args: unknown) => {
      const parsed = definition.parameters.safeParse(args ?? {});
      if (!parsed.success) {
        throw new ToolExecutionError(name, `Invalid arguments: ${formatIssues(parsed.error)}`);
      }
      return definition.execute(parsed.data);
    },
  };
}

function toToolError(toolName: string, error: unknown): ToolError {
  if (
    error instanceof PathEscapeError ||
    error instanceof ToolExecutionError ||
    error instanceof ExternalServiceError
  ) {
    return error;
  }
  return new ToolExecutionError(toolName, errorMessage(error), { cause: error });
}

/**
 * Bind a spec to its server entry and wrap it in the soft-fail boundary:
 * every fault becomes a failed outcome with descriptive text.
 */
export function bindTool(spec: ToolSpec, server: string, logger: Logger): Tool {
  const invoke = async (args: unknown): Promise<ToolOutcome> => {
    const start = Date.now();
    try {
      const text = await spec.execute(args);
      logger.debug('Tool completed', { tool: spec.name, ms: Date.now() - start });
      return { ok: true, text };
    } catch (error) {
      const toolError = toToolError(spec.name, error);
      logger.warn('Tool failed', {
        tool: spec.name,
        code: toolError.code,
        reason: toolError.message,
      });
      return { ok: false, text: `${spec.failurePrefix}: ${toolError.message}`, error: toolError };
    }
  };

  return Object.freeze({
    kind: spec.kind,
    name: spec.name,
    description: spec.description,
    usage: spec.usage,
    server,
    inputSchema: spec.inputSchema,
    invoke,
  });
}
