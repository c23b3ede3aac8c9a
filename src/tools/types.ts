import type { z } from 'zod';

import type { ExternalServiceError, PathEscapeError, ToolExecutionError } from '../errors.js';

/**
 * Tagged tool variants and their registered names
 */
export const TOOL_NAMES = {
  'file-read': 'readFile',
  'file-write': 'writeFile',
  'file-list': 'listFiles',
  'remote-search': 'search',
  'remote-list': 'listRepos',
  'remote-get': 'getFile',
} as const;

export type ToolKind = keyof typeof TOOL_NAMES;
export type ToolName = (typeof TOOL_NAMES)[ToolKind];

export type ToolError = PathEscapeError | ToolExecutionError | ExternalServiceError;

/**
 * Result of a tool call. Failures carry text as well, since the caller is a
 * conversational agent that reads the outcome.
 */
export type ToolOutcome =
  | { ok: true; text: string }
  | { ok: false; text: string; error: ToolError };

/**
 * Tool definition before it is bound to a server entry. `execute` may throw;
 * the registry wraps it in the soft-fail boundary.
 */
export interface ToolSpec {
  readonly kind: ToolKind;
  readonly name: ToolName;
  readonly description: string;
  /** One-line call signature shown in agent prompts, e.g. `readFile(path)` */
  readonly usage: string;
  /** Prefix for failure text, e.g. "Error reading file" */
  readonly failurePrefix: string;
  readonly inputSchema: z.ZodTypeAny;
  execute(args: unknown): Promise<string>;
}

/**
 * Callable tool owned by the CapabilityRegistry. `invoke` never rejects.
 */
export interface Tool {
  readonly kind: ToolKind;
  readonly name: ToolName;
  readonly description: string;
  readonly usage: string;
  /** Descriptor entry that enabled this tool */
  readonly server: string;
  readonly inputSchema: z.ZodTypeAny;
  invoke(args: unknown): Promise<ToolOutcome>;
}
