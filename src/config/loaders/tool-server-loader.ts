import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';

import { z } from 'zod';

import { ConfigurationError, errorMessage } from '../../errors.js';
import {
  ToolServerFileSchema,
  type ToolServerConfig,
  type ToolServerEntry,
} from '../schemas/tool-server.schema.js';

import { extractEnvRefs, findMissingEnvVars, resolveEnvMap } from './env-resolver.js';

export interface LoadedToolServers {
  path: string;
  /** Servers keyed by name, in file order */
  servers: ReadonlyMap<string, ToolServerConfig>;
  /** `$env:` references left unresolved because the variable is not defined */
  unresolvedEnvRefs: Array<{ server: string; variable: string }>;
}

export interface LoadToolServersOptions {
  env?: Record<string, string | undefined>;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

function toServerConfig(
  name: string,
  entry: ToolServerEntry,
  env: Record<string, string | undefined>,
): ToolServerConfig {
  return Object.freeze({
    name,
    command: entry.command,
    args: Object.freeze([...entry.args]),
    description: entry.description,
    ...(entry.env ? { env: Object.freeze(resolveEnvMap(entry.env, { env })) } : {}),
  });
}

/**
 * Load the tool-server descriptor file
 * @param descriptorPath - Path to the descriptor JSON (e.g. mcp_servers.json)
 * @returns Validated servers keyed by name
 * @throws ConfigurationError when the file is missing, unreadable or invalid
 */
export function loadToolServers(
  descriptorPath: string,
  options: LoadToolServersOptions = {},
): LoadedToolServers {
  const fullPath = resolve(descriptorPath);

  if (!existsSync(fullPath)) {
    throw new ConfigurationError(`Tool server descriptor not found: ${fullPath}`, fullPath);
  }

  let data: unknown;
  try {
    data = JSON.parse(readFileSync(fullPath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(
      `Failed to read tool server descriptor ${fullPath}: ${errorMessage(error)}`,
      fullPath,
      { cause: error },
    );
  }

  const parsed = ToolServerFileSchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid tool server descriptor ${fullPath}: ${formatIssues(parsed.error)}`,
      fullPath,
      { cause: parsed.error },
    );
  }

  const env = options.env ?? process.env;
  const servers = new Map<string, ToolServerConfig>();
  const unresolvedEnvRefs: LoadedToolServers['unresolvedEnvRefs'] = [];

  for (const [name, entry] of Object.entries(parsed.data.servers)) {
    servers.set(name, toServerConfig(name, entry, env));
    if (entry.env) {
      for (const variable of findMissingEnvVars(extractEnvRefs(entry.env), env)) {
        unresolvedEnvRefs.push({ server: name, variable });
      }
    }
  }

  return {
    path: fullPath,
    servers,
    unresolvedEnvRefs,
  };
}
