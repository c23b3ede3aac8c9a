import { z } from 'zod';

import { ConfigurationError } from './errors.js';
import { Logger } from './utils/logger.js';

/**
 * ServiceConfig Schema
 * Host-owned runtime settings read from the environment. Tool servers, team
 * presets and prompts live in their own files.
 */
export const ServiceConfigSchema = z.object({
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    structured: z.boolean().default(false),
  }),

  // AI provider selection and secrets
  ai: z.object({
    provider: z.enum(['groq', 'openai', 'openrouter', 'xai']).default('groq'),
    model: z.string().min(1).optional(),
    groqApiKey: z.string().optional(),
    openaiApiKey: z.string().optional(),
    openRouterApiKey: z.string().optional(),
    xaiApiKey: z.string().optional(),
  }),

  // Per-turn limits for the model client
  agent: z.object({
    maxSteps: z.number().int().positive().default(5),
    temperature: z.number().min(0).max(2).default(0.7),
  }),

  session: z.object({
    toolServersPath: z.string().default('mcp_servers.json'),
    workspaceDir: z.string().default('workspace'),
    maxMessages: z.number().int().positive().optional(),
  }),
});

export type ServiceConfig = z.infer<typeof ServiceConfigSchema>;
export type AIProviderName = ServiceConfig['ai']['provider'];

type Env = Record<string, string | undefined>;

function parseNumber(value: string | undefined): number | undefined {
  if (!value) {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (!value) {
    return undefined;
  }
  return value.toLowerCase() === 'true';
}

function emptyToUndefined(value: string | undefined): string | undefined {
  return value && value.trim().length > 0 ? value : undefined;
}

/**
 * Build the service configuration from environment variables.
 * Called once at startup; the result is threaded through the AppContext.
 */
export function loadServiceConfig(env: Env = process.env): ServiceConfig {
  const rawConfig = {
    logging: {
      level: emptyToUndefined(env['LOG_LEVEL'])?.toLowerCase(),
      structured: parseBoolean(env['LOG_STRUCTURED']),
    },
    ai: {
      provider: emptyToUndefined(env['AI_PROVIDER'])?.toLowerCase(),
      model: emptyToUndefined(env['AI_MODEL']),
      groqApiKey: emptyToUndefined(env['GROQ_API_KEY']),
      openaiApiKey: emptyToUndefined(env['OPENAI_API_KEY']),
      openRouterApiKey: emptyToUndefined(env['OPENROUTER_API_KEY']),
      xaiApiKey: emptyToUndefined(env['XAI_API_KEY']),
    },
    agent: {
      maxSteps: parseNumber(env['AGENT_MAX_STEPS']),
      temperature: parseNumber(env['AGENT_TEMPERATURE']),
    },
    session: {
      toolServersPath: emptyToUndefined(env['TOOL_SERVERS_PATH']),
      workspaceDir: emptyToUndefined(env['WORKSPACE_DIR']),
      maxMessages: parseNumber(env['MAX_MESSAGES']),
    },
  };

  const result = ServiceConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    const logger = new Logger({ namespace: 'Config' });
    logger.error('Configuration validation failed');
    for (const issue of result.error.issues) {
      logger.error(`  ${issue.path.join('.')}: ${issue.message}`);
    }
    throw new ConfigurationError('Invalid service configuration', undefined, {
      cause: result.error,
    });
  }
  return result.data;
}
