import {
  generateText,
  stepCountIs,
  tool,
  type LanguageModel,
  type ModelMessage,
  type ToolSet,
} from 'ai';

import type { AgentDescriptor, ModelClient, TurnRequest } from '../agents/types.js';
import type { AppContext } from '../context.js';
import { ConfigurationError, ExternalServiceError, errorMessage } from '../errors.js';
import type { Message } from '../orchestrator/ConversationLog.js';
import type { Tool } from '../tools/types.js';
import type { Logger } from '../utils/logger.js';

import { createProviderSelector, DEFAULT_MODELS, getAvailableProviders } from './providers/index.js';

export interface AiSdkModelClientOptions {
  /** Use this model instead of the one selected from the service configuration */
  model?: LanguageModel;
  /** Label for logs and errors when `model` is given */
  id?: string;
  /** Retries per model call (AI SDK default is 2) */
  maxRetries?: number;
}

/**
 * Conversation so far, as seen by `agent`: the task opens the conversation,
 * the agent's own messages are assistant turns, everyone else's are user
 * turns prefixed with the speaker's name.
 */
export function toModelMessages(
  agentName: string,
  task: string,
  history: readonly Message[],
): ModelMessage[] {
  const messages: ModelMessage[] = [{ role: 'user', content: task }];
  for (const message of history) {
    if (message.speaker === agentName) {
      messages.push({ role: 'assistant', content: message.content });
    } else {
      messages.push({ role: 'user', content: `${message.speaker}: ${message.content}` });
    }
  }
  return messages;
}

/**
 * Expose bound tools to the model. The model always receives the tool's text,
 * including soft-fail text.
 */
export function toToolSet(tools: readonly Tool[]): ToolSet {
  const toolSet: ToolSet = {};
  for (const boundTool of tools) {
    toolSet[boundTool.name] = tool({
      description: boundTool.description,
      inputSchema: boundTool.inputSchema,
      execute: async (input: unknown) => (await boundTool.invoke(input)).text,
    });
  }
  return toolSet;
}

/**
 * ModelClient backed by the Vercel AI SDK. Each turn is one `generateText`
 * call that may run up to `agent.maxSteps` tool-calling steps.
 */
export class AiSdkModelClient implements ModelClient {
  readonly id: string;
  private readonly model: LanguageModel;
  private readonly logger: Logger;
  private readonly maxRetries: number | undefined;

  constructor(
    private readonly context: AppContext,
    options: AiSdkModelClientOptions = {},
  ) {
    this.logger = context.logger.child('ModelClient');
    this.maxRetries = options.maxRetries;

    if (options.model) {
      this.model = options.model;
      this.id = options.id ?? 'custom';
      return;
    }

    const { provider, model } = context.config.ai;
    const selector = createProviderSelector(context.config.ai);
    const createModel = selector[provider];
    if (!createModel) {
      const available = getAvailableProviders(selector);
      throw new ConfigurationError(
        `No API key configured for AI provider "${provider}".` +
          (available.length > 0 ? ` Providers with keys: ${available.join(', ')}` : ''),
      );
    }

    const modelName = model ?? DEFAULT_MODELS[provider];
    this.model = createModel(modelName);
    this.id = `${provider}:${modelName}`;
  }

  async complete(request: TurnRequest): Promise<string> {
    const { agent, task, history } = request;
    const tools = toToolSet(agent.boundTools);
    const { maxSteps, temperature } = this.context.config.agent;

    this.logger.debug('Requesting turn', {
      agent: agent.name,
      history: history.length,
      tools: Object.keys(tools),
    });

    try {
      const result = await generateText({
        model: this.model,
        system: agent.systemPrompt,
        messages: toModelMessages(agent.name, task, history),
        tools: Object.keys(tools).length > 0 ? tools : undefined,
        temperature,
        stopWhen: stepCountIs(maxSteps),
        ...(this.maxRetries !== undefined ? { maxRetries: this.maxRetries } : {}),
      });

      this.logger.debug('Turn completed', {
        agent: agent.name,
        steps: result.steps.length,
        toolCalls: result.steps.flatMap((step) => step.toolCalls.map((call) => call.toolName)),
      });
      return result.text;
    } catch (error) {
      throw new ExternalServiceError(
        this.id,
        `Model call for ${agentLabel(agent)} failed: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }
}

function agentLabel(agent: AgentDescriptor): string {
  return `${agent.name} (${agent.role})`;
}
