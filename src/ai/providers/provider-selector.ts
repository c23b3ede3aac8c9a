/**
 * Provider Selector - Multi-provider AI support
 * Enables selection of different AI providers (Groq, OpenAI, OpenRouter, xAI)
 */

import type { LanguageModel } from 'ai';
import { createOpenRouter } from '@openrouter/ai-sdk-provider';
import { createOpenAI } from '@ai-sdk/openai';
import { createXai } from '@ai-sdk/xai';

// ============================================================================
// Types
// ============================================================================

export type ProviderName = 'groq' | 'openai' | 'openrouter' | 'xai';

export interface ProviderSelectorConfig {
  groqApiKey?: string;
  openaiApiKey?: string;
  openRouterApiKey?: string;
  xaiApiKey?: string;
}

export type ProviderSelector = Partial<Record<ProviderName, (model?: string) => LanguageModel>>;

// ============================================================================
// Default Models
// ============================================================================

export const DEFAULT_MODELS = {
  groq: 'llama-3.1-8b-instant',
  openai: 'gpt-5-mini',
  openrouter: 'anthropic/claude-sonnet-4.5',
  xai: 'grok-4-fast-reasoning',
} as const satisfies Record<ProviderName, string>;

/** Groq serves an OpenAI-compatible chat completions API */
export const GROQ_BASE_URL = 'https://api.groq.com/openai/v1';

const PROVIDER_ORDER: readonly ProviderName[] = ['groq', 'openai', 'openrouter', 'xai'];

// ============================================================================
// Provider Selector
// ============================================================================

/**
 * Creates a provider selector with initialized providers based on available API keys
 *
 * @example
 * ```typescript
 * const selector = createProviderSelector({ groqApiKey: process.env['GROQ_API_KEY'] });
 *
 * if (selector.groq) {
 *   const model = selector.groq('llama-3.1-8b-instant');
 *   // Use with Vercel AI SDK...
 * }
 * ```
 */
export function createProviderSelector(config: ProviderSelectorConfig): ProviderSelector {
  const selector: ProviderSelector = {};

  // Groq (chat completions endpoint, not the responses API)
  if (config.groqApiKey) {
    const groq = createOpenAI({
      apiKey: config.groqApiKey,
      baseURL: GROQ_BASE_URL,
    });
    selector.groq = (model?: string) => groq.chat(model || DEFAULT_MODELS.groq);
  }

  // OpenAI
  if (config.openaiApiKey) {
    const openai = createOpenAI({
      apiKey: config.openaiApiKey,
    });
    selector.openai = (model?: string) => openai(model || DEFAULT_MODELS.openai);
  }

  // OpenRouter
  if (config.openRouterApiKey) {
    const openRouter = createOpenRouter({
      apiKey: config.openRouterApiKey,
    });
    selector.openrouter = (model?: string) => openRouter(model || DEFAULT_MODELS.openrouter);
  }

  // xAI
  if (config.xaiApiKey) {
    const xai = createXai({
      apiKey: config.xaiApiKey,
    });
    selector.xai = (model?: string) => xai(model || DEFAULT_MODELS.xai);
  }

  return selector;
}

/**
 * Gets list of available provider names from a provider selector
 *
 * @example
 * ```typescript
 * const availableProviders = getAvailableProviders(selector);
 * console.log('Available:', availableProviders); // ['groq', 'openai']
 * ```
 */
export function getAvailableProviders(selector: ProviderSelector): ProviderName[] {
  return PROVIDER_ORDER.filter((name) => selector[name] !== undefined);
}
