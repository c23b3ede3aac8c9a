/**
 * Provider Selector Exports
 */

export {
  createProviderSelector,
  getAvailableProviders,
  DEFAULT_MODELS,
  GROQ_BASE_URL,
  type ProviderName,
  type ProviderSelector,
  type ProviderSelectorConfig,
} from './provider-selector.js';
