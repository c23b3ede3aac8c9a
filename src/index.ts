/**
 * Agent Roundtable
 * Round-robin multi-agent conversations over a sandboxed tool registry
 */

export { loadServiceConfig, ServiceConfigSchema, type ServiceConfig, type AIProviderName } from './config.js';
export { createContext, type AppContext, type CreateContextOptions } from './context.js';
export * from './errors.js';
export { Logger, LogLevel, type LogContext, type LogLevelName, type LoggerOptions } from './utils/logger.js';

export {
  loadToolServers,
  type LoadedToolServers,
  type LoadToolServersOptions,
} from './config/loaders/tool-server-loader.js';
export type { ToolServerConfig } from './config/schemas/tool-server.schema.js';
export {
  DEFAULT_PRESETS_DIR,
  listTeamPresets,
  loadTeamPreset,
  type TeamPreset,
  type TeamMemberPreset,
} from './config/loaders/team-loader.js';

export {
  CapabilityRegistry,
  type CapabilityRegistryOptions,
  type CapabilitySummary,
  type ToolServerSummary,
} from './tools/CapabilityRegistry.js';
export { CAPABILITY_GROUPS, type CapabilityGroupName } from './tools/capability-groups.js';
export {
  PlaceholderRepositoryProvider,
  type RemoteRepositoryProvider,
} from './tools/remote-tools.js';
export { TOOL_NAMES, type Tool, type ToolKind, type ToolName, type ToolOutcome } from './tools/types.js';

export { AgentFactory } from './agents/AgentFactory.js';
export { composePrompt, COLLABORATION_INSTRUCTION } from './agents/prompt-composer.js';
export type { AgentDescriptor, AgentSpec, ModelClient, TurnRequest } from './agents/types.js';

export { AiSdkModelClient, type AiSdkModelClientOptions } from './ai/model-client.js';
export {
  createProviderSelector,
  DEFAULT_MODELS,
  type ProviderName,
  type ProviderSelector,
} from './ai/providers/index.js';

export { ConversationLog, type Message } from './orchestrator/ConversationLog.js';
export {
  RoundRobinOrchestrator,
  type OrchestratorOptions,
  type RunOptions,
  type SessionResult,
  type StopReason,
} from './orchestrator/RoundRobinOrchestrator.js';
export { type SessionState } from './orchestrator/state-machine.js';
export {
  anyOf,
  maxMessages,
  textMention,
  type TerminationCondition,
} from './orchestrator/termination.js';
export { SessionPersister } from './persistence/SessionPersister.js';
