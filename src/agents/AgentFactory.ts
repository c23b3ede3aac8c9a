import type { TeamPreset } from '../config/loaders/team-loader.js';
import type { AppContext } from '../context.js';
import { DuplicateAgentError } from '../errors.js';
import type { CapabilityRegistry } from '../tools/CapabilityRegistry.js';
import type { Tool } from '../tools/types.js';
import type { Logger } from '../utils/logger.js';

import { composePrompt } from './prompt-composer.js';
import type { AgentDescriptor, AgentSpec, ModelClient } from './types.js';

/**
 * Builds immutable agent descriptors for one session. Tool references are
 * taken from the registry as-is, so every agent shares the registry's tools.
 */
export class AgentFactory {
  private readonly logger: Logger;
  private readonly names = new Set<string>();

  constructor(
    context: AppContext,
    private readonly registry: CapabilityRegistry,
  ) {
    this.logger = context.logger.child('AgentFactory');
  }

  /**
   * @throws CapabilityUnavailable if any requested tool is not registered
   * @throws DuplicateAgentError if the name is already taken in this session
   */
  createAgent(spec: AgentSpec): AgentDescriptor {
    if (this.names.has(spec.name)) {
      throw new DuplicateAgentError(spec.name);
    }

    const toolNames = spec.toolNames ?? this.registry.getToolNames();
    const boundTools: readonly Tool[] = Object.freeze(
      toolNames.map((toolName) => this.registry.resolve(toolName)),
    );
    const prompt = composePrompt(spec.basePrompt, boundTools);

    const agent: AgentDescriptor = Object.freeze({
      name: spec.name,
      role: spec.role,
      systemPrompt: prompt.content,
      boundTools,
      modelClient: spec.modelClient,
    });

    this.names.add(spec.name);
    this.logger.debug('Agent created', {
      agent: spec.name,
      role: spec.role,
      tools: boundTools.map((tool) => tool.name),
    });

    return agent;
  }

  /**
   * Create every member of a preset, in the preset's turn order
   */
  createTeam(preset: TeamPreset, modelClient: ModelClient): AgentDescriptor[] {
    const agents = preset.members.map((member) =>
      this.createAgent({
        name: member.name,
        role: member.role,
        basePrompt: member.basePrompt,
        ...(member.toolNames ? { toolNames: member.toolNames } : {}),
        modelClient,
      }),
    );
    this.logger.info(`Team "${preset.id}" created with ${agents.length} agents`);
    return agents;
  }
}
