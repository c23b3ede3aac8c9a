/**
 * Central registry of the tools available to agents
 */

import type { ToolServerConfig } from '../config/schemas/tool-server.schema.js';
import type { AppContext } from '../context.js';
import { CapabilityUnavailable, ConfigurationError } from '../errors.js';
import type { Logger } from '../utils/logger.js';

import { CAPABILITY_GROUPS, isCapabilityGroup } from './capability-groups.js';
import { PlaceholderRepositoryProvider, type RemoteRepositoryProvider } from './remote-tools.js';
import { bindTool } from './tool-factory.js';
import type { Tool } from './types.js';
import { WorkspaceSandbox } from './workspace.js';

export interface ToolServerSummary {
  name: string;
  description: string;
}

export interface CapabilitySummary {
  name: string;
  description: string;
  usage: string;
  server: string;
}

export interface CapabilityRegistryOptions {
  remoteProvider?: RemoteRepositoryProvider;
}

/**
 * Owns every Tool built from the descriptor. Agents hold references to these
 * Tool objects; nothing else creates tools.
 */
export class CapabilityRegistry {
  private readonly logger: Logger;
  private readonly sandbox: WorkspaceSandbox;
  private readonly remoteProvider: RemoteRepositoryProvider;
  private servers: ToolServerConfig[] = [];
  private tools: Map<string, Tool> = new Map();

  constructor(context: AppContext, options: CapabilityRegistryOptions = {}) {
    this.logger = context.logger.child('CapabilityRegistry');
    this.sandbox = new WorkspaceSandbox(context.workspaceRoot);
    this.remoteProvider = options.remoteProvider ?? new PlaceholderRepositoryProvider();
  }

  get workspaceRoot(): string {
    return this.sandbox.root;
  }

  /**
   * Rebuild the registry from descriptor entries. Performs no I/O.
   * @throws ConfigurationError if two groups would register the same tool name
   */
  load(configs: Iterable<ToolServerConfig>): void {
    const entries = Array.from(configs);
    const tools = new Map<string, Tool>();
    const deps = { sandbox: this.sandbox, remoteProvider: this.remoteProvider };

    for (const server of entries) {
      if (!isCapabilityGroup(server.name)) {
        this.logger.debug('Ignoring unrecognized capability group', { server: server.name });
        continue;
      }

      for (const spec of CAPABILITY_GROUPS[server.name](deps)) {
        if (tools.has(spec.name)) {
          throw new ConfigurationError(
            `Tool "${spec.name}" from server "${server.name}" is already registered`,
          );
        }
        tools.set(spec.name, bindTool(spec, server.name, this.logger));
      }
    }

    this.servers = entries;
    this.tools = tools;

    this.logger.debug('Capability registry built', {
      servers: entries.map((server) => server.name),
      tools: Array.from(tools.keys()),
    });
  }

  /**
   * Configured servers in descriptor order, recognized or not
   */
  listTools(): ToolServerSummary[] {
    return this.servers.map((server) => ({ name: server.name, description: server.description }));
  }

  /**
   * Built tools in registration order
   */
  listCapabilities(): CapabilitySummary[] {
    return Array.from(this.tools.values()).map((tool) => ({
      name: tool.name,
      description: tool.description,
      usage: tool.usage,
      server: tool.server,
    }));
  }

  getToolNames(): string[] {
    return Array.from(this.tools.keys());
  }

  hasTool(name: string): boolean {
    return this.tools.has(name);
  }

  /**
   * @throws CapabilityUnavailable if no such tool was built
   */
  resolve(name: string): Tool {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new CapabilityUnavailable(name);
    }
    return tool;
  }
}
