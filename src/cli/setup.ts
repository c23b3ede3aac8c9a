/**
 * Shared wiring for CLI commands: context, descriptor and registry
 */

import { resolve } from 'node:path';

import {
  loadToolServers,
  type LoadedToolServers,
} from '../config/loaders/tool-server-loader.js';
import { createContext, type AppContext } from '../context.js';
import { CapabilityRegistry } from '../tools/CapabilityRegistry.js';

export interface CliSession {
  context: AppContext;
  descriptor: LoadedToolServers;
  registry: CapabilityRegistry;
}

/**
 * @param configPath - Descriptor path from `--config`; falls back to TOOL_SERVERS_PATH
 */
export function setupRegistry(configPath?: string, context: AppContext = createContext()): CliSession {
  const descriptorPath = resolve(configPath ?? context.config.session.toolServersPath);
  const descriptor = loadToolServers(descriptorPath);
  const registry = new CapabilityRegistry(context);
  registry.load(descriptor.servers.values());
  return { context, descriptor, registry };
}
