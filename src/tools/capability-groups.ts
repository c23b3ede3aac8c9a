import { createFileSystemTools } from './file-tools.js';
import { createRemoteRepositoryTools, type RemoteRepositoryProvider } from './remote-tools.js';
import type { ToolSpec } from './types.js';
import type { WorkspaceSandbox } from './workspace.js';

export interface CapabilityGroupDeps {
  sandbox: WorkspaceSandbox;
  remoteProvider: RemoteRepositoryProvider;
}

/**
 * Descriptor entry name → the fixed tool set it enables.
 * Evaluated once per registry build; entries not listed here are ignored.
 */
export const CAPABILITY_GROUPS = {
  fs: (deps: CapabilityGroupDeps) => createFileSystemTools(deps.sandbox),
  github: (deps: CapabilityGroupDeps) => createRemoteRepositoryTools(deps.remoteProvider),
} as const satisfies Record<string, (deps: CapabilityGroupDeps) => ToolSpec[]>;

export type CapabilityGroupName = keyof typeof CAPABILITY_GROUPS;

export function isCapabilityGroup(name: string): name is CapabilityGroupName {
  return Object.hasOwn(CAPABILITY_GROUPS, name);
}
