/**
 * CLI Command: agent-roundtable tools
 * Lists configured tool servers and the tools built from them
 */

import { cliOutput } from '../output.js';
import { setupRegistry } from '../setup.js';

export interface ToolsOptions {
  config?: string;
}

export async function toolsCommand(options: ToolsOptions = {}): Promise<void> {
  const { descriptor, registry } = setupRegistry(options.config);

  cliOutput.print(`Tool servers from \`${descriptor.path}\``);
  cliOutput.blank();

  const servers = registry.listTools();
  if (servers.length === 0) {
    cliOutput.warn('No tool servers configured');
  }
  for (const server of servers) {
    cliOutput.print(`  - **${server.name}**: ${server.description || '(no description)'}`);
  }

  cliOutput.blank();
  cliOutput.print('**Available tools:**');
  const capabilities = registry.listCapabilities();
  if (capabilities.length === 0) {
    cliOutput.print('  none');
  }
  for (const capability of capabilities) {
    cliOutput.print(`  - \`${capability.usage}\` [${capability.server}] ${capability.description}`);
  }
  cliOutput.blank();
  cliOutput.print(`Workspace: \`${registry.workspaceRoot}\``);
}
