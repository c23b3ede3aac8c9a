/**
 * CLI Command: agent-roundtable doctor
 * Validates the service configuration, tool-server descriptor and team presets
 */

import { existsSync, statSync } from 'node:fs';

import { isCapabilityGroup } from '../../tools/capability-groups.js';
import { listTeamPresets, loadTeamPreset } from '../../config/loaders/team-loader.js';
import { createContext, type AppContext } from '../../context.js';
import { errorMessage } from '../../errors.js';
import { createProviderSelector } from '../../ai/providers/index.js';
import { cliOutput } from '../output.js';
import { setupRegistry, type CliSession } from '../setup.js';

export interface DoctorOptions {
  config?: string;
  verbose?: boolean;
}

export async function doctorCommand(options: DoctorOptions = {}): Promise<void> {
  cliOutput.print('Running configuration diagnostics...');
  cliOutput.blank();

  const errors: string[] = [];
  const warnings: string[] = [];

  // 1. Service configuration
  cliOutput.success('Checking service configuration...');
  let context: AppContext;
  try {
    context = createContext();
  } catch (error) {
    cliOutput.error(`Service configuration is invalid: ${errorMessage(error)}`);
    throw new Error('Configuration validation failed', { cause: error });
  }

  const { provider } = context.config.ai;
  if (!createProviderSelector(context.config.ai)[provider]) {
    errors.push(`AI provider "${provider}" is selected but its API key is not set`);
  } else if (options.verbose) {
    cliOutput.print(`  AI provider: \`${provider}\``);
  }

  // 2. Tool-server descriptor
  cliOutput.success('Checking tool server descriptor...');
  let session: CliSession | undefined;
  try {
    session = setupRegistry(options.config, context);
  } catch (error) {
    errors.push(errorMessage(error));
  }

  if (session) {
    const { descriptor, registry } = session;
    cliOutput.print(`  Found ${descriptor.servers.size} tool server(s) in \`${descriptor.path}\``);
    for (const ref of descriptor.unresolvedEnvRefs) {
      warnings.push(`Server "${ref.server}" references undefined environment variable ${ref.variable}`);
    }
    for (const name of descriptor.servers.keys()) {
      if (!isCapabilityGroup(name)) {
        warnings.push(`Server "${name}" is not a known capability group and provides no tools`);
      }
    }
    if (options.verbose) {
      cliOutput.print(`  Tools: ${registry.getToolNames().join(', ') || 'none'}`);
    }
  }

  // 3. Workspace
  cliOutput.success('Checking workspace...');
  if (!existsSync(context.workspaceRoot)) {
    warnings.push(`Workspace ${context.workspaceRoot} does not exist yet; it is created on first write`);
  } else if (!statSync(context.workspaceRoot).isDirectory()) {
    errors.push(`Workspace ${context.workspaceRoot} is not a directory`);
  }

  // 4. Team presets
  cliOutput.success('Checking team presets...');
  try {
    for (const teamId of listTeamPresets()) {
      const preset = loadTeamPreset(teamId);
      cliOutput.print(`  - ${teamId}: ${preset.members.map((member) => member.name).join(', ')}`);
      for (const member of preset.members) {
        for (const toolName of member.toolNames ?? []) {
          if (session && !session.registry.hasTool(toolName)) {
            errors.push(`Team "${teamId}" member ${member.name} requests unavailable tool "${toolName}"`);
          }
        }
      }
    }
  } catch (error) {
    errors.push(errorMessage(error));
  }

  // 5. Report results
  cliOutput.blank();
  cliOutput.print('**=== Diagnostics Complete ===**');
  cliOutput.blank();

  if (errors.length > 0) {
    cliOutput.error(`Found ${errors.length} error(s):`);
    for (const error of errors) {
      cliOutput.error(`  ${error}`);
    }
  }

  if (warnings.length > 0) {
    cliOutput.blank();
    cliOutput.warn(`Found ${warnings.length} warning(s):`);
    for (const warning of warnings) {
      cliOutput.warn(`  ${warning}`);
    }
  }

  if (errors.length === 0 && warnings.length === 0) {
    cliOutput.success('No issues found. Configuration is valid!');
  }

  if (errors.length > 0) {
    throw new Error('Configuration validation failed');
  }
}
