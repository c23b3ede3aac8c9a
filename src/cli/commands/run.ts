/**
 * CLI Command: agent-roundtable run
 * Runs one round-robin session for a team preset and saves the conversation
 */

import process from 'node:process';

import type { Ora } from 'ora';

import { AgentFactory } from '../../agents/AgentFactory.js';
import { AiSdkModelClient } from '../../ai/model-client.js';
import { loadTeamPreset } from '../../config/loaders/team-loader.js';
import type { Message } from '../../orchestrator/ConversationLog.js';
import {
  RoundRobinOrchestrator,
  type TurnStartedEvent,
} from '../../orchestrator/RoundRobinOrchestrator.js';
import { anyOf, maxMessages, textMention } from '../../orchestrator/termination.js';
import { SessionPersister } from '../../persistence/SessionPersister.js';
import { cliOutput } from '../output.js';
import { setupRegistry } from '../setup.js';

export interface RunOptions {
  team: string;
  task: string;
  maxMessages?: number;
  /** Also stop when a message mentions this text */
  stopOn?: string;
  output?: string;
  config?: string;
}

export interface InterruptHandlers {
  /** First interrupt: cancel at the next turn boundary */
  onCancel: () => void;
  /** Any later interrupt, while a turn may still be in flight */
  onForceExit: () => void;
}

/**
 * SIGINT listener: the first signal aborts `controller`, later ones force an exit
 */
export function createInterruptHandler(
  controller: AbortController,
  handlers: InterruptHandlers,
): () => void {
  return () => {
    if (controller.signal.aborted) {
      handlers.onForceExit();
      return;
    }
    handlers.onCancel();
    controller.abort();
  };
}

export async function runCommand(options: RunOptions): Promise<void> {
  const { context, registry } = setupRegistry(options.config);
  const preset = loadTeamPreset(options.team);
  const modelClient = new AiSdkModelClient(context);
  const agents = new AgentFactory(context, registry).createTeam(preset, modelClient);

  const limit = options.maxMessages ?? context.config.session.maxMessages ?? preset.maxMessages;
  const termination = options.stopOn
    ? anyOf(maxMessages(limit), textMention(options.stopOn))
    : maxMessages(limit);

  const orchestrator = new RoundRobinOrchestrator(context, agents, termination);
  const persister = new SessionPersister(context);

  cliOutput.print(`Starting **${preset.id}** team session with \`${modelClient.id}\``);
  cliOutput.print(`  Agents: ${agents.map((agent) => agent.name).join(' → ')}`);
  cliOutput.print(`  Stops on: ${termination.description}`);
  cliOutput.print(`  Task: ${options.task}`);
  cliOutput.blank();

  let spinner: Ora | undefined;
  orchestrator.on('turnStarted', (event: TurnStartedEvent) => {
    spinner = cliOutput.spinner(`${event.agent} is working (turn ${event.turn + 1})...`);
  });
  orchestrator.on('message', (message: Message) => {
    spinner?.stop();
    spinner = undefined;
    cliOutput.print(`**[${message.sequenceNumber}] ${message.speaker}:**`, 'cyan');
    cliOutput.print(message.content);
    cliOutput.blank();
  });

  // First Ctrl-C cancels at the next turn boundary; a second one exits at once
  const controller = new AbortController();
  const handleSignal = createInterruptHandler(controller, {
    onCancel: () => {
      spinner?.stop();
      cliOutput.info('Cancelling after the current turn... (Ctrl-C again to exit now)');
      spinner?.start();
    },
    onForceExit: () => {
      spinner?.stop();
      cliOutput.warn('Interrupted again, exiting without saving the conversation');
      process.exitCode = 130;
      process.exit();
    },
  });
  process.on('SIGINT', handleSignal);

  try {
    const result = await orchestrator.run(options.task, { signal: controller.signal });
    spinner?.stop();

    if (result.error) {
      cliOutput.error(`Session ended early: ${result.error.message}`);
      process.exitCode = 1;
    } else if (result.status === 'cancelled') {
      cliOutput.warn(`Session cancelled after ${result.turns} message(s)`);
    } else {
      cliOutput.success(`Session complete after ${result.turns} message(s)`);
    }

    const destination = options.output ?? `${preset.id}_conversation.json`;
    const savedTo = await persister.save(result.messages, destination);
    cliOutput.success(`Conversation saved to \`${savedTo}\``);
  } finally {
    process.off('SIGINT', handleSignal);
  }
}
