/**
 * Round-robin turn loop over a fixed list of agents.
 *
 * Turns run strictly one after another. The model-client call is the only
 * await inside a turn; cancellation is observed between turns.
 */

import { EventEmitter } from 'node:events';

import { v7 as uuidv7 } from 'uuid';

import type { AgentDescriptor } from '../agents/types.js';
import type { AppContext } from '../context.js';
import {
  ConfigurationError,
  DuplicateAgentError,
  ExternalServiceError,
  errorMessage,
} from '../errors.js';
import type { Logger } from '../utils/logger.js';

import { ConversationLog, type Message } from './ConversationLog.js';
import { ensureTransition, isTerminal, type SessionState } from './state-machine.js';
import type { TerminationCondition } from './termination.js';

export type StopReason = 'condition' | 'error' | 'cancelled';

export interface SessionResult {
  sessionId: string;
  status: Extract<SessionState, 'terminated' | 'cancelled'>;
  reason: StopReason;
  messages: readonly Message[];
  /** Completed turns, equal to the number of messages */
  turns: number;
  error?: ExternalServiceError;
}

export interface OrchestratorOptions {
  sessionId?: string;
  /** Clock used for message timestamps */
  now?: () => Date;
}

export interface RunOptions {
  /** Aborting requests cooperative cancellation */
  signal?: AbortSignal;
}

export interface TurnStartedEvent {
  sessionId: string;
  turn: number;
  agent: string;
}

export interface StateChangedEvent {
  sessionId: string;
  from: SessionState;
  to: SessionState;
}

/**
 * Events: `turnStarted` (TurnStartedEvent), `message` (Message),
 * `stateChanged` (StateChangedEvent)
 */
export class RoundRobinOrchestrator extends EventEmitter {
  readonly sessionId: string;
  private readonly logger: Logger;
  private readonly agents: readonly AgentDescriptor[];
  private readonly log = new ConversationLog();
  private readonly now: () => Date;
  private currentState: SessionState = 'idle';
  private turn = 0;
  private cancelRequested = false;

  constructor(
    context: AppContext,
    agents: readonly AgentDescriptor[],
    private readonly termination: TerminationCondition,
    options: OrchestratorOptions = {},
  ) {
    super();
    if (agents.length === 0) {
      throw new ConfigurationError('A session needs at least one agent');
    }
    const seen = new Set<string>();
    for (const agent of agents) {
      if (seen.has(agent.name)) {
        throw new DuplicateAgentError(agent.name);
      }
      seen.add(agent.name);
    }

    this.agents = Object.freeze([...agents]);
    this.sessionId = options.sessionId ?? uuidv7();
    this.now = options.now ?? (() => new Date());
    this.logger = context.logger.child('Orchestrator');
  }

  get state(): SessionState {
    return this.currentState;
  }

  get messages(): readonly Message[] {
    return this.log.messages;
  }

  /**
   * Request cancellation. Before `run` the session is cancelled at once;
   * while running it takes effect at the next turn boundary, after any
   * in-flight turn has been appended.
   */
  cancel(): void {
    if (this.currentState === 'idle') {
      this.transition('cancelled');
      return;
    }
    if (this.currentState === 'running' && !this.cancelRequested) {
      this.cancelRequested = true;
      this.logger.info('Cancellation requested', { sessionId: this.sessionId, turn: this.turn });
    }
  }

  /**
   * Drive the conversation until the termination condition holds, a model
   * call fails, or cancellation is observed.
   * @throws SessionStateError if the session already ran or was cancelled
   * @throws whatever an event listener or the termination condition throws,
   *   after the session has moved to `terminated`
   */
  async run(task: string, options: RunOptions = {}): Promise<SessionResult> {
    this.transition('running');
    this.logger.info('Session started', {
      sessionId: this.sessionId,
      agents: this.agents.map((agent) => agent.name),
      termination: this.termination.description,
    });

    const { signal } = options;
    const onAbort = (): void => this.cancel();
    if (signal?.aborted) {
      this.cancel();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    try {
      return await this.loop(task);
    } catch (error) {
      if (this.currentState === 'running') {
        this.logger.error('Session stopped by an unexpected error', error, {
          sessionId: this.sessionId,
          messages: this.log.size,
        });
        this.transition('terminated');
      }
      throw error;
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }
  }

  private async loop(task: string): Promise<SessionResult> {
    for (;;) {
      if (this.cancelRequested) {
        return this.finish('cancelled', 'cancelled');
      }

      const agent = this.currentAgent();
      this.emit('turnStarted', {
        sessionId: this.sessionId,
        turn: this.turn,
        agent: agent.name,
      } satisfies TurnStartedEvent);

      let content: string;
      try {
        content = await this.requestTurn(agent, task);
      } catch (error) {
        const failure =
          error instanceof ExternalServiceError
            ? error
            : new ExternalServiceError(
                agent.modelClient.id,
                `Model client "${agent.modelClient.id}" failed during ${agent.name}'s turn: ${errorMessage(error)}`,
                { cause: error },
              );
        this.logger.error('Model client failed, ending session', failure, {
          sessionId: this.sessionId,
          agent: agent.name,
        });
        return this.finish('terminated', 'error', failure);
      }

      const message = this.log.append(agent.name, content, this.now());
      this.logger.debug('Message appended', {
        sessionId: this.sessionId,
        agent: agent.name,
        sequenceNumber: message.sequenceNumber,
      });
      this.emit('message', message);

      if (this.termination.isSatisfied(this.log.size, message)) {
        return this.finish('terminated', 'condition');
      }
      this.turn += 1;
    }
  }

  private currentAgent(): AgentDescriptor {
    const agent = this.agents[this.turn % this.agents.length];
    if (!agent) {
      throw new ConfigurationError('A session needs at least one agent');
    }
    return agent;
  }

  private async requestTurn(agent: AgentDescriptor, task: string): Promise<string> {
    const response: unknown = await agent.modelClient.complete({
      agent,
      task,
      history: this.log.messages,
    });
    if (typeof response !== 'string') {
      throw new ExternalServiceError(
        agent.modelClient.id,
        `Model client "${agent.modelClient.id}" returned a malformed response during ${agent.name}'s turn`,
      );
    }
    return response;
  }

  private finish(
    status: SessionResult['status'],
    reason: StopReason,
    error?: ExternalServiceError,
  ): SessionResult {
    this.transition(status);
    this.logger.info('Session ended', {
      sessionId: this.sessionId,
      status,
      reason,
      messages: this.log.size,
    });
    return {
      sessionId: this.sessionId,
      status,
      reason,
      messages: this.log.messages,
      turns: this.log.size,
      ...(error ? { error } : {}),
    };
  }

  private transition(to: SessionState): void {
    const from = this.currentState;
    ensureTransition(this.sessionId, from, to);
    this.currentState = to;
    this.emit('stateChanged', { sessionId: this.sessionId, from, to } satisfies StateChangedEvent);
    if (isTerminal(to)) {
      this.cancelRequested = false;
    }
  }
}
