import type { Message } from '../orchestrator/ConversationLog.js';
import type { Tool } from '../tools/types.js';

/**
 * What an agent sees when it is asked for its next message
 */
export interface TurnRequest {
  agent: AgentDescriptor;
  /** The task the session was started with */
  task: string;
  /** Every message appended so far, in sequence order */
  history: readonly Message[];
}

/**
 * Opaque producer of agent turns. May call the agent's bound tools while
 * producing the message. A rejection ends the session.
 */
export interface ModelClient {
  readonly id: string;
  complete(request: TurnRequest): Promise<string>;
}

export interface AgentDescriptor {
  readonly name: string;
  readonly role: string;
  readonly systemPrompt: string;
  readonly boundTools: readonly Tool[];
  readonly modelClient: ModelClient;
}

export interface AgentSpec {
  name: string;
  role: string;
  basePrompt: string;
  /** Tools to bind, in prompt order. Omit to bind every registered tool. */
  toolNames?: readonly string[];
  modelClient: ModelClient;
}
