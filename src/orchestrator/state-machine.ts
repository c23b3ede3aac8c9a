import { SessionStateError } from '../errors.js';

export type SessionState = 'idle' | 'running' | 'terminated' | 'cancelled';

export const validTransitions: Record<SessionState, readonly SessionState[]> = {
  idle: ['running', 'cancelled'],
  running: ['terminated', 'cancelled'],
  terminated: [],
  cancelled: [],
} as const;

export function canTransition(from: SessionState, to: SessionState): boolean {
  return validTransitions[from].includes(to);
}

export function isTerminal(state: SessionState): boolean {
  return validTransitions[state].length === 0;
}

export function ensureTransition(sessionId: string, from: SessionState, to: SessionState): void {
  if (!canTransition(from, to)) {
    throw new SessionStateError(`Invalid session transition ${from} -> ${to} for ${sessionId}`);
  }
}
