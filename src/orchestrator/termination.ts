import type { Message } from './ConversationLog.js';

/**
 * Predicate evaluated after every append
 */
export interface TerminationCondition {
  readonly description: string;
  isSatisfied(messageCount: number, lastMessage: Message): boolean;
}

/**
 * Stop once `max` messages have been appended
 */
export function maxMessages(max: number): TerminationCondition {
  if (!Number.isInteger(max) || max <= 0) {
    throw new RangeError(`maxMessages must be a positive integer, got ${max}`);
  }
  return {
    description: `maxMessages(${max})`,
    isSatisfied: (messageCount) => messageCount >= max,
  };
}

/**
 * Stop when the last message contains `text` (e.g. "TERMINATE")
 */
export function textMention(text: string): TerminationCondition {
  if (text.length === 0) {
    throw new RangeError('textMention requires a non-empty string');
  }
  return {
    description: `textMention(${JSON.stringify(text)})`,
    isSatisfied: (_messageCount, lastMessage) => lastMessage.content.includes(text),
  };
}

/**
 * Stop when any of the given conditions holds
 */
export function anyOf(...conditions: TerminationCondition[]): TerminationCondition {
  if (conditions.length === 0) {
    throw new RangeError('anyOf requires at least one condition');
  }
  return {
    description: conditions.map((condition) => condition.description).join(' | '),
    isSatisfied: (messageCount, lastMessage) =>
      conditions.some((condition) => condition.isSatisfied(messageCount, lastMessage)),
  };
}
