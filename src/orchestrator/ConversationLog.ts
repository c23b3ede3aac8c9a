export interface Message {
  readonly speaker: string;
  readonly content: string;
  readonly sequenceNumber: number;
  readonly timestamp: Date;
}

/**
 * Append-only record of a session. Sequence numbers start at 0 and follow
 * insertion order.
 */
export class ConversationLog {
  private readonly entries: Message[] = [];

  append(speaker: string, content: string, timestamp: Date = new Date()): Message {
    const message: Message = Object.freeze({
      speaker,
      content,
      sequenceNumber: this.entries.length,
      timestamp,
    });
    this.entries.push(message);
    return message;
  }

  get size(): number {
    return this.entries.length;
  }

  get last(): Message | undefined {
    return this.entries.at(-1);
  }

  /** Ordered snapshot; later appends do not affect it */
  get messages(): readonly Message[] {
    return Object.freeze([...this.entries]);
  }
}
