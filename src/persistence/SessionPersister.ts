import { existsSync } from 'node:fs';
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { basename, dirname, join, resolve } from 'node:path';

import { v7 as uuidv7 } from 'uuid';
import { z } from 'zod';

import type { AppContext } from '../context.js';
import { PersistenceError, errorMessage } from '../errors.js';
import type { ConversationLog, Message } from '../orchestrator/ConversationLog.js';
import type { Logger } from '../utils/logger.js';

/**
 * On-disk shape of one message
 */
export const PersistedMessageSchema = z.object({
  speaker: z.string(),
  content: z.string(),
  sequenceNumber: z.number().int().nonnegative(),
  timestamp: z.string().datetime({ offset: true }),
});

export const PersistedSessionSchema = z.array(PersistedMessageSchema);

export type PersistedMessage = z.infer<typeof PersistedMessageSchema>;

function toRecord(message: Message): PersistedMessage {
  return {
    speaker: message.speaker,
    content: message.content,
    sequenceNumber: message.sequenceNumber,
    timestamp: message.timestamp.toISOString(),
  };
}

/**
 * Writes conversation logs as flat JSON files and reads them back
 */
export class SessionPersister {
  private readonly logger: Logger;

  constructor(context: AppContext) {
    this.logger = context.logger.child('SessionPersister');
  }

  /**
   * Write the log atomically (temp file then rename). The log itself is only
   * read.
   * @returns Absolute path written
   * @throws PersistenceError on any I/O failure
   */
  async save(log: ConversationLog | readonly Message[], destination: string): Promise<string> {
    const messages = 'messages' in log ? log.messages : log;
    const target = resolve(destination);
    const tempPath = join(dirname(target), `.${basename(target)}.${uuidv7()}.tmp`);
    const body = `${JSON.stringify(messages.map(toRecord), null, 2)}\n`;

    try {
      await mkdir(dirname(target), { recursive: true });
      await writeFile(tempPath, body, 'utf-8');
      await rename(tempPath, target);
    } catch (error) {
      await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        this.logger.warn('Could not remove temporary session file', {
          path: tempPath,
          error: errorMessage(cleanupError),
        });
      });
      throw new PersistenceError(
        target,
        `Failed to save conversation to ${target}: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    this.logger.info(`Conversation saved to ${target}`, { messages: messages.length });
    return target;
  }

  /**
   * Read a file written by `save`. Order and content are reproduced exactly.
   * @throws PersistenceError if the file is missing, malformed or out of order
   */
  async load(source: string): Promise<Message[]> {
    const fullPath = resolve(source);
    if (!existsSync(fullPath)) {
      throw new PersistenceError(fullPath, `Conversation file not found: ${fullPath}`);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(fullPath, 'utf-8'));
    } catch (error) {
      throw new PersistenceError(
        fullPath,
        `Failed to read conversation file ${fullPath}: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    const result = PersistedSessionSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new PersistenceError(fullPath, `Invalid conversation file ${fullPath}: ${issues}`, {
        cause: result.error,
      });
    }

    let previous = -1;
    for (const record of result.data) {
      if (record.sequenceNumber <= previous) {
        throw new PersistenceError(
          fullPath,
          `Invalid conversation file ${fullPath}: sequence number ${record.sequenceNumber} follows ${previous}`,
        );
      }
      previous = record.sequenceNumber;
    }

    this.logger.debug(`Conversation loaded from ${fullPath}`, { messages: result.data.length });
    return result.data.map((record) =>
      Object.freeze({
        speaker: record.speaker,
        content: record.content,
        sequenceNumber: record.sequenceNumber,
        timestamp: new Date(record.timestamp),
      }),
    );
  }
}
