/**
 * Relay State Store
 *
 * Pinned report records, the last-seen card snapshot and the user mapping in
 * effect, persisted as one versioned JSON file. Writes go to a temporary file
 * that is renamed over the target.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { nanoid } from 'nanoid';
import type { Logger } from 'pino';

export const STATE_VERSION = 1;

export class StateCorruptionError extends Error {
  constructor(
    message: string,
    public readonly filePath: string
  ) {
    super(`${filePath}: ${message}`);
    this.name = 'StateCorruptionError';
  }
}

const categorySchema = z.enum(['completed', 'overdue', 'long-running', 'in-progress', 'uncategorized']);

const pinnedMessageSchema = z.object({
  slot: z.string(),
  chatId: z.string(),
  messageId: z.number().int(),
  pinnedAt: z.string(),
  messageUrl: z.string(),
});

const cardSnapshotSchema = z.object({
  boardId: z.string(),
  listId: z.string(),
  category: categorySchema,
  memberIds: z.array(z.string()),
  listSince: z.string(),
});

const relayStateSchema = z.object({
  version: z.literal(STATE_VERSION),
  pinned: z.array(pinnedMessageSchema),
  snapshot: z.record(cardSnapshotSchema),
  userMappings: z.record(z.string()),
});

/** Pinned-message file written by earlier releases */
const legacyPinnedSchema = z.object({
  messages: z.array(
    z.object({
      chat_id: z.union([z.string(), z.number()]),
      message_id: z.number().int(),
      pinned_at: z.string().default('unknown'),
      message_url: z.string().default(''),
    })
  ),
});

export type PinnedMessageRecord = z.infer<typeof pinnedMessageSchema>;
export type CardSnapshot = z.infer<typeof cardSnapshotSchema>;
export type LastSeenSnapshot = Record<string, CardSnapshot>;
export type RelayState = z.infer<typeof relayStateSchema>;

export const LEGACY_SLOT = 'legacy-report';

export function emptyState(): RelayState {
  return { version: STATE_VERSION, pinned: [], snapshot: {}, userMappings: {} };
}

/**
 * Parse file contents into a state value
 * @throws StateCorruptionError when the contents are not a known state shape
 */
export function parseState(content: string, filePath: string): RelayState {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new StateCorruptionError(`Invalid JSON: ${(error as Error).message}`, filePath);
  }

  const current = relayStateSchema.safeParse(raw);
  if (current.success) {
    return current.data;
  }

  const legacy = legacyPinnedSchema.safeParse(raw);
  if (legacy.success) {
    return {
      ...emptyState(),
      pinned: legacy.data.messages.map((msg) => ({
        slot: `${LEGACY_SLOT}:${msg.chat_id}`,
        chatId: String(msg.chat_id),
        messageId: msg.message_id,
        pinnedAt: msg.pinned_at,
        messageUrl: msg.message_url,
      })),
    };
  }

  const issue = current.error.errors[0];
  throw new StateCorruptionError(
    `Unrecognised state at ${issue?.path.join('.') || '(root)'}: ${issue?.message ?? 'invalid'}`,
    filePath
  );
}

export interface StateStoreOptions {
  filePath: string;
  logger: Logger;
}

export class StateStore {
  readonly filePath: string;
  private logger: Logger;

  constructor(options: StateStoreOptions) {
    this.filePath = path.resolve(options.filePath);
    this.logger = options.logger.child({ component: 'state-store' });
  }

  /**
   * Load the state. A missing file yields the empty state; an unreadable one
   * is reported and also yields the empty state.
   */
  async load(): Promise<RelayState> {
    try {
      const content = await this.readRaw();
      return content === null ? emptyState() : parseState(content, this.filePath);
    } catch (error) {
      if (!(error instanceof StateCorruptionError)) throw error;
      this.logger.error(
        { filePath: this.filePath, error: error.message },
        'State file is corrupt, continuing with empty state'
      );
      return emptyState();
    }
  }

  async save(state: RelayState): Promise<void> {
    const validated = relayStateSchema.parse(state);
    const tempPath = `${this.filePath}.${nanoid(8)}.tmp`;

    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    try {
      await fs.writeFile(tempPath, JSON.stringify(validated, null, 2) + '\n', 'utf-8');
      await fs.rename(tempPath, this.filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw error;
    }

    this.logger.debug(
      { pinned: validated.pinned.length, cards: Object.keys(validated.snapshot).length },
      'State saved'
    );
  }

  /**
   * Raw file contents, or null when there is no file yet
   */
  async readRaw(): Promise<string | null> {
    try {
      return await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return null;
      }
      throw new StateCorruptionError(`Cannot read file: ${(error as Error).message}`, this.filePath);
    }
  }
}
