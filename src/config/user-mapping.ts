/**
 * Board username <-> chat handle mapping.
 *
 * Built once from configuration and read-only afterwards. Lookups are
 * case-insensitive in both directions; chat handles are normalised to a
 * leading "@".
 */

import { ConfigError } from './config.js';

export function normalizeHandle(handle: string): string {
  const trimmed = handle.trim();
  return trimmed.startsWith('@') ? trimmed : `@${trimmed}`;
}

const key = (value: string) => value.trim().replace(/^@/, '').toLowerCase();

export class UserMapping {
  private boardToChat = new Map<string, { boardUsername: string; handle: string }>();
  private chatToBoard = new Map<string, string>();

  constructor(entries: Record<string, string> = {}) {
    for (const [boardUsername, handle] of Object.entries(entries)) {
      const boardKey = key(boardUsername);
      const chatKey = key(handle);
      if (!boardKey || !chatKey) {
        throw new ConfigError(`Empty entry in user mapping: "${boardUsername}" -> "${handle}"`);
      }
      if (this.boardToChat.has(boardKey)) {
        throw new ConfigError(`Board user "${boardUsername}" is mapped more than once`);
      }
      const existing = this.chatToBoard.get(chatKey);
      if (existing !== undefined) {
        throw new ConfigError(
          `Chat handle "${handle}" is mapped to both "${existing}" and "${boardUsername}"`
        );
      }
      this.boardToChat.set(boardKey, { boardUsername, handle: normalizeHandle(handle) });
      this.chatToBoard.set(chatKey, boardUsername);
    }
  }

  toChatHandle(boardUsername: string): string | null {
    return this.boardToChat.get(key(boardUsername))?.handle ?? null;
  }

  toBoardUsername(chatHandle: string): string | null {
    return this.chatToBoard.get(key(chatHandle)) ?? null;
  }

  get size(): number {
    return this.boardToChat.size;
  }

  toRecord(): Record<string, string> {
    const record: Record<string, string> = {};
    for (const { boardUsername, handle } of this.boardToChat.values()) {
      record[boardUsername] = handle;
    }
    return record;
  }
}
