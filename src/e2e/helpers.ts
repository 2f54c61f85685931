/**
 * Test Helpers
 *
 * In-process stand-ins for the board service and the chat service, plus
 * builders for boards and cards. Nothing here touches the network.
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import pino, { type Logger } from 'pino';
import { vi } from 'vitest';
import {
  UpstreamError,
  type BoardClient,
  type BoardFetchResult,
  type FetchBoardOptions,
} from '../board/board-client.js';
import type { Board, BoardList, BoardMember, Card } from '../board/types.js';
import { DeliveryError, type ChatClient, type ChatOperation } from '../channels/types.js';
import { StateStore } from '../state/state-store.js';

// ---------------------------------------------------------------------------
// Silent logger for tests
// ---------------------------------------------------------------------------
export const testLogger = pino({ level: 'silent' });

/**
 * Logger whose calls can be asserted on. `child` returns the same mock, so
 * component loggers record into it too.
 */
export function createMockLogger() {
  const mock = {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn(),
  };
  mock.child.mockReturnValue(mock);
  return { mock, logger: mock as unknown as Logger };
}

// ---------------------------------------------------------------------------
// Builders
// ---------------------------------------------------------------------------

export function member(username: string, id = `m-${username}`): BoardMember {
  return { id, username, fullName: username };
}

export function makeCard(overrides: Partial<Card> & Pick<Card, 'id'>): Card {
  return {
    title: `Card ${overrides.id}`,
    url: `https://trello.com/c/${overrides.id}`,
    boardId: 'board-a',
    listId: 'list-todo',
    due: null,
    start: null,
    members: [],
    enteredListAt: null,
    lastActivityAt: null,
    archived: false,
    ...overrides,
  };
}

/**
 * Board with the usual lists: To Do, In Progress, Done
 */
export function makeBoard(id: string, name: string, cards: Card[] = []): Board {
  const lists: BoardList[] = [
    { id: 'list-todo', name: 'To Do', boardId: id, position: 1 },
    { id: 'list-doing', name: 'In Progress', boardId: id, position: 2 },
    { id: 'list-done', name: 'Done', boardId: id, position: 3 },
  ];
  return {
    id,
    name,
    url: `https://trello.com/b/${id}`,
    lists,
    cards: cards.map((card) => ({ ...card, boardId: id })),
  };
}

// ---------------------------------------------------------------------------
// Fake board client
// ---------------------------------------------------------------------------

/**
 * Serves boards from memory. Board ids listed in `failing` reject with an
 * UpstreamError, as an unreachable board would.
 */
export class FakeBoardClient implements BoardClient {
  boards = new Map<string, Board>();
  failing = new Set<string>();
  fetchCalls: Array<{ boardId: string; options: FetchBoardOptions }> = [];
  username = 'relay-bot';

  constructor(boards: Board[] = []) {
    for (const board of boards) {
      this.boards.set(board.id, board);
    }
  }

  setBoard(board: Board): void {
    this.boards.set(board.id, board);
  }

  async fetchBoard(boardId: string, options: FetchBoardOptions = {}): Promise<Board> {
    this.fetchCalls.push({ boardId, options });
    const board = this.boards.get(boardId);
    if (this.failing.has(boardId) || !board) {
      throw new UpstreamError('Trello API error: 503 Service Unavailable', boardId, `boards/${boardId}`, 503);
    }
    return {
      ...board,
      cards: board.cards.filter((card) => options.includeArchived || !card.archived),
    };
  }

  async fetchBoards(boardIds: readonly string[], options: FetchBoardOptions = {}): Promise<BoardFetchResult> {
    const result: BoardFetchResult = { boards: [], failures: [] };
    for (const boardId of boardIds) {
      try {
        result.boards.push(await this.fetchBoard(boardId, options));
      } catch (error) {
        if (!(error instanceof UpstreamError)) throw error;
        result.failures.push({ boardId, error });
      }
    }
    return result;
  }

  async testAuthentication(): Promise<string> {
    return this.username;
  }
}

// ---------------------------------------------------------------------------
// Fake chat client
// ---------------------------------------------------------------------------

export interface SentMessage {
  chatId: string;
  messageId: number;
  text: string;
}

/**
 * Records every chat operation. Operations listed in `failing` throw a
 * DeliveryError instead.
 */
export class FakeChatClient implements ChatClient {
  readonly defaultChatId: string;
  sent: SentMessage[] = [];
  edits: Array<{ chatId: string; messageId: number; text: string }> = [];
  pinned: Array<{ chatId: string; messageId: number }> = [];
  unpinned: Array<{ chatId: string; messageId: number }> = [];
  deleted: Array<{ chatId: string; messageId: number }> = [];
  commandsCleared = 0;
  failing = new Set<ChatOperation>();
  private nextId: number;
  private mentions: Record<string, string>;

  constructor(options: { defaultChatId?: string; firstMessageId?: number; mentions?: Record<string, string> } = {}) {
    this.defaultChatId = options.defaultChatId ?? '-1001234567890';
    this.nextId = options.firstMessageId ?? 100;
    this.mentions = options.mentions ?? {};
  }

  private check(operation: ChatOperation, chatId: string, messageId?: number): void {
    if (this.failing.has(operation)) {
      throw new DeliveryError('Bad Request: simulated failure', operation, chatId, messageId);
    }
  }

  async send(text: string, chatId: string = this.defaultChatId): Promise<number> {
    this.check('send', chatId);
    const messageId = this.nextId++;
    this.sent.push({ chatId, messageId, text });
    return messageId;
  }

  async edit(messageId: number, text: string, chatId: string = this.defaultChatId): Promise<void> {
    this.check('edit', chatId, messageId);
    this.edits.push({ chatId, messageId, text });
  }

  async pin(messageId: number, chatId: string = this.defaultChatId): Promise<void> {
    this.check('pin', chatId, messageId);
    this.pinned.push({ chatId, messageId });
  }

  async unpin(messageId: number, chatId: string = this.defaultChatId): Promise<void> {
    this.check('unpin', chatId, messageId);
    this.unpinned.push({ chatId, messageId });
  }

  async delete(messageId: number, chatId: string = this.defaultChatId): Promise<void> {
    this.check('delete', chatId, messageId);
    this.deleted.push({ chatId, messageId });
  }

  async clearCommands(): Promise<void> {
    this.check('clear_commands', this.defaultChatId);
    this.commandsCleared++;
  }

  resolveMention(boardUsername: string): string | null {
    return this.mentions[boardUsername] ?? null;
  }

  messageUrl(chatId: string, messageId: number): string {
    return `https://chat.test/${chatId}/${messageId}`;
  }
}

// ---------------------------------------------------------------------------
// Temporary state
// ---------------------------------------------------------------------------

export async function createTempDir(prefix = 'board-relay-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export function createStateStore(dir: string, file = 'relay-state.json'): StateStore {
  return new StateStore({ filePath: path.join(dir, file), logger: testLogger });
}
