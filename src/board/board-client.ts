/**
 * Trello board client
 *
 * Read-only wrapper over the Trello REST API. Each board is fetched with
 * four parallel calls (board, lists, cards, list-move actions); the actions
 * give the time a card entered its current list.
 */

import { z } from 'zod';
import type { Board, BoardList, Card } from './types.js';

const DEFAULT_BASE_URL = 'https://api.trello.com/1';
const DEFAULT_TIMEOUT_MS = 30000;
const ACTIONS_LIMIT = 1000;

/**
 * Board-service call failed: non-2xx response, network error or a payload
 * that does not match the expected shape.
 */
export class UpstreamError extends Error {
  constructor(
    message: string,
    public readonly boardId?: string,
    public readonly endpoint?: string,
    public readonly status?: number
  ) {
    super(boardId ? `Board ${boardId}: ${message}` : message);
    this.name = 'UpstreamError';
  }
}

// ============ Payload schemas ============

const boardPayload = z.object({
  id: z.string(),
  name: z.string(),
  url: z.string().default(''),
});

const listPayload = z.object({
  id: z.string(),
  name: z.string(),
  pos: z.number().default(0),
  closed: z.boolean().default(false),
});

const memberPayload = z.object({
  id: z.string(),
  username: z.string(),
  fullName: z.string().default(''),
});

const cardPayload = z.object({
  id: z.string(),
  name: z.string(),
  idList: z.string(),
  shortUrl: z.string().default(''),
  due: z.string().nullable().default(null),
  start: z.string().nullable().default(null),
  dateLastActivity: z.string().nullable().default(null),
  closed: z.boolean().default(false),
  members: z.array(memberPayload).default([]),
});

const actionPayload = z.object({
  type: z.string(),
  date: z.string(),
  data: z
    .object({
      card: z.object({ id: z.string() }).optional(),
      list: z.object({ id: z.string() }).optional(),
      listAfter: z.object({ id: z.string() }).optional(),
    })
    .default({}),
});

const memberMePayload = z.object({
  id: z.string(),
  username: z.string(),
});

type CardPayload = z.infer<typeof cardPayload>;
type ActionPayload = z.infer<typeof actionPayload>;

// ============ Client ============

export interface FetchBoardOptions {
  /** Include archived cards (used for weekly statistics) */
  includeArchived?: boolean;
}

export interface BoardFetchFailure {
  boardId: string;
  error: UpstreamError;
}

export interface BoardFetchResult {
  boards: Board[];
  failures: BoardFetchFailure[];
}

/**
 * What the relay needs from a board service
 */
export interface BoardClient {
  fetchBoard(boardId: string, options?: FetchBoardOptions): Promise<Board>;
  fetchBoards(boardIds: readonly string[], options?: FetchBoardOptions): Promise<BoardFetchResult>;
  testAuthentication(): Promise<string>;
}

export interface TrelloBoardClientOptions {
  apiKey: string;
  token: string;
  baseUrl?: string;
  timeout?: number;
  fetchFn?: typeof fetch;
}

function parseDate(value: string | null): Date | null {
  if (!value) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Latest time each card entered the list it was moved (or created) into,
 * keyed by `cardId:listId`
 */
export function listEntryTimes(actions: ActionPayload[]): Map<string, Date> {
  const entries = new Map<string, Date>();
  for (const action of actions) {
    const cardId = action.data.card?.id;
    const listId = action.type === 'createCard' ? action.data.list?.id : action.data.listAfter?.id;
    const date = parseDate(action.date);
    if (!cardId || !listId || !date) continue;

    const key = `${cardId}:${listId}`;
    const previous = entries.get(key);
    if (!previous || previous.getTime() < date.getTime()) {
      entries.set(key, date);
    }
  }
  return entries;
}

export class TrelloBoardClient implements BoardClient {
  private apiKey: string;
  private token: string;
  private baseUrl: string;
  private timeout: number;
  private fetchFn: typeof fetch;

  constructor(options: TrelloBoardClientOptions) {
    this.apiKey = options.apiKey;
    this.token = options.token;
    this.baseUrl = (options.baseUrl || DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.timeout = options.timeout || DEFAULT_TIMEOUT_MS;
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
  }

  async testAuthentication(): Promise<string> {
    const me = await this.request('members/me', {}, memberMePayload);
    return me.username;
  }

  async fetchBoard(boardId: string, options: FetchBoardOptions = {}): Promise<Board> {
    const [info, lists, cards, actions] = await Promise.all([
      this.request(`boards/${boardId}`, { fields: 'name,url' }, boardPayload, boardId),
      this.request(`boards/${boardId}/lists`, { fields: 'name,pos,closed' }, z.array(listPayload), boardId),
      this.request(
        `boards/${boardId}/cards`,
        {
          fields: 'name,idList,shortUrl,due,start,dateLastActivity,closed',
          members: 'true',
          member_fields: 'username,fullName',
          filter: options.includeArchived ? 'all' : 'open',
        },
        z.array(cardPayload),
        boardId
      ),
      this.request(
        `boards/${boardId}/actions`,
        { filter: 'updateCard:idList,createCard', fields: 'type,date,data', limit: String(ACTIONS_LIMIT) },
        z.array(actionPayload),
        boardId
      ),
    ]);

    const boardLists: BoardList[] = lists
      .filter((list) => !list.closed)
      .sort((a, b) => a.pos - b.pos)
      .map((list) => ({ id: list.id, name: list.name, boardId: info.id, position: list.pos }));

    const entered = listEntryTimes(actions);

    return {
      id: info.id,
      name: info.name,
      url: info.url,
      lists: boardLists,
      cards: cards.map((card) => this.toCard(card, info.id, entered)),
    };
  }

  async fetchBoards(boardIds: readonly string[], options: FetchBoardOptions = {}): Promise<BoardFetchResult> {
    const settled = await Promise.allSettled(boardIds.map((id) => this.fetchBoard(id, options)));

    const result: BoardFetchResult = { boards: [], failures: [] };
    settled.forEach((outcome, index) => {
      const boardId = boardIds[index];
      if (outcome.status === 'fulfilled') {
        result.boards.push(outcome.value);
      } else {
        const error =
          outcome.reason instanceof UpstreamError
            ? outcome.reason
            : new UpstreamError(String(outcome.reason), boardId);
        result.failures.push({ boardId, error });
      }
    });
    return result;
  }

  private toCard(card: CardPayload, boardId: string, entered: Map<string, Date>): Card {
    return {
      id: card.id,
      title: card.name,
      url: card.shortUrl,
      boardId,
      listId: card.idList,
      due: parseDate(card.due),
      start: parseDate(card.start),
      members: card.members,
      enteredListAt: entered.get(`${card.id}:${card.idList}`) ?? null,
      lastActivityAt: parseDate(card.dateLastActivity),
      archived: card.closed,
    };
  }

  /**
   * Authenticated GET, validated against a schema
   */
  private async request<T extends z.ZodTypeAny>(
    endpoint: string,
    params: Record<string, string>,
    schema: T,
    boardId?: string
  ): Promise<z.output<T>> {
    const url = new URL(`${this.baseUrl}/${endpoint}`);
    for (const [name, value] of Object.entries({ ...params, key: this.apiKey, token: this.token })) {
      url.searchParams.set(name, value);
    }

    let response: Response;
    try {
      response = await this.fetchFn(url, { signal: AbortSignal.timeout(this.timeout) });
    } catch (error) {
      throw new UpstreamError(`Request failed: ${(error as Error).message}`, boardId, endpoint);
    }

    if (!response.ok) {
      const hint = response.status === 401 ? ' (check API key and token)' : '';
      throw new UpstreamError(
        `Trello API error: ${response.status} ${response.statusText}${hint}`,
        boardId,
        endpoint,
        response.status
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      throw new UpstreamError('Response is not valid JSON', boardId, endpoint, response.status);
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.errors[0];
      throw new UpstreamError(
        `Malformed payload at ${issue?.path.join('.') || '(root)'}: ${issue?.message ?? 'invalid'}`,
        boardId,
        endpoint,
        response.status
      );
    }
    return parsed.data;
  }
}
