/**
 * Card classification
 *
 * Maps a card, the name of its list and the current time to a Category.
 * Classification is an ordered rule table: the first rule whose condition
 * holds wins, so CATEGORY_PRECEDENCE is the only place precedence lives.
 */

import type { Board, Card, Category, ClassifiedCard, CompletedCard } from './types.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/** Highest precedence first */
export const CATEGORY_PRECEDENCE = [
  'completed',
  'overdue',
  'long-running',
  'in-progress',
  'uncategorized',
] as const satisfies readonly Category[];

export interface ListKeywords {
  completed: readonly string[];
  inProgress: readonly string[];
}

export const DEFAULT_LIST_KEYWORDS: ListKeywords = {
  completed: ['done', 'completed', 'finished'],
  inProgress: ['in progress', 'doing', 'working', 'review', 'qa'],
};

export const DEFAULT_LONG_RUNNING_MS = 3 * DAY_MS;

export interface ClassifierOptions {
  keywords?: ListKeywords;
  longRunningMs?: number;
}

/**
 * Observations a rule can look at
 */
interface CardFacts {
  inCompletedList: boolean;
  inProgressList: boolean;
  pastDue: boolean;
  longRunning: boolean;
}

const RULES: Record<Category, (facts: CardFacts) => boolean> = {
  completed: (f) => f.inCompletedList,
  overdue: (f) => f.pastDue,
  'long-running': (f) => f.inProgressList && f.longRunning,
  'in-progress': (f) => f.inProgressList,
  uncategorized: () => true,
};

export function matchesAny(listName: string, keywords: readonly string[]): boolean {
  const name = listName.toLowerCase();
  return keywords.some((keyword) => name.includes(keyword.toLowerCase()));
}

export function classify(
  card: Pick<Card, 'due' | 'enteredListAt'>,
  listName: string,
  now: Date,
  options: ClassifierOptions = {}
): Category {
  const keywords = options.keywords ?? DEFAULT_LIST_KEYWORDS;
  const longRunningMs = options.longRunningMs ?? DEFAULT_LONG_RUNNING_MS;

  const facts: CardFacts = {
    inCompletedList: matchesAny(listName, keywords.completed),
    inProgressList: matchesAny(listName, keywords.inProgress),
    pastDue: card.due !== null && card.due.getTime() < now.getTime(),
    longRunning:
      card.enteredListAt !== null && now.getTime() - card.enteredListAt.getTime() >= longRunningMs,
  };

  for (const category of CATEGORY_PRECEDENCE) {
    if (RULES[category](facts)) {
      return category;
    }
  }
  return 'uncategorized';
}

/**
 * Classify every open card on a board, ordered by list position then title
 */
export function classifyBoard(board: Board, now: Date, options: ClassifierOptions = {}): ClassifiedCard[] {
  const lists = new Map(board.lists.map((list) => [list.id, list]));

  const classified = board.cards
    .filter((card) => !card.archived)
    .map((card): ClassifiedCard => {
      const list = lists.get(card.listId);
      const listName = list?.name ?? '';
      return {
        card,
        boardName: board.name,
        listName,
        listPosition: list?.position ?? Number.MAX_SAFE_INTEGER,
        category: classify(card, listName, now, options),
      };
    });

  return sortClassified(classified);
}

export function sortClassified(cards: ClassifiedCard[]): ClassifiedCard[] {
  return [...cards].sort(
    (a, b) =>
      a.listPosition - b.listPosition ||
      a.card.title.localeCompare(b.card.title) ||
      a.card.id.localeCompare(b.card.id)
  );
}

/**
 * Cards (archived ones included) that reached a completed list at or after `since`
 */
export function completedSince(board: Board, since: Date, options: ClassifierOptions = {}): CompletedCard[] {
  const keywords = options.keywords ?? DEFAULT_LIST_KEYWORDS;
  const lists = new Map(board.lists.map((list) => [list.id, list]));
  const completed: CompletedCard[] = [];

  for (const card of board.cards) {
    const list = lists.get(card.listId);
    if (!list || !matchesAny(list.name, keywords.completed)) continue;

    const completedAt = card.enteredListAt ?? card.lastActivityAt;
    if (!completedAt || completedAt.getTime() < since.getTime()) continue;

    completed.push({
      card,
      boardName: board.name,
      listName: list.name,
      listPosition: list.position,
      category: 'completed',
      completedAt,
    });
  }
  return completed;
}

/** Cards due further out than this count as planned, not current */
export const PLANNED_AHEAD_DAYS = 3;

/**
 * Open card scheduled for later: its start date is still ahead or, with no
 * start date, it is due more than PLANNED_AHEAD_DAYS whole days from now.
 */
export function plannedForLater(card: Pick<Card, 'start' | 'due'>, now: Date): boolean {
  if (card.start) {
    return card.start.getTime() > now.getTime();
  }
  if (card.due) {
    return Math.floor((card.due.getTime() - now.getTime()) / DAY_MS) > PLANNED_AHEAD_DAYS;
  }
  return false;
}
