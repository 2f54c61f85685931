/**
 * Board Types
 *
 * Domain view of the board service (boards, lists, cards) and the derived
 * card categories.
 */

export interface BoardMember {
  id: string;
  username: string;
  fullName: string;
}

export interface BoardList {
  id: string;
  name: string;
  boardId: string;
  position: number;
}

export interface Card {
  id: string;
  title: string;
  url: string;
  boardId: string;
  listId: string;
  due: Date | null;
  /** Planned start date */
  start: Date | null;
  members: BoardMember[];
  /** When the card moved into its current list, if known */
  enteredListAt: Date | null;
  lastActivityAt: Date | null;
  archived: boolean;
}

export interface Board {
  id: string;
  name: string;
  url: string;
  /** Ordered by board position */
  lists: BoardList[];
  cards: Card[];
}

export type Category = 'completed' | 'overdue' | 'long-running' | 'in-progress' | 'uncategorized';

/**
 * A card together with the context it was classified in
 */
export interface ClassifiedCard {
  card: Card;
  boardName: string;
  listName: string;
  listPosition: number;
  category: Category;
}

export interface CompletedCard extends ClassifiedCard {
  /** Time the card reached a completed list (last activity when unknown) */
  completedAt: Date;
}

export interface ClassifiedBoard {
  board: Board;
  cards: ClassifiedCard[];
}

export function cardKey(card: Pick<Card, 'boardId' | 'id'>): string {
  return `${card.boardId}:${card.id}`;
}
