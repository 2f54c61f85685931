/**
 * Change detection
 *
 * Compares freshly classified boards against the last-seen snapshot and
 * produces alerts for cards that reached a completed list and for members
 * newly assigned to open cards. Pure: the caller persists the new snapshot.
 */

import { classifyBoard, type ClassifierOptions } from '../board/classifier.js';
import { cardKey, type Board, type BoardMember, type Card } from '../board/types.js';
import type { CardSnapshot, LastSeenSnapshot } from '../state/state-store.js';

export interface CompletedAlert {
  type: 'completed';
  boardName: string;
  card: Card;
}

export interface AssignmentAlert {
  type: 'assigned';
  boardName: string;
  card: Card;
  newMembers: BoardMember[];
}

export type ChangeAlert = CompletedAlert | AssignmentAlert;

export interface ChangeDetectionResult {
  alerts: ChangeAlert[];
  snapshot: LastSeenSnapshot;
}

export interface DetectChangesOptions {
  now: Date;
  /** Boards that could not be fetched; their snapshot entries are kept as they were */
  failedBoardIds?: readonly string[];
  classifier?: ClassifierOptions;
}

/**
 * Fill in unknown list-entry times from the snapshot, when the card is
 * still in the list it was last seen in
 */
export function withKnownListEntry(board: Board, snapshot: LastSeenSnapshot): Board {
  return {
    ...board,
    cards: board.cards.map((card) => {
      if (card.enteredListAt) return card;
      const seen = snapshot[cardKey(card)];
      if (!seen || seen.listId !== card.listId) return card;
      return { ...card, enteredListAt: new Date(seen.listSince) };
    }),
  };
}

export function detectChanges(
  previous: LastSeenSnapshot,
  boards: Board[],
  options: DetectChangesOptions
): ChangeDetectionResult {
  const { now } = options;
  const alerts: ChangeAlert[] = [];
  const snapshot: LastSeenSnapshot = {};

  const failed = new Set(options.failedBoardIds ?? []);
  for (const [key, entry] of Object.entries(previous)) {
    if (failed.has(entry.boardId)) {
      snapshot[key] = entry;
    }
  }

  for (const board of boards) {
    const classified = classifyBoard(withKnownListEntry(board, previous), now, options.classifier);

    for (const { card, category } of classified) {
      const key = cardKey(card);
      const seen = previous[key];

      if (seen) {
        if (category === 'completed' && seen.category !== 'completed') {
          alerts.push({ type: 'completed', boardName: board.name, card });
        } else if (category !== 'completed') {
          const known = new Set(seen.memberIds);
          const newMembers = card.members.filter((member) => !known.has(member.id));
          if (newMembers.length > 0) {
            alerts.push({ type: 'assigned', boardName: board.name, card, newMembers });
          }
        }
      }

      const entry: CardSnapshot = {
        boardId: card.boardId,
        listId: card.listId,
        category,
        memberIds: card.members.map((member) => member.id),
        listSince:
          seen && seen.listId === card.listId
            ? seen.listSince
            : (card.enteredListAt ?? now).toISOString(),
      };
      snapshot[key] = entry;
    }
  }

  return { alerts, snapshot };
}
