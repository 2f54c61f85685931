import { describe, it, expect } from 'vitest';
import { detectChanges, withKnownListEntry } from './change-detector.js';
import type { LastSeenSnapshot } from '../state/state-store.js';
import { makeBoard, makeCard, member } from '../e2e/helpers.js';

const NOW = new Date('2024-05-10T12:00:00.000Z');
const EARLIER = '2024-05-09T12:00:00.000Z';

const seen = (
  listId: string,
  category: 'completed' | 'in-progress' | 'uncategorized',
  memberIds: string[] = [],
  boardId = 'board-a'
) => ({ boardId, listId, category, memberIds, listSince: EARLIER });

describe('detectChanges', () => {
  it('records first-seen cards without alerting', () => {
    const board = makeBoard('board-a', 'Eng', [
      makeCard({ id: 'c1', listId: 'list-done' }),
      makeCard({ id: 'c2', listId: 'list-doing', members: [member('alice')] }),
    ]);

    const { alerts, snapshot } = detectChanges({}, [board], { now: NOW });

    expect(alerts).toEqual([]);
    expect(snapshot).toEqual({
      'board-a:c1': {
        boardId: 'board-a',
        listId: 'list-done',
        category: 'completed',
        memberIds: [],
        listSince: NOW.toISOString(),
      },
      'board-a:c2': {
        boardId: 'board-a',
        listId: 'list-doing',
        category: 'in-progress',
        memberIds: ['m-alice'],
        listSince: NOW.toISOString(),
      },
    });
  });

  it('alerts once when a card reaches a completed list', () => {
    const previous: LastSeenSnapshot = { 'board-a:c1': seen('list-doing', 'in-progress') };
    const board = makeBoard('board-a', 'Eng', [makeCard({ id: 'c1', title: 'Fix bug', listId: 'list-done' })]);

    const first = detectChanges(previous, [board], { now: NOW });
    const second = detectChanges(first.snapshot, [board], { now: NOW });

    expect(first.alerts).toHaveLength(1);
    expect(first.alerts[0]).toMatchObject({ type: 'completed', boardName: 'Eng', card: { id: 'c1' } });
    expect(first.snapshot['board-a:c1'].listSince).toBe(NOW.toISOString());
    expect(second.alerts).toEqual([]);
  });

  it('alerts on newly assigned members only', () => {
    const previous: LastSeenSnapshot = { 'board-a:c1': seen('list-doing', 'in-progress', ['m-alice']) };
    const board = makeBoard('board-a', 'Eng', [
      makeCard({ id: 'c1', listId: 'list-doing', members: [member('alice'), member('bob')] }),
    ]);

    const { alerts, snapshot } = detectChanges(previous, [board], { now: NOW });

    expect(alerts).toHaveLength(1);
    const [alert] = alerts;
    expect(alert.type).toBe('assigned');
    if (alert.type !== 'assigned') return;
    expect(alert.newMembers.map((m) => m.username)).toEqual(['bob']);
    expect(snapshot['board-a:c1'].memberIds).toEqual(['m-alice', 'm-bob']);
    expect(snapshot['board-a:c1'].listSince).toBe(EARLIER);
  });

  it('does not announce assignments on completed cards', () => {
    const previous: LastSeenSnapshot = { 'board-a:c1': seen('list-done', 'completed') };
    const board = makeBoard('board-a', 'Eng', [
      makeCard({ id: 'c1', listId: 'list-done', members: [member('bob')] }),
    ]);

    expect(detectChanges(previous, [board], { now: NOW }).alerts).toEqual([]);
  });

  it('keeps the entries of boards that failed to load and drops vanished cards', () => {
    const previous: LastSeenSnapshot = {
      'board-a:gone': seen('list-doing', 'in-progress'),
      'board-b:c9': seen('list-doing', 'in-progress', [], 'board-b'),
    };
    const board = makeBoard('board-a', 'Eng', []);

    const { snapshot } = detectChanges(previous, [board], { now: NOW, failedBoardIds: ['board-b'] });

    expect(Object.keys(snapshot)).toEqual(['board-b:c9']);
    expect(snapshot['board-b:c9']).toBe(previous['board-b:c9']);
  });

  it('uses the remembered list-entry time for the long-running check', () => {
    const previous: LastSeenSnapshot = {
      'board-a:c1': { ...seen('list-doing', 'in-progress'), listSince: '2024-05-01T00:00:00.000Z' },
    };
    const board = makeBoard('board-a', 'Eng', [makeCard({ id: 'c1', listId: 'list-doing' })]);

    const { snapshot } = detectChanges(previous, [board], { now: NOW });

    expect(snapshot['board-a:c1'].category).toBe('long-running');
    expect(snapshot['board-a:c1'].listSince).toBe('2024-05-01T00:00:00.000Z');
  });
});

describe('withKnownListEntry', () => {
  it('fills unknown entry times only for cards still in the remembered list', () => {
    const snapshot: LastSeenSnapshot = {
      'board-a:c1': seen('list-doing', 'in-progress'),
      'board-a:c2': seen('list-todo', 'uncategorized'),
    };
    const known = new Date('2024-05-05T00:00:00.000Z');
    const board = makeBoard('board-a', 'Eng', [
      makeCard({ id: 'c1', listId: 'list-doing' }),
      makeCard({ id: 'c2', listId: 'list-doing' }),
      makeCard({ id: 'c3', listId: 'list-doing', enteredListAt: known }),
    ]);

    const result = withKnownListEntry(board, snapshot);

    expect(result.cards.map((card) => card.enteredListAt)).toEqual([new Date(EARLIER), null, known]);
  });
});
