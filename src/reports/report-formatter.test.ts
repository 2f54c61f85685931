import { describe, it, expect } from 'vitest';
import {
  cardLink,
  escapeHtml,
  formatAssignmentAlert,
  formatCompletedAlert,
  formatDaily,
  formatHelp,
  formatPersonal,
  formatWeekly,
  type MentionResolver,
} from './report-formatter.js';
import type { Category, ClassifiedBoard, ClassifiedCard, CompletedCard } from '../board/types.js';
import { makeBoard, makeCard, member } from '../e2e/helpers.js';

const handles: Record<string, string> = { alice: '@alice_tg' };
const mention: MentionResolver = (username) => handles[username] ?? null;

function classified(
  boardName: string,
  category: Category,
  overrides: Parameters<typeof makeCard>[0],
  listName = 'In Progress'
): ClassifiedCard {
  return { card: makeCard(overrides), boardName, listName, listPosition: 2, category };
}

describe('escapeHtml', () => {
  it('escapes markup characters', () => {
    expect(escapeHtml('<b>"Tom" & Jerry</b>')).toBe('&lt;b&gt;&quot;Tom&quot; &amp; Jerry&lt;/b&gt;');
  });
});

describe('cardLink', () => {
  it('links the escaped title, or shows it plain without a url', () => {
    expect(cardLink({ title: 'A & B', url: 'https://trello.com/c/x' })).toBe(
      '<a href="https://trello.com/c/x">A &amp; B</a>'
    );
    expect(cardLink({ title: 'A & B', url: '' })).toBe('A &amp; B');
  });
});

describe('formatDaily', () => {
  it('lists an overdue card with its assignee mention and a summary', () => {
    const boards: ClassifiedBoard[] = [
      {
        board: makeBoard('board-a', 'Eng'),
        cards: [classified('Eng', 'overdue', { id: 'c1', title: 'Fix bug', members: [member('alice')] })],
      },
    ];

    expect(formatDaily(boards, { mention })).toBe(
      [
        '📊 <b>Daily Board Report</b>',
        '',
        '🗂️ <b>Eng</b>',
        '⏰ <b>Overdue (1):</b>',
        '⏰ <a href="https://trello.com/c/c1">Fix bug</a> - @alice_tg',
        '',
        '📈 <b>Summary:</b>',
        '• Overdue: 1',
      ].join('\n')
    );
  });

  it('orders sections and shows unmapped members by plain username', () => {
    const boards: ClassifiedBoard[] = [
      {
        board: makeBoard('board-a', 'Eng'),
        cards: [
          classified('Eng', 'in-progress', { id: 'c2', title: 'Review', members: [member('bob'), member('alice')] }),
          classified('Eng', 'long-running', { id: 'c3', title: 'Migrate', url: '' }),
          classified('Eng', 'uncategorized', { id: 'c4', title: 'Someday' }, 'To Do'),
        ],
      },
    ];

    expect(formatDaily(boards, { mention }).split('\n')).toEqual([
      '📊 <b>Daily Board Report</b>',
      '',
      '🗂️ <b>Eng</b>',
      '🐌 <b>Long-running (1):</b>',
      '🐌 Migrate',
      '🔄 <b>In progress (1):</b>',
      '🔄 <a href="https://trello.com/c/c2">Review</a> - bob @alice_tg',
      '',
      '📈 <b>Summary:</b>',
      '• Long-running: 1',
      '• In progress: 1',
    ]);
  });

  it('congratulates when nothing is open and keeps every board section', () => {
    const boards: ClassifiedBoard[] = [
      { board: makeBoard('board-a', 'Eng'), cards: [] },
      { board: makeBoard('board-c', 'Ops'), cards: [classified('Ops', 'completed', { id: 'c5' }, 'Done')] },
    ];

    expect(formatDaily(boards, { mention }).split('\n')).toEqual([
      '📊 <b>Daily Board Report</b>',
      '',
      '🗂️ <b>Eng</b>',
      'No overdue or in-progress cards',
      '',
      '🗂️ <b>Ops</b>',
      'No overdue or in-progress cards',
      '',
      '✅ All tasks completed on time!',
    ]);
  });

  it('adds the failed-board footer and the previous report link', () => {
    const text = formatDaily([{ board: makeBoard('board-a', 'Eng'), cards: [] }], {
      mention,
      failedBoardCount: 1,
      previousReportUrl: 'https://t.me/c/1234567890/41',
    });

    expect(text.split('\n').slice(-4)).toEqual([
      '',
      '⚠️ 1 board could not be loaded this cycle',
      '',
      '📎 <a href="https://t.me/c/1234567890/41">Previous report</a>',
    ]);
  });

  it('pluralises the footer', () => {
    const text = formatDaily([], { mention, failedBoardCount: 2 });
    expect(text.endsWith('⚠️ 2 boards could not be loaded this cycle')).toBe(true);
  });

  it('escapes board names and card titles', () => {
    const boards: ClassifiedBoard[] = [
      {
        board: makeBoard('board-a', 'R&D <core>'),
        cards: [classified('R&D <core>', 'overdue', { id: 'c6', title: '<script>', url: '' })],
      },
    ];

    const lines = formatDaily(boards, { mention }).split('\n');
    expect(lines[2]).toBe('🗂️ <b>R&amp;D &lt;core&gt;</b>');
    expect(lines[4]).toBe('⏰ &lt;script&gt;');
  });

  it('produces identical text for identical input', () => {
    const boards: ClassifiedBoard[] = [
      {
        board: makeBoard('board-a', 'Eng'),
        cards: [classified('Eng', 'overdue', { id: 'c1', title: 'Fix bug', members: [member('alice')] })],
      },
    ];
    expect(formatDaily(boards, { mention })).toBe(formatDaily(boards, { mention }));
  });
});

describe('formatWeekly', () => {
  it('counts completed and overdue cards per board and lists completions newest first', () => {
    const eng = makeBoard('board-a', 'Eng');
    const ops = makeBoard('board-c', 'Ops');
    const completed: CompletedCard[] = [
      {
        ...classified('Eng', 'completed', { id: 'c1', title: 'Older', boardId: 'board-a' }, 'Done'),
        completedAt: new Date(2024, 4, 6, 9, 0),
      },
      {
        ...classified('Ops', 'completed', { id: 'c2', title: 'Newer', boardId: 'board-c', url: '' }, 'Done'),
        completedAt: new Date(2024, 4, 8, 17, 30),
      },
    ];
    const boards: ClassifiedBoard[] = [
      { board: eng, cards: [classified('Eng', 'overdue', { id: 'c3' })] },
      { board: ops, cards: [] },
    ];

    expect(formatWeekly(boards, completed).split('\n')).toEqual([
      '📈 <b>Weekly Board Statistics</b>',
      '',
      '🗂️ <b>Eng</b>',
      '✅ Completed this week: 1',
      '⏰ Currently overdue: 1',
      '',
      '🗂️ <b>Ops</b>',
      '✅ Completed this week: 1',
      '⏰ Currently overdue: 0',
      '',
      '📊 <b>Overall Statistics:</b>',
      '✅ Total completed this week: 2',
      '⏰ Total overdue: 1',
      '',
      '📋 <b>Completed tasks this week:</b>',
      '✅ Newer',
      '  📅 08.05 | 🗂️ Ops',
      '✅ <a href="https://trello.com/c/c1">Older</a>',
      '  📅 06.05 | 🗂️ Eng',
    ]);
  });

  it('omits the completion list when nothing was completed', () => {
    const text = formatWeekly([{ board: makeBoard('board-a', 'Eng'), cards: [] }], [], { failedBoardCount: 1 });

    expect(text).not.toContain('Completed tasks this week');
    expect(text.endsWith('⚠️ 1 board could not be loaded this cycle')).toBe(true);
  });
});

describe('formatPersonal', () => {
  it('groups overdue and current cards with their location', () => {
    const cards = [
      classified('Eng', 'overdue', { id: 'c1', title: 'Fix bug', members: [member('alice')] }),
      classified('Eng', 'long-running', { id: 'c2', title: 'Migrate', url: '' }, 'Doing'),
      classified('Ops', 'in-progress', { id: 'c3', title: 'Deploy', url: '' }),
    ];

    expect(formatPersonal('@alice_tg', 'alice', cards).split('\n')).toEqual([
      '👤 <b>My tasks (@alice_tg / alice)</b>',
      '',
      '⏰ <b>Overdue (1):</b>',
      '⏰ <a href="https://trello.com/c/c1">Fix bug</a>',
      '  📋 Eng → In Progress',
      '',
      '🔄 <b>Current (2):</b>',
      '🐌 Migrate',
      '  📋 Eng → Doing',
      '🔄 Deploy',
      '  📋 Ops → In Progress',
    ]);
  });

  it('says so when there is nothing active', () => {
    expect(formatPersonal('@bob', 'bob', [])).toBe('👤 <b>My tasks (@bob / bob)</b>\n\n✅ You have no active tasks!');
  });
});

describe('alerts', () => {
  it('formats a completion alert', () => {
    const card = makeCard({ id: 'c1', title: 'Fix bug' });
    expect(formatCompletedAlert('Eng', card)).toBe(
      '✅ <b>Card completed!</b>\n\n🗂️ Board: Eng\n📋 Card: <a href="https://trello.com/c/c1">Fix bug</a>'
    );
  });

  it('formats an assignment alert with mentions', () => {
    const card = makeCard({ id: 'c1', title: 'Fix bug' });
    expect(formatAssignmentAlert('Eng', card, ['alice', 'carol'], mention).split('\n')).toEqual([
      '👥 <b>New assignment!</b>',
      '',
      '🗂️ Board: Eng',
      '📋 Card: <a href="https://trello.com/c/c1">Fix bug</a>',
      '',
      '@alice_tg carol',
    ]);
  });
});

describe('formatHelp', () => {
  it('shows the configured schedules', () => {
    const text = formatHelp({ dailyCron: '0 8 * * 1-6', weeklyCron: '0 0 * * 1', pollIntervalSeconds: 30, longRunningDays: 3 });

    expect(text).toContain('• Daily report on schedule <code>0 8 * * 1-6</code>');
    expect(text).toContain('• Notifies about completed cards and new assignments (every 30s)');
    expect(text).toContain('🐌 - card in progress for 3 days or more');
    expect(text).toContain('• /clear_commands - Clear the command menu');
  });
});
