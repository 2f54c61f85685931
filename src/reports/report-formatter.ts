/**
 * Report formatting
 *
 * Pure functions turning classified cards into Telegram HTML text. Output
 * depends only on the input and its order: callers pass boards in configured
 * order and cards ordered by list, then title.
 */

import type { Card, Category, ClassifiedBoard, ClassifiedCard, CompletedCard } from '../board/types.js';

export type MentionResolver = (boardUsername: string) => string | null;

export const CATEGORY_EMOJI: Record<Category, string> = {
  completed: '✅',
  overdue: '⏰',
  'long-running': '🐌',
  'in-progress': '🔄',
  uncategorized: '▫️',
};

const CATEGORY_LABEL: Record<Category, string> = {
  completed: 'Completed',
  overdue: 'Overdue',
  'long-running': 'Long-running',
  'in-progress': 'In progress',
  uncategorized: 'Other',
};

/** Sections of the daily report, in display order */
const DAILY_SECTIONS: readonly Category[] = ['overdue', 'long-running', 'in-progress'];

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

export function cardLink(card: Pick<Card, 'title' | 'url'>): string {
  const title = escapeHtml(card.title);
  return card.url ? `<a href="${escapeHtml(card.url)}">${title}</a>` : title;
}

function assigneeTags(card: Card, mention: MentionResolver): string {
  return card.members
    .map((member) => mention(member.username) ?? escapeHtml(member.username))
    .join(' ');
}

function cardLine(item: ClassifiedCard, mention?: MentionResolver): string {
  const tags = mention ? assigneeTags(item.card, mention) : '';
  return `${CATEGORY_EMOJI[item.category]} ${cardLink(item.card)}${tags ? ` - ${tags}` : ''}`;
}

function sectionHeader(category: Category, count: number, label = CATEGORY_LABEL[category]): string {
  return `${CATEGORY_EMOJI[category]} <b>${label} (${count}):</b>`;
}

function failureLine(failedBoardCount: number): string {
  const noun = failedBoardCount === 1 ? 'board' : 'boards';
  return `⚠️ ${failedBoardCount} ${noun} could not be loaded this cycle`;
}

function dayMonth(date: Date): string {
  const day = String(date.getDate()).padStart(2, '0');
  const month = String(date.getMonth() + 1).padStart(2, '0');
  return `${day}.${month}`;
}

// ============ Daily ============

export interface DailyReportOptions {
  mention: MentionResolver;
  failedBoardCount?: number;
  previousReportUrl?: string;
}

export function formatDaily(boards: ClassifiedBoard[], options: DailyReportOptions): string {
  const lines = ['📊 <b>Daily Board Report</b>'];
  const totals: Record<Category, number> = {
    completed: 0,
    overdue: 0,
    'long-running': 0,
    'in-progress': 0,
    uncategorized: 0,
  };

  for (const { board, cards } of boards) {
    lines.push('', `🗂️ <b>${escapeHtml(board.name)}</b>`);

    let shown = 0;
    for (const category of DAILY_SECTIONS) {
      const section = cards.filter((item) => item.category === category);
      if (section.length === 0) continue;

      totals[category] += section.length;
      shown += section.length;
      lines.push(sectionHeader(category, section.length));
      for (const item of section) {
        lines.push(cardLine(item, options.mention));
      }
    }

    if (shown === 0) {
      lines.push('No overdue or in-progress cards');
    }
  }

  const open = DAILY_SECTIONS.reduce((sum, category) => sum + totals[category], 0);
  if (open === 0) {
    lines.push('', '✅ All tasks completed on time!');
  } else {
    lines.push('', '📈 <b>Summary:</b>');
    for (const category of DAILY_SECTIONS) {
      if (totals[category] > 0) {
        lines.push(`• ${CATEGORY_LABEL[category]}: ${totals[category]}`);
      }
    }
  }

  if (options.failedBoardCount) {
    lines.push('', failureLine(options.failedBoardCount));
  }

  if (options.previousReportUrl) {
    lines.push('', `📎 <a href="${escapeHtml(options.previousReportUrl)}">Previous report</a>`);
  }

  return lines.join('\n');
}

// ============ Weekly ============

export interface WeeklyReportOptions {
  failedBoardCount?: number;
}

export function formatWeekly(
  boards: ClassifiedBoard[],
  completed: CompletedCard[],
  options: WeeklyReportOptions = {}
): string {
  const lines = ['📈 <b>Weekly Board Statistics</b>'];
  let totalCompleted = 0;
  let totalOverdue = 0;

  for (const { board, cards } of boards) {
    const doneCount = completed.filter((item) => item.card.boardId === board.id).length;
    const overdueCount = cards.filter((item) => item.category === 'overdue').length;
    totalCompleted += doneCount;
    totalOverdue += overdueCount;

    lines.push(
      '',
      `🗂️ <b>${escapeHtml(board.name)}</b>`,
      `✅ Completed this week: ${doneCount}`,
      `⏰ Currently overdue: ${overdueCount}`
    );
  }

  lines.push(
    '',
    '📊 <b>Overall Statistics:</b>',
    `✅ Total completed this week: ${totalCompleted}`,
    `⏰ Total overdue: ${totalOverdue}`
  );

  if (completed.length > 0) {
    lines.push('', '📋 <b>Completed tasks this week:</b>');

    const newestFirst = [...completed].sort(
      (a, b) =>
        b.completedAt.getTime() - a.completedAt.getTime() || a.card.title.localeCompare(b.card.title)
    );
    for (const item of newestFirst) {
      lines.push(
        `${CATEGORY_EMOJI.completed} ${cardLink(item.card)}`,
        `  📅 ${dayMonth(item.completedAt)} | 🗂️ ${escapeHtml(item.boardName)}`
      );
    }
  }

  if (options.failedBoardCount) {
    lines.push('', failureLine(options.failedBoardCount));
  }

  return lines.join('\n');
}

// ============ Personal ============

export function formatPersonal(userMention: string, boardUsername: string, cards: ClassifiedCard[]): string {
  const lines = [`👤 <b>My tasks (${escapeHtml(userMention)} / ${escapeHtml(boardUsername)})</b>`];

  const overdue = cards.filter((item) => item.category === 'overdue');
  const current = cards.filter(
    (item) => item.category === 'in-progress' || item.category === 'long-running'
  );

  const pushCards = (items: ClassifiedCard[]) => {
    for (const item of items) {
      lines.push(
        cardLine(item),
        `  📋 ${escapeHtml(item.boardName)} → ${escapeHtml(item.listName)}`
      );
    }
  };

  if (overdue.length > 0) {
    lines.push('', sectionHeader('overdue', overdue.length));
    pushCards(overdue);
  }

  if (current.length > 0) {
    lines.push('', sectionHeader('in-progress', current.length, 'Current'));
    pushCards(current);
  }

  if (overdue.length === 0 && current.length === 0) {
    lines.push('', '✅ You have no active tasks!');
  }

  return lines.join('\n');
}

// ============ Alerts ============

export function formatCompletedAlert(boardName: string, card: Card): string {
  return [
    '✅ <b>Card completed!</b>',
    '',
    `🗂️ Board: ${escapeHtml(boardName)}`,
    `📋 Card: ${cardLink(card)}`,
  ].join('\n');
}

export function formatAssignmentAlert(
  boardName: string,
  card: Card,
  newMemberUsernames: string[],
  mention: MentionResolver
): string {
  const tags = newMemberUsernames
    .map((username) => mention(username) ?? escapeHtml(username))
    .join(' ');
  return [
    '👥 <b>New assignment!</b>',
    '',
    `🗂️ Board: ${escapeHtml(boardName)}`,
    `📋 Card: ${cardLink(card)}`,
    '',
    tags,
  ].join('\n');
}

// ============ Help ============

export interface HelpOptions {
  dailyCron: string;
  weeklyCron: string;
  pollIntervalSeconds: number;
  longRunningDays: number;
}

export function formatHelp(options: HelpOptions): string {
  return [
    '🤖 <b>Board relay is active</b>',
    '',
    'Available commands:',
    '• /ct - Current report for all boards',
    '• /wr - Weekly statistics',
    '• /mt - My tasks (overdue and current)',
    '• /stored - Show stored pinned messages',
    '• /unpin MESSAGE_ID - Unpin a stored message',
    '• /clear_stored - Clear stored message ids',
    '• /clear_commands - Clear the command menu',
    '• /debug_file - Show the state file',
    '• /start - Show this message',
    '',
    'Automatically:',
    `• Notifies about completed cards and new assignments (every ${options.pollIntervalSeconds}s)`,
    `• Daily report on schedule <code>${escapeHtml(options.dailyCron)}</code>`,
    `• Weekly statistics on schedule <code>${escapeHtml(options.weeklyCron)}</code>`,
    '',
    `${CATEGORY_EMOJI['long-running']} - card in progress for ${options.longRunningDays} days or more`,
  ].join('\n');
}
