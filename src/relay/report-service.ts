/**
 * Report Service
 *
 * Fetches boards, classifies their cards and publishes reports and change
 * alerts. One unreachable board never blocks the others: it is logged,
 * left out of the report and counted in the report footer.
 */

import type { Logger } from 'pino';
import type { BoardClient, FetchBoardOptions } from '../board/board-client.js';
import { classifyBoard, completedSince, plannedForLater, type ClassifierOptions } from '../board/classifier.js';
import type { Board, Category, ClassifiedBoard } from '../board/types.js';
import type { ChatClient } from '../channels/types.js';
import { DeliveryError } from '../channels/types.js';
import type { Config } from '../config/config.js';
import { normalizeHandle, type UserMapping } from '../config/user-mapping.js';
import {
  formatAssignmentAlert,
  formatCompletedAlert,
  formatDaily,
  formatPersonal,
  formatWeekly,
} from '../reports/report-formatter.js';
import { LEGACY_SLOT, type LastSeenSnapshot, type PinnedMessageRecord, type RelayState, type StateStore } from '../state/state-store.js';
import { detectChanges, withKnownListEntry, type ChangeAlert } from './change-detector.js';

const DAY_MS = 24 * 60 * 60 * 1000;

const CURRENT_CATEGORIES: ReadonlySet<Category> = new Set(['in-progress', 'long-running']);

export const DAILY_REPORT_SLOT = 'daily-report';

export function dailySlot(chatId: string): string {
  return `${DAILY_REPORT_SLOT}:${chatId}`;
}

/**
 * Whether publishing into `slot` retires `record`. A daily report also
 * retires reports pinned in the same chat before the slots existed.
 */
export function supersedes(slot: string, chatId: string, record: PinnedMessageRecord): boolean {
  if (record.slot === slot) return true;
  return slot === dailySlot(chatId) && record.slot === `${LEGACY_SLOT}:${chatId}`;
}

export function classifierOptionsFrom(config: Pick<Config, 'lists' | 'reports'>): ClassifierOptions {
  return {
    keywords: { completed: config.lists.done, inProgress: config.lists.inProgress },
    longRunningMs: config.reports.longRunningDays * DAY_MS,
  };
}

export interface CollectedBoards {
  boards: Board[];
  failedBoardIds: string[];
}

export interface ReportServiceOptions {
  boardClient: BoardClient;
  chat: ChatClient;
  store: StateStore;
  userMapping: UserMapping;
  config: Pick<Config, 'trello' | 'lists' | 'reports'>;
  logger: Logger;
  now?: () => Date;
}

export class ReportService {
  private boardClient: BoardClient;
  private chat: ChatClient;
  private store: StateStore;
  private userMapping: UserMapping;
  private boardIds: string[];
  private classifier: ClassifierOptions;
  private weeklyWindowMs: number;
  private deleteSuperseded: boolean;
  private logger: Logger;
  private now: () => Date;

  constructor(options: ReportServiceOptions) {
    this.boardClient = options.boardClient;
    this.chat = options.chat;
    this.store = options.store;
    this.userMapping = options.userMapping;
    this.boardIds = options.config.trello.boardIds;
    this.classifier = classifierOptionsFrom(options.config);
    this.weeklyWindowMs = options.config.reports.weeklyWindowDays * DAY_MS;
    this.deleteSuperseded = options.config.reports.deleteSupersededReports;
    this.logger = options.logger.child({ component: 'reports' });
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Fetch every configured board, logging and skipping the ones that fail
   */
  async collectBoards(options?: FetchBoardOptions): Promise<CollectedBoards> {
    const { boards, failures } = await this.boardClient.fetchBoards(this.boardIds, options);

    for (const { boardId, error } of failures) {
      this.logger.error(
        { boardId, endpoint: error.endpoint, status: error.status, error: error.message },
        'Board fetch failed, skipping board this cycle'
      );
    }

    return { boards, failedBoardIds: failures.map((failure) => failure.boardId) };
  }

  private classifyAll(boards: Board[], snapshot: LastSeenSnapshot): ClassifiedBoard[] {
    const now = this.now();
    return boards.map((board) => {
      const known = withKnownListEntry(board, snapshot);
      return { board: known, cards: classifyBoard(known, now, this.classifier) };
    });
  }

  async buildDailyReport(snapshot: LastSeenSnapshot, previousReportUrl?: string): Promise<string> {
    const { boards, failedBoardIds } = await this.collectBoards();
    return formatDaily(this.classifyAll(boards, snapshot), {
      mention: (username) => this.chat.resolveMention(username),
      failedBoardCount: failedBoardIds.length,
      previousReportUrl,
    });
  }

  async buildWeeklyReport(): Promise<string> {
    const { boards, failedBoardIds } = await this.collectBoards({ includeArchived: true });
    const since = new Date(this.now().getTime() - this.weeklyWindowMs);
    const { snapshot } = await this.store.load();

    const completed = boards.flatMap((board) => completedSince(board, since, this.classifier));
    return formatWeekly(this.classifyAll(boards, snapshot), completed, {
      failedBoardCount: failedBoardIds.length,
    });
  }

  /**
   * Open cards assigned to one board user, across all boards. In-progress
   * cards planned for later are left out.
   */
  async buildPersonalReport(chatUsername: string, boardUsername: string): Promise<string> {
    const { boards } = await this.collectBoards();
    const { snapshot } = await this.store.load();
    const username = boardUsername.toLowerCase();
    const now = this.now();

    const cards = this.classifyAll(boards, snapshot).flatMap(({ cards }) =>
      cards.filter(
        (item) =>
          item.card.members.some((member) => member.username.toLowerCase() === username) &&
          !(CURRENT_CATEGORIES.has(item.category) && plannedForLater(item.card, now))
      )
    );
    return formatPersonal(normalizeHandle(chatUsername), boardUsername, cards);
  }

  /**
   * Board username for a chat user, or null when the user is not mapped
   */
  boardUserFor(chatUsername: string): string | null {
    return this.userMapping.toBoardUsername(chatUsername);
  }

  /**
   * Post the daily report to a chat and pin it in place of the previous one
   */
  async runDailyReport(chatId: string = this.chat.defaultChatId): Promise<void> {
    const state = await this.store.load();
    const slot = dailySlot(chatId);
    const previous =
      state.pinned.find((record) => record.slot === slot) ??
      state.pinned.find((record) => supersedes(slot, chatId, record));

    const text = await this.buildDailyReport(state.snapshot, previous?.messageUrl || undefined);
    await this.publishPinned(state, slot, chatId, text);
    await this.store.save(state);
  }

  async runWeeklyReport(chatId: string = this.chat.defaultChatId): Promise<void> {
    const text = await this.buildWeeklyReport();
    await this.chat.send(text, chatId);
    this.logger.info({ chatId }, 'Weekly report sent');
  }

  /**
   * Compare boards against the last-seen snapshot, send alerts and store the
   * new snapshot. Returns the alerts that were produced.
   */
  async runChangePoll(): Promise<ChangeAlert[]> {
    const state = await this.store.load();
    const { boards, failedBoardIds } = await this.collectBoards();

    const { alerts, snapshot } = detectChanges(state.snapshot, boards, {
      now: this.now(),
      failedBoardIds,
      classifier: this.classifier,
    });

    for (const alert of alerts) {
      const text =
        alert.type === 'completed'
          ? formatCompletedAlert(alert.boardName, alert.card)
          : formatAssignmentAlert(
              alert.boardName,
              alert.card,
              alert.newMembers.map((member) => member.username),
              (username) => this.chat.resolveMention(username)
            );
      try {
        await this.chat.send(text);
      } catch (error) {
        if (!(error instanceof DeliveryError)) throw error;
        this.logger.error({ alert: alert.type, cardId: alert.card.id, error: error.message }, 'Alert not delivered');
      }
    }

    state.snapshot = snapshot;
    await this.store.save(state);

    if (alerts.length > 0) {
      this.logger.info({ alerts: alerts.length }, 'Board changes announced');
    }
    return alerts;
  }

  /**
   * Send a report, pin it, then retire whatever was pinned in the slot
   * before. Mutates `state`; the caller saves it.
   */
  async publishPinned(state: RelayState, slot: string, chatId: string, text: string): Promise<number> {
    const messageId = await this.chat.send(text, chatId);

    try {
      await this.chat.pin(messageId, chatId);
    } catch (error) {
      if (!(error instanceof DeliveryError)) throw error;
      this.logger.error({ slot, messageId, error: error.message }, 'Could not pin report, keeping previous pin');
      return messageId;
    }

    const superseded = state.pinned.filter((record) => supersedes(slot, chatId, record));
    for (const record of superseded) {
      try {
        await this.chat.unpin(record.messageId, record.chatId);
        if (this.deleteSuperseded) {
          await this.chat.delete(record.messageId, record.chatId);
        }
      } catch (error) {
        if (!(error instanceof DeliveryError)) throw error;
        this.logger.warn({ slot, messageId: record.messageId, error: error.message }, 'Could not retire previous report');
      }
    }

    state.pinned = [
      ...state.pinned.filter((record) => !supersedes(slot, chatId, record)),
      {
        slot,
        chatId,
        messageId,
        pinnedAt: this.now().toISOString(),
        messageUrl: this.chat.messageUrl(chatId, messageId),
      },
    ];

    this.logger.info({ slot, chatId, messageId, superseded: superseded.length }, 'Report pinned');
    return messageId;
  }
}
