/**
 * Command Router
 *
 * Turns interactive chat commands into report runs and state maintenance.
 * Every reply goes back to the chat the command came from.
 */

import * as path from 'path';
import type { Logger } from 'pino';
import { DeliveryError, type ChatClient, type CommandName, type InboundCommand } from '../channels/types.js';
import { escapeHtml, formatHelp, type HelpOptions } from '../reports/report-formatter.js';
import type { StateStore } from '../state/state-store.js';
import type { ReportService } from './report-service.js';

/** Leaves room for the surrounding markup within one message */
const MAX_DEBUG_CHARS = 3500;

export const PROGRESS_TEXT = '⏳ Collecting board data...';

export interface CommandRouterOptions {
  reports: ReportService;
  chat: ChatClient;
  store: StateStore;
  help: HelpOptions;
  logger: Logger;
}

type Handler = (command: InboundCommand) => Promise<void>;

export class CommandRouter {
  private reports: ReportService;
  private chat: ChatClient;
  private store: StateStore;
  private help: HelpOptions;
  private logger: Logger;
  private handlers: Record<CommandName, Handler>;

  constructor(options: CommandRouterOptions) {
    this.reports = options.reports;
    this.chat = options.chat;
    this.store = options.store;
    this.help = options.help;
    this.logger = options.logger.child({ component: 'commands' });

    this.handlers = {
      start: (cmd) => this.reply(cmd, formatHelp(this.help)),
      ct: (cmd) => this.reports.runDailyReport(cmd.chatId),
      wr: (cmd) => this.replyWithProgress(cmd, () => this.reports.buildWeeklyReport()),
      mt: (cmd) => this.myTasks(cmd),
      stored: (cmd) => this.stored(cmd),
      unpin: (cmd) => this.unpin(cmd),
      clear_stored: (cmd) => this.clearStored(cmd),
      clear_commands: (cmd) => this.clearCommands(cmd),
      debug_file: (cmd) => this.debugFile(cmd),
    };
  }

  async handle(command: InboundCommand): Promise<void> {
    this.logger.info({ command: command.name, chatId: command.chatId, userId: command.userId }, 'Command received');

    try {
      await this.handlers[command.name](command);
    } catch (error) {
      this.logger.error({ command: command.name, error: (error as Error).message }, 'Command failed');
      await this.reply(command, `❌ Error: ${escapeHtml((error as Error).message)}`).catch((replyError: unknown) => {
        this.logger.error({ error: (replyError as Error).message }, 'Could not report command failure');
      });
    }
  }

  private async reply(command: InboundCommand, text: string): Promise<void> {
    await this.chat.send(text, command.chatId);
  }

  /**
   * Post a placeholder, then replace it with the result once it is built
   */
  private async replyWithProgress(command: InboundCommand, build: () => Promise<string>): Promise<void> {
    const placeholderId = await this.chat.send(PROGRESS_TEXT, command.chatId);
    const text = await build();

    try {
      await this.chat.edit(placeholderId, text, command.chatId);
    } catch (error) {
      if (!(error instanceof DeliveryError)) throw error;
      this.logger.warn({ command: command.name, error: error.message }, 'Could not edit placeholder, sending anew');
      await this.reply(command, text);
    }
  }

  private async myTasks(command: InboundCommand): Promise<void> {
    if (!command.username) {
      await this.reply(command, '❌ Could not determine your username. Set one in your chat profile.');
      return;
    }

    const boardUsername = this.reports.boardUserFor(command.username);
    if (!boardUsername) {
      await this.reply(command, `❌ User @${escapeHtml(command.username)} not found in settings.`);
      return;
    }

    const chatUsername = command.username;
    await this.replyWithProgress(command, () => this.reports.buildPersonalReport(chatUsername, boardUsername));
  }

  private async stored(command: InboundCommand): Promise<void> {
    const state = await this.store.load();
    const records = state.pinned.filter((record) => record.chatId === command.chatId);

    if (records.length === 0) {
      await this.reply(command, '📌 No stored pinned messages');
      return;
    }

    const lines = [`📌 <b>Stored pinned messages (${records.length}):</b>`];
    records.forEach((record, index) => {
      const link = record.messageUrl ? ` - <a href="${escapeHtml(record.messageUrl)}">open</a>` : '';
      lines.push(
        '',
        `${index + 1}. ID: <code>${record.messageId}</code>${link}`,
        `   📅 ${escapeHtml(record.pinnedAt)}`,
        `   🏷️ ${escapeHtml(record.slot)}`
      );
    });
    await this.reply(command, lines.join('\n'));
  }

  private async unpin(command: InboundCommand): Promise<void> {
    if (!/^\d+$/.test(command.args)) {
      await this.reply(command, '❌ Usage: /unpin MESSAGE_ID');
      return;
    }
    const messageId = Number(command.args);

    const state = await this.store.load();
    const record = state.pinned.find(
      (candidate) => candidate.chatId === command.chatId && candidate.messageId === messageId
    );
    if (!record) {
      await this.reply(command, `❌ Message ${messageId} not found among stored pinned messages`);
      return;
    }

    try {
      await this.chat.unpin(messageId, command.chatId);
    } catch (error) {
      if (!(error instanceof DeliveryError)) throw error;
      this.logger.warn({ messageId, error: error.message }, 'Unpin failed');
      await this.reply(command, `❌ Failed to unpin message ${messageId}`);
      return;
    }

    state.pinned = state.pinned.filter((candidate) => candidate !== record);
    await this.store.save(state);
    await this.reply(command, `✅ Message ${messageId} unpinned and removed from storage`);
  }

  private async clearStored(command: InboundCommand): Promise<void> {
    const state = await this.store.load();
    const before = state.pinned.length;
    state.pinned = state.pinned.filter((record) => record.chatId !== command.chatId);
    const cleared = before - state.pinned.length;

    await this.store.save(state);
    await this.reply(command, `🗑️ Cleared ${cleared} stored pinned message${cleared === 1 ? '' : 's'}`);
  }

  private async clearCommands(command: InboundCommand): Promise<void> {
    try {
      await this.chat.clearCommands();
    } catch (error) {
      if (!(error instanceof DeliveryError)) throw error;
      this.logger.warn({ error: error.message }, 'Could not clear bot commands');
      await this.reply(command, '❌ Failed to clear bot commands');
      return;
    }
    await this.reply(command, '🗑️ All bot commands cleared');
  }

  private async debugFile(command: InboundCommand): Promise<void> {
    const raw = await this.store.readRaw();
    const name = escapeHtml(path.basename(this.store.filePath));

    if (raw === null) {
      await this.reply(command, `📄 ${name} does not exist yet`);
      return;
    }

    const truncated = raw.length > MAX_DEBUG_CHARS;
    const body = truncated ? raw.slice(0, MAX_DEBUG_CHARS) : raw;
    const lines = [`📄 <b>${name}</b> (${raw.length} chars)`, `<pre>${escapeHtml(body)}</pre>`];
    if (truncated) {
      lines.push('… truncated');
    }
    await this.reply(command, lines.join('\n'));
  }
}
