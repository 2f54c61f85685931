import { Bot, type Context } from 'grammy';
import type { Logger } from 'pino';
import type { UserMapping } from '../config/user-mapping.js';
import {
  COMMAND_NAMES,
  DeliveryError,
  type ChatClient,
  type ChatOperation,
  type CommandListener,
  type CommandName,
} from './types.js';

const MAX_MESSAGE_LENGTH = 4096;

const COMMAND_MENU: Record<CommandName, string> = {
  start: 'Show help and command list',
  ct: 'Current report for all boards',
  wr: 'Weekly statistics',
  mt: 'My tasks (personal)',
  stored: 'Show pinned messages',
  unpin: 'Unpin a stored message',
  clear_stored: 'Clear stored messages',
  clear_commands: 'Clear the command menu',
  debug_file: 'Show the state file',
};

export interface TelegramChannelOptions {
  botToken: string;
  /** The only chat whose commands are served */
  chatId: string;
  /** Where scheduled reports and alerts go */
  reportChatId: string;
  userMapping: UserMapping;
  logger: Logger;
  /** Pre-built bot (tests); created from botToken otherwise */
  bot?: Bot;
}

export function splitMessage(text: string): string[] {
  if (text.length <= MAX_MESSAGE_LENGTH) {
    return [text];
  }

  const chunks: string[] = [];
  let remaining = text;

  while (remaining.length > 0) {
    if (remaining.length <= MAX_MESSAGE_LENGTH) {
      chunks.push(remaining);
      break;
    }

    // Try to split at paragraph boundary
    let splitIndex = remaining.lastIndexOf('\n\n', MAX_MESSAGE_LENGTH);

    // If no paragraph, try line boundary
    if (splitIndex === -1 || splitIndex < MAX_MESSAGE_LENGTH / 2) {
      splitIndex = remaining.lastIndexOf('\n', MAX_MESSAGE_LENGTH);
    }

    // Force split if no good boundary found
    if (splitIndex === -1 || splitIndex < MAX_MESSAGE_LENGTH / 2) {
      splitIndex = MAX_MESSAGE_LENGTH;
    }

    chunks.push(remaining.substring(0, splitIndex).trim());
    remaining = remaining.substring(splitIndex).trim();
  }

  return chunks;
}

/**
 * Link to a message. Supergroup ids carry a "-100" prefix that t.me links omit.
 */
export function telegramMessageUrl(chatId: string, messageId: number): string {
  const urlChatId = chatId.startsWith('-100') ? chatId.slice(4) : chatId.replace(/^-/, '');
  return `https://t.me/c/${urlChatId}/${messageId}`;
}

export class TelegramChannel implements ChatClient {
  readonly defaultChatId: string;
  private bot: Bot;
  private chatId: string;
  private userMapping: UserMapping;
  private logger: Logger;
  private listener: CommandListener | null = null;
  private isRunning = false;

  constructor(options: TelegramChannelOptions) {
    this.bot = options.bot ?? new Bot(options.botToken);
    this.chatId = options.chatId;
    this.defaultChatId = options.reportChatId;
    this.userMapping = options.userMapping;
    this.logger = options.logger.child({ channel: 'telegram' });

    this.setupHandlers();
  }

  /**
   * Register the receiver of interactive commands
   */
  onCommand(listener: CommandListener): void {
    this.listener = listener;
  }

  private setupHandlers(): void {
    for (const name of COMMAND_NAMES) {
      this.bot.command(name, (ctx) => this.handleCommand(name, ctx));
    }

    // Error handler
    this.bot.catch((err) => {
      this.logger.error({ error: err.message }, 'Bot error');
    });
  }

  private handleCommand(name: CommandName, ctx: Context): void {
    const chatId = ctx.chat?.id.toString();
    const userId = ctx.from?.id.toString();
    if (!chatId || !userId) return;

    if (chatId !== this.chatId) {
      this.logger.warn({ chatId, userId, command: name }, 'Command from unauthorized chat ignored');
      return;
    }

    if (!this.listener) {
      this.logger.warn({ command: name }, 'Command received before a listener was registered');
      return;
    }

    const args = typeof ctx.match === 'string' ? ctx.match.trim() : '';
    this.listener({
      name,
      args,
      chatId,
      userId,
      username: ctx.from?.username ?? null,
      receivedAt: new Date(),
    });
  }

  async start(): Promise<void> {
    if (this.isRunning) {
      return;
    }

    this.logger.info('Starting Telegram bot...');
    this.isRunning = true;

    // Register bot commands with Telegram (makes them show in menu)
    await this.bot.api.setMyCommands(
      COMMAND_NAMES.map((command) => ({ command, description: COMMAND_MENU[command] }))
    );

    // bot.start() runs grammy's long-polling loop and only settles on stop
    this.bot
      .start({
        onStart: (botInfo) => {
          this.logger.info({ username: botInfo.username, chatId: this.chatId }, 'Telegram bot started');
        },
      })
      .catch((error: unknown) => {
        this.isRunning = false;
        this.logger.error({ error: (error as Error).message }, 'Telegram polling stopped');
      });
  }

  async stop(): Promise<void> {
    if (!this.isRunning) {
      return;
    }

    this.logger.info('Stopping Telegram bot...');
    await this.bot.stop();
    this.isRunning = false;
    this.logger.info('Telegram bot stopped');
  }

  async send(text: string, chatId: string = this.defaultChatId): Promise<number> {
    let firstId: number | undefined;
    for (const chunk of splitMessage(text)) {
      const message = await this.call('send', chatId, undefined, () =>
        this.bot.api.sendMessage(chatId, chunk, {
          parse_mode: 'HTML',
          link_preview_options: { is_disabled: true },
        })
      );
      firstId ??= message.message_id;
    }

    this.logger.debug({ chatId, messageId: firstId, length: text.length }, 'Message sent');
    if (firstId === undefined) {
      throw new DeliveryError('Nothing to send', 'send', chatId);
    }
    return firstId;
  }

  /**
   * Replace the text of a message. Text past the size limit goes out as
   * follow-up messages.
   */
  async edit(messageId: number, text: string, chatId: string = this.defaultChatId): Promise<void> {
    const [first, ...rest] = splitMessage(text);
    await this.call('edit', chatId, messageId, () =>
      this.bot.api.editMessageText(chatId, messageId, first, {
        parse_mode: 'HTML',
        link_preview_options: { is_disabled: true },
      })
    );
    for (const chunk of rest) {
      await this.send(chunk, chatId);
    }
  }

  async pin(messageId: number, chatId: string = this.defaultChatId): Promise<void> {
    await this.call('pin', chatId, messageId, () =>
      this.bot.api.pinChatMessage(chatId, messageId, { disable_notification: true })
    );
  }

  async unpin(messageId: number, chatId: string = this.defaultChatId): Promise<void> {
    await this.call('unpin', chatId, messageId, () => this.bot.api.unpinChatMessage(chatId, messageId));
  }

  async delete(messageId: number, chatId: string = this.defaultChatId): Promise<void> {
    await this.call('delete', chatId, messageId, () => this.bot.api.deleteMessage(chatId, messageId));
  }

  async clearCommands(): Promise<void> {
    await this.call('clear_commands', this.chatId, undefined, () => this.bot.api.deleteMyCommands());
  }

  resolveMention(boardUsername: string): string | null {
    return this.userMapping.toChatHandle(boardUsername);
  }

  messageUrl(chatId: string, messageId: number): string {
    return telegramMessageUrl(chatId, messageId);
  }

  private async call<T>(
    operation: ChatOperation,
    chatId: string,
    messageId: number | undefined,
    fn: () => Promise<T>
  ): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw new DeliveryError((error as Error).message, operation, chatId, messageId);
    }
  }
}
