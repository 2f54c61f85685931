/**
 * Chat channel types and interfaces
 *
 * The relay only talks to the chat service through ChatClient, so report and
 * command logic stay independent of the messaging platform.
 */

export type ChatOperation = 'send' | 'edit' | 'pin' | 'unpin' | 'delete' | 'clear_commands';

/**
 * A chat-service call failed (network error, message not found, API error).
 * Callers skip the affected message or slot for the current cycle.
 */
export class DeliveryError extends Error {
  constructor(
    message: string,
    public readonly operation: ChatOperation,
    public readonly chatId: string,
    public readonly messageId?: number
  ) {
    super(`${operation} failed in chat ${chatId}${messageId !== undefined ? ` (message ${messageId})` : ''}: ${message}`);
    this.name = 'DeliveryError';
  }
}

export interface ChatClient {
  /** Chat that scheduled reports and alerts go to */
  readonly defaultChatId: string;

  /** Send a message, returning the id of its first part */
  send(text: string, chatId?: string): Promise<number>;

  edit(messageId: number, text: string, chatId?: string): Promise<void>;

  pin(messageId: number, chatId?: string): Promise<void>;

  unpin(messageId: number, chatId?: string): Promise<void>;

  delete(messageId: number, chatId?: string): Promise<void>;

  /** Remove the bot's command menu */
  clearCommands(): Promise<void>;

  /** Chat handle for a board username, or null when the user is not mapped */
  resolveMention(boardUsername: string): string | null;

  /** Permanent link to a message, used to reference earlier reports */
  messageUrl(chatId: string, messageId: number): string;
}

export const COMMAND_NAMES = [
  'start',
  'ct',
  'wr',
  'mt',
  'stored',
  'unpin',
  'clear_stored',
  'clear_commands',
  'debug_file',
] as const;

export type CommandName = (typeof COMMAND_NAMES)[number];

/**
 * Interactive command received from the chat
 */
export interface InboundCommand {
  name: CommandName;
  /** Text after the command, trimmed */
  args: string;
  chatId: string;
  userId: string;
  /** Sender's chat username without "@", when they have one */
  username: string | null;
  receivedAt: Date;
}

export type CommandListener = (command: InboundCommand) => void;
