// Chat client interface and command types
export {
  DeliveryError,
  COMMAND_NAMES,
  type ChatClient,
  type ChatOperation,
  type CommandName,
  type CommandListener,
  type InboundCommand,
} from './types.js';

// Telegram
export {
  TelegramChannel,
  splitMessage,
  telegramMessageUrl,
  type TelegramChannelOptions,
} from './telegram.js';
