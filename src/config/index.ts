export {
  configSchema,
  loadConfig,
  getConfig,
  resetConfig,
  maskConfig,
  ConfigError,
  DEFAULT_CONFIG_PATH,
  type Config,
  type TelegramConfig,
  type TrelloConfig,
  type ListsConfig,
  type ScheduleConfig,
  type ReportsConfig,
  type LoggingConfig,
  type LoadConfigOptions,
} from './config.js';
export { UserMapping, normalizeHandle } from './user-mapping.js';
