import { z } from 'zod';
import dotenv from 'dotenv';
import yaml from 'js-yaml';
import * as fs from 'fs';
import * as path from 'path';
import { parseCronExpression } from '../scheduler/scheduler.js';

// Load environment variables from .env file
dotenv.config();

export const DEFAULT_CONFIG_PATH = 'config.yaml';

/**
 * Fatal configuration problem. Raised only at startup; the process must not
 * run with missing or invalid credentials.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly configPath?: string
  ) {
    super(configPath ? `${configPath}: ${message}` : message);
    this.name = 'ConfigError';
  }
}

// Values copied verbatim from the example file are treated as missing
const required = (label: string) =>
  z
    .string({ required_error: `${label} is required` })
    .trim()
    .min(1, `${label} is required`)
    .refine((value) => !value.startsWith('YOUR_'), `${label} still holds a placeholder value`);

// Telegram accepts numeric chat ids; YAML may hand them over as numbers
const chatId = (label: string) =>
  z.union([z.string(), z.number()]).transform((value) => String(value)).pipe(required(label));

const telegramSchema = z.object({
  botToken: required('Telegram bot token'),
  chatId: chatId('Telegram chat id'),
  reportChatId: z.union([z.string(), z.number()]).transform((value) => String(value)).optional(),
});

const trelloSchema = z.object({
  apiKey: required('Trello API key'),
  token: required('Trello token'),
  boardIds: z.array(z.string().trim().min(1)).min(1, 'At least one board id must be configured'),
  baseUrl: z.string().url().default('https://api.trello.com/1'),
  requestTimeoutMs: z.number().int().positive().default(30000),
});

const listsSchema = z.object({
  done: z.array(z.string().min(1)).min(1).default(['done', 'completed', 'finished']),
  inProgress: z.array(z.string().min(1)).min(1).default(['in progress', 'doing', 'working', 'review', 'qa']),
});

const cron = (label: string) =>
  z.string().refine((expr) => parseCronExpression(expr).valid, `${label} is not a valid cron expression`);

const scheduleSchema = z.object({
  daily: cron('Daily schedule').default('0 8 * * 1-6'),
  weekly: cron('Weekly schedule').default('0 0 * * 1'),
  pollIntervalSeconds: z.number().int().positive().default(30),
  tickSeconds: z.number().int().positive().default(15),
});

const reportsSchema = z.object({
  longRunningDays: z.number().positive().default(3),
  weeklyWindowDays: z.number().int().positive().default(7),
  deleteSupersededReports: z.boolean().default(false),
});

const stateSchema = z.object({
  file: z.string().min(1).default('relay-state.json'),
});

const loggingSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
});

// Main configuration schema
export const configSchema = z.object({
  telegram: telegramSchema,
  trello: trelloSchema,
  userMapping: z.record(z.string()).default({}),
  lists: listsSchema.default({}),
  schedule: scheduleSchema.default({}),
  reports: reportsSchema.default({}),
  state: stateSchema.default({}),
  logging: loggingSchema.default({}),
});

export type Config = z.infer<typeof configSchema>;
export type TelegramConfig = z.infer<typeof telegramSchema>;
export type TrelloConfig = z.infer<typeof trelloSchema>;
export type ListsConfig = z.infer<typeof listsSchema>;
export type ScheduleConfig = z.infer<typeof scheduleSchema>;
export type ReportsConfig = z.infer<typeof reportsSchema>;
export type LoggingConfig = z.infer<typeof loggingSchema>;

type RawSection = Record<string, unknown>;

function isRecord(value: unknown): value is RawSection {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: RawSection, key: string): RawSection {
  const value = raw[key];
  return isRecord(value) ? { ...value } : {};
}

/**
 * Read the YAML file into a plain object. A missing file is not an error on
 * its own: every required value may come from the environment instead.
 */
function readConfigFile(configPath: string): RawSection {
  if (!fs.existsSync(configPath)) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Invalid YAML: ${(error as Error).message}`, configPath);
  }

  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new ConfigError('Configuration root must be a mapping', configPath);
  }
  return parsed;
}

/**
 * Environment variables win over file values
 */
function applyEnvOverrides(raw: RawSection, env: NodeJS.ProcessEnv): RawSection {
  const telegram = section(raw, 'telegram');
  const trello = section(raw, 'trello');
  const logging = section(raw, 'logging');

  if (env.TELEGRAM_BOT_TOKEN) telegram.botToken = env.TELEGRAM_BOT_TOKEN;
  if (env.TELEGRAM_CHAT_ID) telegram.chatId = env.TELEGRAM_CHAT_ID;
  if (env.REPORT_CHAT_ID) telegram.reportChatId = env.REPORT_CHAT_ID;
  if (env.TRELLO_API_KEY) trello.apiKey = env.TRELLO_API_KEY;
  if (env.TRELLO_TOKEN) trello.token = env.TRELLO_TOKEN;
  if (env.TRELLO_BOARD_IDS) {
    trello.boardIds = env.TRELLO_BOARD_IDS.split(',').map((id) => id.trim()).filter(Boolean);
  }
  if (env.LOG_LEVEL) logging.level = env.LOG_LEVEL;

  return { ...raw, telegram, trello, logging };
}

export interface LoadConfigOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Load configuration from the YAML file with environment overrides
 * @throws ConfigError if a required value is missing or invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const env = options.env ?? process.env;
  const configPath = path.resolve(options.configPath ?? env.RELAY_CONFIG ?? DEFAULT_CONFIG_PATH);

  const rawConfig = applyEnvOverrides(readConfigFile(configPath), env);
  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errorMessages = result.error.errors
      .map((err) => `${err.path.join('.')}: ${err.message}`)
      .join('\n');
    throw new ConfigError(`Configuration validation failed:\n${errorMessages}`, configPath);
  }

  const config = result.data;
  if (!config.telegram.reportChatId) {
    config.telegram.reportChatId = config.telegram.chatId;
  }
  return config;
}

/**
 * Copy of the configuration that is safe to print
 */
export function maskConfig(config: Config): Record<string, unknown> {
  const mask = (value: string) => (value ? `${value.slice(0, 4)}***` : '(not set)');
  return {
    ...config,
    telegram: { ...config.telegram, botToken: mask(config.telegram.botToken) },
    trello: { ...config.trello, apiKey: mask(config.trello.apiKey), token: mask(config.trello.token) },
  };
}

// Cached config instance (lazy loaded)
let cachedConfig: Config | null = null;

export function getConfig(): Config {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

export function resetConfig(): void {
  cachedConfig = null;
}
