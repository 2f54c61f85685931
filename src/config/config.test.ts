import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { ConfigError, loadConfig, maskConfig } from './config.js';
import { createTempDir } from '../e2e/helpers.js';

const VALID_YAML = `
telegram:
  botToken: test-bot-token
  chatId: -1001234567890
trello:
  apiKey: test-key
  token: test-token
  boardIds:
    - board-a
    - board-b
userMapping:
  alice: "@alice_tg"
`;

describe('loadConfig', () => {
  let testDir: string;
  let configPath: string;

  beforeEach(async () => {
    testDir = await createTempDir('board-relay-config-');
    configPath = path.join(testDir, 'config.yaml');
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it('reads the YAML file and fills in defaults', async () => {
    await fs.writeFile(configPath, VALID_YAML);

    const config = loadConfig({ configPath, env: {} });

    expect(config.telegram.chatId).toBe('-1001234567890');
    expect(config.telegram.reportChatId).toBe('-1001234567890');
    expect(config.trello.boardIds).toEqual(['board-a', 'board-b']);
    expect(config.trello.baseUrl).toBe('https://api.trello.com/1');
    expect(config.userMapping).toEqual({ alice: '@alice_tg' });
    expect(config.schedule).toEqual({
      daily: '0 8 * * 1-6',
      weekly: '0 0 * * 1',
      pollIntervalSeconds: 30,
      tickSeconds: 15,
    });
    expect(config.reports).toEqual({ longRunningDays: 3, weeklyWindowDays: 7, deleteSupersededReports: false });
    expect(config.lists.done).toEqual(['done', 'completed', 'finished']);
    expect(config.state.file).toBe('relay-state.json');
    expect(config.logging.level).toBe('info');
  });

  it('lets environment variables override the file', async () => {
    await fs.writeFile(configPath, VALID_YAML);

    const config = loadConfig({
      configPath,
      env: {
        TELEGRAM_BOT_TOKEN: 'env-bot-token',
        REPORT_CHAT_ID: '-100999',
        TRELLO_BOARD_IDS: ' board-x , board-y,',
        LOG_LEVEL: 'debug',
      },
    });

    expect(config.telegram.botToken).toBe('env-bot-token');
    expect(config.telegram.reportChatId).toBe('-100999');
    expect(config.trello.boardIds).toEqual(['board-x', 'board-y']);
    expect(config.logging.level).toBe('debug');
  });

  it('runs from the environment alone when the file is missing', () => {
    const config = loadConfig({
      configPath: path.join(testDir, 'absent.yaml'),
      env: {
        TELEGRAM_BOT_TOKEN: 'env-bot-token',
        TELEGRAM_CHAT_ID: '42',
        TRELLO_API_KEY: 'test-key',
        TRELLO_TOKEN: 'test-token',
        TRELLO_BOARD_IDS: 'board-a',
      },
    });

    expect(config.telegram.chatId).toBe('42');
    expect(config.trello.boardIds).toEqual(['board-a']);
  });

  it('takes the file path from RELAY_CONFIG', async () => {
    await fs.writeFile(configPath, VALID_YAML);

    const config = loadConfig({ env: { RELAY_CONFIG: configPath } });

    expect(config.trello.apiKey).toBe('test-key');
  });

  it('rejects missing credentials with a ConfigError naming the field', async () => {
    await fs.writeFile(configPath, VALID_YAML.replace('  token: test-token\n', ''));

    expect(() => loadConfig({ configPath, env: {} })).toThrow(ConfigError);
    expect(() => loadConfig({ configPath, env: {} })).toThrow('trello.token: Trello token is required');
  });

  it('rejects placeholder values copied from the example file', async () => {
    await fs.writeFile(configPath, VALID_YAML.replace('test-bot-token', 'YOUR_BOT_TOKEN'));

    expect(() => loadConfig({ configPath, env: {} })).toThrow(
      'telegram.botToken: Telegram bot token still holds a placeholder value'
    );
  });

  it('rejects an invalid cron schedule', async () => {
    await fs.writeFile(configPath, `${VALID_YAML}schedule:\n  daily: "every morning"\n`);

    expect(() => loadConfig({ configPath, env: {} })).toThrow(
      'schedule.daily: Daily schedule is not a valid cron expression'
    );
  });

  it('rejects a cron schedule with an empty list item', async () => {
    await fs.writeFile(configPath, `${VALID_YAML}schedule:\n  weekly: "0 0 * * 1,,5"\n`);

    expect(() => loadConfig({ configPath, env: {} })).toThrow(
      'schedule.weekly: Weekly schedule is not a valid cron expression'
    );
  });

  it('rejects YAML that is not a mapping', async () => {
    await fs.writeFile(configPath, '- just\n- a list\n');

    expect(() => loadConfig({ configPath, env: {} })).toThrow('Configuration root must be a mapping');
  });
});

describe('maskConfig', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await createTempDir('board-relay-config-');
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it('hides secrets but keeps their first characters', async () => {
    const configPath = path.join(testDir, 'config.yaml');
    await fs.writeFile(configPath, VALID_YAML);

    const masked = maskConfig(loadConfig({ configPath, env: {} }));

    expect(masked.telegram).toEqual({
      botToken: 'test***',
      chatId: '-1001234567890',
      reportChatId: '-1001234567890',
    });
    expect(masked.trello).toMatchObject({ apiKey: 'test***', token: 'test***' });
  });
});
