#!/usr/bin/env node

import { Command } from 'commander';
import { loadConfig, maskConfig, resetConfig, type Config } from './config/index.js';
import { UserMapping } from './config/user-mapping.js';
import { TrelloBoardClient } from './board/board-client.js';
import { Gateway, setupGracefulShutdown } from './gateway/gateway.js';
import { createLogger } from './utils/logger.js';

const VERSION = '0.1.0';

const program = new Command();

program
  .name('board-relay')
  .description('Relays Trello board reports and change alerts to a Telegram chat')
  .version(VERSION);

// Start command - runs the relay until interrupted
program
  .command('start')
  .description('Start the relay')
  .option('-c, --config <path>', 'Path to the YAML configuration file')
  .option('-v, --verbose', 'Enable verbose logging')
  .action(async (options: { config?: string; verbose?: boolean }) => {
    try {
      resetConfig();
      const config = loadConfig({ configPath: options.config });

      if (options.verbose) {
        config.logging.level = 'debug';
      }

      const logger = createLogger(config.logging);

      logger.info({ version: VERSION, boards: config.trello.boardIds.length }, 'Starting board relay...');

      const gateway = new Gateway({ config, logger });
      setupGracefulShutdown(gateway, logger);

      await gateway.initialize();
      await gateway.start();

      logger.info('Board relay is running. Press Ctrl+C to stop.');
    } catch (error) {
      console.error('Failed to start board relay:', (error as Error).message);
      process.exit(1);
    }
  });

// Check command - verify credentials and board access without starting
program
  .command('check')
  .description('Verify configuration, credentials and board access')
  .option('-c, --config <path>', 'Path to the YAML configuration file')
  .action(async (options: { config?: string }) => {
    let config: Config;
    try {
      resetConfig();
      config = loadConfig({ configPath: options.config });
      const mapping = new UserMapping(config.userMapping);
      console.log(`✓ Configuration valid (${mapping.size} mapped user(s))`);
    } catch (error) {
      console.error(`✗ ${(error as Error).message}`);
      process.exit(1);
    }

    const client = new TrelloBoardClient({
      apiKey: config.trello.apiKey,
      token: config.trello.token,
      baseUrl: config.trello.baseUrl,
      timeout: config.trello.requestTimeoutMs,
    });

    try {
      const username = await client.testAuthentication();
      console.log(`✓ Authenticated with Trello as ${username}`);
    } catch (error) {
      console.error(`✗ Trello authentication failed: ${(error as Error).message}`);
      process.exit(1);
    }

    const { boards, failures } = await client.fetchBoards(config.trello.boardIds);
    for (const board of boards) {
      console.log(`✓ Board "${board.name}" (${board.id}): ${board.lists.length} lists, ${board.cards.length} cards`);
    }
    for (const { boardId, error } of failures) {
      console.error(`✗ Board ${boardId}: ${error.message}`);
    }

    if (failures.length > 0) {
      process.exit(1);
    }
  });

// Config command - show current configuration
program
  .command('config')
  .description('Show current configuration')
  .option('-c, --config <path>', 'Path to the YAML configuration file')
  .option('--json', 'Output as JSON')
  .action((options: { config?: string; json?: boolean }) => {
    try {
      resetConfig();
      const config = loadConfig({ configPath: options.config });
      const safeConfig = maskConfig(config);

      if (options.json) {
        console.log(JSON.stringify(safeConfig, null, 2));
        return;
      }

      console.log('Board Relay Configuration:');
      console.log('');
      console.log('Telegram:');
      console.log(`  Bot token: ${config.telegram.botToken.slice(0, 4)}***`);
      console.log(`  Command chat: ${config.telegram.chatId}`);
      console.log(`  Report chat: ${config.telegram.reportChatId ?? config.telegram.chatId}`);
      console.log('');
      console.log('Trello:');
      console.log(`  Boards: ${config.trello.boardIds.join(', ')}`);
      console.log(`  Mapped users: ${Object.keys(config.userMapping).length}`);
      console.log('');
      console.log('Schedule:');
      console.log(`  Daily report: ${config.schedule.daily}`);
      console.log(`  Weekly report: ${config.schedule.weekly}`);
      console.log(`  Change poll: every ${config.schedule.pollIntervalSeconds}s`);
      console.log('');
      console.log('State:');
      console.log(`  File: ${config.state.file}`);
      console.log('');
      console.log('Logging:');
      console.log(`  Level: ${config.logging.level}`);
    } catch (error) {
      console.error('Failed to load config:', (error as Error).message);
      process.exit(1);
    }
  });

program.parse();
