import type { Logger } from 'pino';
import type { Config } from '../config/config.js';
import { UserMapping } from '../config/user-mapping.js';
import { TrelloBoardClient, type BoardClient } from '../board/board-client.js';
import { TelegramChannel } from '../channels/telegram.js';
import { StateStore } from '../state/state-store.js';
import { ReportService } from '../relay/report-service.js';
import { CommandRouter } from '../relay/command-router.js';
import { JobQueue } from '../scheduler/job-queue.js';
import { Scheduler } from '../scheduler/scheduler.js';

export const JOB_NAMES = {
  daily: 'daily-report',
  weekly: 'weekly-report',
  poll: 'change-poll',
} as const;

export interface GatewayOptions {
  config: Config;
  logger: Logger;
  /** Board service client; a Trello client built from config otherwise */
  boardClient?: BoardClient;
}

export class Gateway {
  private config: Config;
  private logger: Logger;
  private injectedBoardClient: BoardClient | undefined;

  private boardClient: BoardClient | null = null;
  private telegramChannel: TelegramChannel | null = null;
  private store: StateStore | null = null;
  private reports: ReportService | null = null;
  private router: CommandRouter | null = null;
  private queue: JobQueue | null = null;
  private scheduler: Scheduler | null = null;

  private isInitialized = false;
  private isRunning = false;

  constructor(options: GatewayOptions) {
    this.config = options.config;
    this.logger = options.logger;
    this.injectedBoardClient = options.boardClient;
  }

  async initialize(): Promise<void> {
    if (this.isInitialized) {
      return;
    }

    this.logger.info('Initializing gateway...');
    const { telegram, trello, schedule, reports } = this.config;

    const userMapping = new UserMapping(this.config.userMapping);

    const boardClient =
      this.injectedBoardClient ??
      new TrelloBoardClient({
        apiKey: trello.apiKey,
        token: trello.token,
        baseUrl: trello.baseUrl,
        timeout: trello.requestTimeoutMs,
      });
    this.boardClient = boardClient;

    // Fail fast on bad credentials rather than on the first scheduled run
    const boardUser = await boardClient.testAuthentication();
    this.logger.info({ boardUser, boards: trello.boardIds.length }, 'Board service authenticated');

    const store = new StateStore({ filePath: this.config.state.file, logger: this.logger });
    this.store = store;
    const state = await store.load();
    state.userMappings = userMapping.toRecord();
    await store.save(state);
    this.logger.debug({ filePath: store.filePath, mappedUsers: userMapping.size }, 'State store ready');

    const telegramChannel = new TelegramChannel({
      botToken: telegram.botToken,
      chatId: telegram.chatId,
      reportChatId: telegram.reportChatId ?? telegram.chatId,
      userMapping,
      logger: this.logger,
    });
    this.telegramChannel = telegramChannel;

    const reportService = new ReportService({
      boardClient,
      chat: telegramChannel,
      store,
      userMapping,
      config: this.config,
      logger: this.logger,
    });
    this.reports = reportService;

    this.router = new CommandRouter({
      reports: reportService,
      chat: telegramChannel,
      store,
      help: {
        dailyCron: schedule.daily,
        weeklyCron: schedule.weekly,
        pollIntervalSeconds: schedule.pollIntervalSeconds,
        longRunningDays: reports.longRunningDays,
      },
      logger: this.logger,
    });

    const queue = new JobQueue(this.logger);
    this.queue = queue;

    const scheduler = new Scheduler({ logger: this.logger, queue, tickMs: schedule.tickSeconds * 1000 });
    scheduler.schedule({
      name: JOB_NAMES.daily,
      trigger: { type: 'cron', expression: schedule.daily },
      run: () => reportService.runDailyReport(),
    });
    scheduler.schedule({
      name: JOB_NAMES.weekly,
      trigger: { type: 'cron', expression: schedule.weekly },
      run: () => reportService.runWeeklyReport(),
    });
    scheduler.schedule({
      name: JOB_NAMES.poll,
      trigger: { type: 'interval', everyMs: schedule.pollIntervalSeconds * 1000 },
      run: async () => {
        await reportService.runChangePoll();
      },
    });
    this.scheduler = scheduler;

    this.isInitialized = true;
    this.logger.info('Gateway initialized');
  }

  async start(): Promise<void> {
    if (this.isRunning) {
      return;
    }

    if (!this.isInitialized) {
      await this.initialize();
    }

    const { telegramChannel, router, queue, scheduler } = this;
    if (!telegramChannel || !router || !queue || !scheduler) {
      throw new Error('Gateway not initialized');
    }

    this.logger.info('Starting gateway...');

    telegramChannel.onCommand((command) => {
      queue.enqueue({
        name: `command:/${command.name}`,
        kind: 'command',
        run: () => router.handle(command),
      });
    });
    await telegramChannel.start();

    scheduler.start();
    // First poll records the snapshot that later polls compare against
    scheduler.runNow(JOB_NAMES.poll);

    this.isRunning = true;
    this.logger.info('Gateway started');
  }

  async stop(): Promise<void> {
    if (!this.isRunning) {
      return;
    }

    this.logger.info('Stopping gateway...');

    this.scheduler?.stop();

    if (this.telegramChannel) {
      await this.telegramChannel.stop();
    }

    // Let the job in flight finish writing state
    if (this.queue) {
      await this.queue.onIdle();
    }

    this.isRunning = false;
    this.logger.info('Gateway stopped');
  }

  getScheduler(): Scheduler | null {
    return this.scheduler;
  }

  getQueue(): JobQueue | null {
    return this.queue;
  }
}

export function setupGracefulShutdown(gateway: Gateway, logger: Logger): void {
  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Received shutdown signal');
    try {
      await gateway.stop();
      logger.info('Graceful shutdown complete');
      process.exit(0);
    } catch (error) {
      logger.error({ error: (error as Error).message }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}
