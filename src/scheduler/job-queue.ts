/**
 * Job Queue
 *
 * Runs scheduled jobs and command handlers one at a time, in arrival order.
 * A failing job is logged and recorded; the queue moves on to the next one.
 */

import type { Logger } from 'pino';

export type JobKind = 'scheduled' | 'command';

export interface Job {
  name: string;
  kind: JobKind;
  run: () => Promise<void>;
}

export interface JobExecution {
  name: string;
  kind: JobKind;
  startedAt: Date;
  success: boolean;
  error?: string;
  /** Milliseconds */
  duration: number;
}

const MAX_HISTORY = 50;

export class JobQueue {
  private logger: Logger;
  private pending: Job[] = [];
  private running: Job | null = null;
  private draining: Promise<void> | null = null;
  private history: JobExecution[] = [];

  constructor(logger: Logger) {
    this.logger = logger.child({ component: 'job-queue' });
  }

  /**
   * Queue a job. A scheduled job that is already waiting (not yet started)
   * is not queued twice; returns false in that case.
   */
  enqueue(job: Job): boolean {
    if (job.kind === 'scheduled' && this.pending.some((queued) => queued.name === job.name)) {
      this.logger.debug({ job: job.name }, 'Job already waiting, skipped');
      return false;
    }

    this.pending.push(job);
    if (!this.draining) {
      this.draining = this.drain();
    }
    return true;
  }

  /**
   * Resolves once every queued job has finished
   */
  onIdle(): Promise<void> {
    return this.draining ?? Promise.resolve();
  }

  get size(): number {
    return this.pending.length;
  }

  get current(): string | null {
    return this.running?.name ?? null;
  }

  getHistory(limit?: number): JobExecution[] {
    const history = [...this.history].reverse();
    return limit ? history.slice(0, limit) : history;
  }

  private async drain(): Promise<void> {
    try {
      for (let job = this.pending.shift(); job; job = this.pending.shift()) {
        this.running = job;
        await this.execute(job);
        this.running = null;
      }
    } finally {
      this.draining = null;
    }
  }

  private async execute(job: Job): Promise<void> {
    const startedAt = new Date();
    let success = true;
    let errorMessage: string | undefined;

    try {
      await job.run();
    } catch (error) {
      success = false;
      errorMessage = (error as Error).message;
      this.logger.error({ job: job.name, kind: job.kind, error: errorMessage }, 'Job failed');
    }

    const execution: JobExecution = {
      name: job.name,
      kind: job.kind,
      startedAt,
      success,
      error: errorMessage,
      duration: Date.now() - startedAt.getTime(),
    };
    this.history.push(execution);
    if (this.history.length > MAX_HISTORY) {
      this.history.shift();
    }

    this.logger.info({ job: job.name, success, duration: execution.duration }, 'Job executed');
  }
}
