/**
 * Scheduler
 *
 * Trigger rules (cron or fixed interval) paired with jobs, evaluated on every
 * tick by a pure due-entries function. Due jobs go to the sequential JobQueue;
 * the scheduler itself never runs a job.
 */

import type { Logger } from 'pino';
import type { JobQueue } from './job-queue.js';

export interface CronParseResult {
  valid: boolean;
  error?: string;
  parts?: string[];
  fields?: CronFields;
}

export interface CronFields {
  minutes: number[];
  hours: number[];
  daysOfMonth: number[];
  months: number[];
  daysOfWeek: number[];
  /** Day-of-month field was not "*" */
  domRestricted: boolean;
  /** Day-of-week field was not "*" */
  dowRestricted: boolean;
}

const SHORTHANDS: Record<string, string> = {
  '@hourly': '0 * * * *',
  '@daily': '0 0 * * *',
  '@weekly': '0 0 * * 0',
  '@monthly': '0 0 1 * *',
  '@yearly': '0 0 1 1 *',
  '@annually': '0 0 1 1 *',
};

const RANGES = [
  { min: 0, max: 59 }, // minute
  { min: 0, max: 23 }, // hour
  { min: 1, max: 31 }, // day of month
  { min: 1, max: 12 }, // month
  { min: 0, max: 7 },  // day of week (0 and 7 are Sunday)
];

// Digits only; '' and '1e1' are not field values
function toInt(text: string): number | null {
  return /^\d+$/.test(text) ? Number(text) : null;
}

/**
 * Expand one cron field ("*", "*\/5", "1-5", "1-5/2", "1,3,5") to its values
 */
function expandCronPart(part: string, min: number, max: number): number[] | null {
  const values = new Set<number>();

  for (const item of part.split(',')) {
    const pieces = item.split('/');
    if (pieces.length > 2) return null;
    const [range, stepText] = pieces;
    const step = stepText === undefined ? 1 : toInt(stepText);
    if (step === null || step <= 0 || step > max) return null;

    let start: number | null;
    let end: number | null;
    if (range === '*') {
      start = min;
      end = max;
    } else if (range.includes('-')) {
      const bounds = range.split('-');
      if (bounds.length !== 2) return null;
      start = toInt(bounds[0]);
      end = toInt(bounds[1]);
    } else {
      start = toInt(range);
      end = stepText === undefined ? start : max;
    }

    if (start === null || end === null || start < min || end > max || start > end) {
      return null;
    }
    for (let value = start; value <= end; value += step) {
      values.add(value);
    }
  }

  return [...values].sort((a, b) => a - b);
}

/**
 * Parse and validate a cron expression
 */
export function parseCronExpression(expression: string): CronParseResult {
  const expr = SHORTHANDS[expression] || expression;
  const parts = expr.trim().split(/\s+/);

  if (parts.length !== 5) {
    return {
      valid: false,
      error: `Invalid cron expression: expected 5 parts, got ${parts.length}`,
    };
  }

  const expanded: number[][] = [];
  for (let i = 0; i < parts.length; i++) {
    const values = expandCronPart(parts[i], RANGES[i].min, RANGES[i].max);
    if (!values || values.length === 0) {
      return {
        valid: false,
        error: `Invalid cron part at position ${i + 1}: ${parts[i]}`,
      };
    }
    expanded.push(values);
  }

  const [minutes, hours, daysOfMonth, months, rawDaysOfWeek] = expanded;
  const daysOfWeek = [...new Set(rawDaysOfWeek.map((day) => day % 7))].sort((a, b) => a - b);

  return {
    valid: true,
    parts,
    fields: {
      minutes,
      hours,
      daysOfMonth,
      months,
      daysOfWeek,
      domRestricted: parts[2] !== '*',
      dowRestricted: parts[4] !== '*',
    },
  };
}

function dayMatches(fields: CronFields, date: Date): boolean {
  if (!fields.months.includes(date.getMonth() + 1)) return false;

  const dom = fields.daysOfMonth.includes(date.getDate());
  const dow = fields.daysOfWeek.includes(date.getDay());
  // Standard cron: when both day fields are restricted, either may match
  if (fields.domRestricted && fields.dowRestricted) return dom || dow;
  return dom && dow;
}

// Long enough to reach Feb 29 from anywhere
const MAX_SEARCH_DAYS = 366 * 8;

/**
 * First minute strictly after `from` that matches the cron fields (local time)
 */
export function nextCronRun(fields: CronFields, from: Date): Date {
  const cursor = new Date(from);
  cursor.setSeconds(0, 0);
  cursor.setMinutes(cursor.getMinutes() + 1);

  for (let day = 0; day < MAX_SEARCH_DAYS; day++) {
    if (dayMatches(fields, cursor)) {
      for (const hour of fields.hours) {
        if (hour < cursor.getHours()) continue;
        for (const minute of fields.minutes) {
          if (hour === cursor.getHours() && minute < cursor.getMinutes()) continue;
          const next = new Date(cursor);
          next.setHours(hour, minute, 0, 0);
          return next;
        }
      }
    }
    cursor.setDate(cursor.getDate() + 1);
    cursor.setHours(0, 0, 0, 0);
  }

  throw new Error('Cron expression never fires');
}

// ============ Trigger rules ============

export type Trigger =
  | { type: 'cron'; expression: string }
  | { type: 'interval'; everyMs: number };

export interface ScheduleEntry {
  name: string;
  trigger: Trigger;
}

/**
 * Next fire time of a trigger strictly after `after`
 */
export function nextFireAfter(trigger: Trigger, after: Date): Date {
  if (trigger.type === 'interval') {
    return new Date(after.getTime() + trigger.everyMs);
  }

  const parsed = parseCronExpression(trigger.expression);
  if (!parsed.fields) {
    throw new Error(parsed.error ?? `Invalid cron expression: ${trigger.expression}`);
  }
  return nextCronRun(parsed.fields, after);
}

/**
 * Entries whose next run is at or before `now`, earliest first; entries due
 * at the same time keep their declaration order
 */
export function dueEntries<T extends ScheduleEntry>(
  entries: readonly T[],
  nextRuns: ReadonlyMap<string, Date>,
  now: Date
): T[] {
  return entries
    .map((entry, index) => ({ entry, index, at: nextRuns.get(entry.name) }))
    .filter((item): item is { entry: T; index: number; at: Date } =>
      item.at !== undefined && item.at.getTime() <= now.getTime()
    )
    .sort((a, b) => a.at.getTime() - b.at.getTime() || a.index - b.index)
    .map((item) => item.entry);
}

// ============ Scheduler ============

export interface ScheduledJob extends ScheduleEntry {
  run: () => Promise<void>;
}

export interface SchedulerOptions {
  logger: Logger;
  queue: JobQueue;
  /** How often due entries are evaluated */
  tickMs?: number;
  now?: () => Date;
}

export class Scheduler {
  private logger: Logger;
  private queue: JobQueue;
  private tickMs: number;
  private now: () => Date;
  private jobs: ScheduledJob[] = [];
  private nextRuns: Map<string, Date> = new Map();
  private timer: NodeJS.Timeout | null = null;

  constructor(options: SchedulerOptions) {
    this.logger = options.logger.child({ component: 'scheduler' });
    this.queue = options.queue;
    this.tickMs = options.tickMs ?? 15000;
    this.now = options.now ?? (() => new Date());
  }

  schedule(job: ScheduledJob): void {
    if (this.jobs.some((existing) => existing.name === job.name)) {
      throw new Error(`Job already scheduled: ${job.name}`);
    }
    if (job.trigger.type === 'cron') {
      const parsed = parseCronExpression(job.trigger.expression);
      if (!parsed.valid) {
        throw new Error(`Invalid cron expression for ${job.name}: ${parsed.error}`);
      }
    }

    const nextRun = nextFireAfter(job.trigger, this.now());
    this.jobs.push(job);
    this.nextRuns.set(job.name, nextRun);

    this.logger.info({ name: job.name, trigger: job.trigger, nextRun: nextRun.toISOString() }, 'Job scheduled');
  }

  /**
   * Enqueue every due job and advance its next run. Returns the number of
   * jobs handed to the queue.
   */
  tick(now: Date = this.now()): number {
    let enqueued = 0;
    for (const job of dueEntries(this.jobs, this.nextRuns, now)) {
      this.nextRuns.set(job.name, nextFireAfter(job.trigger, now));
      if (this.queue.enqueue({ name: job.name, kind: 'scheduled', run: job.run })) {
        enqueued++;
      }
    }
    return enqueued;
  }

  /**
   * Enqueue a scheduled job out of turn (its schedule is unchanged)
   */
  runNow(name: string): boolean {
    const job = this.jobs.find((candidate) => candidate.name === name);
    if (!job) {
      throw new Error(`Unknown job: ${name}`);
    }
    return this.queue.enqueue({ name: job.name, kind: 'scheduled', run: job.run });
  }

  listJobs(): Array<ScheduleEntry & { nextRun: Date | undefined }> {
    return this.jobs.map((job) => ({
      name: job.name,
      trigger: job.trigger,
      nextRun: this.nextRuns.get(job.name),
    }));
  }

  start(): void {
    if (this.timer) return;

    this.timer = setInterval(() => this.tick(), this.tickMs);
    this.logger.info({ jobs: this.jobs.length, tickMs: this.tickMs }, 'Scheduler started');
  }

  stop(): void {
    if (!this.timer) return;

    clearInterval(this.timer);
    this.timer = null;
    this.logger.info('Scheduler stopped');
  }

  isRunning(): boolean {
    return this.timer !== null;
  }
}
