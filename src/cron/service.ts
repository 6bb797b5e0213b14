/**
 * Scheduler - runs coffee rounds on a cron schedule
 *
 * Used by `coffeepair serve` for deployments without an external cron.
 * A tick that fires while the previous round is still running is skipped.
 */

import { appendFileSync } from 'node:fs';
import { resolve } from 'node:path';
import schedule from 'node-schedule';
import type { Job } from 'node-schedule';
import type { ScheduleConfig } from '../config/types.js';
import type { RoundResult } from '../core/round.js';
import type { RoundRunner, SchedulerState, SchedulerStatus } from './types.js';

export const DEFAULT_LOG_PATH = 'coffeepair-log.jsonl';

/**
 * Append an event to the JSONL log and echo it to the console
 */
export function logEvent(logPath: string, event: string, data: Record<string, unknown> = {}): void {
  const entry = {
    timestamp: new Date().toISOString(),
    event,
    ...data,
  };

  try {
    appendFileSync(logPath, JSON.stringify(entry) + '\n');
  } catch (err) {
    console.warn(`[Scheduler] Could not write to ${logPath}:`, err instanceof Error ? err.message : err);
  }

  console.log(`[Scheduler] ${event}:`, JSON.stringify(data));
}

export class CoffeeScheduler {
  private runRound: RoundRunner;
  private config: ScheduleConfig;
  private logPath: string;
  private job: Job | null = null;
  private started = false;
  private inProgress = false;
  private state: SchedulerState = {};

  constructor(runRound: RoundRunner, config: ScheduleConfig) {
    this.runRound = runRound;
    this.config = config;
    this.logPath = resolve(process.cwd(), config.logPath || DEFAULT_LOG_PATH);
  }

  start(): void {
    if (this.started) return;

    const rule = this.config.timezone
      ? { rule: this.config.cron, tz: this.config.timezone }
      : this.config.cron;

    const job: Job | null = schedule.scheduleJob(rule, async () => {
      await this.runNow();
    });
    if (!job) {
      throw new Error(`Invalid schedule: "${this.config.cron}"`);
    }

    this.job = job;
    this.started = true;
    this.updateNextRun();

    logEvent(this.logPath, 'scheduler_started', {
      schedule: this.config.cron,
      timezone: this.config.timezone ?? null,
      nextRun: this.state.nextRunAt?.toISOString() ?? null,
    });
  }

  stop(): void {
    if (this.job) {
      this.job.cancel();
      this.job = null;
    }
    this.started = false;
    this.state.nextRunAt = undefined;
    console.log('[Scheduler] Stopped');
  }

  /**
   * Run a round immediately. Returns null when skipped or failed.
   */
  async runNow(): Promise<RoundResult | null> {
    if (this.inProgress) {
      logEvent(this.logPath, 'round_skipped', { reason: 'previous round still running' });
      return null;
    }

    this.inProgress = true;
    logEvent(this.logPath, 'round_running');

    try {
      const result = await this.runRound();
      this.state.lastStatus = result.status;
      this.state.lastError = undefined;
      logEvent(this.logPath, 'round_completed', {
        status: result.status,
        members: result.memberCount,
        pairs: result.pairs.length,
        previousRounds: result.historyCount,
      });
      return result;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.state.lastStatus = 'error';
      this.state.lastError = message;
      logEvent(this.logPath, 'round_failed', { error: message });
      return null;
    } finally {
      this.inProgress = false;
      this.state.lastRunAt = new Date();
      this.updateNextRun();
    }
  }

  getStatus(): SchedulerStatus {
    return {
      ...this.state,
      started: this.started,
      roundInProgress: this.inProgress,
      schedule: this.config.cron,
      timezone: this.config.timezone,
    };
  }

  private updateNextRun(): void {
    const next = this.job?.nextInvocation();
    this.state.nextRunAt = next ? new Date(next.getTime()) : undefined;
  }
}
