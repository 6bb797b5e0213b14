/**
 * Scheduler Types
 */

import type { RoundResult, RoundStatus } from '../core/round.js';

/**
 * Runs one coffee round. Supplied by the caller so the scheduler
 * does not need to know about Slack or config.
 */
export type RoundRunner = () => Promise<RoundResult>;

/**
 * What the scheduler remembers between ticks
 */
export interface SchedulerState {
  lastRunAt?: Date;
  nextRunAt?: Date;
  lastStatus?: RoundStatus | 'error';
  lastError?: string;
}

export interface SchedulerStatus extends SchedulerState {
  started: boolean;
  roundInProgress: boolean;
  schedule: string;
  timezone?: string;
}
