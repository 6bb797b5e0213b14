import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { RoundResult } from '../core/round.js';

const { scheduleJob, cancel, nextInvocation } = vi.hoisted(() => {
  const cancel = vi.fn();
  const nextInvocation = vi.fn(() => new Date('2026-01-12T09:00:00Z'));
  type FakeJob = { cancel: typeof cancel; nextInvocation: typeof nextInvocation };
  const scheduleJob = vi.fn((_rule: unknown, _callback: () => Promise<void>): FakeJob | null => ({ cancel, nextInvocation }));
  return { scheduleJob, cancel, nextInvocation };
});

vi.mock('node-schedule', () => ({
  default: { scheduleJob },
}));

import { CoffeeScheduler } from './service.js';

const POSTED: RoundResult = {
  status: 'posted',
  memberCount: 4,
  historyCount: 2,
  pairs: [['<@U1>', '<@U2>'], ['<@U3>', '<@U4>']],
  message: 'announcement',
};

describe('CoffeeScheduler', () => {
  let tempDir: string;
  let logPath: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'coffeepair-cron-'));
    logPath = join(tempDir, 'events.jsonl');
    vi.spyOn(console, 'log').mockImplementation(() => {});
    scheduleJob.mockClear();
    cancel.mockClear();
    nextInvocation.mockClear();
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('schedules the cron expression', () => {
    const scheduler = new CoffeeScheduler(async () => POSTED, { cron: '0 9 * * 1', logPath });

    scheduler.start();

    expect(scheduleJob).toHaveBeenCalledTimes(1);
    expect(scheduleJob.mock.calls[0][0]).toBe('0 9 * * 1');
    expect(scheduler.getStatus()).toMatchObject({
      started: true,
      roundInProgress: false,
      schedule: '0 9 * * 1',
      nextRunAt: new Date('2026-01-12T09:00:00Z'),
    });
  });

  it('passes the timezone to node-schedule', () => {
    const scheduler = new CoffeeScheduler(async () => POSTED, { cron: '0 9 * * 1', timezone: 'Europe/Oslo', logPath });

    scheduler.start();

    expect(scheduleJob.mock.calls[0][0]).toEqual({ rule: '0 9 * * 1', tz: 'Europe/Oslo' });
  });

  it('starts only once', () => {
    const scheduler = new CoffeeScheduler(async () => POSTED, { cron: '0 9 * * 1', logPath });
    scheduler.start();
    scheduler.start();
    expect(scheduleJob).toHaveBeenCalledTimes(1);
  });

  it('runs the round when the job fires', async () => {
    const runRound = vi.fn(async () => POSTED);
    const scheduler = new CoffeeScheduler(runRound, { cron: '0 9 * * 1', logPath });
    scheduler.start();

    await scheduleJob.mock.calls[0][1]();

    expect(runRound).toHaveBeenCalledTimes(1);
    expect(scheduler.getStatus().lastStatus).toBe('posted');
  });

  it('cancels the job on stop', () => {
    const scheduler = new CoffeeScheduler(async () => POSTED, { cron: '0 9 * * 1', logPath });
    scheduler.start();
    scheduler.stop();

    expect(cancel).toHaveBeenCalledTimes(1);
    expect(scheduler.getStatus().started).toBe(false);
    expect(scheduler.getStatus().nextRunAt).toBeUndefined();
  });

  it('throws when node-schedule rejects the expression', () => {
    scheduleJob.mockReturnValueOnce(null);
    const scheduler = new CoffeeScheduler(async () => POSTED, { cron: 'not a cron', logPath });

    expect(() => scheduler.start()).toThrow('Invalid schedule: "not a cron"');
  });

  describe('runNow', () => {
    it('records the result and logs events', async () => {
      const scheduler = new CoffeeScheduler(async () => POSTED, { cron: '0 9 * * 1', logPath });

      const result = await scheduler.runNow();

      expect(result).toBe(POSTED);
      const status = scheduler.getStatus();
      expect(status.lastStatus).toBe('posted');
      expect(status.lastError).toBeUndefined();
      expect(status.lastRunAt).toBeInstanceOf(Date);

      const events = readFileSync(logPath, 'utf-8').trim().split('\n').map(line => JSON.parse(line));
      expect(events.map(e => e.event)).toEqual(['round_running', 'round_completed']);
      expect(events[1]).toMatchObject({ status: 'posted', members: 4, pairs: 2, previousRounds: 2 });
    });

    it('records a thrown error without rethrowing', async () => {
      const scheduler = new CoffeeScheduler(async () => {
        throw new Error('boom');
      }, { cron: '0 9 * * 1', logPath });

      expect(await scheduler.runNow()).toBeNull();
      expect(scheduler.getStatus()).toMatchObject({ lastStatus: 'error', lastError: 'boom', roundInProgress: false });
    });

    it('skips a run while the previous one is still going', async () => {
      let finish: (result: RoundResult) => void = () => {};
      const runRound = vi.fn(() => new Promise<RoundResult>((resolve) => {
        finish = resolve;
      }));
      const scheduler = new CoffeeScheduler(runRound, { cron: '0 9 * * 1', logPath });

      const first = scheduler.runNow();
      expect(scheduler.getStatus().roundInProgress).toBe(true);
      expect(await scheduler.runNow()).toBeNull();

      finish(POSTED);
      expect(await first).toBe(POSTED);
      expect(runRound).toHaveBeenCalledTimes(1);

      const events = readFileSync(logPath, 'utf-8').trim().split('\n').map(line => JSON.parse(line).event);
      expect(events).toEqual(['round_running', 'round_skipped', 'round_completed']);
    });
  });
});
