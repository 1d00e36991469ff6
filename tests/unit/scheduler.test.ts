import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { closeDatabase, initializeDatabase, MEMORY_DATABASE } from '@/data/db';
import { getRecentSystemEvents } from '@/data/repositories/system_log_repo';
import { CalculationScheduler, toCronExpression } from '@/scheduler/scheduler';

const { schedule } = vi.hoisted(() => ({
  schedule: vi.fn((_expression: string, _fn: () => Promise<void>, _options?: { timezone?: string }) => ({
    stop: vi.fn(),
  })),
}));

vi.mock('node-cron', () => ({ default: { schedule } }));

const OPTIONS = { times: ['08:00', '20:30'], timezone: 'UTC' };

describe('toCronExpression', () => {
  it('converts HH:mm into a daily cron expression', () => {
    expect(toCronExpression('08:00')).toBe('0 8 * * *');
    expect(toCronExpression('20:30')).toBe('30 20 * * *');
  });

  it('rejects malformed times', () => {
    expect(() => toCronExpression('8:00')).toThrow('Invalid schedule time "8:00" (expected HH:mm)');
    expect(() => toCronExpression('24:00')).toThrow('Invalid schedule time');
  });
});

describe('CalculationScheduler', () => {
  beforeEach(() => {
    schedule.mockClear();
    initializeDatabase(MEMORY_DATABASE);
  });

  afterEach(() => {
    closeDatabase();
  });

  it('schedules one task per configured time', () => {
    const scheduler = new CalculationScheduler(async () => true, OPTIONS);
    scheduler.start();

    expect(scheduler.isStarted()).toBe(true);
    expect(schedule.mock.calls.map(([expression, , options]) => [expression, options])).toEqual([
      ['0 8 * * *', { timezone: 'UTC' }],
      ['30 20 * * *', { timezone: 'UTC' }],
    ]);

    scheduler.start();
    expect(schedule).toHaveBeenCalledTimes(2);
  });

  it('stops every task', () => {
    const scheduler = new CalculationScheduler(async () => true, OPTIONS);
    scheduler.start();
    const tasks = schedule.mock.results.map((result) => result.value);

    scheduler.stop();
    expect(scheduler.isStarted()).toBe(false);
    for (const task of tasks) {
      expect(task.stop).toHaveBeenCalledTimes(1);
    }
    expect(getRecentSystemEvents(1)[0].message).toBe('Scheduler stopped');
  });

  it('runs the job from the cron callback', async () => {
    const job = vi.fn(async () => true);
    new CalculationScheduler(job, OPTIONS).start();

    await schedule.mock.calls[0][1]();
    expect(job).toHaveBeenCalledTimes(1);
  });

  it('skips a trigger while the previous run is still going', async () => {
    let finish: (value: boolean) => void = () => undefined;
    const job = vi.fn(
      () =>
        new Promise<boolean>((resolve) => {
          finish = resolve;
        })
    );
    const scheduler = new CalculationScheduler(job, OPTIONS);

    const first = scheduler.trigger();
    expect(await scheduler.trigger()).toBe(false);
    finish(true);

    expect(await first).toBe(true);
    expect(job).toHaveBeenCalledTimes(1);

    const next = scheduler.trigger();
    finish(true);
    expect(await next).toBe(true);
    expect(job).toHaveBeenCalledTimes(2);
  });

  it('records a job that throws and resolves false', async () => {
    const scheduler = new CalculationScheduler(async () => {
      throw new Error('provider down');
    }, OPTIONS);

    expect(await scheduler.trigger()).toBe(false);
    expect(getRecentSystemEvents(1)[0]).toMatchObject({
      level: 'ERROR',
      component: 'scheduler',
      message: 'Scheduled calculation threw',
      details: { error: 'provider down' },
    });
  });

  it('records a job that reports failure', async () => {
    const scheduler = new CalculationScheduler(async () => false, OPTIONS);

    expect(await scheduler.trigger()).toBe(false);
    expect(getRecentSystemEvents(1)[0].message).toBe('Scheduled calculation failed');
  });

  it('keeps running when the event log is unavailable', async () => {
    closeDatabase();
    const scheduler = new CalculationScheduler(async () => {
      throw new Error('boom');
    }, OPTIONS);

    expect(() => scheduler.start()).not.toThrow();
    expect(await scheduler.trigger()).toBe(false);
  });
});
