/**
 * Cron-driven calculation runs at fixed times of day.
 */

import cron, { type ScheduledTask } from 'node-cron';
import { createChildLogger } from '@/utils/logger';
import { errorMessage } from '@/utils/errors';
import { logSystemEvent, type SystemEventLevel } from '@/data/repositories/system_log_repo';

const logger = createChildLogger('scheduler');

export interface SchedulerOptions {
  /** "HH:mm" entries */
  times: readonly string[];
  timezone: string;
}

export type CalculationJob = () => Promise<boolean>;

/** "08:00" -> "0 8 * * *" */
export function toCronExpression(time: string): string {
  const match = /^([01]\d|2[0-3]):([0-5]\d)$/.exec(time);
  if (!match) {
    throw new Error(`Invalid schedule time "${time}" (expected HH:mm)`);
  }
  return `${Number(match[2])} ${Number(match[1])} * * *`;
}

export class CalculationScheduler {
  private tasks: ScheduledTask[] = [];
  private running = false;

  constructor(
    private readonly job: CalculationJob,
    private readonly options: SchedulerOptions
  ) {}

  get expressions(): string[] {
    return this.options.times.map(toCronExpression);
  }

  start(): void {
    if (this.tasks.length > 0) {
      logger.warn('Scheduler already started');
      return;
    }

    for (const expression of this.expressions) {
      this.tasks.push(
        cron.schedule(
          expression,
          async () => {
            await this.trigger();
          },
          { timezone: this.options.timezone }
        )
      );
    }

    logger.info({ times: this.options.times, timezone: this.options.timezone }, 'Scheduler started');
    this.record('INFO', 'Scheduler started', {
      times: this.options.times,
      timezone: this.options.timezone,
    });
  }

  stop(): void {
    for (const task of this.tasks) {
      task.stop();
    }
    if (this.tasks.length > 0) {
      logger.info('Scheduler stopped');
      this.record('INFO', 'Scheduler stopped');
    }
    this.tasks = [];
  }

  isStarted(): boolean {
    return this.tasks.length > 0;
  }

  /**
   * Run the job once unless a previous run is still going.
   * Resolves false for a skipped or failed run; never rejects.
   */
  async trigger(): Promise<boolean> {
    if (this.running) {
      logger.warn('Previous calculation still running, skipping');
      return false;
    }

    this.running = true;
    try {
      const success = await this.job();
      if (!success) {
        logger.error('Scheduled calculation failed');
        this.record('ERROR', 'Scheduled calculation failed');
      }
      return success;
    } catch (error) {
      const message = errorMessage(error);
      logger.error({ error: message }, 'Scheduled calculation threw');
      this.record('ERROR', 'Scheduled calculation threw', { error: message });
      return false;
    } finally {
      this.running = false;
    }
  }

  private record(level: SystemEventLevel, message: string, details?: Record<string, unknown>): void {
    try {
      logSystemEvent(level, 'scheduler', message, details);
    } catch (error) {
      logger.warn({ error: errorMessage(error), message }, 'Could not write system event');
    }
  }
}
