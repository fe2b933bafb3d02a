import * as cron from 'node-cron';
import { logger } from '../utils/logger.js';
import { ConflictError } from '../utils/errors.js';
import { JobController, JobTask } from './job-controller.js';

/**
 * Cron-driven sync trigger
 *
 * Cron schedule format:
 * ┌────────────── second (optional, 0-59)
 * │ ┌──────────── minute (0-59)
 * │ │ ┌────────── hour (0-23)
 * │ │ │ ┌──────── day of month (1-31)
 * │ │ │ │ ┌────── month (1-12)
 * │ │ │ │ │ ┌──── day of week (0-7, 0 and 7 are Sunday)
 * │ │ │ │ │ │
 * * * * * * *
 */

export interface SchedulerConfig {
  /** Cron expression (default: '0 * * * *' = hourly) */
  schedule?: string;
  /** Trigger a run immediately on startup */
  runOnStart?: boolean;
  timezone?: string;
}

export class JobScheduler {
  private task: cron.ScheduledTask | null = null;
  private readonly config: Required<SchedulerConfig>;

  constructor(
    private readonly controller: JobController,
    private readonly job: JobTask,
    config: SchedulerConfig = {}
  ) {
    this.config = {
      schedule: config.schedule || '0 * * * *',
      runOnStart: config.runOnStart ?? false,
      timezone: config.timezone || 'Europe/Paris',
    };
  }

  start(): void {
    if (this.task) {
      logger.warn('Scheduler is already running');
      return;
    }

    if (!cron.validate(this.config.schedule)) {
      throw new Error(`Invalid cron expression: ${this.config.schedule}`);
    }

    this.task = cron.schedule(
      this.config.schedule,
      () => {
        this.trigger('scheduled');
      },
      { timezone: this.config.timezone }
    );

    logger.info('Job scheduler started', {
      schedule: this.config.schedule,
      timezone: this.config.timezone,
    });

    if (this.config.runOnStart) {
      this.trigger('startup');
    }
  }

  /**
   * Start a run through the controller. Returns false when one is already running.
   */
  trigger(reason: 'scheduled' | 'startup' | 'manual'): boolean {
    try {
      const state = this.controller.start(this.job);
      logger.info(`Sync run triggered (${reason})`, { runId: state.runId });
      return true;
    } catch (error) {
      if (error instanceof ConflictError) {
        logger.warn(`Previous run still in progress, skipping ${reason} trigger`);
        return false;
      }
      throw error;
    }
  }

  stop(): void {
    if (this.task) {
      logger.info('Stopping job scheduler');
      this.task.stop();
      this.task = null;
    }
  }

  isSchedulerRunning(): boolean {
    return this.task !== null;
  }

  getConfig(): Required<SchedulerConfig> {
    return { ...this.config };
  }
}
