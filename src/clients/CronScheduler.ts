import * as cron from 'node-cron';
import { CronScheduler as ICronScheduler, CronSchedulerConfig } from '../interfaces/CronScheduler';
import { ArchiveEngine } from '../interfaces/ArchiveEngine';
import { Logger } from '../interfaces/Logger';

/**
 * Custom error classes for cron scheduling operations
 */
export class CronSchedulerError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'CronSchedulerError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

export class CronValidationError extends CronSchedulerError {
  constructor(
    message: string,
    public readonly expression: string
  ) {
    super(message, 'validation');
    this.name = 'CronValidationError';
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * CronScheduler implementation using node-cron library
 * Runs archive passes on a schedule and never lets two passes overlap
 */
export class CronScheduler implements ICronScheduler {
  private task: cron.ScheduledTask | null = null;
  private config: CronSchedulerConfig;
  private archiveEngine: ArchiveEngine;
  private logger: Logger;
  private isArchiveRunning = false;

  constructor(config: CronSchedulerConfig, archiveEngine: ArchiveEngine, logger: Logger) {
    this.config = config;
    this.archiveEngine = archiveEngine;
    this.logger = logger;
  }

  start(): void {
    if (this.task) {
      this.logger.warn('CronScheduler is already running');
      return;
    }

    if (!this.validateCronExpression(this.config.cronExpression)) {
      throw new CronValidationError(
        `Invalid cron expression: ${this.config.cronExpression}`,
        this.config.cronExpression
      );
    }

    const timezone = this.config.timezone || 'UTC';
    this.logger.info(
      `Starting cron scheduler with expression: ${this.config.cronExpression} (timezone: ${timezone})`
    );

    try {
      this.task = cron.schedule(
        this.config.cronExpression,
        () => {
          void this.executeScheduledArchive();
        },
        {
          scheduled: false, // Don't start immediately
          timezone,
        }
      );
      this.task.start();
    } catch (error) {
      this.task = null;
      const cause = toError(error);
      throw new CronSchedulerError(`Failed to start cron scheduler: ${cause.message}`, 'start', cause);
    }

    this.logger.info('CronScheduler started successfully');

    if (this.config.runOnInit) {
      this.logger.info('Running initial archive pass due to runOnInit configuration');
      setImmediate(() => {
        void this.executeScheduledArchive();
      });
    }
  }

  stop(): void {
    if (!this.task) {
      this.logger.warn('CronScheduler is not running');
      return;
    }

    this.logger.info('Stopping cron scheduler...');
    this.task.stop();
    this.task = null;
    this.logger.info('CronScheduler stopped successfully');
  }

  isRunning(): boolean {
    return this.task !== null;
  }

  /**
   * Validate a cron expression using node-cron's built-in validation
   */
  validateCronExpression(expression: string): boolean {
    return cron.validate(expression);
  }

  /**
   * Execute a scheduled archive pass with overlap prevention.
   * Resolves in every case; failures are logged, never rethrown into the timer.
   */
  async executeScheduledArchive(): Promise<void> {
    if (this.isArchiveRunning) {
      this.logger.warn('Archive pass is already running, skipping this scheduled execution');
      return;
    }

    this.isArchiveRunning = true;
    this.logger.logScheduledExecution(this.config.cronExpression);

    try {
      const result = await this.archiveEngine.executeArchive();

      if (result.success) {
        this.logger.info(`[${result.runId}] Scheduled archive pass completed successfully`);
      } else {
        this.logger.warn(
          `[${result.runId}] Scheduled archive pass finished with ${result.summary.failedCount} failed files`
        );
      }
    } catch (error) {
      this.logger.error('Scheduled archive pass aborted', toError(error), {
        cronExpression: this.config.cronExpression,
      });
    } finally {
      this.isArchiveRunning = false;
    }
  }
}
