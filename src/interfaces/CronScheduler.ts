/**
 * Runs archive passes on a cron expression, never two at once
 */
export interface CronScheduler {
  start(): void;

  stop(): void;

  isRunning(): boolean;

  validateCronExpression(expression: string): boolean;

  /** One scheduled pass; skipped while another pass is still running */
  executeScheduledArchive(): Promise<void>;
}

export interface CronSchedulerConfig {
  /** e.g. "0 2 * * *" for 02:00 every day */
  cronExpression: string;

  /** IANA zone name, UTC when omitted */
  timezone?: string;

  /** Start a pass right after the task is scheduled */
  runOnInit?: boolean;
}
