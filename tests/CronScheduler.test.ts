// Mock node-cron
const mockSchedule = jest.fn();
const mockValidate = jest.fn();

jest.mock('node-cron', () => ({
  schedule: (...args: unknown[]) => mockSchedule(...args),
  validate: (...args: unknown[]) => mockValidate(...args),
}));

import { CronScheduler, CronSchedulerError, CronValidationError } from '../src/clients/CronScheduler';
import { CronSchedulerConfig } from '../src/interfaces/CronScheduler';
import { ArchiveEngine, RunResult } from '../src/interfaces/ArchiveEngine';
import { createMockLogger } from './support/mockLogger';

describe('CronScheduler', () => {
  let mockArchiveEngine: jest.Mocked<ArchiveEngine>;
  let mockLogger: ReturnType<typeof createMockLogger>;
  let mockTask: { start: jest.Mock; stop: jest.Mock };
  let scheduler: CronScheduler;
  let config: CronSchedulerConfig;

  const runResult = (failedCount: number): RunResult => ({
    runId: 'archive-123',
    cutoffDate: '2024-03-03',
    summary: {
      archivedCount: 2,
      archivedBytes: 2048,
      failedCount,
      keptCount: 1,
      skippedCount: 0,
      deleteFailedCount: 0,
    },
    outcomes: [],
    success: failedCount === 0,
    durationMs: 42,
  });

  beforeEach(() => {
    jest.clearAllMocks();

    mockArchiveEngine = {
      executeArchive: jest.fn(),
      scan: jest.fn(),
      validateConfiguration: jest.fn(),
    };
    mockLogger = createMockLogger();
    mockTask = {
      start: jest.fn(),
      stop: jest.fn(),
    };

    mockSchedule.mockReturnValue(mockTask);
    mockValidate.mockReturnValue(true);

    config = {
      cronExpression: '0 2 * * *', // Daily at 2 AM
      timezone: 'UTC',
    };

    scheduler = new CronScheduler(config, mockArchiveEngine, mockLogger);
  });

  describe('validateCronExpression', () => {
    it('should delegate to node-cron', () => {
      mockValidate.mockReturnValueOnce(false);

      expect(scheduler.validateCronExpression('invalid')).toBe(false);
      expect(mockValidate).toHaveBeenCalledWith('invalid');
    });
  });

  describe('start', () => {
    it('should schedule a stopped task and then start it', () => {
      scheduler.start();

      expect(mockSchedule).toHaveBeenCalledWith('0 2 * * *', expect.any(Function), {
        scheduled: false,
        timezone: 'UTC',
      });
      expect(mockTask.start).toHaveBeenCalledTimes(1);
      expect(scheduler.isRunning()).toBe(true);
    });

    it('should default the timezone to UTC', () => {
      scheduler = new CronScheduler({ cronExpression: '*/15 * * * *' }, mockArchiveEngine, mockLogger);

      scheduler.start();

      expect(mockSchedule).toHaveBeenCalledWith('*/15 * * * *', expect.any(Function), {
        scheduled: false,
        timezone: 'UTC',
      });
    });

    it('should throw CronValidationError for an invalid expression', () => {
      mockValidate.mockReturnValue(false);

      expect(() => scheduler.start()).toThrow(CronValidationError);
      expect(mockSchedule).not.toHaveBeenCalled();
      expect(scheduler.isRunning()).toBe(false);
    });

    it('should wrap unexpected scheduling failures', () => {
      mockSchedule.mockImplementation(() => {
        throw new Error('timer unavailable');
      });

      expect(() => scheduler.start()).toThrow(CronSchedulerError);
      expect(() => scheduler.start()).toThrow('Failed to start cron scheduler: timer unavailable');
      expect(scheduler.isRunning()).toBe(false);
    });

    it('should warn if already running', () => {
      scheduler.start();
      scheduler.start();

      expect(mockLogger.warn).toHaveBeenCalledWith('CronScheduler is already running');
      expect(mockSchedule).toHaveBeenCalledTimes(1);
    });

    it('should run an initial pass if runOnInit is true', done => {
      mockArchiveEngine.executeArchive.mockResolvedValue(runResult(0));
      scheduler = new CronScheduler({ ...config, runOnInit: true }, mockArchiveEngine, mockLogger);

      scheduler.start();

      setImmediate(() => {
        expect(mockArchiveEngine.executeArchive).toHaveBeenCalledTimes(1);
        done();
      });
    });
  });

  describe('stop', () => {
    it('should stop a running scheduler', () => {
      scheduler.start();
      scheduler.stop();

      expect(mockTask.stop).toHaveBeenCalledTimes(1);
      expect(scheduler.isRunning()).toBe(false);
    });

    it('should warn if not running', () => {
      scheduler.stop();

      expect(mockLogger.warn).toHaveBeenCalledWith('CronScheduler is not running');
    });
  });

  describe('executeScheduledArchive', () => {
    it('should log a successful pass', async () => {
      mockArchiveEngine.executeArchive.mockResolvedValue(runResult(0));

      await scheduler.executeScheduledArchive();

      expect(mockLogger.logScheduledExecution).toHaveBeenCalledWith('0 2 * * *');
      expect(mockLogger.info).toHaveBeenCalledWith('[archive-123] Scheduled archive pass completed successfully');
    });

    it('should warn when files failed', async () => {
      mockArchiveEngine.executeArchive.mockResolvedValue(runResult(2));

      await scheduler.executeScheduledArchive();

      expect(mockLogger.warn).toHaveBeenCalledWith(
        '[archive-123] Scheduled archive pass finished with 2 failed files'
      );
    });

    it('should log an aborted pass without rejecting', async () => {
      const error = new Error('LOG_DIR does not exist: /var/log/pmta-accounting');
      mockArchiveEngine.executeArchive.mockRejectedValue(error);

      await expect(scheduler.executeScheduledArchive()).resolves.toBeUndefined();

      expect(mockLogger.error).toHaveBeenCalledWith('Scheduled archive pass aborted', error, {
        cronExpression: '0 2 * * *',
      });
    });

    it('should run the pass when the cron callback fires', async () => {
      mockArchiveEngine.executeArchive.mockResolvedValue(runResult(0));
      scheduler.start();
      const [, callback] = mockSchedule.mock.calls[0];

      callback();
      await new Promise(resolve => setImmediate(resolve));

      expect(mockArchiveEngine.executeArchive).toHaveBeenCalledTimes(1);
    });

    it('should prevent overlapping passes', async () => {
      let finish: (result: RunResult) => void = () => undefined;
      mockArchiveEngine.executeArchive.mockReturnValue(
        new Promise<RunResult>(resolve => {
          finish = resolve;
        })
      );

      const first = scheduler.executeScheduledArchive();
      await scheduler.executeScheduledArchive();

      expect(mockLogger.warn).toHaveBeenCalledWith(
        'Archive pass is already running, skipping this scheduled execution'
      );
      expect(mockArchiveEngine.executeArchive).toHaveBeenCalledTimes(1);

      finish(runResult(0));
      await first;

      mockArchiveEngine.executeArchive.mockResolvedValue(runResult(0));
      await scheduler.executeScheduledArchive();
      expect(mockArchiveEngine.executeArchive).toHaveBeenCalledTimes(2);
    });
  });
});
