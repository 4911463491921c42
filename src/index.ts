#!/usr/bin/env node

import { Command, CommanderError } from 'commander';
import { ConfigurationManager, ConfigurationError } from './config/ConfigurationManager';
import { Logger } from './clients/Logger';
import { ArchiveEngine } from './clients/ArchiveEngine';
import { CronScheduler } from './clients/CronScheduler';
import { S3RemoteStore } from './clients/S3RemoteStore';
import { normalizePrefix } from './clients/FileClassifier';
import { cutoffDate, isEligible } from './clients/RetentionPolicy';
import { ConnectivityError } from './errors/RemoteStoreErrors';
import { ArchiverConfig } from './interfaces/ArchiverConfig';
import { RunResult } from './interfaces/ArchiveEngine';
import { Logger as ILogger } from './interfaces/Logger';
import { RemoteStore } from './interfaces/RemoteStore';

export const ExitCode = {
  SUCCESS: 0,
  CONFIGURATION_ERROR: 1,
  CONNECTIVITY_ERROR: 2,
  FILE_FAILURES: 3,
  DELETION_FAILURES: 4,
  UNEXPECTED_ERROR: 5,
} as const;

export type ExitCodeValue = (typeof ExitCode)[keyof typeof ExitCode];

export interface ApplicationOptions {
  /** Defaults to the S3-compatible store described by the configuration */
  remoteStore?: RemoteStore;
  logger?: ILogger;
  /** Human-readable output for status and listing commands */
  write?: (line: string) => void;
}

export function exitCodeForResult(result: RunResult): ExitCodeValue {
  if (result.summary.deleteFailedCount > 0) {
    return ExitCode.DELETION_FAILURES;
  }
  return result.success ? ExitCode.SUCCESS : ExitCode.FILE_FAILURES;
}

export function exitCodeForError(error: unknown): ExitCodeValue {
  if (error instanceof ConfigurationError) {
    return ExitCode.CONFIGURATION_ERROR;
  }
  if (error instanceof ConnectivityError) {
    return ExitCode.CONNECTIVITY_ERROR;
  }
  return ExitCode.UNEXPECTED_ERROR;
}

function formatMegabytes(bytes: number): string {
  return `${(bytes / 1024 / 1024).toFixed(2)}MB`;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Main application class that wires configuration, logging, the remote store and the engine
 */
export class LogArchiverApplication {
  private config: Readonly<ArchiverConfig>;
  private logger: ILogger;
  private remoteStore: RemoteStore;
  private engine: ArchiveEngine;
  private write: (line: string) => void;
  private cronScheduler: CronScheduler | null = null;

  constructor(config: Readonly<ArchiverConfig>, options: ApplicationOptions = {}) {
    this.config = config;
    this.logger = options.logger ?? new Logger(config.logLevel, config.logFile);
    this.remoteStore = options.remoteStore ?? new S3RemoteStore(config, this.logger);
    this.engine = new ArchiveEngine(this.remoteStore, config, this.logger);
    this.write = options.write ?? (line => console.log(line));

    this.logger.logConfigurationStart(ConfigurationManager.sanitizeForLogging(config));
  }

  /**
   * Execute one archival pass and map its outcome to an exit code
   */
  async run(now: Date = new Date()): Promise<ExitCodeValue> {
    try {
      const result = await this.engine.executeArchive(now);
      return exitCodeForResult(result);
    } catch (error) {
      this.logger.error('Archive run aborted before processing files', toError(error));
      return exitCodeForError(error);
    }
  }

  async testConnection(): Promise<ExitCodeValue> {
    try {
      await this.remoteStore.testConnection();
      this.write(`Connection to bucket ${this.config.remoteBucket} successful`);
      return ExitCode.SUCCESS;
    } catch (error) {
      this.logger.error('Remote store connection test failed', toError(error));
      this.write(`Connection to bucket ${this.config.remoteBucket} failed. Check your credentials.`);
      return exitCodeForError(error);
    }
  }

  /**
   * Print every archived object under the configured prefix with a total
   */
  async listRemote(): Promise<ExitCodeValue> {
    const normalized = normalizePrefix(this.config.remotePathPrefix);
    const prefix = normalized ? `${normalized}/` : '';
    let count = 0;
    let totalBytes = 0;

    try {
      for await (const object of this.remoteStore.list(prefix)) {
        this.write(`${String(object.sizeBytes).padStart(12)} ${object.key}`);
        count++;
        totalBytes += object.sizeBytes;
      }
    } catch (error) {
      this.logger.error('Failed to list remote objects', toError(error), { prefix });
      return exitCodeForError(error);
    }

    this.write(`Total: ${count} objects (${formatMegabytes(totalBytes)})`);
    return ExitCode.SUCCESS;
  }

  /**
   * Print the sanitized configuration and the local files awaiting archival
   */
  async status(now: Date = new Date()): Promise<ExitCodeValue> {
    const sanitized = ConfigurationManager.sanitizeForLogging(this.config);
    this.write('Configuration:');
    for (const [key, value] of Object.entries(sanitized)) {
      this.write(`  ${key}: ${String(value)}`);
    }

    try {
      await ConfigurationManager.assertLogDirectory(this.config);
      const files = await this.engine.scan();
      const cutoff = cutoffDate(now, this.config.retentionDays);
      const totalBytes = files.reduce((sum, file) => sum + file.sizeBytes, 0);
      const eligible = files.filter(file => file.embeddedDate !== null && isEligible(file.embeddedDate, cutoff));

      this.write('Local log files:');
      this.write(`  Count: ${files.length} files (${formatMegabytes(totalBytes)})`);
      this.write(`  Cutoff date: ${cutoff}`);
      this.write(`  Eligible for archival: ${eligible.length} files`);
      return ExitCode.SUCCESS;
    } catch (error) {
      this.logger.error('Failed to inspect log directory', toError(error));
      return exitCodeForError(error);
    }
  }

  /**
   * Start the in-process schedule; runs until stop() is called
   */
  schedule(runOnInit = false): CronScheduler {
    this.cronScheduler = new CronScheduler(
      {
        cronExpression: this.config.archiveSchedule,
        timezone: 'UTC',
        runOnInit,
      },
      this.engine,
      this.logger
    );
    this.cronScheduler.start();
    return this.cronScheduler;
  }

  stop(): void {
    if (this.cronScheduler && this.cronScheduler.isRunning()) {
      this.cronScheduler.stop();
    }
  }
}

/**
 * Build the command-line program. Each action stores its exit code through `setExitCode`.
 */
export function buildProgram(
  env: NodeJS.ProcessEnv,
  setExitCode: (code: ExitCodeValue) => void,
  options: ApplicationOptions = {}
): Command {
  const program = new Command();

  program
    .name('log-archiver')
    .description('Archive aged log files to S3-compatible storage, deleting local copies only after verification')
    .version('1.0.0')
    .option('-c, --config <file>', 'KEY="value" configuration file (environment variables take precedence)')
    .exitOverride();

  const withApplication = async (
    action: (app: LogArchiverApplication) => Promise<ExitCodeValue>
  ): Promise<void> => {
    let app: LogArchiverApplication;
    try {
      const { config: configFile } = program.opts<{ config?: string }>();
      const config = ConfigurationManager.loadConfiguration(
        ConfigurationManager.loadEnvironment(configFile, env)
      );
      app = new LogArchiverApplication(config, options);
    } catch (error) {
      const logger = options.logger ?? Logger.createFromEnvironment(env);
      logger.error('Configuration error', toError(error));
      setExitCode(exitCodeForError(error));
      return;
    }
    setExitCode(await action(app));
  };

  program
    .command('run')
    .description('Run one archival pass')
    .action(() => withApplication(app => app.run()));

  program
    .command('status')
    .description('Show configuration and local files awaiting archival')
    .action(() => withApplication(app => app.status()));

  program
    .command('list-remote')
    .description('List archived objects in the bucket')
    .action(() => withApplication(app => app.listRemote()));

  program
    .command('test')
    .description('Test the remote store connection')
    .action(() => withApplication(app => app.testConnection()));

  program
    .command('schedule')
    .description('Run archival passes on ARCHIVE_SCHEDULE until interrupted')
    .option('--run-now', 'Run a pass immediately after starting', false)
    .action((commandOptions: { runNow: boolean }) =>
      withApplication(async app => {
        app.schedule(commandOptions.runNow);
        const signals = ['SIGTERM', 'SIGINT'] as const;
        signals.forEach(signal => {
          process.once(signal, () => {
            app.stop();
          });
        });
        return ExitCode.SUCCESS;
      })
    );

  return program;
}

/**
 * Main application entry point; resolves with the process exit code
 */
export async function main(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env,
  options: ApplicationOptions = {}
): Promise<ExitCodeValue> {
  let exitCode: ExitCodeValue = ExitCode.SUCCESS;
  const program = buildProgram(env, code => {
    exitCode = code;
  }, options);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? ExitCode.SUCCESS : ExitCode.CONFIGURATION_ERROR;
    }
    throw error;
  }

  return exitCode;
}

// Start the application
if (require.main === module) {
  process.on('uncaughtException', error => {
    console.error('Uncaught exception:', error);
    process.exit(ExitCode.UNEXPECTED_ERROR);
  });

  process.on('unhandledRejection', reason => {
    console.error('Unhandled promise rejection:', reason);
    process.exit(ExitCode.UNEXPECTED_ERROR);
  });

  main()
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      console.error('Fatal error:', error);
      process.exit(ExitCode.UNEXPECTED_ERROR);
    });
}
