import { readFileSync } from 'fs';
import { stat } from 'fs/promises';
import { parse as parseDotenv } from 'dotenv';
import * as cron from 'node-cron';
import { ArchiverConfig } from '../interfaces/ArchiverConfig';
import { LogLevel } from '../interfaces/Logger';

export class ConfigurationError extends Error {
  constructor(message: string, public readonly field?: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

const REQUIRED_VARIABLES = [
  'LOG_DIR',
  'R2_BUCKET',
  'R2_ACCOUNT_ID',
  'R2_ACCESS_KEY_ID',
  'R2_SECRET_ACCESS_KEY',
] as const;

export const DEFAULT_FILENAME_PATTERN = 'oempro-*.csv';
export const DEFAULT_RETENTION_DAYS = 7;
export const DEFAULT_REMOTE_PATH = 'pmta-logs';
export const DEFAULT_ARCHIVE_SCHEDULE = '0 2 * * *';

/**
 * Builds the immutable archiver configuration from environment variables
 */
export class ConfigurationManager {
  /**
   * Read a KEY="value" configuration file into a copy of the environment.
   * Variables already present in the environment take precedence over the file.
   */
  static loadEnvironment(configFile?: string, env: NodeJS.ProcessEnv = process.env): NodeJS.ProcessEnv {
    if (!configFile) {
      return { ...env };
    }

    let contents: string;
    try {
      contents = readFileSync(configFile, 'utf8');
    } catch (error) {
      throw new ConfigurationError(
        `Cannot read configuration file ${configFile}: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    return { ...parseDotenv(contents), ...env };
  }

  static loadConfiguration(env: NodeJS.ProcessEnv = process.env): Readonly<ArchiverConfig> {
    const missingVars = REQUIRED_VARIABLES.filter(name => !env[name]);

    if (missingVars.length > 0) {
      throw new ConfigurationError(
        `Missing required environment variables: ${missingVars.join(', ')}`,
        missingVars[0]
      );
    }

    const retentionDays = this.parseRetentionDays(env['RETENTION_DAYS']);

    const archiveSchedule = env['ARCHIVE_SCHEDULE'] || DEFAULT_ARCHIVE_SCHEDULE;
    if (!cron.validate(archiveSchedule)) {
      throw new ConfigurationError(
        `Invalid cron expression: ${archiveSchedule}. Expected format: "minute hour day month day-of-week"`,
        'ARCHIVE_SCHEDULE'
      );
    }

    const requestedLevel = env['LOG_LEVEL'];
    const logLevel = Object.values(LogLevel).find(level => level === requestedLevel);
    if (requestedLevel && !logLevel) {
      throw new ConfigurationError(
        `Invalid LOG_LEVEL: ${requestedLevel}. Must be one of: ${Object.values(LogLevel).join(', ')}`,
        'LOG_LEVEL'
      );
    }

    const config: ArchiverConfig = {
      logDirectory: this.required(env, 'LOG_DIR'),
      filenamePattern: env['LOG_PATTERN'] || DEFAULT_FILENAME_PATTERN,
      retentionDays,
      remoteBucket: this.required(env, 'R2_BUCKET'),
      remotePathPrefix: env['R2_PATH'] ?? DEFAULT_REMOTE_PATH,
      remoteEndpointAccountId: this.required(env, 'R2_ACCOUNT_ID'),
      remoteAccessKeyId: this.required(env, 'R2_ACCESS_KEY_ID'),
      remoteSecretAccessKey: this.required(env, 'R2_SECRET_ACCESS_KEY'),
      archiveSchedule,
      logLevel: logLevel ?? LogLevel.INFO,
    };

    // Add optional properties only if they exist
    if (env['R2_ENDPOINT']) {
      config.remoteEndpointUrl = env['R2_ENDPOINT'];
    }
    if (env['ARCHIVER_LOG_FILE']) {
      config.logFile = env['ARCHIVER_LOG_FILE'];
    }

    return Object.freeze(config);
  }

  /**
   * The log directory must exist before a run touches anything
   */
  static async assertLogDirectory(config: ArchiverConfig): Promise<void> {
    try {
      const stats = await stat(config.logDirectory);
      if (!stats.isDirectory()) {
        throw new ConfigurationError(`LOG_DIR is not a directory: ${config.logDirectory}`, 'LOG_DIR');
      }
    } catch (error) {
      if (error instanceof ConfigurationError) {
        throw error;
      }
      throw new ConfigurationError(`LOG_DIR does not exist: ${config.logDirectory}`, 'LOG_DIR');
    }
  }

  static sanitizeForLogging(config: ArchiverConfig): Record<string, unknown> {
    return {
      ...config,
      remoteAccessKeyId: this.maskValue(config.remoteAccessKeyId),
      remoteSecretAccessKey: '[REDACTED]',
      remoteEndpointUrl: config.remoteEndpointUrl || 'default (Cloudflare R2)',
      remotePathPrefix: config.remotePathPrefix || '(root)',
      logFile: config.logFile || '(console only)',
    };
  }

  private static parseRetentionDays(value: string | undefined): number {
    if (value === undefined || value === '') {
      return DEFAULT_RETENTION_DAYS;
    }

    const parsed = Number(value);
    if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed)) {
      throw new ConfigurationError(
        `Invalid RETENTION_DAYS: ${value}. Must be a non-negative integer`,
        'RETENTION_DAYS'
      );
    }

    return parsed;
  }

  private static required(env: NodeJS.ProcessEnv, name: (typeof REQUIRED_VARIABLES)[number]): string {
    const value = env[name];
    if (!value) {
      throw new ConfigurationError(`Missing required environment variables: ${name}`, name);
    }
    return value;
  }

  private static maskValue(value: string): string {
    if (value.length <= 4) {
      return '***';
    }
    return `${value.substring(0, 4)}***`;
  }
}
