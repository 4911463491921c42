import { LogLevel } from './Logger';

export interface ArchiverConfig {
  logDirectory: string;
  filenamePattern: string;
  retentionDays: number;
  remoteBucket: string;
  remotePathPrefix: string;
  remoteEndpointAccountId: string;
  remoteAccessKeyId: string;
  remoteSecretAccessKey: string;
  remoteEndpointUrl?: string; // overrides the account-scoped R2 endpoint
  archiveSchedule: string; // cron format
  logFile?: string;
  logLevel: LogLevel;
}
