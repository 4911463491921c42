import {
  S3Client as AWSS3Client,
  S3ClientConfig,
  PutObjectCommand,
  HeadObjectCommand,
  HeadObjectCommandOutput,
  ListObjectsV2Command,
  HeadBucketCommand,
  PutObjectCommandInput,
  ListObjectsV2CommandInput,
} from '@aws-sdk/client-s3';
import { createReadStream } from 'fs';
import { stat } from 'fs/promises';
import { basename } from 'path';
import { RemoteStore, RemoteObject } from '../interfaces/RemoteStore';
import { ArchiverConfig } from '../interfaces/ArchiverConfig';
import { Logger } from '../interfaces/Logger';
import {
  ConnectivityError,
  RemoteObjectNotFoundError,
  TransferError,
} from '../errors/RemoteStoreErrors';

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
}

const DEFAULT_RETRY: RetryOptions = {
  maxAttempts: 3,
  baseDelayMs: 1000, // 1 second
};

// Credential and addressing problems never succeed on retry
const NON_RETRYABLE_CODES = [
  'InvalidAccessKeyId',
  'SignatureDoesNotMatch',
  'AccessDenied',
  'NoSuchBucket',
  'InvalidBucketName',
  'NotFound',
];

interface AwsErrorShape {
  name?: string;
  Code?: string;
  $metadata?: { httpStatusCode?: number };
}

function asAwsError(error: unknown): AwsErrorShape {
  const shape: AwsErrorShape = {};
  if (typeof error !== 'object' || error === null) {
    return shape;
  }

  if ('name' in error && typeof error.name === 'string') {
    shape.name = error.name;
  }
  if ('Code' in error && typeof error.Code === 'string') {
    shape.Code = error.Code;
  }
  if ('$metadata' in error && typeof error.$metadata === 'object' && error.$metadata !== null) {
    const metadata = error.$metadata;
    if ('httpStatusCode' in metadata && typeof metadata.httpStatusCode === 'number') {
      shape.$metadata = { httpStatusCode: metadata.httpStatusCode };
    }
  }

  return shape;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * RemoteStore backed by an S3-compatible endpoint (Cloudflare R2 by default) using AWS SDK v3
 */
export class S3RemoteStore implements RemoteStore {
  private client: AWSS3Client;
  private bucket: string;
  private retry: RetryOptions;
  private logger: Logger | undefined;

  constructor(config: ArchiverConfig, logger?: Logger, retry: Partial<RetryOptions> = {}) {
    const clientConfig: S3ClientConfig = {
      region: 'auto',
      credentials: {
        accessKeyId: config.remoteAccessKeyId,
        secretAccessKey: config.remoteSecretAccessKey,
      },
    };

    if (config.remoteEndpointUrl) {
      clientConfig.endpoint = config.remoteEndpointUrl;
      clientConfig.forcePathStyle = true; // Required for MinIO and other S3-compatible services
    } else {
      clientConfig.endpoint = S3RemoteStore.endpointForAccount(config.remoteEndpointAccountId);
    }

    this.client = new AWSS3Client(clientConfig);
    this.bucket = config.remoteBucket;
    this.retry = { ...DEFAULT_RETRY, ...retry };
    this.logger = logger;
  }

  static endpointForAccount(accountId: string): string {
    return `https://${accountId}.r2.cloudflarestorage.com`;
  }

  /**
   * Upload a file with retry logic
   */
  async put(localPath: string, key: string): Promise<void> {
    try {
      await this.withRetry(async () => {
        // A fresh stream per attempt; a consumed stream cannot be resent
        const fileStats = await stat(localPath);
        const fileStream = createReadStream(localPath);

        const uploadParams: PutObjectCommandInput = {
          Bucket: this.bucket,
          Key: key,
          Body: fileStream,
          ContentLength: fileStats.size,
          ContentType: localPath.endsWith('.csv') ? 'text/csv' : 'application/octet-stream',
          Metadata: {
            'original-filename': basename(localPath),
            'file-size': fileStats.size.toString(),
          },
        };

        try {
          await this.client.send(new PutObjectCommand(uploadParams));
        } finally {
          // Release the descriptor on every attempt, successful or not
          fileStream.destroy();
        }
      }, `upload file ${localPath} to ${key}`);
    } catch (error) {
      const cause = toError(error);
      throw new TransferError(`Upload of ${localPath} to ${key} failed: ${cause.message}`, key, cause);
    }
  }

  /**
   * Fetch object size without downloading it
   */
  async stat(key: string): Promise<RemoteObject> {
    let response: HeadObjectCommandOutput;
    try {
      response = await this.withRetry(
        () => this.client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: key })),
        `stat object ${key}`
      );
    } catch (error) {
      if (S3RemoteStore.isNotFound(error)) {
        throw new RemoteObjectNotFoundError(key, toError(error));
      }
      const cause = toError(error);
      throw new ConnectivityError(`Could not stat ${key}: ${cause.message}`, 'stat', cause);
    }

    if (response.ContentLength === undefined) {
      throw new ConnectivityError(`Could not stat ${key}: response carried no Content-Length`, 'stat');
    }

    return {
      key,
      sizeBytes: response.ContentLength,
      lastModified: response.LastModified,
    };
  }

  /**
   * List objects under a prefix, one page at a time
   */
  async *list(prefix: string): AsyncIterable<RemoteObject> {
    let continuationToken: string | undefined;

    do {
      const listParams: ListObjectsV2CommandInput = {
        Bucket: this.bucket,
        Prefix: prefix,
        ContinuationToken: continuationToken,
      };

      const response = await this.withRetry(
        () => this.client.send(new ListObjectsV2Command(listParams)),
        `list objects with prefix ${prefix}`
      );

      for (const obj of response.Contents ?? []) {
        if (!obj.Key) {
          continue;
        }
        yield {
          key: obj.Key,
          sizeBytes: obj.Size ?? 0,
          lastModified: obj.LastModified,
        };
      }

      continuationToken = response.IsTruncated ? response.NextContinuationToken : undefined;
    } while (continuationToken);
  }

  /**
   * Test connectivity and credentials against the bucket
   */
  async testConnection(): Promise<void> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: this.bucket }));
    } catch (error) {
      const cause = toError(error);
      throw new ConnectivityError(
        `Remote store connection test failed for bucket ${this.bucket}: ${cause.message}`,
        'testConnection',
        cause
      );
    }
  }

  /**
   * Execute an operation with exponential backoff retry logic
   */
  private async withRetry<T>(operation: () => Promise<T>, operationName: string): Promise<T> {
    const { maxAttempts, baseDelayMs } = this.retry;

    for (let attempt = 1; ; attempt++) {
      try {
        return await operation();
      } catch (error) {
        if (this.isNonRetryableError(error)) {
          throw error;
        }

        const lastError = toError(error);
        if (attempt >= maxAttempts) {
          throw new Error(
            `Failed to ${operationName} after ${maxAttempts} attempts. Last error: ${lastError.message}`
          );
        }

        const delay = baseDelayMs * Math.pow(2, attempt - 1);
        this.logger?.warn(
          `Attempt ${attempt} failed for ${operationName}: ${lastError.message}. Retrying in ${delay}ms...`
        );

        await this.sleep(delay);
      }
    }
  }

  /**
   * Check if an error should not be retried
   */
  private isNonRetryableError(error: unknown): boolean {
    const awsError = asAwsError(error);
    const status = awsError.$metadata?.httpStatusCode;

    return (
      (awsError.name !== undefined && NON_RETRYABLE_CODES.includes(awsError.name)) ||
      (awsError.Code !== undefined && NON_RETRYABLE_CODES.includes(awsError.Code)) ||
      (status !== undefined && status >= 400 && status < 500)
    );
  }

  private static isNotFound(error: unknown): boolean {
    const awsError = asAwsError(error);
    return (
      awsError.name === 'NotFound' ||
      awsError.name === 'NoSuchKey' ||
      awsError.$metadata?.httpStatusCode === 404
    );
  }

  /**
   * Sleep for specified milliseconds
   */
  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }
}
