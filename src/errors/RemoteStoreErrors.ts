/**
 * Error classes raised by RemoteStore implementations
 */
export class RemoteStoreError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'RemoteStoreError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

export class TransferError extends RemoteStoreError {
  constructor(
    message: string,
    public readonly key: string,
    cause?: Error
  ) {
    super(message, 'put', cause);
    this.name = 'TransferError';
  }
}

export class RemoteObjectNotFoundError extends RemoteStoreError {
  constructor(
    public readonly key: string,
    cause?: Error
  ) {
    super(`Remote object not found: ${key}`, 'stat', cause);
    this.name = 'RemoteObjectNotFoundError';
  }
}

export class ConnectivityError extends RemoteStoreError {
  constructor(message: string, operation: string, cause?: Error) {
    super(message, operation, cause);
    this.name = 'ConnectivityError';
  }
}
