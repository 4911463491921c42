/**
 * An object as observed in the remote store
 */
export interface RemoteObject {
  /** Object key */
  key: string;

  /** Size of the object in bytes */
  sizeBytes: number;

  /** Last modified timestamp, when the store reports one */
  lastModified?: Date;
}

/**
 * Capability interface over an object-storage backend
 */
export interface RemoteStore {
  /**
   * Upload a local file under the given key.
   * Retries transient failures internally; rejects with TransferError once they are exhausted.
   */
  put(localPath: string, key: string): Promise<void>;

  /**
   * Look up an object's size.
   * Rejects with RemoteObjectNotFoundError for a missing key and ConnectivityError otherwise.
   */
  stat(key: string): Promise<RemoteObject>;

  /** Lazily list every object under a prefix; each iteration starts a fresh listing */
  list(prefix: string): AsyncIterable<RemoteObject>;

  /** Check that the bucket is reachable with the configured credentials */
  testConnection(): Promise<void>;
}
