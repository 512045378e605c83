/**
 * Remote store and alert sink interface definitions
 */

export interface RemoteEntry {
  name: string;
  modTime: Date;
  size: number;
}

export interface RemoteStore {
  /** Display form of the remote, e.g. `gdrive:` */
  readonly label: string;

  /**
   * Check that the external tool backing this store is installed
   */
  isToolAvailable(): Promise<boolean>;

  /**
   * Check that the configured remote answers a listing
   */
  isReachable(): Promise<boolean>;

  /**
   * Copy a local file to `<remote>:<remoteFolder>/<basename>`
   */
  upload(localFile: string, remoteFolder: string): Promise<void>;

  /**
   * List plain files directly inside a remote folder
   */
  list(remoteFolder: string): Promise<RemoteEntry[]>;

  /**
   * Delete one file from a remote folder
   */
  delete(remoteFolder: string, name: string): Promise<void>;
}

export interface AlertSink {
  /**
   * Deliver a message to the operator channel. Never rejects.
   */
  notify(message: string): Promise<void>;
}
