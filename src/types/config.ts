/**
 * Configuration type definitions for dbshelf
 */

export interface AlertCredentials {
  readonly token: string;
  readonly chatId: string;
}

export interface CloudConfig {
  /** Name of the rclone remote, without the trailing colon */
  readonly remoteName: string;
  readonly alertCredentials?: AlertCredentials;
}

export interface RetentionConfig {
  /** Number of newest archives kept per remote folder */
  readonly keep: number;
}

export interface PathsConfig {
  /** Directory holding one `.last` file per tracked object */
  readonly stateDir: string;
  /** Directory for ephemeral archive artifacts */
  readonly scratchDir: string;
}

export interface TrackedObject {
  readonly localPath: string;
  readonly intervalDays: number;
  readonly remoteFolder: string;
}

export interface ShelfConfig {
  readonly cloud: CloudConfig;
  readonly retention: RetentionConfig;
  readonly paths: PathsConfig;
  readonly objects: readonly TrackedObject[];
}

/**
 * Object entry as written in a config file: either the compact
 * `path;intervalDays;remoteFolder` form or an explicit record.
 */
export type ObjectEntryDocument =
  | string
  | {
      path: string;
      intervalDays: number;
      remoteFolder: string;
    };

/**
 * Config file contents after parsing, before paths and entries are resolved
 */
export interface ConfigDocument {
  cloud: {
    provider: string;
    telegram?: string | { token: string; chatId: string | number };
    keep?: number;
  };
  paths?: {
    state?: string;
    scratch?: string;
  };
  objects: ObjectEntryDocument[];
}
