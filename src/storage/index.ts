/**
 * Storage module exports
 */

import type { CloudConfig, RemoteStore } from "../types";
import { RcloneRemoteStore } from "./rclone";

export { buildRemotePath, parseLsjson, RcloneRemoteStore } from "./rclone";

/**
 * Create the remote store for the configured remote
 */
export function createRemoteStore(cloud: CloudConfig): RemoteStore {
  return new RcloneRemoteStore(cloud.remoteName);
}
