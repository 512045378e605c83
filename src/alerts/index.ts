/**
 * Alert module exports
 */

import type { AlertSink, CloudConfig } from "../types";
import { type FetchFn, NullAlertSink, TelegramAlertSink } from "./telegram";

export { type FetchFn, NullAlertSink, TelegramAlertSink } from "./telegram";

/**
 * Create the alert sink for the configured credentials
 */
export function createAlertSink(cloud: CloudConfig, fetchFn?: FetchFn): AlertSink {
  if (!cloud.alertCredentials) {
    return new NullAlertSink();
  }
  return new TelegramAlertSink(cloud.alertCredentials, fetchFn);
}
