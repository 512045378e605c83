/**
 * Telegram alert sink
 */

import type { AlertCredentials, AlertSink } from "../types";
import { logger } from "../utils";

const TELEGRAM_API = "https://api.telegram.org";

export type FetchFn = typeof fetch;

export class TelegramAlertSink implements AlertSink {
  constructor(
    private readonly credentials: AlertCredentials,
    private readonly fetchFn: FetchFn = fetch,
  ) {}

  async notify(message: string): Promise<void> {
    const url = `${TELEGRAM_API}/bot${this.credentials.token}/sendMessage`;
    const body = new URLSearchParams({ chat_id: this.credentials.chatId, text: message });

    try {
      const response = await this.fetchFn(url, { method: "POST", body });
      if (!response.ok) {
        logger.warn(`Telegram alert rejected: HTTP ${response.status}`);
        return;
      }
      logger.debug("Telegram alert sent");
    } catch (error) {
      logger.warn("Failed to send Telegram alert:", error);
    }
  }
}

/**
 * Sink used when no alert credentials are configured
 */
export class NullAlertSink implements AlertSink {
  async notify(message: string): Promise<void> {
    logger.debug(`Alerting disabled, not sending: ${message}`);
  }
}
