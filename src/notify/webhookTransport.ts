/**
 * Webhook通知トランスポート
 * レンダリング済みペイロードを JSON で POST する。2xx 以外は失敗扱い
 */

import { logger } from "../logger";
import { errorMessage } from "../errors";
import { withTimeout } from "../utils/retry";
import { DeliveryResult, NotificationTransport, RenderedMessage } from "./types";

export interface WebhookTransportConfig {
  url?: string;
  timeoutMs?: number;
  headers?: Record<string, string>;
}

export class WebhookTransport implements NotificationTransport {
  private readonly url: string | undefined;
  private readonly timeoutMs: number;
  private readonly headers: Record<string, string>;

  constructor(config: WebhookTransportConfig) {
    this.url = config.url;
    this.timeoutMs = config.timeoutMs ?? 10000;
    this.headers = config.headers ?? {};
  }

  async send(receiver: string, message: RenderedMessage): Promise<DeliveryResult> {
    const url = this.url;
    if (!url) {
      return { ok: false, reason: "WEBHOOK_URL is not set" };
    }

    try {
      const response = await withTimeout(
        (signal) =>
          fetch(url, {
            method: "POST",
            headers: { "Content-Type": "application/json", ...this.headers },
            body: JSON.stringify({ ...message.payload, title: message.title, text: message.text }),
            signal,
          }),
        this.timeoutMs,
        `webhook:${receiver}`
      );

      if (!response.ok) {
        return { ok: false, reason: `HTTP ${response.status}` };
      }

      logger.debug("Webhook delivered", { receiver, status: response.status });
      return { ok: true };
    } catch (error) {
      return { ok: false, reason: errorMessage(error) };
    }
  }

  isConfigured(): boolean {
    return !!this.url;
  }
}
