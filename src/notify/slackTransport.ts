/**
 * Slack通知トランスポート
 * Slack API（chat.postMessage）を使用してメッセージを送信
 */

import { z } from "zod";
import { logger } from "../logger";
import { errorMessage } from "../errors";
import { withTimeout } from "../utils/retry";
import { Severity } from "../rules/types";
import { DeliveryResult, NotificationTransport, RenderedMessage } from "./types";

const SLACK_POST_MESSAGE_URL = "https://slack.com/api/chat.postMessage";

/** 重大度別の絵文字プレフィックス */
const SEVERITY_EMOJI: Record<Severity, string> = {
  info: "ℹ️",
  warning: "⚠️",
  critical: "🚨",
};

const RESOLVED_EMOJI = "✅";

/** Slack API レスポンス */
const SlackResponseSchema = z.object({
  ok: z.boolean(),
  error: z.string().optional(),
  ts: z.string().optional(),
  channel: z.string().optional(),
});

export interface SlackTransportConfig {
  botToken?: string;
  channel: string;
  timeoutMs?: number;
}

/**
 * Slack通知トランスポート
 */
export class SlackTransport implements NotificationTransport {
  private readonly botToken: string | undefined;
  private readonly channel: string;
  private readonly timeoutMs: number;

  constructor(config: SlackTransportConfig) {
    this.botToken = config.botToken;
    this.channel = config.channel;
    this.timeoutMs = config.timeoutMs ?? 10000;
  }

  /**
   * Slackにメッセージを送信
   */
  async send(receiver: string, message: RenderedMessage): Promise<DeliveryResult> {
    if (!this.botToken) {
      return { ok: false, reason: "SLACK_BOT_TOKEN is not set" };
    }

    const emoji = message.status === "resolved" ? RESOLVED_EMOJI : SEVERITY_EMOJI[message.severity];

    try {
      const response = await withTimeout(
        (signal) =>
          fetch(SLACK_POST_MESSAGE_URL, {
            method: "POST",
            headers: {
              "Content-Type": "application/json; charset=utf-8",
              Authorization: `Bearer ${this.botToken}`,
            },
            body: JSON.stringify({
              channel: this.channel,
              text: `${emoji} ${message.text}`,
              mrkdwn: true,
            }),
            signal,
          }),
        this.timeoutMs,
        `slack:${receiver}`
      );

      const parsed = SlackResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        return { ok: false, reason: `unexpected Slack response (HTTP ${response.status})` };
      }
      if (!parsed.data.ok) {
        return { ok: false, reason: `Slack API error: ${parsed.data.error ?? "unknown"}` };
      }

      logger.debug("Slack message sent", { receiver, channel: this.channel, ts: parsed.data.ts });
      return { ok: true };
    } catch (error) {
      return { ok: false, reason: errorMessage(error) };
    }
  }

  /**
   * 設定が有効かどうかを確認
   */
  isConfigured(): boolean {
    return !!this.botToken;
  }
}
