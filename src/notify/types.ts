/**
 * 通知 - 型定義
 */

import { GroupNotificationKind } from "../grouping/types";
import { Labels } from "../labels";
import { Severity } from "../rules/types";

/**
 * 送信結果（トランスポートは例外を投げずにこの形で返す）
 */
export type DeliveryResult = { ok: true } | { ok: false; reason: string };

/**
 * Webhook 受信側に渡す JSON ペイロード
 */
export interface WebhookPayload {
  version: "1";
  groupKey: string;
  receiver: string;
  status: "firing" | "resolved";
  kind: GroupNotificationKind;
  groupLabels: Labels;
  commonLabels: Labels;
  alerts: {
    status: "firing" | "resolved";
    labels: Labels;
    annotations: Record<string, string>;
    value: number;
    startsAt: string;
    endsAt: string | null;
    fingerprint: string;
  }[];
}

/**
 * レンダリング済みメッセージ
 */
export interface RenderedMessage {
  title: string;
  /** Slack mrkdwn 形式の本文 */
  text: string;
  severity: Severity;
  status: "firing" | "resolved";
  payload: WebhookPayload;
}

/**
 * 通知トランスポート
 */
export interface NotificationTransport {
  send(receiver: string, message: RenderedMessage): Promise<DeliveryResult>;
}

/**
 * 配信失敗イベント（リトライ上限到達）
 */
export interface DeliveryFailure {
  notificationId: string;
  groupKey: string;
  receiver: string;
  kind: GroupNotificationKind;
  attempts: number;
  reasons: string[];
  failedAt: string;
}

/**
 * 配信履歴
 */
export interface DeliveryRecord {
  notificationId: string;
  groupKey: string;
  receiver: string;
  kind: GroupNotificationKind;
  attempts: number;
  failedAttempts: string[];
  deliveredAt: string;
}
