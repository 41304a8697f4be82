/**
 * 通知メッセージのレンダリング
 *
 * グループ通知から Slack 向けテキストと Webhook 向け JSON の両方を作る
 */

import { AlertSnapshot } from "../alerts/types";
import { GroupNotification } from "../grouping/types";
import { Labels, commonLabels, formatLabels } from "../labels";
import { formatValue } from "../utils/template";
import { RenderedMessage, WebhookPayload } from "./types";

// =============================================================================
// メッセージ構築
// =============================================================================

function isoOrNull(ms: number | null): string | null {
  return ms === null ? null : new Date(ms).toISOString();
}

function memberLines(alert: AlertSnapshot): string[] {
  const lines: string[] = [];
  lines.push(`• ${formatLabels(alert.labels)}`);
  lines.push(`    value: ${formatValue(alert.lastValue)}  state: ${alert.state}`);
  const summary = alert.annotations.summary;
  if (summary) {
    lines.push(`    summary: ${summary}`);
  }
  const description = alert.annotations.description;
  if (description) {
    lines.push(`    description: ${description}`);
  }
  return lines;
}

/**
 * ヘッダー行: [FIRING:n] / [RESOLVED]
 */
export function renderTitle(notification: GroupNotification): string {
  const status = notification.firing.length > 0 ? `FIRING:${notification.firing.length}` : "RESOLVED";
  const groupPart = Object.keys(notification.groupLabels).length > 0 ? ` (${formatLabels(notification.groupLabels)})` : "";
  return `[${status}] ${notification.ruleName}${groupPart}`;
}

function buildText(notification: GroupNotification): string {
  const lines: string[] = [];

  lines.push(`*${renderTitle(notification)}*`);
  lines.push("");
  lines.push("```");
  lines.push(`rule:      ${notification.ruleName}`);
  lines.push(`severity:  ${notification.severity}`);
  lines.push(`kind:      ${notification.kind}`);
  lines.push(`group:     ${formatLabels(notification.groupLabels) || "(all)"}`);
  lines.push("```");

  if (notification.firing.length > 0) {
    lines.push("");
    lines.push(`*Firing (${notification.firing.length}):*`);
    for (const alert of notification.firing) {
      lines.push(...memberLines(alert));
    }
  }

  if (notification.resolved.length > 0) {
    lines.push("");
    lines.push(`*Resolved (${notification.resolved.length}):*`);
    for (const alert of notification.resolved) {
      lines.push(...memberLines(alert));
    }
  }

  return lines.join("\n");
}

function buildPayload(notification: GroupNotification): WebhookPayload {
  const members = [...notification.firing, ...notification.resolved];
  const labelSets: Labels[] = members.map((a) => a.labels);

  return {
    version: "1",
    groupKey: notification.groupKey,
    receiver: notification.receiver,
    status: notification.firing.length > 0 ? "firing" : "resolved",
    kind: notification.kind,
    groupLabels: notification.groupLabels,
    commonLabels: commonLabels(labelSets),
    alerts: members.map((alert) => ({
      status: alert.state === "FIRING" ? "firing" : "resolved",
      labels: alert.labels,
      annotations: { ...alert.annotations },
      value: alert.lastValue,
      startsAt: new Date(alert.firedAt ?? alert.activeSince).toISOString(),
      endsAt: isoOrNull(alert.resolvedAt),
      fingerprint: alert.fingerprint,
    })),
  };
}

/**
 * グループ通知をレンダリングする
 */
export function renderNotification(notification: GroupNotification): RenderedMessage {
  return {
    title: renderTitle(notification),
    text: buildText(notification),
    severity: notification.severity,
    status: notification.firing.length > 0 ? "firing" : "resolved",
    payload: buildPayload(notification),
  };
}
