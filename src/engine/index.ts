/**
 * エンジンモジュール
 */

import { EngineConfig } from "../config";
import { PrometheusClient } from "../query/prometheusClient";
import { SlackTransport } from "../notify/slackTransport";
import { WebhookTransport } from "../notify/webhookTransport";
import { NotificationTransport } from "../notify/types";
import { AlertEngine } from "./alertEngine";

export { AlertEngine } from "./alertEngine";
export type { AlertEngineOptions, AlertEngineSettings } from "./alertEngine";
export { EvaluationScheduler } from "./scheduler";
export type { EngineHealth, QueryFailure, InconsistencyEvent } from "./types";

/**
 * 組み込みレシーバー（slack / webhook）のトランスポートを作る
 */
export function createTransports(config: EngineConfig): Record<string, NotificationTransport> {
  return {
    slack: new SlackTransport({
      botToken: config.slackBotToken,
      channel: config.slackChannel,
      timeoutMs: config.notifyTimeoutMs,
    }),
    webhook: new WebhookTransport({
      url: config.webhookUrl,
      timeoutMs: config.notifyTimeoutMs,
    }),
  };
}

/**
 * 設定からエンジンを組み立てる
 */
export function createAlertEngine(config: EngineConfig): AlertEngine {
  return new AlertEngine({
    settings: config,
    metrics: new PrometheusClient({
      baseUrl: config.metricsBaseUrl,
      timeoutMs: config.queryTimeoutMs,
    }),
    transports: createTransports(config),
  });
}
