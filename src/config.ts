/**
 * しきい値アラートエンジン - 環境変数設定
 */

import { SERVER, ENGINE_DEFAULTS } from "./constants";

// =============================================================================
// 環境変数名
// =============================================================================

export const ENGINE_ENV_VARS = {
  PORT: "PORT",
  API_KEY: "API_KEY",
  RULES_FILE: "RULES_FILE",

  // ----- メトリクスソース -----
  METRICS_BASE_URL: "METRICS_BASE_URL",
  METRICS_QUERY_TIMEOUT_MS: "METRICS_QUERY_TIMEOUT_MS",
  METRICS_LOOKBACK_MS: "METRICS_LOOKBACK_MS",

  // ----- グルーピング -----
  GROUP_WAIT_MS: "GROUP_WAIT_MS",
  GROUP_INTERVAL_MS: "GROUP_INTERVAL_MS",
  REPEAT_INTERVAL_MS: "REPEAT_INTERVAL_MS",

  // ----- ディスパッチ -----
  DISPATCH_TICK_MS: "DISPATCH_TICK_MS",
  QUEUE_CAPACITY: "QUEUE_CAPACITY",
  NOTIFY_MAX_ATTEMPTS: "NOTIFY_MAX_ATTEMPTS",
  NOTIFY_BASE_DELAY_MS: "NOTIFY_BASE_DELAY_MS",
  NOTIFY_MAX_DELAY_MS: "NOTIFY_MAX_DELAY_MS",
  NOTIFY_TIMEOUT_MS: "NOTIFY_TIMEOUT_MS",

  // ----- レシーバー -----
  DEFAULT_RECEIVER: "DEFAULT_RECEIVER",
  SLACK_BOT_TOKEN: "SLACK_BOT_TOKEN",
  SLACK_CHANNEL: "SLACK_CHANNEL",
  WEBHOOK_URL: "WEBHOOK_URL",

  // ----- サイレンス -----
  SILENCE_RETENTION_MS: "SILENCE_RETENTION_MS",
} as const;

// =============================================================================
// 設定インターフェース
// =============================================================================

export interface EngineConfig {
  // サーバー設定
  port: number;
  nodeEnv: string;
  apiKey?: string;
  rulesFile: string;

  // メトリクスソース
  metricsBaseUrl: string;
  queryTimeoutMs: number;
  /** 範囲クエリで遡る時間。0 なら即時クエリ */
  lookbackMs: number;

  // グルーピング
  groupWaitMs: number;
  groupIntervalMs: number;
  repeatIntervalMs: number;

  // ディスパッチ
  dispatchTickMs: number;
  queueCapacity: number;
  notifyMaxAttempts: number;
  notifyBaseDelayMs: number;
  notifyMaxDelayMs: number;
  notifyTimeoutMs: number;

  // レシーバー
  defaultReceiver: string;
  slackBotToken?: string;
  slackChannel: string;
  webhookUrl?: string;

  silenceRetentionMs: number;
}

// =============================================================================
// ヘルパー関数
// =============================================================================

/**
 * 環境変数から数値を取得
 */
export function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined || value === "") {
    return defaultValue;
  }
  const parsed = parseFloat(value);
  if (isNaN(parsed)) {
    return defaultValue;
  }
  return parsed;
}

/**
 * 環境変数から文字列を取得
 */
export function getEnvString(key: string): string | undefined {
  const value = process.env[key];
  if (value === undefined || value === "") {
    return undefined;
  }
  return value;
}

// =============================================================================
// 設定ローダー
// =============================================================================

/**
 * 環境変数からエンジン設定を読み込む
 */
export function loadEngineConfig(): EngineConfig {
  const env = ENGINE_ENV_VARS;
  return {
    port: getEnvNumber(env.PORT, SERVER.DEFAULT_PORT),
    nodeEnv: process.env.NODE_ENV || "development",
    apiKey: getEnvString(env.API_KEY),
    rulesFile: getEnvString(env.RULES_FILE) ?? ENGINE_DEFAULTS.RULES_FILE,

    metricsBaseUrl: getEnvString(env.METRICS_BASE_URL) ?? ENGINE_DEFAULTS.METRICS_BASE_URL,
    queryTimeoutMs: getEnvNumber(env.METRICS_QUERY_TIMEOUT_MS, ENGINE_DEFAULTS.QUERY_TIMEOUT_MS),
    lookbackMs: getEnvNumber(env.METRICS_LOOKBACK_MS, ENGINE_DEFAULTS.LOOKBACK_MS),

    groupWaitMs: getEnvNumber(env.GROUP_WAIT_MS, ENGINE_DEFAULTS.GROUP_WAIT_MS),
    groupIntervalMs: getEnvNumber(env.GROUP_INTERVAL_MS, ENGINE_DEFAULTS.GROUP_INTERVAL_MS),
    repeatIntervalMs: getEnvNumber(env.REPEAT_INTERVAL_MS, ENGINE_DEFAULTS.REPEAT_INTERVAL_MS),

    dispatchTickMs: getEnvNumber(env.DISPATCH_TICK_MS, ENGINE_DEFAULTS.DISPATCH_TICK_MS),
    queueCapacity: getEnvNumber(env.QUEUE_CAPACITY, ENGINE_DEFAULTS.QUEUE_CAPACITY),
    notifyMaxAttempts: getEnvNumber(env.NOTIFY_MAX_ATTEMPTS, ENGINE_DEFAULTS.NOTIFY_MAX_ATTEMPTS),
    notifyBaseDelayMs: getEnvNumber(env.NOTIFY_BASE_DELAY_MS, ENGINE_DEFAULTS.NOTIFY_BASE_DELAY_MS),
    notifyMaxDelayMs: getEnvNumber(env.NOTIFY_MAX_DELAY_MS, ENGINE_DEFAULTS.NOTIFY_MAX_DELAY_MS),
    notifyTimeoutMs: getEnvNumber(env.NOTIFY_TIMEOUT_MS, ENGINE_DEFAULTS.NOTIFY_TIMEOUT_MS),

    defaultReceiver: getEnvString(env.DEFAULT_RECEIVER) ?? ENGINE_DEFAULTS.DEFAULT_RECEIVER,
    slackBotToken: getEnvString(env.SLACK_BOT_TOKEN),
    slackChannel: getEnvString(env.SLACK_CHANNEL) ?? ENGINE_DEFAULTS.SLACK_CHANNEL,
    webhookUrl: getEnvString(env.WEBHOOK_URL),

    silenceRetentionMs: getEnvNumber(env.SILENCE_RETENTION_MS, ENGINE_DEFAULTS.SILENCE_RETENTION_MS),
  };
}

/**
 * 設定値を検証する
 */
export function validateEngineConfig(config: EngineConfig): {
  valid: boolean;
  errors: string[];
} {
  const errors: string[] = [];

  const positive: Array<[string, number]> = [
    ["queryTimeoutMs", config.queryTimeoutMs],
    ["dispatchTickMs", config.dispatchTickMs],
    ["queueCapacity", config.queueCapacity],
    ["notifyMaxAttempts", config.notifyMaxAttempts],
    ["notifyBaseDelayMs", config.notifyBaseDelayMs],
    ["notifyTimeoutMs", config.notifyTimeoutMs],
  ];
  for (const [name, value] of positive) {
    if (!(value > 0)) {
      errors.push(`${name} must be positive (got ${value})`);
    }
  }

  const nonNegative: Array<[string, number]> = [
    ["lookbackMs", config.lookbackMs],
    ["groupWaitMs", config.groupWaitMs],
    ["groupIntervalMs", config.groupIntervalMs],
    ["repeatIntervalMs", config.repeatIntervalMs],
    ["silenceRetentionMs", config.silenceRetentionMs],
  ];
  for (const [name, value] of nonNegative) {
    if (!(value >= 0)) {
      errors.push(`${name} must not be negative (got ${value})`);
    }
  }

  if (config.notifyMaxDelayMs < config.notifyBaseDelayMs) {
    errors.push("notifyMaxDelayMs must be >= notifyBaseDelayMs");
  }

  try {
    new URL(config.metricsBaseUrl);
  } catch {
    errors.push(`metricsBaseUrl is not a valid URL: ${config.metricsBaseUrl}`);
  }

  return { valid: errors.length === 0, errors };
}
