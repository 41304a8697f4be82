/**
 * しきい値アラートエンジン - 定数定義
 */

// =============================================================================
// サーバー設定
// =============================================================================
export const SERVER = {
  /** デフォルトポート */
  DEFAULT_PORT: 8080,
} as const;

// =============================================================================
// エンジンのデフォルト値
// =============================================================================
export const ENGINE_DEFAULTS = {
  RULES_FILE: "config/rules.json",
  METRICS_BASE_URL: "http://localhost:9090",
  /** メトリクスクエリのタイムアウト（10秒） */
  QUERY_TIMEOUT_MS: 10_000,
  /** 即時クエリ */
  LOOKBACK_MS: 0,

  /** グルーピングウィンドウ（30秒） */
  GROUP_WAIT_MS: 30_000,
  /** 更新通知の最小間隔（5分） */
  GROUP_INTERVAL_MS: 5 * 60_000,
  /** 発火継続中の再送間隔（4時間） */
  REPEAT_INTERVAL_MS: 4 * 60 * 60_000,

  DISPATCH_TICK_MS: 1_000,
  QUEUE_CAPACITY: 10_000,

  NOTIFY_MAX_ATTEMPTS: 5,
  NOTIFY_BASE_DELAY_MS: 1_000,
  NOTIFY_MAX_DELAY_MS: 60_000,
  NOTIFY_TIMEOUT_MS: 10_000,

  DEFAULT_RECEIVER: "slack",
  SLACK_CHANNEL: "alerts",

  /** 期限切れサイレンスの保持期間（5日） */
  SILENCE_RETENTION_MS: 5 * 24 * 60 * 60_000,
} as const;

// =============================================================================
// 健康状態ビュー
// =============================================================================
export const HEALTH = {
  /** 保持する配信失敗イベントの上限 */
  MAX_DELIVERY_FAILURES: 100,
  /** 保持する状態不整合イベントの上限 */
  MAX_INCONSISTENCIES: 100,
  /** この期間内に配信失敗・不整合があれば degraded とする（15分） */
  DEGRADED_WINDOW_MS: 15 * 60_000,
} as const;
