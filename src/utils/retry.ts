/**
 * リトライ・タイムアウトユーティリティ
 *
 * 通知配信の再試行はブロッキングせず「次回試行時刻」で管理するため、
 * ここでは待機せずに遅延時間だけを計算する
 */

// =============================================================================
// 設定
// =============================================================================

export interface RetryConfig {
  maxAttempts: number; // 最大試行回数（初回を含む）
  baseDelayMs: number; // 基本待機時間（ミリ秒）
  maxDelayMs: number; // 最大待機時間（ミリ秒）
  backoffMultiplier: number; // 指数バックオフ乗数
  jitterRatio: number; // ジッター比率（0 でジッターなし）
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 5,
  baseDelayMs: 1000,
  maxDelayMs: 60000,
  backoffMultiplier: 2,
  jitterRatio: 0,
};

// =============================================================================
// バックオフ
// =============================================================================

/**
 * 失敗回数から次回試行までの待機時間を計算
 *
 * 1回目の失敗後 base、2回目 base*m、... を maxDelayMs で頭打ちにする
 */
export function computeBackoffDelayMs(
  failedAttempts: number,
  config: Partial<RetryConfig> = {},
  random: () => number = Math.random
): number {
  const effective = { ...DEFAULT_RETRY_CONFIG, ...config };
  const exponent = Math.max(0, failedAttempts - 1);
  const delay = Math.min(
    effective.baseDelayMs * Math.pow(effective.backoffMultiplier, exponent),
    effective.maxDelayMs
  );

  if (effective.jitterRatio <= 0) {
    return delay;
  }

  const jitter = delay * random() * effective.jitterRatio;
  return Math.round(delay + jitter);
}

// =============================================================================
// タイムアウト
// =============================================================================

/**
 * タイムアウトエラー
 */
export class TimeoutError extends Error {
  public readonly code = "ETIMEDOUT";

  constructor(name: string, timeoutMs: number) {
    super(`Timeout after ${timeoutMs}ms: ${name}`);
    this.name = "TimeoutError";
  }
}

/**
 * タイムアウト付きで関数を実行
 *
 * fn には AbortSignal が渡されるので、fetch 等に渡してリクエスト自体も中断する
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  name: string
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(name, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
