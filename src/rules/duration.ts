/**
 * 期間表記の解析
 *
 * "30s", "1m", "1h30m", "500ms" などの Prometheus 形式、
 * または秒数（数値）を受け付ける
 */

const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
  w: 7 * 24 * 60 * 60 * 1000,
};

const DURATION_PATTERN = /^(?:\d+(?:ms|s|m|h|d|w))+$/;
const PART_PATTERN = /(\d+)(ms|s|m|h|d|w)/g;

/**
 * 期間をミリ秒に変換する。不正な表記なら null
 */
export function parseDuration(value: string | number): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) && value >= 0 ? Math.round(value * 1000) : null;
  }

  const text = value.trim();
  if (text === "0") {
    return 0;
  }
  if (!DURATION_PATTERN.test(text)) {
    return null;
  }

  let total = 0;
  for (const [, amount, unit] of text.matchAll(PART_PATTERN)) {
    total += Number(amount) * UNIT_MS[unit];
  }
  return total;
}

/**
 * ミリ秒を短い表記に戻す（表示用）
 */
export function formatDuration(ms: number): string {
  if (ms === 0) {
    return "0s";
  }
  const parts: string[] = [];
  let rest = ms;
  for (const unit of ["w", "d", "h", "m", "s", "ms"]) {
    const size = UNIT_MS[unit];
    if (rest >= size) {
      const amount = Math.floor(rest / size);
      parts.push(`${amount}${unit}`);
      rest -= amount * size;
    }
  }
  return parts.join("");
}
