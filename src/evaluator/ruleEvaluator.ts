/**
 * ルール評価
 *
 * クエリ結果の各系列の最新サンプルをしきい値と比較し、
 * 違反しているラベルセットの集合を返す
 */

import { Labels, fingerprint, mergeLabels, ALERTNAME_LABEL, SEVERITY_LABEL } from "../labels";
import { logger } from "../logger";
import { Sample } from "../query/types";
import { ComparisonOperator, Rule } from "../rules/types";

// =============================================================================
// 型定義
// =============================================================================

/**
 * 違反している1系列
 */
export interface Breach {
  /** アラートのラベル（系列ラベル + severity + ルールラベル + alertname） */
  readonly labels: Labels;
  readonly fingerprint: string;
  readonly value: number;
  readonly sampleTimestamp: number;
}

/**
 * フィンガープリント → 違反
 *
 * ここに無いラベルセットは「違反していない」とみなす（データ欠損も同じ）
 */
export type BreachSet = ReadonlyMap<string, Breach>;

// =============================================================================
// 比較
// =============================================================================

/**
 * 値がしきい値を違反しているか
 *
 * NaN・±Inf は違反とみなさない
 */
export function compare(value: number, operator: ComparisonOperator, threshold: number): boolean {
  if (!Number.isFinite(value)) {
    return false;
  }
  switch (operator) {
    case ">":
      return value > threshold;
    case ">=":
      return value >= threshold;
    case "<":
      return value < threshold;
    case "<=":
      return value <= threshold;
    case "==":
      return value === threshold;
    case "!=":
      return value !== threshold;
  }
}

/**
 * 系列ラベルとルールのラベルからアラートのラベルを作る
 *
 * 系列側の __name__ は落とす。優先順位は alertname > ルールのラベル > severity > 系列ラベル
 */
export function alertLabels(rule: Rule, seriesLabels: Labels): Labels {
  const { __name__: _metricName, ...rest } = seriesLabels;
  return mergeLabels(rest, { [SEVERITY_LABEL]: rule.severity }, rule.labels, { [ALERTNAME_LABEL]: rule.name });
}

// =============================================================================
// 評価
// =============================================================================

/**
 * 系列ごとに最新のサンプルだけを残す
 */
export function latestPerSeries(samples: readonly Sample[]): Sample[] {
  const latest = new Map<string, Sample>();
  for (const sample of samples) {
    const key = fingerprint(sample.labels);
    const current = latest.get(key);
    if (!current || sample.timestamp >= current.timestamp) {
      latest.set(key, sample);
    }
  }
  return [...latest.values()];
}

/**
 * ルールをクエリ結果に対して評価する
 */
export function evaluateRule(rule: Rule, samples: readonly Sample[]): BreachSet {
  const breaches = new Map<string, Breach>();

  for (const sample of latestPerSeries(samples)) {
    if (!compare(sample.value, rule.operator, rule.threshold)) {
      continue;
    }

    const labels = alertLabels(rule, sample.labels);
    const key = fingerprint(labels);

    // ルールラベルで上書きされ、別系列が同じラベルセットになった場合
    if (breaches.has(key)) {
      logger.warn("Multiple series collapse into one alert label set", {
        ruleId: rule.id,
        fingerprint: key,
      });
      continue;
    }

    breaches.set(key, {
      labels,
      fingerprint: key,
      value: sample.value,
      sampleTimestamp: sample.timestamp,
    });
  }

  logger.debug("Rule evaluated", {
    ruleId: rule.id,
    sampleCount: samples.length,
    breachCount: breaches.size,
  });

  return breaches;
}
