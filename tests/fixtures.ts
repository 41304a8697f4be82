/**
 * テスト用のルール・スナップショット生成ヘルパー
 */

import { Rule } from "../src/rules/types";
import { AlertSnapshot } from "../src/alerts/types";
import { fingerprint } from "../src/labels";
import { instanceKey } from "../src/alerts/stateMachine";

export function makeRule(overrides: Partial<Rule> = {}): Rule {
  const rule: Rule = {
    id: overrides.name ?? "HighRequestLatencyP99",
    name: "HighRequestLatencyP99",
    expr: "p99_latency",
    operator: ">",
    threshold: 0.5,
    intervalMs: 30_000,
    forMs: 60_000,
    labels: {},
    annotations: {},
    severity: "warning",
    groupBy: [],
    ...overrides,
  };
  return Object.freeze(rule);
}

export function makeAlert(labels: Record<string, string>, overrides: Partial<AlertSnapshot> = {}): AlertSnapshot {
  const fp = fingerprint(labels);
  const ruleId = overrides.ruleId ?? "rule";
  const alert: AlertSnapshot = {
    key: instanceKey(ruleId, fp),
    ruleId,
    ruleName: ruleId,
    labels,
    fingerprint: fp,
    state: "FIRING",
    severity: "warning",
    annotations: {},
    activeSince: 0,
    firedAt: 0,
    resolvedAt: null,
    lastValue: 1,
    lastEvaluatedAt: 0,
    groupBy: [],
    ...overrides,
  };
  return Object.freeze(alert);
}
