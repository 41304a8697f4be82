/**
 * ルール評価のテスト
 */

import { compare, alertLabels, evaluateRule, latestPerSeries } from "../../src/evaluator/ruleEvaluator";
import { makeRule } from "../fixtures";

describe("compare", () => {
  it.each([
    [0.6, ">", 0.5, true],
    [0.5, ">", 0.5, false],
    [0.5, ">=", 0.5, true],
    [3, "<", 10, true],
    [10, "<=", 10, true],
    [0, "==", 0, true],
    [1, "!=", 0, true],
  ] as const)("%d %s %d → %p", (value, operator, threshold, expected) => {
    expect(compare(value, operator, threshold)).toBe(expected);
  });

  it("NaN や無限大は違反とみなさない", () => {
    expect(compare(NaN, ">", 0)).toBe(false);
    expect(compare(Infinity, ">", 0)).toBe(false);
    expect(compare(-Infinity, "<", 0)).toBe(false);
  });
});

describe("alertLabels", () => {
  it("__name__ を落とし、severity・ルールラベル・alertname を付与する", () => {
    const rule = makeRule({ labels: { team: "orders" } });
    expect(alertLabels(rule, { __name__: "p99_latency", endpoint: "/orders" })).toEqual({
      endpoint: "/orders",
      severity: "warning",
      team: "orders",
      alertname: "HighRequestLatencyP99",
    });
  });

  it("ルールのラベルが系列ラベルより優先される", () => {
    const rule = makeRule({ labels: { team: "orders" } });
    expect(alertLabels(rule, { team: "other" }).team).toBe("orders");
  });
});

describe("latestPerSeries", () => {
  it("系列ごとに最新のサンプルだけを残す", () => {
    const latest = latestPerSeries([
      { labels: { a: "1" }, value: 1, timestamp: 10 },
      { labels: { a: "1" }, value: 2, timestamp: 20 },
      { labels: { a: "2" }, value: 3, timestamp: 10 },
    ]);
    expect(latest.map((s) => s.value).sort()).toEqual([2, 3]);
  });
});

describe("evaluateRule", () => {
  const rule = makeRule();

  it("最新サンプルが違反している系列だけを返す", () => {
    const breaches = evaluateRule(rule, [
      { labels: { endpoint: "/orders" }, value: 0.7, timestamp: 0 },
      { labels: { endpoint: "/users" }, value: 0.2, timestamp: 0 },
      { labels: { endpoint: "/cart" }, value: 0.9, timestamp: 0 },
      { labels: { endpoint: "/cart" }, value: 0.1, timestamp: 30_000 },
    ]);

    expect([...breaches.values()].map((b) => b.labels.endpoint)).toEqual(["/orders"]);
    const breach = [...breaches.values()][0];
    expect(breach.value).toBe(0.7);
    expect(breach.fingerprint).toBe(
      '{alertname="HighRequestLatencyP99",endpoint="/orders",severity="warning"}'
    );
  });

  it("データなしは違反なし", () => {
    expect(evaluateRule(rule, []).size).toBe(0);
  });

  it("同じラベルセットに潰れる系列は最初のものだけを残す", () => {
    const breaches = evaluateRule(rule, [
      { labels: { __name__: "a", endpoint: "/x" }, value: 1, timestamp: 0 },
      { labels: { __name__: "b", endpoint: "/x" }, value: 2, timestamp: 0 },
    ]);
    expect(breaches.size).toBe(1);
    expect([...breaches.values()][0].value).toBe(1);
  });
});
