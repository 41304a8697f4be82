/**
 * ラベルセット
 *
 * ラベルセットはアラートインスタンスの識別子を兼ねるため、
 * キーをソートした正規化文字列（フィンガープリント）で比較する
 */

import { z } from "zod";

// =============================================================================
// 型定義
// =============================================================================

/** ラベル名 → 値 */
export type Labels = Readonly<Record<string, string>>;

/** マッチ演算子（Alertmanager と同じ4種） */
export type MatchOperator = "=" | "!=" | "=~" | "!~";

/**
 * 設定・API で受け付けるマッチャー
 */
export const LabelMatcherSchema = z.object({
  name: z.string().min(1, "matcher name is required"),
  value: z.string(),
  isRegex: z.boolean().default(false),
  isEqual: z.boolean().default(true),
});

export type LabelMatcherInput = z.input<typeof LabelMatcherSchema>;

/**
 * コンパイル済みマッチャー
 */
export interface LabelMatcher {
  readonly name: string;
  readonly value: string;
  readonly operator: MatchOperator;
  readonly regex?: RegExp;
}

export const ALERTNAME_LABEL = "alertname";
export const SEVERITY_LABEL = "severity";

// =============================================================================
// フィンガープリント
// =============================================================================

/**
 * ラベルセットの正規化文字列を返す
 *
 * 例: {endpoint="/orders",method="GET"}
 */
export function fingerprint(labels: Labels): string {
  const pairs = Object.keys(labels)
    .sort()
    .map((name) => `${name}=${JSON.stringify(labels[name])}`);
  return `{${pairs.join(",")}}`;
}

/**
 * 指定したラベル名だけを取り出す（存在しないラベルは空文字として扱う）
 */
export function projectLabels(labels: Labels, names: readonly string[]): Labels {
  const projected: Record<string, string> = {};
  for (const name of [...names].sort()) {
    projected[name] = labels[name] ?? "";
  }
  return Object.freeze(projected);
}

/**
 * ラベルセットを右優先でマージし、値が空のラベルを除く
 */
export function mergeLabels(...sets: Labels[]): Labels {
  const merged: Record<string, string> = {};
  for (const set of sets) {
    for (const [name, value] of Object.entries(set)) {
      merged[name] = value;
    }
  }
  for (const name of Object.keys(merged)) {
    if (merged[name] === "") {
      delete merged[name];
    }
  }
  return Object.freeze(merged);
}

/**
 * 全ラベルセットに共通するラベルだけを返す
 */
export function commonLabels(sets: readonly Labels[]): Labels {
  if (sets.length === 0) {
    return Object.freeze({});
  }
  const [first, ...rest] = sets;
  const common: Record<string, string> = {};
  for (const [name, value] of Object.entries(first)) {
    if (rest.every((set) => set[name] === value)) {
      common[name] = value;
    }
  }
  return Object.freeze(common);
}

/**
 * 表示用: name="value" をカンマ区切りにする
 */
export function formatLabels(labels: Labels): string {
  return Object.keys(labels)
    .sort()
    .map((name) => `${name}="${labels[name]}"`)
    .join(", ");
}

// =============================================================================
// マッチャー
// =============================================================================

/**
 * マッチャー入力をコンパイルする
 *
 * 正規表現は Prometheus と同様に全体一致（^...$）で評価する
 * @throws {SyntaxError} 正規表現が不正な場合
 */
export function compileMatcher(input: LabelMatcherInput): LabelMatcher {
  const parsed = LabelMatcherSchema.parse(input);
  const operator: MatchOperator = parsed.isRegex
    ? parsed.isEqual
      ? "=~"
      : "!~"
    : parsed.isEqual
      ? "="
      : "!=";

  if (parsed.isRegex) {
    return Object.freeze({
      name: parsed.name,
      value: parsed.value,
      operator,
      regex: new RegExp(`^(?:${parsed.value})$`),
    });
  }
  return Object.freeze({ name: parsed.name, value: parsed.value, operator });
}

const MATCHER_PATTERN = /^\s*([a-zA-Z_][a-zA-Z0-9_]*)\s*(=~|!~|!=|=)\s*"((?:[^"\\]|\\.)*)"\s*$/;

/**
 * 文字列形式のマッチャーを解析する
 *
 * 例: severity="critical", endpoint=~"/orders.*"
 * @throws {SyntaxError} 形式が不正な場合
 */
export function parseMatcher(text: string): LabelMatcher {
  const match = MATCHER_PATTERN.exec(text);
  if (!match) {
    throw new SyntaxError(`Invalid label matcher: ${text}`);
  }
  const [, name, op, rawValue] = match;
  const value = rawValue.replace(/\\(.)/g, "$1");
  return compileMatcher({
    name,
    value,
    isRegex: op === "=~" || op === "!~",
    isEqual: op === "=" || op === "=~",
  });
}

/**
 * 単一マッチャーの評価（存在しないラベルは空文字として扱う）
 */
export function matcherMatches(matcher: LabelMatcher, labels: Labels): boolean {
  const actual = labels[matcher.name] ?? "";
  switch (matcher.operator) {
    case "=":
      return actual === matcher.value;
    case "!=":
      return actual !== matcher.value;
    case "=~":
      return matcher.regex?.test(actual) ?? false;
    case "!~":
      return !(matcher.regex?.test(actual) ?? false);
  }
}

/**
 * 全マッチャーが一致するか（空のマッチャー集合はすべてに一致）
 */
export function matchesAll(matchers: readonly LabelMatcher[], labels: Labels): boolean {
  return matchers.every((matcher) => matcherMatches(matcher, labels));
}

/**
 * API 応答用に入力形式へ戻す
 */
export function matcherToInput(matcher: LabelMatcher): Required<LabelMatcherInput> {
  return {
    name: matcher.name,
    value: matcher.value,
    isRegex: matcher.operator === "=~" || matcher.operator === "!~",
    isEqual: matcher.operator === "=" || matcher.operator === "=~",
  };
}
