/**
 * アラートルール - 型定義
 */

import { Labels, LabelMatcher } from "../labels";

// =============================================================================
// ルール
// =============================================================================

/** 比較演算子 */
export const COMPARISON_OPERATORS = [">", ">=", "<", "<=", "==", "!="] as const;

export type ComparisonOperator = (typeof COMPARISON_OPERATORS)[number];

/** 重大度 */
export const SEVERITIES = ["critical", "warning", "info"] as const;

export type Severity = (typeof SEVERITIES)[number];

/**
 * 読み込み済みのアラートルール（読み込み後は不変）
 */
export interface Rule {
  /** ルール識別子（省略時は name） */
  readonly id: string;
  readonly name: string;
  /** メトリクスソースに渡すクエリ式（エンジンは解釈しない） */
  readonly expr: string;
  readonly operator: ComparisonOperator;
  readonly threshold: number;
  /** 評価間隔（ミリ秒） */
  readonly intervalMs: number;
  /** 発火までに必要な継続違反時間（ミリ秒） */
  readonly forMs: number;
  /** 生成されるアラートに付与するラベル */
  readonly labels: Labels;
  /** summary / description などの注釈テンプレート */
  readonly annotations: Readonly<Record<string, string>>;
  readonly severity: Severity;
  /** グルーピングキーとなるラベル名（空ならルール内で1グループ） */
  readonly groupBy: readonly string[];
  /** 明示的なレシーバー（省略時はルーティングで決定） */
  readonly receiver?: string;
}

// =============================================================================
// 抑制・ルーティング
// =============================================================================

/**
 * 抑制ルール: source に一致する発火中アラートがある間、target に一致するアラートの通知を止める
 */
export interface InhibitRule {
  readonly sourceMatchers: readonly LabelMatcher[];
  readonly targetMatchers: readonly LabelMatcher[];
  /** source と target で値が一致している必要があるラベル */
  readonly equal: readonly string[];
}

/**
 * ルーティング: アラートのラベルがマッチすればこのレシーバーへ送る
 */
export interface Route {
  readonly matchers: readonly LabelMatcher[];
  readonly receiver: string;
  /** 一致後も後続ルートの評価を続けるか */
  readonly continue: boolean;
}

// =============================================================================
// 読み込み結果
// =============================================================================

/**
 * 拒否された定義の診断情報
 */
export interface RuleDiagnostic {
  /** "rules[2]" のような定義位置 */
  readonly location: string;
  /** ルール名（判明している場合） */
  readonly name?: string;
  readonly message: string;
}

/**
 * ある時点のルールセット（アトミックに差し替えられる）
 */
export interface RuleSetSnapshot {
  readonly version: number;
  readonly loadedAt: number;
  readonly source: string;
  readonly rules: readonly Rule[];
  readonly inhibitRules: readonly InhibitRule[];
  readonly routes: readonly Route[];
  readonly diagnostics: readonly RuleDiagnostic[];
}

/**
 * リロード結果
 */
export interface ReloadResult {
  readonly version: number;
  readonly accepted: readonly string[];
  readonly rejected: readonly RuleDiagnostic[];
  readonly added: readonly string[];
  readonly removed: readonly string[];
  readonly updated: readonly string[];
}
