/**
 * アラート状態 - 型定義
 */

import { Labels } from "../labels";
import { Severity } from "../rules/types";

// =============================================================================
// 状態
// =============================================================================

/**
 * アラートインスタンスの状態
 *
 * INACTIVE → PENDING → FIRING → RESOLVED → (破棄)
 */
export const ALERT_STATES = ["INACTIVE", "PENDING", "FIRING", "RESOLVED"] as const;

export type AlertState = (typeof ALERT_STATES)[number];

// =============================================================================
// インスタンス
// =============================================================================

/**
 * アラートインスタンスの読み取り専用スナップショット
 *
 * (ruleId, labels) で一意。状態機械の外にはこの形でしか渡さない
 */
export interface AlertSnapshot {
  /** ruleId とフィンガープリントから作るキー */
  readonly key: string;
  readonly ruleId: string;
  readonly ruleName: string;
  readonly labels: Labels;
  readonly fingerprint: string;
  readonly state: AlertState;
  readonly severity: Severity;
  /** 展開済みの注釈 */
  readonly annotations: Readonly<Record<string, string>>;
  /** 違反を最初に観測した時刻 */
  readonly activeSince: number;
  /** FIRING に遷移した時刻 */
  readonly firedAt: number | null;
  /** RESOLVED に遷移した時刻 */
  readonly resolvedAt: number | null;
  /** 最後に評価した値 */
  readonly lastValue: number;
  readonly lastEvaluatedAt: number;
  /** ルールに明示されたレシーバー */
  readonly receiver?: string;
  /** ルールのグルーピングキー */
  readonly groupBy: readonly string[];
}

// =============================================================================
// 遷移
// =============================================================================

/**
 * 遷移の種類
 */
export type TransitionKind =
  | "PENDING" // INACTIVE → PENDING
  | "FIRED" // PENDING → FIRING
  | "REFRESHED" // FIRING → FIRING
  | "RESET" // PENDING → INACTIVE
  | "RESOLVED" // FIRING → RESOLVED
  | "DISCARDED"; // RESOLVED → 破棄

export interface AlertTransition {
  readonly kind: TransitionKind;
  readonly from: AlertState;
  readonly to: AlertState;
  readonly at: number;
  readonly alert: AlertSnapshot;
}

const NOTIFIABLE_KINDS: ReadonlySet<TransitionKind> = new Set<TransitionKind>(["FIRED", "REFRESHED", "RESOLVED"]);

/**
 * 通知パイプラインに流す遷移か
 */
export function isNotifiable(transition: AlertTransition): boolean {
  return NOTIFIABLE_KINDS.has(transition.kind);
}
