/**
 * グルーピング - 型定義
 */

import { Labels } from "../labels";
import { AlertSnapshot } from "../alerts/types";
import { Severity } from "../rules/types";

/**
 * グループ通知の種類
 *
 * - firing: グループ初回の通知（グルーピング待機後）
 * - update: 初回通知後にメンバーが増減した
 * - resolved: 最後の FIRING メンバーが解決した
 * - repeat: メンバー変化なしの再送
 */
export type GroupNotificationKind = "firing" | "update" | "resolved" | "repeat";

export type GroupStatus = "waiting" | "active" | "resolved";

/**
 * 1グループ分の通知内容
 */
export interface GroupNotification {
  readonly groupKey: string;
  readonly receiver: string;
  readonly kind: GroupNotificationKind;
  readonly ruleId: string;
  readonly ruleName: string;
  readonly severity: Severity;
  readonly groupLabels: Labels;
  readonly firing: readonly AlertSnapshot[];
  readonly resolved: readonly AlertSnapshot[];
  readonly at: number;
}

/**
 * 管理API向けのグループ表現
 */
export interface AlertGroupView {
  key: string;
  receiver: string;
  ruleId: string;
  ruleName: string;
  groupLabels: Labels;
  status: GroupStatus;
  createdAt: string;
  lastNotifiedAt: string | null;
  members: {
    fingerprint: string;
    labels: Labels;
    state: AlertSnapshot["state"];
    lastValue: number;
  }[];
}

export interface GroupTimings {
  /** 新規グループの初回通知までの待機 */
  groupWaitMs: number;
  /** update 通知の最小間隔 */
  groupIntervalMs: number;
  /** メンバー変化なしでの再送間隔 */
  repeatIntervalMs: number;
}
