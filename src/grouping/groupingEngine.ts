/**
 * グルーピング・重複排除エンジン
 *
 * FIRING / RESOLVED の遷移を (レシーバー, ルール, groupBy で射影したラベル) ごとの
 * グループにまとめ、グループ単位で通知を出す。
 *
 * タイミング:
 * - groupWait: 新規グループは待機後にまとめて初回通知
 * - groupInterval: メンバー変化による update 通知の最小間隔
 * - repeatInterval: 変化がなくても FIRING が続く限りこの間隔で再送
 *
 * 抑止判定は flush 時にメンバーごとに行い、結果は保持しない
 */

import { logger } from "../logger";
import { Labels, fingerprint, projectLabels } from "../labels";
import { AlertSnapshot, AlertTransition } from "../alerts/types";
import { AlertGroupView, GroupNotification, GroupNotificationKind, GroupStatus, GroupTimings } from "./types";

// =============================================================================
// 型定義
// =============================================================================

interface AlertGroup {
  key: string;
  receiver: string;
  ruleId: string;
  ruleName: string;
  groupLabels: Labels;
  /** alert.key → 最新スナップショット */
  members: Map<string, AlertSnapshot>;
  createdAt: number;
  lastNotifiedAt: number | null;
  /** 最後に通知したメンバー構成 */
  notifiedDigest: string;
}

export type ReceiverResolver = (alert: AlertSnapshot) => readonly string[];

export type SuppressionCheck = (alert: AlertSnapshot, now: number) => boolean;

export interface GroupingEngineOptions extends GroupTimings {
  resolveReceivers: ReceiverResolver;
}

// =============================================================================
// ヘルパー
// =============================================================================

export function groupKey(receiver: string, alert: AlertSnapshot): string {
  return `${receiver}:${alert.ruleId}:${fingerprint(projectLabels(alert.labels, alert.groupBy))}`;
}

function byFingerprint(a: AlertSnapshot, b: AlertSnapshot): number {
  return a.fingerprint < b.fingerprint ? -1 : a.fingerprint > b.fingerprint ? 1 : 0;
}

function digest(firing: readonly AlertSnapshot[], resolved: readonly AlertSnapshot[]): string {
  if (firing.length === 0 && resolved.length === 0) {
    return "";
  }
  const keys = (alerts: readonly AlertSnapshot[]) => alerts.map((a) => a.key).sort().join(",");
  return `${keys(firing)}|${keys(resolved)}`;
}

// =============================================================================
// エンジン
// =============================================================================

export class GroupingEngine {
  private readonly groups = new Map<string, AlertGroup>();
  /** alert.key → 所属グループキー */
  private readonly memberIndex = new Map<string, Set<string>>();
  private readonly timings: GroupTimings;
  private readonly resolveReceivers: ReceiverResolver;

  constructor(options: GroupingEngineOptions) {
    this.timings = {
      groupWaitMs: options.groupWaitMs,
      groupIntervalMs: options.groupIntervalMs,
      repeatIntervalMs: options.repeatIntervalMs,
    };
    this.resolveReceivers = options.resolveReceivers;
  }

  /**
   * 遷移をグループに取り込む
   *
   * FIRING はグループに追加・更新し、RESOLVED は既に所属しているグループだけを更新する。
   * レシーバーや groupBy が変わった FIRING は以前のグループから外す
   */
  ingest(transitions: readonly AlertTransition[], now: number): void {
    for (const transition of transitions) {
      const alert = transition.alert;

      if (alert.state === "FIRING") {
        const current = new Set<string>();
        for (const receiver of this.resolveReceivers(alert)) {
          const group = this.getOrCreateGroup(receiver, alert, now);
          group.members.set(alert.key, alert);
          this.index(alert.key, group.key);
          current.add(group.key);
        }
        this.detachStale(alert.key, current);
        continue;
      }

      if (alert.state === "RESOLVED") {
        const keys = this.memberIndex.get(alert.key);
        if (!keys || keys.size === 0) {
          logger.debug("Resolved alert not in any group, ignoring", { key: alert.key });
          continue;
        }
        for (const key of keys) {
          this.groups.get(key)?.members.set(alert.key, alert);
        }
      }
    }
  }

  /**
   * グループ内の FIRING メンバーを状態機械の現在の状態に合わせる
   *
   * lookup が FIRING 以外を返したメンバーは RESOLVED として扱う。
   * インスタンスが既に無い場合は now で解決したスナップショットに置き換える
   */
  reconcile(lookup: (alert: AlertSnapshot) => AlertSnapshot | undefined, now: number): number {
    let resolvedCount = 0;

    for (const group of this.groups.values()) {
      for (const member of [...group.members.values()]) {
        if (member.state !== "FIRING") {
          continue;
        }
        const current = lookup(member);
        if (current?.state === "FIRING") {
          continue;
        }
        const gone: AlertSnapshot = { ...member, state: "RESOLVED", resolvedAt: now };
        group.members.set(member.key, current?.state === "RESOLVED" ? current : Object.freeze(gone));
        resolvedCount++;
        logger.warn("Group member no longer firing, marking resolved", {
          groupKey: group.key,
          key: member.key,
          state: current?.state ?? null,
        });
      }
    }

    return resolvedCount;
  }

  /**
   * 送信時期に達したグループの通知を返す
   */
  flush(now: number, isSuppressed: SuppressionCheck): GroupNotification[] {
    const notifications: GroupNotification[] = [];

    for (const group of [...this.groups.values()]) {
      const members = [...group.members.values()];
      const visible = members.filter((alert) => !isSuppressed(alert, now));
      const firing = visible.filter((a) => a.state === "FIRING").sort(byFingerprint);
      const resolved = visible.filter((a) => a.state === "RESOLVED").sort(byFingerprint);

      const kind = this.dueKind(group, firing, resolved, now);
      if (kind !== null) {
        notifications.push({
          groupKey: group.key,
          receiver: group.receiver,
          kind,
          ruleId: group.ruleId,
          ruleName: group.ruleName,
          severity: (firing[0] ?? resolved[0] ?? members[0]).severity,
          groupLabels: group.groupLabels,
          firing,
          resolved,
          at: now,
        });
        group.lastNotifiedAt = now;
        group.notifiedDigest = digest(firing, []);
      } else if (group.lastNotifiedAt !== null && firing.length === 0 && resolved.length === 0) {
        // 全メンバーが抑止中: 抑止が解けたら通知を再開する
        group.notifiedDigest = "";
      }

      // 解決済みメンバーは1回だけ通知して外す（未通知グループ・抑止中のものはそのまま外す）
      const visibleKeys = new Set(visible.map((a) => a.key));
      for (const alert of members) {
        if (alert.state !== "RESOLVED") {
          continue;
        }
        if (kind !== null || group.lastNotifiedAt === null || !visibleKeys.has(alert.key)) {
          this.removeMember(group, alert.key);
        }
      }

      if (group.members.size === 0) {
        this.deleteGroup(group);
      }
    }

    if (notifications.length > 0) {
      logger.debug("Group notifications due", {
        notifications: notifications.map((n) => `${n.groupKey}:${n.kind}`),
      });
    }

    return notifications;
  }

  /**
   * 管理API向けのスナップショット
   */
  list(): AlertGroupView[] {
    return [...this.groups.values()].map((group) => {
      const members = [...group.members.values()].sort(byFingerprint);
      const status: GroupStatus =
        group.lastNotifiedAt === null
          ? "waiting"
          : members.some((m) => m.state === "FIRING")
            ? "active"
            : "resolved";
      return {
        key: group.key,
        receiver: group.receiver,
        ruleId: group.ruleId,
        ruleName: group.ruleName,
        groupLabels: group.groupLabels,
        status,
        createdAt: new Date(group.createdAt).toISOString(),
        lastNotifiedAt: group.lastNotifiedAt === null ? null : new Date(group.lastNotifiedAt).toISOString(),
        members: members.map((m) => ({
          fingerprint: m.fingerprint,
          labels: m.labels,
          state: m.state,
          lastValue: m.lastValue,
        })),
      };
    });
  }

  get size(): number {
    return this.groups.size;
  }

  // ===========================================================================
  // 内部処理
  // ===========================================================================

  private dueKind(
    group: AlertGroup,
    firing: readonly AlertSnapshot[],
    resolved: readonly AlertSnapshot[],
    now: number
  ): GroupNotificationKind | null {
    if (group.lastNotifiedAt === null) {
      if (firing.length === 0 || now - group.createdAt < this.timings.groupWaitMs) {
        return null;
      }
      return "firing";
    }

    if (firing.length === 0 && resolved.length === 0) {
      return null;
    }

    const sinceLast = now - group.lastNotifiedAt;
    if (digest(firing, resolved) !== group.notifiedDigest) {
      if (sinceLast < this.timings.groupIntervalMs) {
        return null;
      }
      return firing.length === 0 ? "resolved" : "update";
    }

    if (firing.length > 0 && sinceLast >= this.timings.repeatIntervalMs) {
      return "repeat";
    }
    return null;
  }

  private getOrCreateGroup(receiver: string, alert: AlertSnapshot, now: number): AlertGroup {
    const key = groupKey(receiver, alert);
    const existing = this.groups.get(key);
    if (existing) {
      existing.ruleName = alert.ruleName;
      return existing;
    }

    const group: AlertGroup = {
      key,
      receiver,
      ruleId: alert.ruleId,
      ruleName: alert.ruleName,
      groupLabels: projectLabels(alert.labels, alert.groupBy),
      members: new Map(),
      createdAt: now,
      lastNotifiedAt: null,
      notifiedDigest: "",
    };
    this.groups.set(key, group);
    logger.debug("Alert group created", { groupKey: key, receiver });
    return group;
  }

  private index(alertKey: string, key: string): void {
    let keys = this.memberIndex.get(alertKey);
    if (!keys) {
      keys = new Set();
      this.memberIndex.set(alertKey, keys);
    }
    keys.add(key);
  }

  private removeMember(group: AlertGroup, alertKey: string): void {
    group.members.delete(alertKey);
    const keys = this.memberIndex.get(alertKey);
    if (keys) {
      keys.delete(group.key);
      if (keys.size === 0) {
        this.memberIndex.delete(alertKey);
      }
    }
  }

  private detachStale(alertKey: string, current: ReadonlySet<string>): void {
    const keys = this.memberIndex.get(alertKey);
    if (!keys) {
      return;
    }
    for (const key of [...keys]) {
      if (current.has(key)) {
        continue;
      }
      const group = this.groups.get(key);
      if (!group) {
        keys.delete(key);
        continue;
      }
      this.removeMember(group, alertKey);
      logger.info("Alert moved out of group", { groupKey: key, key: alertKey });
      if (group.members.size === 0) {
        this.deleteGroup(group);
      }
    }
  }

  private deleteGroup(group: AlertGroup): void {
    for (const alertKey of [...group.members.keys()]) {
      this.removeMember(group, alertKey);
    }
    this.groups.delete(group.key);
    logger.debug("Alert group deleted", { groupKey: group.key });
  }
}
