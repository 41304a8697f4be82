/**
 * アラート状態機械
 *
 * (ルール, ラベルセット) ごとに1つのインスタンスを持ち、評価結果から
 * 「for」期間のセマンティクスで状態を遷移させる。
 *
 * - INACTIVE → PENDING: 違反を観測（activeSince = now）
 * - PENDING → FIRING: 違反が継続し now - activeSince >= for
 * - PENDING → INACTIVE: for に達する前に非違反を観測（途中経過は持ち越さない）
 * - FIRING → FIRING: 違反が継続（値を更新）
 * - FIRING → RESOLVED: 非違反を観測（resolvedAt = now）
 * - RESOLVED → 破棄: 次の評価サイクルで破棄
 *
 * applyEvaluation は同期処理なので、1ルールの評価はイベントループ上で不可分に適用される
 */

import { logger } from "../logger";
import { StateInconsistencyError } from "../errors";
import { BreachSet, Breach } from "../evaluator/ruleEvaluator";
import { Rule } from "../rules/types";
import { expandAnnotations } from "../utils/template";
import { AlertSnapshot, AlertState, AlertTransition, TransitionKind } from "./types";

// =============================================================================
// 型定義
// =============================================================================

/**
 * 状態機械内部の可変レコード
 */
interface AlertRecord {
  key: string;
  ruleId: string;
  ruleName: string;
  labels: AlertSnapshot["labels"];
  fingerprint: string;
  state: AlertState;
  severity: AlertSnapshot["severity"];
  annotations: AlertSnapshot["annotations"];
  activeSince: number;
  firedAt: number | null;
  resolvedAt: number | null;
  lastValue: number;
  lastEvaluatedAt: number;
  receiver?: string;
  groupBy: readonly string[];
}

/**
 * 不整合検出時の通知先
 */
export type InconsistencyHandler = (error: StateInconsistencyError) => void;

export interface AlertStateMachineOptions {
  onInconsistency?: InconsistencyHandler;
}

// =============================================================================
// ヘルパー
// =============================================================================

/**
 * インスタンスキー。ruleId は JSON 文字列にして境界を一意にする
 */
export function instanceKey(ruleId: string, fingerprint: string): string {
  return `${JSON.stringify(ruleId)}${fingerprint}`;
}

function snapshot(record: AlertRecord): AlertSnapshot {
  return Object.freeze({ ...record });
}

/**
 * 状態とタイムスタンプの組み合わせを検査する
 * @throws {StateInconsistencyError}
 */
function assertConsistent(record: AlertRecord): void {
  const problem = (() => {
    switch (record.state) {
      case "INACTIVE":
        return "inactive instance is still tracked";
      case "PENDING":
        return record.firedAt !== null || record.resolvedAt !== null
          ? "pending instance carries firedAt/resolvedAt"
          : null;
      case "FIRING":
        return record.firedAt === null || record.resolvedAt !== null
          ? "firing instance must have firedAt and no resolvedAt"
          : null;
      case "RESOLVED":
        return record.firedAt === null || record.resolvedAt === null
          ? "resolved instance must have firedAt and resolvedAt"
          : null;
      default:
        return `unknown state ${String(record.state)}`;
    }
  })();

  if (problem !== null) {
    throw new StateInconsistencyError(`Alert state inconsistency: ${problem}`, {
      key: record.key,
      ruleId: record.ruleId,
      labels: record.labels,
      state: record.state,
      activeSince: record.activeSince,
      firedAt: record.firedAt,
      resolvedAt: record.resolvedAt,
    });
  }
}

// =============================================================================
// 状態機械
// =============================================================================

export class AlertStateMachine {
  /** ruleId → (fingerprint → レコード) */
  private readonly rules = new Map<string, Map<string, AlertRecord>>();
  /** ruleId → 最後に適用した評価時刻 */
  private readonly lastApplied = new Map<string, number>();
  private readonly onInconsistency?: InconsistencyHandler;

  constructor(options: AlertStateMachineOptions = {}) {
    this.onInconsistency = options.onInconsistency;
  }

  /**
   * 1回分の評価結果を適用し、発生した遷移を返す
   */
  applyEvaluation(rule: Rule, breaches: BreachSet, now: number): AlertTransition[] {
    const last = this.lastApplied.get(rule.id);
    if (last !== undefined && now < last) {
      logger.warn("Stale evaluation ignored", { ruleId: rule.id, evaluatedAt: now, lastApplied: last });
      return [];
    }
    this.lastApplied.set(rule.id, now);

    let records = this.rules.get(rule.id);
    if (!records) {
      records = new Map();
      this.rules.set(rule.id, records);
    }

    const transitions: AlertTransition[] = [];

    for (const [fp, record] of records) {
      this.guard(records, fp, record, () => {
        if (record.state === "RESOLVED") {
          // 解決済みは1サイクル保持したので破棄
          records.delete(fp);
          transitions.push(this.transition("DISCARDED", record, "RESOLVED", now));
          return;
        }

        const breach = breaches.get(fp);
        if (breach) {
          this.onBreach(rule, record, breach, now, transitions);
        } else {
          this.onClear(records, fp, record, now, transitions);
        }
      });
    }

    for (const [fp, breach] of breaches) {
      if (records.has(fp)) {
        continue;
      }
      const record = this.createRecord(rule, breach, now);
      records.set(fp, record);
      this.guard(records, fp, record, () => {
        transitions.push(this.transition("PENDING", record, "INACTIVE", now));
        this.promoteIfDue(rule, record, now, transitions);
      });
    }

    if (transitions.length > 0) {
      logger.debug("Alert transitions", {
        ruleId: rule.id,
        transitions: transitions.map((t) => `${t.alert.fingerprint}:${t.kind}`),
      });
    }

    return transitions;
  }

  /**
   * ルール削除時: FIRING は RESOLVED を発行してから、全インスタンスを破棄する
   */
  dropRule(ruleId: string, now: number): AlertTransition[] {
    const records = this.rules.get(ruleId);
    this.rules.delete(ruleId);
    this.lastApplied.delete(ruleId);
    if (!records) {
      return [];
    }

    const transitions: AlertTransition[] = [];
    for (const record of records.values()) {
      switch (record.state) {
        case "FIRING":
          record.state = "RESOLVED";
          record.resolvedAt = now;
          transitions.push(this.transition("RESOLVED", record, "FIRING", now));
          break;
        case "PENDING":
          record.state = "INACTIVE";
          transitions.push(this.transition("RESET", record, "PENDING", now));
          break;
        default:
          break;
      }
    }

    logger.info("Rule state dropped", { ruleId, instanceCount: records.size });
    return transitions;
  }

  /**
   * ルール定義の変更を既存インスタンスに反映する（状態は維持）
   */
  updateRule(rule: Rule): void {
    const records = this.rules.get(rule.id);
    if (!records) {
      return;
    }
    for (const record of records.values()) {
      record.ruleName = rule.name;
      record.severity = rule.severity;
      record.receiver = rule.receiver;
      record.groupBy = rule.groupBy;
    }
  }

  // ===========================================================================
  // 参照
  // ===========================================================================

  get(ruleId: string, fp: string): AlertSnapshot | undefined {
    const record = this.rules.get(ruleId)?.get(fp);
    return record ? snapshot(record) : undefined;
  }

  list(filter?: { state?: AlertState; ruleId?: string }): AlertSnapshot[] {
    const result: AlertSnapshot[] = [];
    for (const [ruleId, records] of this.rules) {
      if (filter?.ruleId !== undefined && filter.ruleId !== ruleId) {
        continue;
      }
      for (const record of records.values()) {
        if (filter?.state === undefined || filter.state === record.state) {
          result.push(snapshot(record));
        }
      }
    }
    return result;
  }

  /**
   * 現在 FIRING のインスタンス（抑制ルールの評価に使う）
   */
  firing(): AlertSnapshot[] {
    return this.list({ state: "FIRING" });
  }

  size(): number {
    let count = 0;
    for (const records of this.rules.values()) {
      count += records.size;
    }
    return count;
  }

  // ===========================================================================
  // 遷移
  // ===========================================================================

  private onBreach(
    rule: Rule,
    record: AlertRecord,
    breach: Breach,
    now: number,
    transitions: AlertTransition[]
  ): void {
    record.lastValue = breach.value;
    record.lastEvaluatedAt = now;
    record.annotations = expandAnnotations(rule.annotations, { labels: record.labels, value: breach.value });

    switch (record.state) {
      case "PENDING":
        this.promoteIfDue(rule, record, now, transitions);
        break;
      case "FIRING":
        transitions.push(this.transition("REFRESHED", record, "FIRING", now));
        break;
      default:
        throw new StateInconsistencyError(`Unexpected state ${record.state} on breach`, {
          key: record.key,
          state: record.state,
        });
    }
  }

  private onClear(
    records: Map<string, AlertRecord>,
    fp: string,
    record: AlertRecord,
    now: number,
    transitions: AlertTransition[]
  ): void {
    record.lastEvaluatedAt = now;

    switch (record.state) {
      case "PENDING":
        record.state = "INACTIVE";
        records.delete(fp);
        transitions.push(this.transition("RESET", record, "PENDING", now));
        break;
      case "FIRING":
        record.state = "RESOLVED";
        record.resolvedAt = now;
        assertConsistent(record);
        transitions.push(this.transition("RESOLVED", record, "FIRING", now));
        break;
      default:
        throw new StateInconsistencyError(`Unexpected state ${record.state} on clear`, {
          key: record.key,
          state: record.state,
        });
    }
  }

  private promoteIfDue(rule: Rule, record: AlertRecord, now: number, transitions: AlertTransition[]): void {
    if (record.state !== "PENDING" || now - record.activeSince < rule.forMs) {
      return;
    }
    record.state = "FIRING";
    record.firedAt = now;
    assertConsistent(record);
    transitions.push(this.transition("FIRED", record, "PENDING", now));
  }

  private createRecord(rule: Rule, breach: Breach, now: number): AlertRecord {
    const record: AlertRecord = {
      key: instanceKey(rule.id, breach.fingerprint),
      ruleId: rule.id,
      ruleName: rule.name,
      labels: breach.labels,
      fingerprint: breach.fingerprint,
      state: "PENDING",
      severity: rule.severity,
      annotations: expandAnnotations(rule.annotations, { labels: breach.labels, value: breach.value }),
      activeSince: now,
      firedAt: null,
      resolvedAt: null,
      lastValue: breach.value,
      lastEvaluatedAt: now,
      receiver: rule.receiver,
      groupBy: rule.groupBy,
    };
    assertConsistent(record);
    return record;
  }

  private transition(kind: TransitionKind, record: AlertRecord, from: AlertState, at: number): AlertTransition {
    return { kind, from, to: record.state, at, alert: snapshot(record) };
  }

  /**
   * 1インスタンス分の処理を実行し、不整合ならそのインスタンスだけ追跡をやめる
   */
  private guard(records: Map<string, AlertRecord>, fp: string, record: AlertRecord, fn: () => void): void {
    try {
      fn();
    } catch (error) {
      if (!(error instanceof StateInconsistencyError)) {
        throw error;
      }
      records.delete(fp);
      logger.error("Alert instance tracking dropped", {
        error,
        details: error.details,
        ruleId: record.ruleId,
        fingerprint: fp,
      });
      this.onInconsistency?.(error);
    }
  }
}
