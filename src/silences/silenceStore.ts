/**
 * サイレンス・抑制ストア
 *
 * 通知直前に「このアラートは抑止されているか」を判定する。
 * 判定は毎回その時点の now で行い、結果はキャッシュしない。
 * サイレンス一覧・抑制ルールは不変配列で保持し、書き込み時は
 * 新しい配列に丸ごと差し替える（読み手が途中状態を見ることはない）
 */

import { v4 as uuidv4 } from "uuid";
import { logger } from "../logger";
import { NotFoundError, ValidationError, errorMessage } from "../errors";
import {
  Labels,
  LabelMatcher,
  compileMatcher,
  parseMatcher,
  matchesAll,
  matcherToInput,
  LabelMatcherInput,
} from "../labels";
import { AlertSnapshot } from "../alerts/types";
import { InhibitRule } from "../rules/types";
import { parseDuration } from "../rules/duration";
import { SilenceCreateSchema } from "../schemas";

// =============================================================================
// 型定義
// =============================================================================

export type SilenceStatus = "PENDING" | "ACTIVE" | "EXPIRED";

export interface Silence {
  readonly id: string;
  readonly matchers: readonly LabelMatcher[];
  readonly startsAt: number;
  readonly endsAt: number;
  readonly createdBy: string;
  readonly comment: string;
  readonly createdAt: number;
  readonly updatedAt: number;
}

/**
 * API 応答用の表現
 */
export interface SilenceView {
  id: string;
  matchers: Required<LabelMatcherInput>[];
  startsAt: string;
  endsAt: string;
  createdBy: string;
  comment: string;
  status: SilenceStatus;
}

/**
 * 抑止理由
 */
export type SuppressionReason =
  | { type: "silence"; silenceId: string }
  | { type: "inhibition"; sourceKey: string };

export interface SilenceStoreOptions {
  /** 現在 FIRING のインスタンス（抑制ルールの source 候補） */
  firingAlerts: () => readonly AlertSnapshot[];
  /** 期限切れサイレンスを保持する期間 */
  retentionMs?: number;
  generateId?: () => string;
}

// =============================================================================
// ヘルパー
// =============================================================================

export function silenceStatus(silence: Silence, now: number): SilenceStatus {
  if (now < silence.startsAt) {
    return "PENDING";
  }
  return now < silence.endsAt ? "ACTIVE" : "EXPIRED";
}

function toView(silence: Silence, now: number): SilenceView {
  return {
    id: silence.id,
    matchers: silence.matchers.map(matcherToInput),
    startsAt: new Date(silence.startsAt).toISOString(),
    endsAt: new Date(silence.endsAt).toISOString(),
    createdBy: silence.createdBy,
    comment: silence.comment,
    status: silenceStatus(silence, now),
  };
}

function equalLabelsMatch(equal: readonly string[], source: Labels, target: Labels): boolean {
  return equal.every((name) => (source[name] ?? "") === (target[name] ?? ""));
}

// =============================================================================
// ストア
// =============================================================================

export class SilenceStore {
  private silences: readonly Silence[] = Object.freeze([]);
  private inhibitRules: readonly InhibitRule[] = Object.freeze([]);
  private readonly firingAlerts: () => readonly AlertSnapshot[];
  private readonly retentionMs: number;
  private readonly generateId: () => string;

  constructor(options: SilenceStoreOptions) {
    this.firingAlerts = options.firingAlerts;
    this.retentionMs = options.retentionMs ?? 5 * 24 * 60 * 60 * 1000;
    this.generateId = options.generateId ?? uuidv4;
  }

  // ===========================================================================
  // 管理操作
  // ===========================================================================

  /**
   * サイレンスを作成する
   * @throws {ValidationError} 入力が不正な場合
   */
  createSilence(input: unknown, now: number = Date.now()): Silence {
    const parsed = SilenceCreateSchema.safeParse(input);
    if (!parsed.success) {
      throw ValidationError.fromZodError(parsed.error);
    }
    const data = parsed.data;

    const matchers: LabelMatcher[] = [];
    const errors: { field: string; message: string }[] = [];
    data.matchers.forEach((matcher, index) => {
      try {
        matchers.push(typeof matcher === "string" ? parseMatcher(matcher) : compileMatcher(matcher));
      } catch (error) {
        errors.push({ field: `matchers.${index}`, message: errorMessage(error) });
      }
    });

    const startsAt = data.startsAt ?? now;
    let endsAt = data.endsAt;
    if (endsAt === undefined && data.duration !== undefined) {
      const durationMs = parseDuration(data.duration);
      if (durationMs === null) {
        errors.push({ field: "duration", message: "invalid duration" });
      } else {
        endsAt = startsAt + durationMs;
      }
    }
    if (endsAt !== undefined && endsAt <= startsAt) {
      errors.push({ field: "endsAt", message: "endsAt must be after startsAt" });
    }
    if (endsAt !== undefined && endsAt <= now) {
      errors.push({ field: "endsAt", message: "endsAt must be in the future" });
    }
    if (errors.length > 0 || endsAt === undefined) {
      throw new ValidationError(errors);
    }

    const silence: Silence = Object.freeze({
      id: this.generateId(),
      matchers: Object.freeze(matchers),
      startsAt,
      endsAt,
      createdBy: data.createdBy,
      comment: data.comment,
      createdAt: now,
      updatedAt: now,
    });

    this.silences = Object.freeze([...this.silences, silence]);

    logger.info("Silence created", {
      silenceId: silence.id,
      createdBy: silence.createdBy,
      startsAt: new Date(startsAt).toISOString(),
      endsAt: new Date(endsAt).toISOString(),
    });
    return silence;
  }

  getSilence(id: string): Silence | undefined {
    return this.silences.find((silence) => silence.id === id);
  }

  listSilences(now: number = Date.now()): SilenceView[] {
    return this.silences.map((silence) => toView(silence, now));
  }

  view(silence: Silence, now: number = Date.now()): SilenceView {
    return toView(silence, now);
  }

  /**
   * サイレンスを失効させる（削除操作）。期限切れのものはそのまま返す
   * @throws {NotFoundError}
   */
  expireSilence(id: string, now: number = Date.now()): Silence {
    const existing = this.getSilence(id);
    if (!existing) {
      throw new NotFoundError("Silence", id);
    }
    if (silenceStatus(existing, now) === "EXPIRED") {
      return existing;
    }

    const expired: Silence = Object.freeze({
      ...existing,
      startsAt: Math.min(existing.startsAt, now),
      endsAt: now,
      updatedAt: now,
    });
    this.silences = Object.freeze(this.silences.map((s) => (s.id === id ? expired : s)));

    logger.info("Silence expired", { silenceId: id });
    return expired;
  }

  /**
   * 保持期間を過ぎた期限切れサイレンスを削除する
   */
  gc(now: number = Date.now()): number {
    const kept = this.silences.filter((silence) => now - silence.endsAt < this.retentionMs);
    const removed = this.silences.length - kept.length;
    if (removed > 0) {
      this.silences = Object.freeze(kept);
      logger.debug("Expired silences removed", { removed });
    }
    return removed;
  }

  setInhibitRules(rules: readonly InhibitRule[]): void {
    this.inhibitRules = Object.freeze([...rules]);
  }

  // ===========================================================================
  // 判定
  // ===========================================================================

  /**
   * アラートの通知が抑止されているか
   */
  isSuppressed(alert: AlertSnapshot, now: number): boolean {
    return this.suppressionReason(alert, now) !== null;
  }

  /**
   * 抑止理由を返す（抑止されていなければ null）
   *
   * 抑制は FIRING のインスタンスに対する1段の参照のみで、推移的には辿らない
   */
  suppressionReason(alert: AlertSnapshot, now: number): SuppressionReason | null {
    const silences = this.silences;
    for (const silence of silences) {
      if (silenceStatus(silence, now) === "ACTIVE" && matchesAll(silence.matchers, alert.labels)) {
        return { type: "silence", silenceId: silence.id };
      }
    }

    const rules = this.inhibitRules;
    const targeted = rules.filter((rule) => matchesAll(rule.targetMatchers, alert.labels));
    if (targeted.length === 0) {
      return null;
    }

    const firing = this.firingAlerts();
    for (const rule of targeted) {
      for (const source of firing) {
        if (source.key === alert.key) {
          continue;
        }
        if (
          matchesAll(rule.sourceMatchers, source.labels) &&
          equalLabelsMatch(rule.equal, source.labels, alert.labels)
        ) {
          return { type: "inhibition", sourceKey: source.key };
        }
      }
    }
    return null;
  }
}
