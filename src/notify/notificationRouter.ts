/**
 * 通知ルーター
 *
 * - アラートからレシーバーを決定する（ルール指定 → ルート → デフォルト）
 * - グループ通知をレンダリングして送信待ち（アウトボックス）に積む
 * - 送信時期に達したものを非同期で送信し、失敗時は次回試行時刻を設定する
 *
 * 送信は待たない（processDue は送信を開始するだけ）。
 * 評価ループがトランスポートの遅延でブロックされることはない
 */

import { v4 as uuidv4 } from "uuid";
import { logger } from "../logger";
import { DispatchError, errorMessage } from "../errors";
import { matchesAll } from "../labels";
import { AlertSnapshot } from "../alerts/types";
import { GroupNotification, GroupNotificationKind } from "../grouping/types";
import { Route } from "../rules/types";
import { DEFAULT_RETRY_CONFIG, RetryConfig, computeBackoffDelayMs } from "../utils/retry";
import { renderNotification } from "./renderer";
import {
  DeliveryFailure,
  DeliveryRecord,
  DeliveryResult,
  NotificationTransport,
  RenderedMessage,
} from "./types";

// =============================================================================
// 型定義
// =============================================================================

interface OutboxEntry {
  id: string;
  groupKey: string;
  receiver: string;
  kind: GroupNotificationKind;
  message: RenderedMessage;
  attempts: number;
  nextAttemptAt: number;
  failedAttempts: string[];
  inFlight: boolean;
  createdAt: number;
}

/**
 * 送信待ちの表現（ヘルスビュー用）
 */
export interface OutboxView {
  id: string;
  groupKey: string;
  receiver: string;
  kind: GroupNotificationKind;
  attempts: number;
  nextAttemptAt: string;
  failedAttempts: string[];
  inFlight: boolean;
}

export interface NotificationRouterOptions {
  /** レシーバー名 → トランスポート */
  transports: Readonly<Record<string, NotificationTransport>>;
  defaultReceiver: string;
  routes?: readonly Route[];
  retry?: Partial<RetryConfig>;
  clock?: () => number;
  /** 保持する配信履歴・失敗履歴の件数 */
  historyLimit?: number;
  onDeliveryFailed?: (failure: DeliveryFailure, error: DispatchError) => void;
  generateId?: () => string;
}

// =============================================================================
// ルーター
// =============================================================================

export class NotificationRouter {
  private readonly transports: Readonly<Record<string, NotificationTransport>>;
  private readonly defaultReceiver: string;
  private readonly retry: RetryConfig;
  private readonly clock: () => number;
  private readonly historyLimit: number;
  private readonly onDeliveryFailed?: (failure: DeliveryFailure, error: DispatchError) => void;
  private readonly generateId: () => string;

  private routes: readonly Route[];
  private outbox: OutboxEntry[] = [];
  private readonly inFlight = new Set<Promise<void>>();
  private readonly delivered: DeliveryRecord[] = [];
  private readonly failed: DeliveryFailure[] = [];

  constructor(options: NotificationRouterOptions) {
    this.transports = options.transports;
    this.defaultReceiver = options.defaultReceiver;
    this.routes = options.routes ?? [];
    this.retry = { ...DEFAULT_RETRY_CONFIG, ...options.retry };
    this.clock = options.clock ?? Date.now;
    this.historyLimit = options.historyLimit ?? 100;
    this.onDeliveryFailed = options.onDeliveryFailed;
    this.generateId = options.generateId ?? uuidv4;
  }

  // ===========================================================================
  // ルーティング
  // ===========================================================================

  setRoutes(routes: readonly Route[]): void {
    this.routes = routes;
  }

  /**
   * アラートの送信先レシーバーを決定する
   *
   * ルールの receiver が最優先。次にルートを順に評価し、continue でない一致で打ち切る。
   * どれにも一致しなければデフォルトレシーバー
   */
  receiversFor(alert: AlertSnapshot): string[] {
    if (alert.receiver !== undefined) {
      return [alert.receiver];
    }

    const receivers: string[] = [];
    for (const route of this.routes) {
      if (!matchesAll(route.matchers, alert.labels)) {
        continue;
      }
      if (!receivers.includes(route.receiver)) {
        receivers.push(route.receiver);
      }
      if (!route.continue) {
        break;
      }
    }
    return receivers.length > 0 ? receivers : [this.defaultReceiver];
  }

  // ===========================================================================
  // アウトボックス
  // ===========================================================================

  /**
   * グループ通知をレンダリングして送信待ちに積む
   */
  enqueue(notifications: readonly GroupNotification[], now: number): void {
    for (const notification of notifications) {
      this.outbox.push({
        id: this.generateId(),
        groupKey: notification.groupKey,
        receiver: notification.receiver,
        kind: notification.kind,
        message: renderNotification(notification),
        attempts: 0,
        nextAttemptAt: now,
        failedAttempts: [],
        inFlight: false,
        createdAt: now,
      });
    }
  }

  /**
   * 送信時期に達したエントリの送信を開始する。開始した件数を返す
   */
  processDue(now: number): number {
    let started = 0;
    for (const entry of this.outbox) {
      if (entry.inFlight || entry.nextAttemptAt > now) {
        continue;
      }
      this.start(entry);
      started++;
    }
    return started;
  }

  /**
   * 送信中のものがすべて完了するまで待つ（停止時・テスト用）
   */
  async idle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  pending(): OutboxView[] {
    return this.outbox.map((entry) => ({
      id: entry.id,
      groupKey: entry.groupKey,
      receiver: entry.receiver,
      kind: entry.kind,
      attempts: entry.attempts,
      nextAttemptAt: new Date(entry.nextAttemptAt).toISOString(),
      failedAttempts: [...entry.failedAttempts],
      inFlight: entry.inFlight,
    }));
  }

  deliveries(): DeliveryRecord[] {
    return [...this.delivered];
  }

  failures(): DeliveryFailure[] {
    return [...this.failed];
  }

  // ===========================================================================
  // 送信
  // ===========================================================================

  private start(entry: OutboxEntry): void {
    entry.inFlight = true;
    entry.attempts++;

    const transport = this.transports[entry.receiver];
    if (!transport) {
      entry.failedAttempts.push(`unknown receiver "${entry.receiver}"`);
      this.giveUp(entry, false);
      return;
    }

    const task = transport
      .send(entry.receiver, entry.message)
      .catch((error: unknown): DeliveryResult => ({ ok: false, reason: errorMessage(error) }))
      .then((result) => this.complete(entry, result))
      .catch((error: unknown) => {
        entry.inFlight = false;
        logger.error("Notification completion handling failed", { error, notificationId: entry.id });
      })
      .finally(() => {
        this.inFlight.delete(task);
      });

    this.inFlight.add(task);
  }

  private complete(entry: OutboxEntry, result: DeliveryResult): void {
    entry.inFlight = false;

    if (result.ok) {
      this.remove(entry);
      this.record(this.delivered, {
        notificationId: entry.id,
        groupKey: entry.groupKey,
        receiver: entry.receiver,
        kind: entry.kind,
        attempts: entry.attempts,
        failedAttempts: [...entry.failedAttempts],
        deliveredAt: new Date(this.clock()).toISOString(),
      });
      logger.info("Notification delivered", {
        notificationId: entry.id,
        groupKey: entry.groupKey,
        receiver: entry.receiver,
        kind: entry.kind,
        attempts: entry.attempts,
      });
      return;
    }

    entry.failedAttempts.push(result.reason);

    if (entry.attempts >= this.retry.maxAttempts) {
      this.giveUp(entry, true);
      return;
    }

    const delayMs = computeBackoffDelayMs(entry.attempts, this.retry);
    entry.nextAttemptAt = this.clock() + delayMs;
    logger.warn("Notification delivery failed, retry scheduled", {
      notificationId: entry.id,
      receiver: entry.receiver,
      attempt: entry.attempts,
      maxAttempts: this.retry.maxAttempts,
      reason: result.reason,
      retryInMs: delayMs,
    });
  }

  /**
   * リトライを打ち切り、配信失敗イベントを出す
   */
  private giveUp(entry: OutboxEntry, retryable: boolean): void {
    entry.inFlight = false;
    this.remove(entry);

    const error = new DispatchError({
      message: `Delivery to "${entry.receiver}" failed after ${entry.attempts} attempt(s): ${entry.failedAttempts.join("; ")}`,
      receiver: entry.receiver,
      attempts: entry.attempts,
      retryable,
    });
    const failure: DeliveryFailure = {
      notificationId: entry.id,
      groupKey: entry.groupKey,
      receiver: entry.receiver,
      kind: entry.kind,
      attempts: entry.attempts,
      reasons: [...entry.failedAttempts],
      failedAt: new Date(this.clock()).toISOString(),
    };
    this.record(this.failed, failure);

    logger.error("Notification delivery failed", {
      error,
      notificationId: entry.id,
      groupKey: entry.groupKey,
      kind: entry.kind,
      reasons: failure.reasons,
    });
    this.onDeliveryFailed?.(failure, error);
  }

  private remove(entry: OutboxEntry): void {
    this.outbox = this.outbox.filter((e) => e !== entry);
  }

  private record<T>(list: T[], item: T): void {
    list.push(item);
    if (list.length > this.historyLimit) {
      list.splice(0, list.length - this.historyLimit);
    }
  }
}
