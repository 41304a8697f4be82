/**
 * アラートエンジン
 *
 * 各コンポーネントを結線する。
 *
 * 評価側: スケジューラー → メトリクスクエリ → ルール評価 → 状態機械 → 遷移キュー
 * 配信側: 遷移キュー → グルーピング → 抑止判定 → 通知ルーター → トランスポート
 *
 * 評価側と配信側は遷移キューでのみつながり、配信の遅延は評価ループに影響しない
 */

import { logger } from "../logger";
import { QueryError, StateInconsistencyError, errorMessage } from "../errors";
import { HEALTH } from "../constants";
import { AlertStateMachine } from "../alerts/stateMachine";
import { AlertSnapshot, AlertState, AlertTransition, isNotifiable } from "../alerts/types";
import { evaluateRule } from "../evaluator/ruleEvaluator";
import { GroupingEngine } from "../grouping/groupingEngine";
import { AlertGroupView, GroupNotification } from "../grouping/types";
import { NotificationRouter } from "../notify/notificationRouter";
import { DeliveryFailure, NotificationTransport } from "../notify/types";
import { MetricsSource, Sample } from "../query/types";
import { TransitionQueue } from "../queue/transitionQueue";
import { RuleStore } from "../rules/ruleStore";
import { ReloadResult, Rule, RuleSetSnapshot } from "../rules/types";
import { SilenceStore } from "../silences/silenceStore";
import { EvaluationScheduler } from "./scheduler";
import { EngineHealth, InconsistencyEvent, QueryFailure } from "./types";

// =============================================================================
// 設定
// =============================================================================

export interface AlertEngineSettings {
  rulesFile: string;
  lookbackMs: number;
  groupWaitMs: number;
  groupIntervalMs: number;
  repeatIntervalMs: number;
  dispatchTickMs: number;
  queueCapacity: number;
  notifyMaxAttempts: number;
  notifyBaseDelayMs: number;
  notifyMaxDelayMs: number;
  defaultReceiver: string;
  silenceRetentionMs: number;
}

export interface AlertEngineOptions {
  settings: AlertEngineSettings;
  metrics: MetricsSource;
  /** レシーバー名 → トランスポート */
  transports: Readonly<Record<string, NotificationTransport>>;
  clock?: () => number;
}

function sameQuery(a: Rule, b: Rule): boolean {
  return a.expr === b.expr && a.operator === b.operator && a.threshold === b.threshold;
}

// =============================================================================
// エンジン
// =============================================================================

export class AlertEngine {
  readonly ruleStore = new RuleStore();
  readonly stateMachine: AlertStateMachine;
  readonly queue: TransitionQueue;
  readonly grouping: GroupingEngine;
  readonly silences: SilenceStore;
  readonly router: NotificationRouter;
  readonly scheduler: EvaluationScheduler;

  private readonly settings: AlertEngineSettings;
  private readonly metrics: MetricsSource;
  private readonly clock: () => number;
  private readonly queryFailures = new Map<string, QueryFailure>();
  private readonly inconsistencies: InconsistencyEvent[] = [];
  private dispatchTimer: NodeJS.Timeout | null = null;
  private startedAt: number | null = null;

  constructor(options: AlertEngineOptions) {
    this.settings = options.settings;
    this.metrics = options.metrics;
    this.clock = options.clock ?? Date.now;

    this.stateMachine = new AlertStateMachine({
      onInconsistency: (error) => this.recordInconsistency(error),
    });
    this.queue = new TransitionQueue(this.settings.queueCapacity);
    this.router = new NotificationRouter({
      transports: options.transports,
      defaultReceiver: this.settings.defaultReceiver,
      retry: {
        maxAttempts: this.settings.notifyMaxAttempts,
        baseDelayMs: this.settings.notifyBaseDelayMs,
        maxDelayMs: this.settings.notifyMaxDelayMs,
      },
      clock: this.clock,
      historyLimit: HEALTH.MAX_DELIVERY_FAILURES,
    });
    this.grouping = new GroupingEngine({
      groupWaitMs: this.settings.groupWaitMs,
      groupIntervalMs: this.settings.groupIntervalMs,
      repeatIntervalMs: this.settings.repeatIntervalMs,
      resolveReceivers: (alert) => this.router.receiversFor(alert),
    });
    this.silences = new SilenceStore({
      firingAlerts: () => this.stateMachine.firing(),
      retentionMs: this.settings.silenceRetentionMs,
    });
    this.scheduler = new EvaluationScheduler((rule) => this.evaluateRule(rule));
  }

  // ===========================================================================
  // ライフサイクル
  // ===========================================================================

  /**
   * 評価ループと配信ループを開始する
   */
  start(): void {
    if (this.dispatchTimer !== null) {
      return;
    }
    this.startedAt = this.clock();
    this.scheduler.sync(this.ruleStore.current().rules);
    this.dispatchTimer = setInterval(() => this.dispatchTick(), this.settings.dispatchTickMs);
    logger.info("Alert engine started", {
      ruleCount: this.ruleStore.current().rules.length,
      intervals: this.scheduler.intervals(),
      dispatchTickMs: this.settings.dispatchTickMs,
    });
  }

  /**
   * ループを停止し、送信中の通知の完了を待つ
   */
  async stop(): Promise<void> {
    if (this.dispatchTimer !== null) {
      clearInterval(this.dispatchTimer);
      this.dispatchTimer = null;
    }
    this.scheduler.stop();
    await this.router.idle();
    logger.info("Alert engine stopped");
  }

  get running(): boolean {
    return this.dispatchTimer !== null;
  }

  // ===========================================================================
  // ルール
  // ===========================================================================

  /**
   * ルール文書を読み込んで反映する
   */
  loadRules(document: unknown, source: string): ReloadResult {
    const now = this.clock();
    const result = this.ruleStore.load(document, source, now);
    this.applyRuleSet(result, now);
    return result;
  }

  /**
   * 設定されたルールファイルから再読み込みする
   */
  async reloadRules(): Promise<ReloadResult> {
    const now = this.clock();
    const result = await this.ruleStore.loadFile(this.settings.rulesFile, now);
    this.applyRuleSet(result, now);
    return result;
  }

  rules(): RuleSetSnapshot {
    return this.ruleStore.current();
  }

  private applyRuleSet(result: ReloadResult, now: number): void {
    const snapshot = this.ruleStore.current();

    for (const ruleId of result.removed) {
      this.enqueue(this.stateMachine.dropRule(ruleId, now));
      this.queryFailures.delete(ruleId);
    }
    for (const ruleId of result.updated) {
      const rule = this.ruleStore.getRule(ruleId);
      if (rule) {
        this.stateMachine.updateRule(rule);
      }
    }

    this.silences.setInhibitRules(snapshot.inhibitRules);
    this.router.setRoutes(snapshot.routes);

    if (this.running) {
      this.scheduler.sync(snapshot.rules);
    }
  }

  // ===========================================================================
  // 評価
  // ===========================================================================

  /**
   * 1ルールを評価し、発生した遷移を返す
   *
   * クエリ失敗はこのルールだけに閉じ込め、インスタンスの状態は変えない
   */
  async evaluateRule(rule: Rule, at?: number): Promise<AlertTransition[]> {
    const now = at ?? this.clock();
    const range = { start: now - this.settings.lookbackMs, end: now };

    let samples: Sample[];
    try {
      samples = await this.metrics.query(rule.expr, range);
    } catch (error) {
      this.recordQueryFailure(rule, error, now);
      return [];
    }

    // クエリ中にルールが削除・変更されていたら結果を捨てる
    const current = this.ruleStore.getRule(rule.id);
    if (!current || !sameQuery(current, rule)) {
      logger.debug("Rule changed during evaluation, discarding result", { ruleId: rule.id });
      return [];
    }

    this.queryFailures.delete(rule.id);
    const breaches = evaluateRule(current, samples);
    const transitions = this.stateMachine.applyEvaluation(current, breaches, now);
    this.enqueue(transitions);
    return transitions;
  }

  // ===========================================================================
  // 配信
  // ===========================================================================

  /**
   * 配信パイプラインを1回分進める
   *
   * キューの遷移をグループに取り込み、送信時期のグループ通知をアウトボックスへ積み、
   * 送信時期に達したものの送信を開始する
   */
  runDispatchCycle(at?: number): GroupNotification[] {
    const now = at ?? this.clock();

    this.grouping.ingest(this.queue.drain(), now);
    this.grouping.reconcile((alert) => this.stateMachine.get(alert.ruleId, alert.fingerprint), now);
    const notifications = this.grouping.flush(now, (alert, t) => this.silences.isSuppressed(alert, t));
    this.router.enqueue(notifications, now);
    this.silences.gc(now);
    this.router.processDue(now);

    return notifications;
  }

  private dispatchTick(): void {
    try {
      this.runDispatchCycle();
    } catch (error) {
      logger.error("Dispatch cycle failed", { error });
    }
  }

  private enqueue(transitions: readonly AlertTransition[]): void {
    this.queue.pushAll(transitions.filter(isNotifiable));
  }

  // ===========================================================================
  // 参照
  // ===========================================================================

  alerts(filter?: { state?: AlertState; ruleId?: string }): AlertSnapshot[] {
    return this.stateMachine.list(filter);
  }

  groups(): AlertGroupView[] {
    return this.grouping.list();
  }

  /**
   * ヘルスビュー
   *
   * 現在失敗中のクエリ、または直近の配信失敗・状態不整合があれば degraded
   */
  health(): EngineHealth {
    const now = this.clock();
    const snapshot = this.ruleStore.current();
    const deliveryFailures = this.router.failures();
    const queryFailures = [...this.queryFailures.values()];
    const since = now - HEALTH.DEGRADED_WINDOW_MS;

    const recent = (failedAt: string) => Date.parse(failedAt) >= since;
    const degraded =
      queryFailures.length > 0 ||
      deliveryFailures.some((f) => recent(f.failedAt)) ||
      this.inconsistencies.some((e) => recent(e.at));

    const alertCounts: Record<AlertState, number> = { INACTIVE: 0, PENDING: 0, FIRING: 0, RESOLVED: 0 };
    for (const alert of this.stateMachine.list()) {
      alertCounts[alert.state]++;
    }

    return {
      status: degraded ? "degraded" : "healthy",
      timestamp: new Date(now).toISOString(),
      running: this.running,
      startedAt: this.startedAt === null ? null : new Date(this.startedAt).toISOString(),
      rules: {
        version: snapshot.version,
        count: snapshot.rules.length,
        diagnostics: [...snapshot.diagnostics],
      },
      alerts: alertCounts,
      groups: this.grouping.size,
      queue: this.queue.stats(),
      queryFailures,
      deliveryFailures: deliveryFailures.map((f): DeliveryFailure => ({ ...f })),
      pendingDeliveries: this.router.pending().length,
      inconsistencies: [...this.inconsistencies],
    };
  }

  private recordQueryFailure(rule: Rule, error: unknown, now: number): void {
    const previous = this.queryFailures.get(rule.id);
    const failure: QueryFailure = {
      ruleId: rule.id,
      expression: rule.expr,
      message: errorMessage(error),
      failedAt: new Date(now).toISOString(),
      consecutiveFailures: (previous?.consecutiveFailures ?? 0) + 1,
    };
    this.queryFailures.set(rule.id, failure);

    logger.warn("Metrics query failed", {
      ruleId: rule.id,
      error: errorMessage(error),
      queryError: error instanceof QueryError,
      consecutiveFailures: failure.consecutiveFailures,
    });
  }

  private recordInconsistency(error: StateInconsistencyError): void {
    this.inconsistencies.push({
      message: error.message,
      details: error.details ?? {},
      at: new Date(this.clock()).toISOString(),
    });
    if (this.inconsistencies.length > HEALTH.MAX_INCONSISTENCIES) {
      this.inconsistencies.splice(0, this.inconsistencies.length - HEALTH.MAX_INCONSISTENCIES);
    }
  }
}
