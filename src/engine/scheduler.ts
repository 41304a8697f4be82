/**
 * 評価スケジューラー
 *
 * 評価間隔ごとに1つのタイマーループを持ち、そのループに属するルールを評価する。
 * 同じルールの評価が実行中ならその回はスキップする（同一ルールの評価は重ならない）。
 * ルールが削除された間隔のループは停止する
 */

import { logger } from "../logger";
import { Rule } from "../rules/types";

export type RuleEvaluationTask = (rule: Rule) => Promise<unknown>;

interface IntervalLoop {
  intervalMs: number;
  rules: readonly Rule[];
  timer: NodeJS.Timeout;
}

export class EvaluationScheduler {
  private readonly loops = new Map<number, IntervalLoop>();
  private readonly inFlight = new Set<string>();

  constructor(private readonly evaluate: RuleEvaluationTask) {}

  /**
   * ルールセットに合わせてループを起動・停止する
   *
   * 新しく加わったルールは次のティックを待たずにすぐ評価する
   */
  sync(rules: readonly Rule[]): void {
    const byInterval = new Map<number, Rule[]>();
    for (const rule of rules) {
      const list = byInterval.get(rule.intervalMs) ?? [];
      list.push(rule);
      byInterval.set(rule.intervalMs, list);
    }

    for (const [intervalMs, loop] of this.loops) {
      if (!byInterval.has(intervalMs)) {
        clearInterval(loop.timer);
        this.loops.delete(intervalMs);
        logger.info("Evaluation loop stopped", { intervalMs });
      }
    }

    for (const [intervalMs, intervalRules] of byInterval) {
      const existing = this.loops.get(intervalMs);
      if (existing) {
        const knownIds = new Set(existing.rules.map((rule) => rule.id));
        existing.rules = intervalRules;
        this.runAll(intervalRules.filter((rule) => !knownIds.has(rule.id)));
        continue;
      }

      const loop: IntervalLoop = {
        intervalMs,
        rules: intervalRules,
        timer: setInterval(() => this.tick(intervalMs), intervalMs),
      };
      this.loops.set(intervalMs, loop);
      logger.info("Evaluation loop started", { intervalMs, ruleCount: intervalRules.length });
      this.runAll(intervalRules);
    }
  }

  /**
   * 全ループを停止する
   */
  stop(): void {
    for (const loop of this.loops.values()) {
      clearInterval(loop.timer);
    }
    this.loops.clear();
  }

  intervals(): number[] {
    return [...this.loops.keys()].sort((a, b) => a - b);
  }

  isRunning(ruleId: string): boolean {
    return this.inFlight.has(ruleId);
  }

  private tick(intervalMs: number): void {
    const loop = this.loops.get(intervalMs);
    if (loop) {
      this.runAll(loop.rules);
    }
  }

  private runAll(rules: readonly Rule[]): void {
    for (const rule of rules) {
      this.run(rule);
    }
  }

  private run(rule: Rule): void {
    if (this.inFlight.has(rule.id)) {
      logger.debug("Previous evaluation still running, skipping tick", { ruleId: rule.id });
      return;
    }
    this.inFlight.add(rule.id);

    void this.evaluate(rule)
      .catch((error: unknown) => {
        logger.error("Rule evaluation failed", { error, ruleId: rule.id });
      })
      .finally(() => {
        this.inFlight.delete(rule.id);
      });
  }
}
