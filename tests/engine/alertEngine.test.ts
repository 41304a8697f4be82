/**
 * アラートエンジンの結合テスト
 *
 * 評価時刻を明示して evaluateRule / runDispatchCycle を直接呼び、
 * 評価から通知までの流れを検証する
 */

import { AlertEngine, AlertEngineSettings } from "../../src/engine/alertEngine";
import { QueryError } from "../../src/errors";
import { GroupNotification } from "../../src/grouping/types";
import { DeliveryResult, NotificationTransport, RenderedMessage } from "../../src/notify/types";
import { MetricsSource, Sample, TimeRange } from "../../src/query/types";

const settings: AlertEngineSettings = {
  rulesFile: "config/rules.json",
  lookbackMs: 0,
  groupWaitMs: 0,
  groupIntervalMs: 0,
  repeatIntervalMs: 4 * 60 * 60 * 1000,
  dispatchTickMs: 1000,
  queueCapacity: 100,
  notifyMaxAttempts: 3,
  notifyBaseDelayMs: 1000,
  notifyMaxDelayMs: 10_000,
  defaultReceiver: "slack",
  silenceRetentionMs: 60 * 60 * 1000,
};

const ruleDocument = {
  rules: [
    {
      name: "HighRequestLatencyP99",
      expr: "p99_latency",
      operator: ">",
      threshold: 0.5,
      for: "1m",
      interval: "30s",
      annotations: { summary: "p99 latency on {{ $labels.endpoint }} is {{ $value }}s" },
    },
  ],
};

const series = (value: number): Sample[] => [{ labels: { endpoint: "/orders" }, value, timestamp: 0 }];

function setup() {
  let now = 0;
  const query = jest.fn<Promise<Sample[]>, [string, TimeRange]>();
  const metrics: MetricsSource = { query };
  const send = jest.fn<Promise<DeliveryResult>, [string, RenderedMessage]>().mockResolvedValue({ ok: true });
  const transport: NotificationTransport = { send };

  const engine = new AlertEngine({ settings, metrics, transports: { slack: transport }, clock: () => now });
  engine.loadRules(ruleDocument, "test");

  const rule = () => {
    const [current] = engine.rules().rules;
    return current;
  };

  /** t 秒時点で value を返して評価し、配信サイクルを1回回す */
  const cycle = async (seconds: number, value: number | null) => {
    now = seconds * 1000;
    query.mockResolvedValueOnce(value === null ? [] : series(value));
    const transitions = await engine.evaluateRule(rule(), now);
    const notifications = engine.runDispatchCycle(now);
    await engine.router.idle();
    return { transitions, notifications };
  };

  const setNow = (ms: number) => {
    now = ms;
  };

  return { engine, query, send, rule, cycle, setNow };
}

describe("AlertEngine", () => {
  it("p99 レイテンシのしきい値超過で FIRING と解決の通知をちょうど1回ずつ送る", async () => {
    const { engine, send, cycle } = setup();

    expect((await cycle(0, 0.7)).transitions.map((t) => t.kind)).toEqual(["PENDING"]);
    expect((await cycle(30, 0.8)).transitions).toEqual([]);

    const fired = await cycle(60, 0.9);
    expect(fired.transitions.map((t) => t.kind)).toEqual(["FIRED"]);
    expect(fired.notifications.map((n) => n.kind)).toEqual(["firing"]);

    await cycle(90, 0.95);

    const resolved = await cycle(120, 0.3);
    expect(resolved.transitions.map((t) => t.kind)).toEqual(["RESOLVED"]);
    expect(resolved.notifications.map((n) => n.kind)).toEqual(["resolved"]);

    expect((await cycle(150, 0.3)).transitions.map((t) => t.kind)).toEqual(["DISCARDED"]);

    expect(send).toHaveBeenCalledTimes(2);
    const [firstReceiver, firstMessage] = send.mock.calls[0];
    expect(firstReceiver).toBe("slack");
    expect(firstMessage.status).toBe("firing");
    expect(firstMessage.payload.alerts[0].annotations.summary).toBe("p99 latency on /orders is 0.9s");
    expect(send.mock.calls[1][1].status).toBe("resolved");

    expect(engine.alerts()).toEqual([]);
    expect(engine.groups()).toEqual([]);
    expect(engine.router.deliveries()).toHaveLength(2);
  });

  it("即時クエリの時間範囲で問い合わせる", async () => {
    const { query, cycle } = setup();
    await cycle(60, 0.1);
    expect(query).toHaveBeenCalledWith("p99_latency", { start: 60_000, end: 60_000 });
  });

  it("クエリ失敗はそのルールの状態を変えずにヘルスへ記録する", async () => {
    const { engine, query, rule, cycle, setNow } = setup();
    await cycle(0, 0.7);

    setNow(30_000);
    query.mockRejectedValueOnce(new QueryError({ message: "connection refused", expression: "p99_latency" }));
    expect(await engine.evaluateRule(rule(), 30_000)).toEqual([]);

    const health = engine.health();
    expect(health.status).toBe("degraded");
    expect(health.queryFailures).toEqual([
      {
        ruleId: "HighRequestLatencyP99",
        expression: "p99_latency",
        message: "connection refused",
        failedAt: "1970-01-01T00:00:30.000Z",
        consecutiveFailures: 1,
      },
    ]);
    expect(engine.alerts()[0].state).toBe("PENDING");

    // 次の成功で回復し、for 期間は失敗前から継続している
    const recovered = await cycle(60, 0.7);
    expect(recovered.transitions.map((t) => t.kind)).toEqual(["FIRED"]);
    expect(engine.health().status).toBe("healthy");
  });

  it("ルールを削除すると FIRING のインスタンスの解決通知を出す", async () => {
    const { engine, send, cycle, setNow } = setup();
    await cycle(0, 0.7);
    await cycle(60, 0.7);
    expect(send).toHaveBeenCalledTimes(1);

    setNow(70_000);
    const result = engine.loadRules({ rules: [] }, "test");
    expect(result.removed).toEqual(["HighRequestLatencyP99"]);

    const notifications = engine.runDispatchCycle(70_000);
    await engine.router.idle();

    expect(notifications.map((n) => n.kind)).toEqual(["resolved"]);
    expect(send).toHaveBeenCalledTimes(2);
    expect(engine.alerts()).toEqual([]);
  });

  it("評価中にルールのしきい値が変わったら結果を捨てる", async () => {
    const { engine, query, rule } = setup();
    let resolveQuery: (samples: Sample[]) => void = () => undefined;
    query.mockReturnValueOnce(
      new Promise<Sample[]>((resolve) => {
        resolveQuery = resolve;
      })
    );

    const evaluation = engine.evaluateRule(rule(), 0);
    engine.loadRules(
      { rules: [{ ...ruleDocument.rules[0], threshold: 0.8 }] },
      "test"
    );
    resolveQuery(series(0.7));

    expect(await evaluation).toEqual([]);
    expect(engine.alerts()).toEqual([]);
  });

  it("サイレンス中は通知せず、期限後に通知する", async () => {
    const { engine, send, cycle } = setup();
    engine.silences.createSilence(
      { matchers: ['alertname="HighRequestLatencyP99"'], startsAt: 0, endsAt: 90_000, createdBy: "oncall" },
      0
    );

    await cycle(0, 0.7);
    const silenced = await cycle(60, 0.7);
    expect(silenced.notifications).toEqual([]);
    expect(send).not.toHaveBeenCalled();

    const afterSilence = await cycle(90, 0.7);
    expect(afterSilence.notifications.map((n) => n.kind)).toEqual(["firing"]);
    expect(send).toHaveBeenCalledTimes(1);
  });

  it("配信に失敗し続けたらヘルスが degraded になる", async () => {
    const { engine, send, cycle, setNow } = setup();
    send.mockResolvedValue({ ok: false, reason: "HTTP 500" });

    await cycle(0, 0.7);
    await cycle(60, 0.7);
    setNow(61_000);
    engine.runDispatchCycle(61_000);
    await engine.router.idle();
    setNow(63_000);
    engine.runDispatchCycle(63_000);
    await engine.router.idle();

    const health = engine.health();
    expect(send).toHaveBeenCalledTimes(3);
    expect(health.status).toBe("degraded");
    expect(health.deliveryFailures).toHaveLength(1);
    expect(health.deliveryFailures[0].reasons).toEqual(["HTTP 500", "HTTP 500", "HTTP 500"]);
    expect(health.pendingDeliveries).toBe(0);
  });

  it("health は状態別の件数とルールセットの版を返す", async () => {
    const { engine, cycle } = setup();
    await cycle(0, 0.7);

    const health = engine.health();

    expect(health.status).toBe("healthy");
    expect(health.running).toBe(false);
    expect(health.startedAt).toBeNull();
    expect(health.rules).toEqual({ version: 1, count: 1, diagnostics: [] });
    expect(health.alerts).toEqual({ INACTIVE: 0, PENDING: 1, FIRING: 0, RESOLVED: 0 });
  });

  describe("グループの追従", () => {
    const instantRule = (id: string, expr: string, receiver?: string) => ({
      id,
      name: id,
      expr,
      operator: ">",
      threshold: 0.5,
      for: 0,
      interval: "30s",
      ...(receiver === undefined ? {} : { receiver }),
    });

    function multiSetup(overrides: Partial<AlertEngineSettings>) {
      let now = 0;
      const values: Record<string, number> = {};
      const query = jest.fn<Promise<Sample[]>, [string, TimeRange]>();
      query.mockImplementation(async (expr) => [{ labels: { endpoint: "/orders" }, value: values[expr] ?? 0, timestamp: 0 }]);
      const slackSend = jest.fn<Promise<DeliveryResult>, [string, RenderedMessage]>().mockResolvedValue({ ok: true });
      const webhookSend = jest.fn<Promise<DeliveryResult>, [string, RenderedMessage]>().mockResolvedValue({ ok: true });

      const engine = new AlertEngine({
        settings: { ...settings, ...overrides },
        metrics: { query },
        transports: { slack: { send: slackSend }, webhook: { send: webhookSend } },
        clock: () => now,
      });
      const sent: GroupNotification[] = [];

      const at = (seconds: number) => {
        now = seconds * 1000;
      };
      const evaluate = async (id: string) => {
        const current = engine.rules().rules.find((r) => r.id === id);
        if (!current) {
          throw new Error(`rule ${id} is not loaded`);
        }
        await engine.evaluateRule(current, now);
      };
      const dispatch = async () => {
        sent.push(...engine.runDispatchCycle(now));
        await engine.router.idle();
      };

      return { engine, values, slackSend, webhookSend, sent, at, evaluate, dispatch };
    }

    it("キューが満杯でも解決を取りこぼさず、解決済みのアラートを再送しない", async () => {
      const { engine, values, sent, at, evaluate, dispatch } = multiSetup({ queueCapacity: 1, repeatIntervalMs: 60_000 });
      engine.loadRules({ rules: [instantRule("R1", "r1_metric"), instantRule("R2", "r2_metric")] }, "test");

      values.r1_metric = 1;
      await evaluate("R1");
      await evaluate("R2");
      await dispatch();

      // R2 の発火でキューが埋まった後に R1 が解決する
      at(30);
      values.r1_metric = 0;
      values.r2_metric = 1;
      await evaluate("R2");
      await evaluate("R1");
      expect(engine.queue.size).toBe(2);
      await dispatch();

      for (const seconds of [60, 90, 120, 150, 180]) {
        at(seconds);
        await evaluate("R2");
        await evaluate("R1");
        await dispatch();
      }

      const kindsOf = (ruleId: string) => sent.filter((n) => n.ruleId === ruleId).map((n) => n.kind);
      expect(kindsOf("R1")).toEqual(["firing", "resolved"]);
      expect(kindsOf("R2")).toEqual(["firing", "repeat", "repeat"]);
      expect(engine.alerts({ ruleId: "R1" })).toEqual([]);
      expect(engine.groups().map((g) => g.ruleId)).toEqual(["R2"]);
      expect(engine.queue.stats().dropped).toBe(0);
    });

    it("リロードでレシーバーが変わったら以前のレシーバーへ再送しない", async () => {
      const { engine, values, slackSend, webhookSend, sent, at, evaluate, dispatch } = multiSetup({
        repeatIntervalMs: 60_000,
      });
      engine.loadRules({ rules: [instantRule("ErrorRate", "error_rate", "slack")] }, "test");

      values.error_rate = 1;
      await evaluate("ErrorRate");
      await dispatch();
      expect(slackSend).toHaveBeenCalledTimes(1);

      at(10);
      expect(engine.loadRules({ rules: [instantRule("ErrorRate", "error_rate", "webhook")] }, "test").updated).toEqual([
        "ErrorRate",
      ]);

      for (const seconds of [30, 60, 90, 120]) {
        at(seconds);
        await evaluate("ErrorRate");
        await dispatch();
      }

      expect(slackSend).toHaveBeenCalledTimes(1);
      expect(webhookSend).toHaveBeenCalledTimes(2);
      expect(sent.map((n) => `${n.receiver}:${n.kind}`)).toEqual(["slack:firing", "webhook:firing", "webhook:repeat"]);
      expect(engine.groups().map((g) => g.receiver)).toEqual(["webhook"]);
    });
  });
});
