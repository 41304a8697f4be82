/**
 * 通知ルーターのテスト
 */

import { NotificationRouter } from "../../src/notify/notificationRouter";
import { DeliveryResult, NotificationTransport } from "../../src/notify/types";
import { GroupNotification } from "../../src/grouping/types";
import { DispatchError } from "../../src/errors";
import { parseMatcher } from "../../src/labels";
import { makeAlert } from "../fixtures";

const alert = makeAlert({ alertname: "HighErrorRate", endpoint: "/orders" }, { ruleId: "HighErrorRate" });

function notification(receiver: string): GroupNotification {
  return {
    groupKey: `${receiver}:HighErrorRate:{}`,
    receiver,
    kind: "firing",
    ruleId: "HighErrorRate",
    ruleName: "HighErrorRate",
    severity: "warning",
    groupLabels: {},
    firing: [alert],
    resolved: [],
    at: 0,
  };
}

function transportReturning(...results: DeliveryResult[]) {
  const send = jest.fn<Promise<DeliveryResult>, Parameters<NotificationTransport["send"]>>();
  for (const result of results) {
    send.mockResolvedValueOnce(result);
  }
  const transport: NotificationTransport = { send };
  return { send, transport };
}

describe("NotificationRouter", () => {
  let now: number;
  const clock = () => now;

  beforeEach(() => {
    now = 0;
  });

  // ===========================================================================
  // ルーティング
  // ===========================================================================

  describe("receiversFor", () => {
    const routes = [
      { matchers: [parseMatcher('team="payments"')], receiver: "webhook", continue: false },
      { matchers: [parseMatcher('severity="critical"')], receiver: "pager", continue: true },
      { matchers: [], receiver: "slack", continue: false },
    ];
    const router = new NotificationRouter({ transports: {}, defaultReceiver: "default", routes });

    it("ルールの receiver が最優先", () => {
      expect(router.receiversFor(makeAlert({ team: "payments" }, { receiver: "ops" }))).toEqual(["ops"]);
    });

    it("continue でない一致で打ち切る", () => {
      expect(router.receiversFor(makeAlert({ team: "payments", severity: "critical" }))).toEqual(["webhook"]);
    });

    it("continue の一致は後続ルートも評価する", () => {
      expect(router.receiversFor(makeAlert({ severity: "critical" }))).toEqual(["pager", "slack"]);
    });

    it("どのルートにも一致しなければデフォルト", () => {
      const strict = new NotificationRouter({
        transports: {},
        defaultReceiver: "default",
        routes: [routes[0]],
      });
      expect(strict.receiversFor(makeAlert({ team: "search" }))).toEqual(["default"]);
    });
  });

  // ===========================================================================
  // 配信・リトライ
  // ===========================================================================

  it("2回失敗して3回目に成功したら失敗理由付きで配信記録を残す", async () => {
    const { send, transport } = transportReturning(
      { ok: false, reason: "HTTP 500" },
      { ok: false, reason: "HTTP 502" },
      { ok: true }
    );
    const router = new NotificationRouter({
      transports: { slack: transport },
      defaultReceiver: "slack",
      retry: { maxAttempts: 5, baseDelayMs: 1000, backoffMultiplier: 2, jitterRatio: 0 },
      clock,
      generateId: () => "n-1",
    });

    router.enqueue([notification("slack")], now);
    expect(router.processDue(now)).toBe(1);
    await router.idle();

    expect(router.pending()[0]).toEqual(
      expect.objectContaining({ attempts: 1, failedAttempts: ["HTTP 500"], nextAttemptAt: "1970-01-01T00:00:01.000Z" })
    );

    now = 500;
    expect(router.processDue(now)).toBe(0);

    now = 1000;
    expect(router.processDue(now)).toBe(1);
    await router.idle();
    expect(router.pending()[0].nextAttemptAt).toBe("1970-01-01T00:00:03.000Z");

    now = 3000;
    router.processDue(now);
    await router.idle();

    expect(send).toHaveBeenCalledTimes(3);
    expect(router.pending()).toEqual([]);
    expect(router.failures()).toEqual([]);
    expect(router.deliveries()).toEqual([
      {
        notificationId: "n-1",
        groupKey: "slack:HighErrorRate:{}",
        receiver: "slack",
        kind: "firing",
        attempts: 3,
        failedAttempts: ["HTTP 500", "HTTP 502"],
        deliveredAt: "1970-01-01T00:00:03.000Z",
      },
    ]);
  });

  it("最大試行回数に達したら配信失敗イベントを出してアウトボックスから外す", async () => {
    const { transport } = transportReturning(
      { ok: false, reason: "timeout" },
      { ok: false, reason: "timeout" }
    );
    const onDeliveryFailed = jest.fn();
    const router = new NotificationRouter({
      transports: { slack: transport },
      defaultReceiver: "slack",
      retry: { maxAttempts: 2, baseDelayMs: 10 },
      clock,
      onDeliveryFailed,
    });

    router.enqueue([notification("slack")], now);
    router.processDue(now);
    await router.idle();
    now = 10;
    router.processDue(now);
    await router.idle();

    expect(router.pending()).toEqual([]);
    expect(router.failures()).toHaveLength(1);
    expect(router.failures()[0]).toEqual(
      expect.objectContaining({ receiver: "slack", attempts: 2, reasons: ["timeout", "timeout"] })
    );
    expect(onDeliveryFailed).toHaveBeenCalledTimes(1);
    expect(onDeliveryFailed).toHaveBeenCalledWith(expect.objectContaining({ attempts: 2 }), expect.any(DispatchError));
  });

  it("トランスポートの例外も失敗として扱う", async () => {
    const send = jest.fn<Promise<DeliveryResult>, Parameters<NotificationTransport["send"]>>();
    send.mockRejectedValueOnce(new Error("socket hang up"));
    const router = new NotificationRouter({
      transports: { slack: { send } },
      defaultReceiver: "slack",
      retry: { maxAttempts: 1 },
      clock,
    });

    router.enqueue([notification("slack")], now);
    router.processDue(now);
    await router.idle();

    expect(router.failures()[0].reasons).toEqual(["socket hang up"]);
  });

  it("未知のレシーバーはリトライせずに失敗させる", () => {
    const onDeliveryFailed = jest.fn();
    const router = new NotificationRouter({ transports: {}, defaultReceiver: "slack", clock, onDeliveryFailed });

    router.enqueue([notification("pager")], now);
    router.processDue(now);

    expect(router.pending()).toEqual([]);
    expect(router.failures()[0].reasons).toEqual(['unknown receiver "pager"']);
    const error: unknown = onDeliveryFailed.mock.calls[0][1];
    expect(error instanceof DispatchError && error.retryable).toBe(false);
  });

  it("送信中のエントリは二重に送信しない", async () => {
    let resolveSend: (result: DeliveryResult) => void = () => undefined;
    const send = jest.fn(
      () =>
        new Promise<DeliveryResult>((resolve) => {
          resolveSend = resolve;
        })
    );
    const router = new NotificationRouter({ transports: { slack: { send } }, defaultReceiver: "slack", clock });

    router.enqueue([notification("slack")], now);
    expect(router.processDue(now)).toBe(1);
    expect(router.processDue(now)).toBe(0);
    expect(router.pending()[0].inFlight).toBe(true);

    resolveSend({ ok: true });
    await router.idle();
    expect(router.deliveries()).toHaveLength(1);
  });

  it("同じグループの通知は置き換えずに順に積む", () => {
    const router = new NotificationRouter({ transports: {}, defaultReceiver: "slack", clock });
    router.enqueue([notification("slack"), { ...notification("slack"), kind: "update" }], now);

    expect(router.pending().map((p) => p.kind)).toEqual(["firing", "update"]);
  });
});
