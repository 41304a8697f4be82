/**
 * グルーピング・重複排除エンジンのテスト
 */

import { GroupingEngine, groupKey } from "../../src/grouping/groupingEngine";
import { AlertSnapshot, AlertTransition } from "../../src/alerts/types";
import { makeAlert } from "../fixtures";

const WAIT = 30_000;
const INTERVAL = 60_000;
const REPEAT = 4 * 60 * 60 * 1000;

const notSuppressed = () => false;

function firingAlert(endpoint: string, overrides: Partial<AlertSnapshot> = {}): AlertSnapshot {
  return makeAlert({ alertname: "HighErrorRate", endpoint }, { ruleId: "HighErrorRate", ...overrides });
}

function resolvedAlert(endpoint: string, at: number, overrides: Partial<AlertSnapshot> = {}): AlertSnapshot {
  return firingAlert(endpoint, { state: "RESOLVED", resolvedAt: at, ...overrides });
}

function toTransition(alert: AlertSnapshot): AlertTransition {
  return alert.state === "RESOLVED"
    ? { kind: "RESOLVED", from: "FIRING", to: "RESOLVED", at: alert.resolvedAt ?? 0, alert }
    : { kind: "FIRED", from: "PENDING", to: "FIRING", at: 0, alert };
}

function createEngine(receivers: string[] = ["slack"]) {
  return new GroupingEngine({
    groupWaitMs: WAIT,
    groupIntervalMs: INTERVAL,
    repeatIntervalMs: REPEAT,
    resolveReceivers: () => receivers,
  });
}

describe("GroupingEngine", () => {
  it("groupBy が空なら同じルールの全系列を1グループにまとめ、groupWait 後に1通だけ通知する", () => {
    const engine = createEngine();
    engine.ingest(["/orders", "/users", "/carts"].map((e) => toTransition(firingAlert(e))), 0);

    expect(engine.size).toBe(1);
    expect(engine.flush(WAIT - 1, notSuppressed)).toEqual([]);

    const notifications = engine.flush(WAIT, notSuppressed);

    expect(notifications).toHaveLength(1);
    expect(notifications[0].kind).toBe("firing");
    expect(notifications[0].receiver).toBe("slack");
    expect(notifications[0].groupLabels).toEqual({});
    expect(notifications[0].firing).toHaveLength(3);
    expect(notifications[0].resolved).toEqual([]);

    // 同じ構成なら次の flush では何も出さない
    expect(engine.flush(WAIT + INTERVAL, notSuppressed)).toEqual([]);
  });

  it("groupBy で射影したラベルごとにグループを分ける", () => {
    const engine = createEngine();
    engine.ingest(
      [
        firingAlert("/orders", { groupBy: ["endpoint"] }),
        firingAlert("/users", { groupBy: ["endpoint"] }),
      ].map(toTransition),
      0
    );

    const notifications = engine.flush(WAIT, notSuppressed);

    expect(notifications.map((n) => n.groupLabels).sort((a, b) => (a.endpoint < b.endpoint ? -1 : 1))).toEqual([
      { endpoint: "/orders" },
      { endpoint: "/users" },
    ]);
  });

  it("レシーバーごとに別のグループを作る", () => {
    const engine = createEngine(["slack", "webhook"]);
    const alert = firingAlert("/orders");
    engine.ingest([toTransition(alert)], 0);

    const notifications = engine.flush(WAIT, notSuppressed);

    expect(notifications.map((n) => n.groupKey).sort()).toEqual(
      [groupKey("slack", alert), groupKey("webhook", alert)].sort()
    );
  });

  it("メンバー追加の update は groupInterval で間引く", () => {
    const engine = createEngine();
    engine.ingest([toTransition(firingAlert("/orders"))], 0);
    engine.flush(WAIT, notSuppressed);

    engine.ingest([toTransition(firingAlert("/users"))], WAIT + 10_000);
    expect(engine.flush(WAIT + 20_000, notSuppressed)).toEqual([]);

    const notifications = engine.flush(WAIT + INTERVAL, notSuppressed);
    expect(notifications.map((n) => n.kind)).toEqual(["update"]);
    expect(notifications[0].firing.map((a) => a.labels.endpoint).sort()).toEqual(["/orders", "/users"]);
  });

  it("一部の解決は update、最後の解決は resolved として1回だけ通知する", () => {
    const engine = createEngine();
    engine.ingest(["/a", "/b"].map((e) => toTransition(firingAlert(e))), 0);
    engine.flush(WAIT, notSuppressed);

    engine.ingest([toTransition(resolvedAlert("/a", 100_000))], 100_000);
    const update = engine.flush(100_000, notSuppressed);
    expect(update.map((n) => n.kind)).toEqual(["update"]);
    expect(update[0].firing.map((a) => a.labels.endpoint)).toEqual(["/b"]);
    expect(update[0].resolved.map((a) => a.labels.endpoint)).toEqual(["/a"]);

    engine.ingest([toTransition(resolvedAlert("/b", 200_000))], 200_000);
    const resolved = engine.flush(200_000, notSuppressed);
    expect(resolved.map((n) => n.kind)).toEqual(["resolved"]);
    expect(resolved[0].firing).toEqual([]);
    expect(resolved[0].resolved.map((a) => a.labels.endpoint)).toEqual(["/b"]);

    expect(engine.size).toBe(0);
    expect(engine.flush(300_000, notSuppressed)).toEqual([]);
  });

  it("変化がなくても repeatInterval ごとに再送する", () => {
    const engine = createEngine();
    engine.ingest([toTransition(firingAlert("/orders"))], 0);
    engine.flush(WAIT, notSuppressed);

    expect(engine.flush(WAIT + REPEAT - 1, notSuppressed)).toEqual([]);
    expect(engine.flush(WAIT + REPEAT, notSuppressed).map((n) => n.kind)).toEqual(["repeat"]);
  });

  it("REFRESHED で値が変わってもメンバー構成が同じなら通知しない", () => {
    const engine = createEngine();
    engine.ingest([toTransition(firingAlert("/orders", { lastValue: 1 }))], 0);
    engine.flush(WAIT, notSuppressed);

    engine.ingest([toTransition(firingAlert("/orders", { lastValue: 2 }))], WAIT + 30_000);

    expect(engine.flush(WAIT + INTERVAL, notSuppressed)).toEqual([]);
    expect(engine.list()[0].members[0].lastValue).toBe(2);
  });

  it("どのグループにも属さない RESOLVED は無視する", () => {
    const engine = createEngine();
    engine.ingest([toTransition(resolvedAlert("/orders", 0))], 0);

    expect(engine.size).toBe(0);
  });

  it("初回通知前に解決したグループは何も通知せずに消える", () => {
    const engine = createEngine();
    engine.ingest([toTransition(firingAlert("/orders"))], 0);
    engine.ingest([toTransition(resolvedAlert("/orders", 10_000))], 10_000);

    expect(engine.flush(WAIT, notSuppressed)).toEqual([]);
    expect(engine.size).toBe(0);
  });

  describe("抑止", () => {
    it("抑止中のメンバーは通知に含めず、全員抑止なら初回通知を保留する", () => {
      const engine = createEngine();
      engine.ingest(["/orders", "/users"].map((e) => toTransition(firingAlert(e))), 0);

      const allSuppressed = engine.flush(WAIT, () => true);
      expect(allSuppressed).toEqual([]);
      expect(engine.list()[0].status).toBe("waiting");

      const partly = engine.flush(WAIT + 1, (alert) => alert.labels.endpoint === "/users");
      expect(partly).toHaveLength(1);
      expect(partly[0].firing.map((a) => a.labels.endpoint)).toEqual(["/orders"]);
    });

    it("抑止が解けたら groupInterval 経過後に通知を再開する", () => {
      const engine = createEngine();
      engine.ingest([toTransition(firingAlert("/orders"))], 0);
      engine.flush(WAIT, notSuppressed);

      expect(engine.flush(WAIT + 10_000, () => true)).toEqual([]);

      expect(engine.flush(WAIT + 20_000, notSuppressed)).toEqual([]);
      expect(engine.flush(WAIT + INTERVAL, notSuppressed).map((n) => n.kind)).toEqual(["update"]);
    });

    it("抑止中に解決したメンバーは通知せずに外す", () => {
      const engine = createEngine();
      engine.ingest(["/a", "/b"].map((e) => toTransition(firingAlert(e))), 0);
      engine.flush(WAIT, notSuppressed);

      engine.ingest([toTransition(resolvedAlert("/a", 50_000))], 50_000);
      const notifications = engine.flush(50_000, (alert) => alert.labels.endpoint === "/a");

      expect(notifications).toEqual([]);
      expect(engine.list()[0].members.map((m) => m.labels.endpoint)).toEqual(["/b"]);
    });
  });

  it("レシーバーが変わった FIRING は以前のグループから外し、空になったグループを消す", () => {
    const engine = new GroupingEngine({
      groupWaitMs: WAIT,
      groupIntervalMs: INTERVAL,
      repeatIntervalMs: REPEAT,
      resolveReceivers: (alert) => [alert.receiver ?? "slack"],
    });
    engine.ingest([toTransition(firingAlert("/orders"))], 0);
    expect(engine.flush(WAIT, notSuppressed).map((n) => n.receiver)).toEqual(["slack"]);

    engine.ingest([toTransition(firingAlert("/orders", { receiver: "webhook" }))], 60_000);

    expect(engine.list().map((g) => g.receiver)).toEqual(["webhook"]);
    expect(engine.flush(60_000 + WAIT, notSuppressed).map((n) => `${n.receiver}:${n.kind}`)).toEqual([
      "webhook:firing",
    ]);
    expect(engine.flush(WAIT + REPEAT, notSuppressed)).toEqual([]);
  });

  it("groupBy が変わった FIRING は新しいグループにだけ属する", () => {
    const engine = createEngine();
    engine.ingest([toTransition(firingAlert("/orders"))], 0);
    engine.ingest([toTransition(firingAlert("/orders", { groupBy: ["endpoint"] }))], 10_000);

    const groups = engine.list();
    expect(groups).toHaveLength(1);
    expect(groups[0].groupLabels).toEqual({ endpoint: "/orders" });
  });

  describe("reconcile", () => {
    it("状態機械に無くなった FIRING メンバーを解決として1回だけ通知する", () => {
      const engine = createEngine();
      const b = firingAlert("/b");
      engine.ingest([toTransition(firingAlert("/a")), toTransition(b)], 0);
      engine.flush(WAIT, notSuppressed);

      const lookup = (alert: AlertSnapshot) => (alert.labels.endpoint === "/b" ? b : undefined);
      expect(engine.reconcile(lookup, 100_000)).toBe(1);

      const update = engine.flush(100_000, notSuppressed);
      expect(update.map((n) => n.kind)).toEqual(["update"]);
      expect(update[0].firing.map((a) => a.labels.endpoint)).toEqual(["/b"]);
      expect(update[0].resolved.map((a) => [a.labels.endpoint, a.state, a.resolvedAt])).toEqual([
        ["/a", "RESOLVED", 100_000],
      ]);
      expect(engine.reconcile(lookup, 110_000)).toBe(0);
    });

    it("状態機械が RESOLVED を返したらそのスナップショットで置き換える", () => {
      const engine = createEngine();
      engine.ingest([toTransition(firingAlert("/orders"))], 0);
      engine.flush(WAIT, notSuppressed);

      const resolved = resolvedAlert("/orders", 90_000);
      expect(engine.reconcile(() => resolved, 120_000)).toBe(1);

      const notifications = engine.flush(120_000, notSuppressed);
      expect(notifications.map((n) => n.kind)).toEqual(["resolved"]);
      expect(notifications[0].resolved).toEqual([resolved]);
      expect(engine.size).toBe(0);
    });
  });

  it("list は状態と通知時刻を返す", () => {
    const engine = createEngine();
    engine.ingest([toTransition(firingAlert("/orders"))], 0);
    engine.flush(WAIT, notSuppressed);

    const [view] = engine.list();

    expect(view.status).toBe("active");
    expect(view.receiver).toBe("slack");
    expect(view.ruleId).toBe("HighErrorRate");
    expect(view.createdAt).toBe("1970-01-01T00:00:00.000Z");
    expect(view.lastNotifiedAt).toBe("1970-01-01T00:00:30.000Z");
  });
});
