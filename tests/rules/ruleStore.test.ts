/**
 * ルールストアのテスト
 */

import { mkdtemp, writeFile, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { RuleStore } from "../../src/rules/ruleStore";
import { RuleConfigError } from "../../src/errors";

const rule = (name: string, threshold = 1) => ({
  name,
  expr: `metric_${name}`,
  operator: ">",
  threshold,
  interval: "30s",
});

describe("RuleStore", () => {
  it("初期状態は空のバージョン0", () => {
    const store = new RuleStore();
    expect(store.current().version).toBe(0);
    expect(store.current().rules).toEqual([]);
  });

  it("読み込みごとにバージョンを1ずつ上げ、差分を返す", () => {
    const store = new RuleStore();

    const first = store.load({ rules: [rule("a"), rule("b")] }, "test", 1000);
    expect(first.version).toBe(1);
    expect(first.added).toEqual(["a", "b"]);

    const second = store.load({ rules: [rule("a", 2), rule("c")] }, "test", 2000);
    expect(second.version).toBe(2);
    expect(second.added).toEqual(["c"]);
    expect(second.updated).toEqual(["a"]);
    expect(second.removed).toEqual(["b"]);
    expect(store.current().loadedAt).toBe(2000);
    expect(store.getRule("a")?.threshold).toBe(2);
    expect(store.getRule("b")).toBeUndefined();
  });

  it("不正なルールは診断付きで拒否し、他のルールは反映する", () => {
    const store = new RuleStore();
    const result = store.load({ rules: [rule("ok"), { name: "bad", expr: "x" }] }, "test");

    expect(result.accepted).toEqual(["ok"]);
    expect(result.rejected).toHaveLength(1);
    expect(result.rejected[0].name).toBe("bad");
    expect(store.current().diagnostics).toEqual(result.rejected);
  });

  it("文書の構造が不正なら何も差し替えずに RuleConfigError", () => {
    const store = new RuleStore();
    store.load({ rules: [rule("a")] }, "test");

    expect(() => store.load({ rules: "nope" }, "broken")).toThrow(RuleConfigError);
    expect(store.current().version).toBe(1);
    expect(store.current().rules.map((r) => r.id)).toEqual(["a"]);
  });

  it("前のスナップショットは差し替え後も変化しない", () => {
    const store = new RuleStore();
    store.load({ rules: [rule("a")] }, "test");
    const before = store.current();

    store.load({ rules: [rule("b")] }, "test");

    expect(before.rules.map((r) => r.id)).toEqual(["a"]);
    expect(Object.isFrozen(before)).toBe(true);
  });

  describe("loadFile", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), "rules-"));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it("JSON ファイルから読み込む", async () => {
      const path = join(dir, "rules.json");
      await writeFile(path, JSON.stringify({ rules: [rule("file-rule")] }));

      const store = new RuleStore();
      const result = await store.loadFile(path);

      expect(result.accepted).toEqual(["file-rule"]);
      expect(store.current().source).toBe(path);
    });

    it("JSON として読めなければ RuleConfigError", async () => {
      const path = join(dir, "broken.json");
      await writeFile(path, "{ not json");

      await expect(new RuleStore().loadFile(path)).rejects.toBeInstanceOf(RuleConfigError);
    });

    it("ファイルが無ければ RuleConfigError", async () => {
      await expect(new RuleStore().loadFile(join(dir, "missing.json"))).rejects.toBeInstanceOf(RuleConfigError);
    });
  });
});
