/**
 * ルールストア
 *
 * ルールセットはプロセス全体で1つ。リロードは新しいスナップショットを
 * 丸ごと差し替えるので、読み手は常に完全なルールセットを見る
 */

import { readFile } from "fs/promises";
import { logger } from "../logger";
import { RuleConfigError, errorMessage } from "../errors";
import { RuleDocumentSchema } from "./schema";
import { compileDocument } from "./ruleValidator";
import { Rule, RuleSetSnapshot, ReloadResult } from "./types";

const EMPTY_SNAPSHOT: RuleSetSnapshot = Object.freeze({
  version: 0,
  loadedAt: 0,
  source: "",
  rules: [],
  inhibitRules: [],
  routes: [],
  diagnostics: [],
});

/**
 * ルール定義の同一性を判定する（差分ログ用）
 */
function sameDefinition(a: Rule, b: Rule): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}

export class RuleStore {
  private snapshot: RuleSetSnapshot = EMPTY_SNAPSHOT;

  /**
   * 現在のスナップショット
   */
  current(): RuleSetSnapshot {
    return this.snapshot;
  }

  getRule(id: string): Rule | undefined {
    return this.snapshot.rules.find((rule) => rule.id === id);
  }

  /**
   * 文書を読み込み、ルールセットを差し替える
   *
   * 文書の構造自体が不正な場合は何も差し替えずに RuleConfigError を投げる。
   * 個々の定義の不正は診断として返し、有効な定義は反映する
   */
  load(document: unknown, source: string, now: number = Date.now()): ReloadResult {
    const parsed = RuleDocumentSchema.safeParse(document);
    if (!parsed.success) {
      throw new RuleConfigError(
        source,
        parsed.error.issues.map((issue) => ({
          field: issue.path.join("."),
          message: issue.message,
        }))
      );
    }

    const compiled = compileDocument(parsed.data);
    const previous = this.snapshot;
    const previousById = new Map(previous.rules.map((rule) => [rule.id, rule]));
    const nextIds = new Set(compiled.rules.map((rule) => rule.id));

    const added: string[] = [];
    const updated: string[] = [];
    for (const rule of compiled.rules) {
      const before = previousById.get(rule.id);
      if (!before) {
        added.push(rule.id);
      } else if (!sameDefinition(before, rule)) {
        updated.push(rule.id);
      }
    }
    const removed = previous.rules.map((rule) => rule.id).filter((id) => !nextIds.has(id));

    const next: RuleSetSnapshot = Object.freeze({
      version: previous.version + 1,
      loadedAt: now,
      source,
      rules: Object.freeze(compiled.rules),
      inhibitRules: Object.freeze(compiled.inhibitRules),
      routes: Object.freeze(compiled.routes),
      diagnostics: Object.freeze(compiled.diagnostics),
    });
    this.snapshot = next;

    for (const diagnostic of compiled.diagnostics) {
      logger.warn("Rule definition rejected", { ...diagnostic, source });
    }
    logger.info("Rule set loaded", {
      version: next.version,
      source,
      ruleCount: next.rules.length,
      rejectedCount: compiled.diagnostics.length,
      disabled: compiled.disabled,
      added,
      removed,
      updated,
    });

    return {
      version: next.version,
      accepted: compiled.rules.map((rule) => rule.id),
      rejected: compiled.diagnostics,
      added,
      removed,
      updated,
    };
  }

  /**
   * JSON ファイルから読み込む
   */
  async loadFile(path: string, now: number = Date.now()): Promise<ReloadResult> {
    let document: unknown;
    try {
      const text = await readFile(path, "utf8");
      document = JSON.parse(text);
    } catch (error) {
      throw new RuleConfigError(path, [{ field: "", message: errorMessage(error) }]);
    }
    return this.load(document, path, now);
  }
}
