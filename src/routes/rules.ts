/**
 * ルール管理APIエンドポイント
 *
 * - GET /api/v1/rules - 現在のルールセット
 * - POST /api/v1/rules/reload - ルールファイルの再読み込み
 */

import { Router, Request, Response } from "express";
import { logger } from "../logger";
import { AlertEngine } from "../engine/alertEngine";
import { matcherToInput } from "../labels";
import { formatDuration } from "../rules/duration";
import { Rule } from "../rules/types";
import { sendError, sendSuccess } from "./respond";

function ruleView(rule: Rule) {
  return {
    id: rule.id,
    name: rule.name,
    expr: rule.expr,
    operator: rule.operator,
    threshold: rule.threshold,
    interval: formatDuration(rule.intervalMs),
    for: formatDuration(rule.forMs),
    labels: rule.labels,
    annotations: rule.annotations,
    severity: rule.severity,
    groupBy: rule.groupBy,
    receiver: rule.receiver ?? null,
  };
}

export function createRuleRoutes(engine: AlertEngine): Router {
  const router = Router();

  router.get("/", (_req: Request, res: Response) => {
    const snapshot = engine.rules();
    sendSuccess(res, {
      version: snapshot.version,
      loadedAt: snapshot.loadedAt > 0 ? new Date(snapshot.loadedAt).toISOString() : null,
      source: snapshot.source,
      rules: snapshot.rules.map(ruleView),
      inhibitRules: snapshot.inhibitRules.map((rule) => ({
        sourceMatchers: rule.sourceMatchers.map(matcherToInput),
        targetMatchers: rule.targetMatchers.map(matcherToInput),
        equal: rule.equal,
      })),
      routes: snapshot.routes.map((route) => ({
        matchers: route.matchers.map(matcherToInput),
        receiver: route.receiver,
        continue: route.continue,
      })),
      diagnostics: snapshot.diagnostics,
    });
  });

  router.post("/reload", async (_req: Request, res: Response) => {
    try {
      const result = await engine.reloadRules();
      logger.info("Rules reloaded via API", { version: result.version });
      sendSuccess(res, result);
    } catch (error) {
      sendError(res, error, "Rule reload failed");
    }
  });

  return router;
}
