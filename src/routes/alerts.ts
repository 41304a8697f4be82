/**
 * アラート参照APIエンドポイント（読み取り専用）
 *
 * - GET /api/v1/alerts?state=firing&ruleId=... - アラートインスタンス一覧
 * - GET /api/v1/groups - アラートグループ一覧
 */

import { Router, Request, Response } from "express";
import { AlertEngine } from "../engine/alertEngine";
import { ValidationError } from "../errors";
import { AlertSnapshot } from "../alerts/types";
import { AlertListQuerySchema } from "../schemas";
import { sendError, sendSuccess } from "./respond";

const toIso = (ms: number | null): string | null => (ms === null ? null : new Date(ms).toISOString());

function alertView(alert: AlertSnapshot) {
  return {
    ruleId: alert.ruleId,
    ruleName: alert.ruleName,
    fingerprint: alert.fingerprint,
    labels: alert.labels,
    annotations: alert.annotations,
    state: alert.state,
    severity: alert.severity,
    value: alert.lastValue,
    activeSince: new Date(alert.activeSince).toISOString(),
    firedAt: toIso(alert.firedAt),
    resolvedAt: toIso(alert.resolvedAt),
    lastEvaluatedAt: new Date(alert.lastEvaluatedAt).toISOString(),
  };
}

export function createAlertRoutes(engine: AlertEngine): Router {
  const router = Router();

  router.get("/alerts", (req: Request, res: Response) => {
    const parsed = AlertListQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      sendError(res, ValidationError.fromZodError(parsed.error), "Invalid alert query");
      return;
    }

    const alerts = engine.alerts(parsed.data).map(alertView);
    sendSuccess(res, { alerts, total: alerts.length });
  });

  router.get("/groups", (_req: Request, res: Response) => {
    const groups = engine.groups();
    sendSuccess(res, { groups, total: groups.length });
  });

  return router;
}
