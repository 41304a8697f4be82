/**
 * ヘルスチェック・ルートインデックス
 */

import { Router, Request, Response } from "express";
import { AlertEngine } from "../engine/alertEngine";

export function createHealthRoutes(engine: AlertEngine, version: string): Router {
  const router = Router();

  // ルート一覧
  router.get("/", (_req: Request, res: Response) => {
    res.json({
      message: "Threshold Alert Engine API",
      version,
      endpoints: {
        health: "GET /health",
        rules: "GET /api/v1/rules",
        rules_reload: "POST /api/v1/rules/reload",
        alerts: "GET /api/v1/alerts",
        groups: "GET /api/v1/groups",
        silences: "GET /api/v1/silences",
        silence_create: "POST /api/v1/silences",
        silence_get: "GET /api/v1/silences/:id",
        silence_delete: "DELETE /api/v1/silences/:id",
      },
    });
  });

  // ヘルスチェック（クエリ失敗・配信失敗があれば 503）
  router.get("/health", (_req: Request, res: Response) => {
    const health = engine.health();
    res.status(health.status === "healthy" ? 200 : 503).json(health);
  });

  return router;
}
