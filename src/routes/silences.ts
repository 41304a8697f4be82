/**
 * サイレンス管理APIエンドポイント
 *
 * - GET /api/v1/silences - 一覧
 * - POST /api/v1/silences - 作成
 * - GET /api/v1/silences/:id - 取得
 * - DELETE /api/v1/silences/:id - 失効
 */

import { Router, Request, Response } from "express";
import { NotFoundError } from "../errors";
import { SilenceStore } from "../silences/silenceStore";
import { sendError, sendSuccess } from "./respond";

export function createSilenceRoutes(silences: SilenceStore, clock: () => number = Date.now): Router {
  const router = Router();

  router.get("/", (_req: Request, res: Response) => {
    const list = silences.listSilences(clock());
    sendSuccess(res, { silences: list, total: list.length });
  });

  router.post("/", (req: Request, res: Response) => {
    try {
      const now = clock();
      const silence = silences.createSilence(req.body, now);
      sendSuccess(res, silences.view(silence, now), 201);
    } catch (error) {
      sendError(res, error, "Silence creation rejected");
    }
  });

  router.get("/:id", (req: Request, res: Response) => {
    const silence = silences.getSilence(req.params.id);
    if (!silence) {
      sendError(res, new NotFoundError("Silence", req.params.id), "Silence not found");
      return;
    }
    sendSuccess(res, silences.view(silence, clock()));
  });

  router.delete("/:id", (req: Request, res: Response) => {
    try {
      const now = clock();
      const silence = silences.expireSilence(req.params.id, now);
      sendSuccess(res, silences.view(silence, now));
    } catch (error) {
      sendError(res, error, "Silence expiry failed");
    }
  });

  return router;
}
