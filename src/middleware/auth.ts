/**
 * しきい値アラートエンジン - 認証ミドルウェア
 */

import { Request, Response, NextFunction } from "express";
import { logger } from "../logger";
import { ApiResponseBuilder, AuthenticationError } from "../errors";

/**
 * API Key認証ミドルウェア
 * ヘッダー: X-API-Key または Authorization: Bearer <api_key>
 *
 * apiKey 未設定なら認証しない（起動時に一度だけ警告する）
 */
export function apiKeyAuth(apiKey: string | undefined) {
  if (!apiKey) {
    logger.warn("API Key authentication is disabled (API_KEY not set)");
  }

  return (req: Request, res: Response, next: NextFunction): void => {
    if (!apiKey) {
      next();
      return;
    }

    const headerKey = req.headers["x-api-key"];
    const providedKey =
      (typeof headerKey === "string" ? headerKey : undefined) ?? extractBearerToken(req.headers.authorization);

    if (!providedKey) {
      const error = new AuthenticationError(
        "API key is required. Provide via X-API-Key header or Authorization: Bearer <key>"
      );
      res.status(401).json(ApiResponseBuilder.error(error));
      return;
    }

    if (providedKey !== apiKey) {
      logger.warn("Invalid API key attempt", {
        ip: req.ip,
        path: req.path,
      });
      res.status(401).json(ApiResponseBuilder.error(new AuthenticationError("Invalid API key")));
      return;
    }

    next();
  };
}

/**
 * Authorization ヘッダーからBearerトークンを抽出
 */
function extractBearerToken(authHeader: string | undefined): string | undefined {
  if (!authHeader || !authHeader.startsWith("Bearer ")) {
    return undefined;
  }
  return authHeader.substring(7);
}
