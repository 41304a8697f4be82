/**
 * ルート共通のレスポンスヘルパー
 */

import { Response } from "express";
import { ApiResponseBuilder, toAppError } from "../errors";
import { logger } from "../logger";

export function sendSuccess<T>(res: Response, data: T, statusCode = 200): void {
  res.status(statusCode).json(ApiResponseBuilder.success(data, { statusCode, requestId: traceIdOf(res) }));
}

/**
 * エラーを AppError に変換して返す。5xx はエラーログに残す
 */
export function sendError(res: Response, error: unknown, message: string): void {
  const appError = toAppError(error);
  if (appError.statusCode >= 500) {
    logger.error(message, { error: appError, code: appError.code });
  } else {
    logger.warn(message, { code: appError.code, error: appError.message });
  }
  res.status(appError.statusCode).json(ApiResponseBuilder.error(appError, traceIdOf(res)));
}

function traceIdOf(res: Response): string | undefined {
  const traceId: unknown = res.locals.traceId;
  return typeof traceId === "string" ? traceId : undefined;
}
