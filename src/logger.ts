/**
 * しきい値アラートエンジン - 構造化ログ
 */

import { Request, Response, NextFunction } from "express";

/**
 * ログレベル
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * ログエントリの構造
 */
interface LogEntry {
  timestamp: string;
  level: LogLevel;
  severity: string;
  message: string;
  traceId?: string;
  service: string;
  version: string;
  environment: string;
  [key: string]: unknown;
}

/**
 * 構造化ロガークラス
 */
export class StructuredLogger {
  private service: string;
  private version: string;
  private environment: string;
  private minLevel: LogLevel;

  private readonly levelPriority: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
  };

  constructor() {
    const envLevel = process.env.LOG_LEVEL?.toLowerCase();
    this.service = "threshold-alert-engine";
    this.version = process.env.npm_package_version || "1.0.0";
    this.environment = process.env.NODE_ENV || "development";
    this.minLevel = isLogLevel(envLevel) ? envLevel : "info";
  }

  /**
   * 出力する最小レベルを変更
   */
  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  /**
   * トレースIDを生成
   */
  generateTraceId(): string {
    return `${Date.now()}-${Math.random().toString(36).substring(2, 15)}`;
  }

  /**
   * ログエントリを構築
   */
  private buildLogEntry(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>
  ): LogEntry {
    return {
      timestamp: new Date().toISOString(),
      level,
      // Cloud Loggingの重大度フィールド
      severity: level.toUpperCase(),
      message,
      service: this.service,
      version: this.version,
      environment: this.environment,
      ...data,
    };
  }

  /**
   * ログを出力
   */
  private log(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>
  ): void {
    if (this.levelPriority[level] < this.levelPriority[this.minLevel]) {
      return;
    }

    const entry = this.buildLogEntry(level, message, data);
    const output = JSON.stringify(entry);

    switch (level) {
      case "error":
        console.error(output);
        break;
      case "warn":
        console.warn(output);
        break;
      case "debug":
        console.debug(output);
        break;
      default:
        console.log(output);
    }
  }

  /**
   * デバッグログ
   */
  debug(message: string, data?: Record<string, unknown>): void {
    this.log("debug", message, data);
  }

  /**
   * 情報ログ
   */
  info(message: string, data?: Record<string, unknown>): void {
    this.log("info", message, data);
  }

  /**
   * 警告ログ
   */
  warn(message: string, data?: Record<string, unknown>): void {
    this.log("warn", message, data);
  }

  /**
   * エラーログ
   */
  error(message: string, data?: Record<string, unknown>): void {
    // エラーオブジェクトを文字列化
    if (data?.error instanceof Error) {
      data = {
        ...data,
        error: {
          name: data.error.name,
          message: data.error.message,
          stack: data.error.stack,
        },
      };
    }
    this.log("error", message, data);
  }

  /**
   * リクエストログ用のミドルウェア
   */
  requestLogger() {
    return (req: Request, res: Response, next: NextFunction): void => {
      const headerTraceId = req.header("x-trace-id");
      const traceId = headerTraceId ?? this.generateTraceId();
      const startTime = Date.now();

      res.locals.traceId = traceId;

      this.debug("Request started", {
        traceId,
        method: req.method,
        path: req.path,
        ip: req.ip,
      });

      res.on("finish", () => {
        this.info("Request completed", {
          traceId,
          method: req.method,
          path: req.path,
          statusCode: res.statusCode,
          durationMs: Date.now() - startTime,
        });
      });

      next();
    };
  }
}

// シングルトンインスタンス
export const logger = new StructuredLogger();
