/**
 * しきい値アラートエンジン - APIサーバー
 *
 * エントリポイント: startServer() でエンジンと管理APIを起動
 */

// dotenv を最初に読み込んで .env ファイルから環境変数を設定
import "dotenv/config";

import { Server } from "http";
import express, { Express, Request, Response, NextFunction } from "express";
import cors from "cors";
import rateLimit from "express-rate-limit";
import { version as packageVersion } from "../package.json";
import { loadEngineConfig, validateEngineConfig } from "./config";
import { apiKeyAuth } from "./middleware/auth";
import { logger } from "./logger";
import { ApiResponseBuilder, ConfigurationError, ValidationError, errorMessage, toAppError } from "./errors";
import { AlertEngine, createAlertEngine } from "./engine";
import { createHealthRoutes, createRuleRoutes, createAlertRoutes, createSilenceRoutes } from "./routes";

// =============================================================================
// アプリケーション構築
// =============================================================================

export interface AppOptions {
  apiKey?: string;
  /** 追加で許可する CORS オリジン */
  corsOrigins?: string[];
  /** 1分あたりのリクエスト上限 */
  rateLimitPerMinute?: number;
  clock?: () => number;
}

/**
 * Express app を作成する（listen はしない）
 */
export function createApp(engine: AlertEngine, options: AppOptions = {}): Express {
  const app = express();

  // ===========================================================================
  // CORS設定
  // ===========================================================================

  const allowedOrigins: (string | RegExp)[] = [
    // ローカル開発
    /^http:\/\/localhost(:\d+)?$/,
    ...(options.corsOrigins ?? []),
  ];

  app.use(
    cors({
      origin: (origin, callback) => {
        // オリジンがない場合（サーバー間通信など）は許可
        if (!origin) {
          return callback(null, true);
        }
        const isAllowed = allowedOrigins.some((allowed) =>
          typeof allowed === "string" ? origin === allowed : allowed.test(origin)
        );
        if (!isAllowed) {
          logger.warn("CORS request blocked", { origin });
        }
        callback(null, isAllowed);
      },
      methods: ["GET", "POST", "DELETE", "OPTIONS"],
      allowedHeaders: ["Content-Type", "Authorization", "X-API-Key", "X-Request-ID", "X-Trace-ID"],
      exposedHeaders: ["X-Request-ID", "X-Trace-ID", "X-RateLimit-Limit", "X-RateLimit-Remaining"],
      maxAge: 86400,
    })
  );

  // ===========================================================================
  // ミドルウェア
  // ===========================================================================

  app.use(express.json({ limit: "1mb" }));
  app.use(logger.requestLogger());

  // レート制限（API全体）
  app.use(
    rateLimit({
      windowMs: 60 * 1000,
      max: options.rateLimitPerMinute ?? 300,
      message: {
        success: false,
        error: "rate-limit-exceeded",
        message: "Too many requests, please try again later.",
      },
      standardHeaders: true,
      legacyHeaders: false,
    })
  );

  // ===========================================================================
  // エンドポイント
  // ===========================================================================

  const auth = apiKeyAuth(options.apiKey);

  // ヘルスチェック（認証なし）
  app.use("/", createHealthRoutes(engine, packageVersion));

  app.use("/api/v1/rules", auth, createRuleRoutes(engine));
  app.use("/api/v1/silences", auth, createSilenceRoutes(engine.silences, options.clock));
  app.use("/api/v1", auth, createAlertRoutes(engine));

  // ===========================================================================
  // エラーハンドリング
  // ===========================================================================

  app.use((req: Request, res: Response) => {
    res.status(404).json({ error: "Not Found", message: `No route for ${req.method} ${req.path}` });
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const appError =
      err instanceof SyntaxError
        ? new ValidationError([{ field: "body", message: "malformed JSON body" }])
        : toAppError(err);
    if (appError.statusCode >= 500) {
      logger.error("Unhandled error", { error: appError, path: req.path });
    }
    res.status(appError.statusCode).json(ApiResponseBuilder.error(appError));
  });

  return app;
}

// =============================================================================
// サーバー起動関数
// =============================================================================

/**
 * エンジンと HTTP サーバーを起動する
 *
 * 1. 設定の読み込みと検証
 * 2. ルールファイルの読み込み
 * 3. 評価・配信ループの開始
 * 4. app.listen()
 */
export async function startServer(): Promise<{ engine: AlertEngine; server: Server }> {
  const config = loadEngineConfig();

  const validation = validateEngineConfig(config);
  if (!validation.valid) {
    throw new ConfigurationError(`Configuration validation failed: ${validation.errors.join(", ")}`);
  }

  const engine = createAlertEngine(config);

  try {
    const result = await engine.reloadRules();
    logger.info("Initial rule set loaded", {
      version: result.version,
      accepted: result.accepted.length,
      rejected: result.rejected.length,
    });
  } catch (error) {
    // ルールファイルが読めなくても API は起動し、reload で復旧できるようにする
    logger.error("Failed to load rule file", { error: toAppError(error), rulesFile: config.rulesFile });
  }

  engine.start();

  const app = createApp(engine, {
    apiKey: config.apiKey,
    corsOrigins: process.env.CORS_ALLOWED_ORIGINS?.split(",").map((o) => o.trim()),
  });

  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(config.port, () => {
      logger.info("Server started", {
        version: packageVersion,
        port: config.port,
        environment: config.nodeEnv,
        authEnabled: !!config.apiKey,
        metricsBaseUrl: config.metricsBaseUrl,
        defaultReceiver: config.defaultReceiver,
      });
      resolve(listening);
    });
  });

  const shutdown = (signal: string) => {
    logger.info("Shutting down", { signal });
    server.close();
    void engine
      .stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error("Shutdown failed", { error: errorMessage(error) });
        process.exit(1);
      });
  };
  process.once("SIGTERM", () => shutdown("SIGTERM"));
  process.once("SIGINT", () => shutdown("SIGINT"));

  return { engine, server };
}

// =============================================================================
// エントリポイント
// =============================================================================

if (require.main === module) {
  void startServer().catch((error: unknown) => {
    logger.error("Failed to start server", {
      environment: process.env.NODE_ENV || "development",
      error: errorMessage(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    process.exit(1);
  });
}
