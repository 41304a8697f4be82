/**
 * カスタムエラークラスと統一レスポンス形式
 *
 * 障害を最小単位（1ルール・1インスタンス・1配信試行）に閉じ込めるため、
 * エンジン内の失敗はすべてここのエラー型で表現する
 */

// =============================================================================
// エラーコード定義
// =============================================================================

export const ErrorCode = {
  // 認証エラー (401)
  UNAUTHORIZED: "UNAUTHORIZED",

  // バリデーションエラー (400)
  VALIDATION_ERROR: "VALIDATION_ERROR",

  // リソースエラー (404)
  NOT_FOUND: "NOT_FOUND",

  // ルール設定エラー (400)
  RULE_CONFIG_ERROR: "RULE_CONFIG_ERROR",

  // メトリクスソースのクエリ失敗 (502)
  QUERY_ERROR: "QUERY_ERROR",

  // 通知トランスポートの送信失敗 (502)
  DISPATCH_ERROR: "DISPATCH_ERROR",

  // アラート状態の不整合（到達しないはず）
  STATE_INCONSISTENCY: "STATE_INCONSISTENCY",

  // サーバーエラー (500)
  INTERNAL_ERROR: "INTERNAL_ERROR",
  CONFIGURATION_ERROR: "CONFIGURATION_ERROR",
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

// =============================================================================
// 基底エラークラス
// =============================================================================

export interface AppErrorOptions {
  code: ErrorCodeType;
  message: string;
  statusCode?: number;
  details?: Record<string, unknown>;
  cause?: Error;
  retryable?: boolean;
  retryAfterMs?: number;
}

/**
 * アプリケーション基底エラークラス
 */
export class AppError extends Error {
  public readonly code: ErrorCodeType;
  public readonly statusCode: number;
  public readonly details?: Record<string, unknown>;
  public readonly retryable: boolean;
  public readonly retryAfterMs?: number;
  public readonly timestamp: string;
  public readonly originalCause?: Error;

  constructor(options: AppErrorOptions) {
    super(options.message);
    this.name = "AppError";
    this.code = options.code;
    this.statusCode = options.statusCode ?? 500;
    this.details = options.details;
    this.retryable = options.retryable ?? false;
    this.retryAfterMs = options.retryAfterMs;
    this.timestamp = new Date().toISOString();
    this.originalCause = options.cause;

    // スタックトレースを保持
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * JSON形式でエラー情報を取得
   */
  toJSON(): Record<string, unknown> {
    return {
      error: this.code,
      message: this.message,
      statusCode: this.statusCode,
      details: this.details,
      retryable: this.retryable,
      retryAfterMs: this.retryAfterMs,
      timestamp: this.timestamp,
    };
  }
}

// =============================================================================
// 認証エラー
// =============================================================================

/**
 * 認証エラー（401）
 */
export class AuthenticationError extends AppError {
  constructor(message: string = "Authentication failed", details?: Record<string, unknown>) {
    super({
      code: ErrorCode.UNAUTHORIZED,
      message,
      statusCode: 401,
      details,
      retryable: false,
    });
    this.name = "AuthenticationError";
  }
}

// =============================================================================
// バリデーションエラー
// =============================================================================

export interface ValidationErrorDetail {
  field: string;
  message: string;
  received?: unknown;
}

/**
 * バリデーションエラー（400）
 */
export class ValidationError extends AppError {
  public readonly errors: ValidationErrorDetail[];

  constructor(errors: ValidationErrorDetail[], message: string = "Validation failed") {
    super({
      code: ErrorCode.VALIDATION_ERROR,
      message,
      statusCode: 400,
      details: { errors },
      retryable: false,
    });
    this.name = "ValidationError";
    this.errors = errors;
  }

  static fromZodError(zodError: { issues: Array<{ path: (string | number)[]; message: string }> }): ValidationError {
    const errors: ValidationErrorDetail[] = zodError.issues.map((issue) => ({
      field: issue.path.join("."),
      message: issue.message,
    }));
    return new ValidationError(errors);
  }
}

// =============================================================================
// リソースエラー
// =============================================================================

/**
 * リソース未検出エラー（404）
 */
export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string) {
    const message = identifier
      ? `${resource} not found: ${identifier}`
      : `${resource} not found`;
    super({
      code: ErrorCode.NOT_FOUND,
      message,
      statusCode: 404,
      details: { resource, identifier },
      retryable: false,
    });
    this.name = "NotFoundError";
  }
}

// =============================================================================
// ルール設定エラー
// =============================================================================

/**
 * 不正なルール定義
 * 読み込み時にそのルールだけが拒否され、他のルールには影響しない
 */
export class RuleConfigError extends AppError {
  public readonly ruleName: string;
  public readonly errors: ValidationErrorDetail[];

  constructor(ruleName: string, errors: ValidationErrorDetail[]) {
    const summary = errors.map((e) => (e.field ? `${e.field}: ${e.message}` : e.message)).join("; ");
    super({
      code: ErrorCode.RULE_CONFIG_ERROR,
      message: `Invalid rule "${ruleName}": ${summary}`,
      statusCode: 400,
      details: { ruleName, errors },
      retryable: false,
    });
    this.name = "RuleConfigError";
    this.ruleName = ruleName;
    this.errors = errors;
  }
}

// =============================================================================
// 外部サービスエラー
// =============================================================================

/**
 * メトリクスソースへのクエリ失敗
 * 「結果が空」とは区別される。該当ルールのみ次のインターバルで再試行
 */
export class QueryError extends AppError {
  public readonly expression: string;

  constructor(options: {
    message: string;
    expression: string;
    statusCode?: number;
    cause?: Error;
  }) {
    super({
      code: ErrorCode.QUERY_ERROR,
      message: options.message,
      statusCode: options.statusCode ?? 502,
      details: { expression: options.expression },
      retryable: true,
      cause: options.cause,
    });
    this.name = "QueryError";
    this.expression = options.expression;
  }
}

/**
 * 通知トランスポートの送信失敗
 */
export class DispatchError extends AppError {
  public readonly receiver: string;
  public readonly attempts: number;

  constructor(options: {
    message: string;
    receiver: string;
    attempts: number;
    retryable?: boolean;
    cause?: Error;
  }) {
    super({
      code: ErrorCode.DISPATCH_ERROR,
      message: options.message,
      statusCode: 502,
      details: { receiver: options.receiver, attempts: options.attempts },
      retryable: options.retryable ?? true,
      cause: options.cause,
    });
    this.name = "DispatchError";
    this.receiver = options.receiver;
    this.attempts = options.attempts;
  }
}

// =============================================================================
// 状態不整合エラー
// =============================================================================

/**
 * アラートインスタンスの状態不整合
 * 到達不能のはずの分岐で投げる。該当インスタンスの追跡のみ破棄する
 */
export class StateInconsistencyError extends AppError {
  constructor(message: string, details: Record<string, unknown>) {
    super({
      code: ErrorCode.STATE_INCONSISTENCY,
      message,
      statusCode: 500,
      details,
      retryable: false,
    });
    this.name = "StateInconsistencyError";
  }
}

// =============================================================================
// 設定エラー
// =============================================================================

/**
 * 設定エラー
 */
export class ConfigurationError extends AppError {
  constructor(message: string, missingConfig?: string[]) {
    super({
      code: ErrorCode.CONFIGURATION_ERROR,
      message,
      statusCode: 500,
      details: missingConfig ? { missingConfig } : undefined,
      retryable: false,
    });
    this.name = "ConfigurationError";
  }
}

// =============================================================================
// 統一レスポンス形式
// =============================================================================

export interface ApiResponse<T = unknown> {
  success: boolean;
  statusCode: number;
  data?: T;
  error?: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
    retryable?: boolean;
  };
  meta?: {
    requestId?: string;
    timestamp: string;
  };
}

/**
 * 統一レスポンスビルダー
 */
export class ApiResponseBuilder {
  /**
   * 成功レスポンスを生成
   */
  static success<T>(
    data: T,
    options?: { statusCode?: number; requestId?: string }
  ): ApiResponse<T> {
    return {
      success: true,
      statusCode: options?.statusCode ?? 200,
      data,
      meta: {
        requestId: options?.requestId,
        timestamp: new Date().toISOString(),
      },
    };
  }

  /**
   * エラーレスポンスを生成
   */
  static error(error: AppError | Error, requestId?: string): ApiResponse<never> {
    if (error instanceof AppError) {
      return {
        success: false,
        statusCode: error.statusCode,
        error: {
          code: error.code,
          message: error.message,
          details: error.details,
          retryable: error.retryable,
        },
        meta: {
          requestId,
          timestamp: new Date().toISOString(),
        },
      };
    }

    // 一般的なErrorの場合
    return {
      success: false,
      statusCode: 500,
      error: {
        code: ErrorCode.INTERNAL_ERROR,
        message: error.message || "An unexpected error occurred",
        retryable: false,
      },
      meta: {
        requestId,
        timestamp: new Date().toISOString(),
      },
    };
  }
}

// =============================================================================
// エラーハンドリングユーティリティ
// =============================================================================

/**
 * エラーをAppErrorに変換
 */
export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }
  if (error instanceof Error) {
    return new AppError({
      code: ErrorCode.INTERNAL_ERROR,
      message: error.message,
      cause: error,
    });
  }
  return new AppError({
    code: ErrorCode.INTERNAL_ERROR,
    message: String(error),
  });
}

/**
 * ログ出力用にエラーメッセージを取り出す
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
