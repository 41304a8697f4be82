/**
 * Prometheus HTTP API クライアント
 *
 * 範囲の始点と終点が同じなら /api/v1/query、異なれば /api/v1/query_range を使う
 * APIドキュメント: https://prometheus.io/docs/prometheus/latest/querying/api/
 */

import { z } from "zod";
import { logger } from "../logger";
import { QueryError, errorMessage } from "../errors";
import { withTimeout } from "../utils/retry";
import { MetricsSource, Sample, TimeRange } from "./types";

// =============================================================================
// 設定
// =============================================================================

export interface PrometheusClientConfig {
  baseUrl: string;
  timeoutMs?: number;
  /** 範囲クエリで step 未指定時のステップ */
  defaultStepMs?: number;
  headers?: Record<string, string>;
}

const DEFAULT_TIMEOUT_MS = 10000;
const DEFAULT_STEP_MS = 15000;

// =============================================================================
// 応答スキーマ
// =============================================================================

/** [unix秒, "値"] */
const SamplePairSchema = z.tuple([z.number(), z.string()]);

const VectorResultSchema = z.object({
  resultType: z.literal("vector"),
  result: z.array(
    z.object({
      metric: z.record(z.string()),
      value: SamplePairSchema,
    })
  ),
});

const MatrixResultSchema = z.object({
  resultType: z.literal("matrix"),
  result: z.array(
    z.object({
      metric: z.record(z.string()),
      values: z.array(SamplePairSchema),
    })
  ),
});

const ScalarResultSchema = z.object({
  resultType: z.literal("scalar"),
  result: SamplePairSchema,
});

const QueryResponseSchema = z.discriminatedUnion("status", [
  z.object({
    status: z.literal("success"),
    data: z.discriminatedUnion("resultType", [
      VectorResultSchema,
      MatrixResultSchema,
      ScalarResultSchema,
    ]),
  }),
  z.object({
    status: z.literal("error"),
    errorType: z.string().optional(),
    error: z.string().optional(),
  }),
]);

type QueryResponse = z.infer<typeof QueryResponseSchema>;
type QueryData = Extract<QueryResponse, { status: "success" }>["data"];

// =============================================================================
// 変換
// =============================================================================

/**
 * Prometheus の値文字列を数値にする（"NaN", "+Inf" を含む）
 */
export function parseSampleValue(text: string): number {
  switch (text) {
    case "+Inf":
      return Infinity;
    case "-Inf":
      return -Infinity;
    default:
      return Number(text);
  }
}

/**
 * 応答データを Sample 配列に変換する
 */
export function toSamples(data: QueryData): Sample[] {
  switch (data.resultType) {
    case "vector":
      return data.result.map((series) => ({
        labels: Object.freeze({ ...series.metric }),
        value: parseSampleValue(series.value[1]),
        timestamp: Math.round(series.value[0] * 1000),
      }));
    case "matrix":
      return data.result.flatMap((series) => {
        const labels = Object.freeze({ ...series.metric });
        return series.values.map(([ts, value]) => ({
          labels,
          value: parseSampleValue(value),
          timestamp: Math.round(ts * 1000),
        }));
      });
    case "scalar":
      return [
        {
          labels: Object.freeze({}),
          value: parseSampleValue(data.result[1]),
          timestamp: Math.round(data.result[0] * 1000),
        },
      ];
  }
}

// =============================================================================
// クライアント
// =============================================================================

export class PrometheusClient implements MetricsSource {
  private readonly config: Required<PrometheusClientConfig>;

  constructor(config: PrometheusClientConfig) {
    this.config = {
      baseUrl: config.baseUrl.replace(/\/+$/, ""),
      timeoutMs: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      defaultStepMs: config.defaultStepMs ?? DEFAULT_STEP_MS,
      headers: config.headers ?? {},
    };
  }

  /**
   * 式を評価してサンプルを返す
   * @throws {QueryError} 到達不能・HTTPエラー・式エラー・不正な応答
   */
  async query(expression: string, range: TimeRange): Promise<Sample[]> {
    const url = this.buildUrl(expression, range);

    logger.debug("Querying metrics source", { expression, start: range.start, end: range.end });

    let response: Response;
    try {
      response = await withTimeout(
        (signal) => fetch(url, { method: "GET", headers: this.config.headers, signal }),
        this.config.timeoutMs,
        "metrics query"
      );
    } catch (error) {
      throw new QueryError({
        message: `Metrics source unreachable: ${errorMessage(error)}`,
        expression,
        cause: error instanceof Error ? error : undefined,
      });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new QueryError({
        message: `Metrics source returned a non-JSON response (HTTP ${response.status})`,
        expression,
        statusCode: response.status >= 400 ? response.status : 502,
        cause: error instanceof Error ? error : undefined,
      });
    }

    const parsed = QueryResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new QueryError({
        message: `Malformed metrics response: ${parsed.error.issues[0]?.message ?? "unknown"}`,
        expression,
      });
    }

    if (parsed.data.status === "error") {
      throw new QueryError({
        message: `Query failed (${parsed.data.errorType ?? "error"}): ${parsed.data.error ?? "unknown error"}`,
        expression,
        statusCode: response.status >= 400 ? response.status : 502,
      });
    }

    return toSamples(parsed.data.data);
  }

  private buildUrl(expression: string, range: TimeRange): string {
    const params = new URLSearchParams({ query: expression });

    if (range.start === range.end) {
      params.set("time", String(range.end / 1000));
      return `${this.config.baseUrl}/api/v1/query?${params.toString()}`;
    }

    const stepMs = range.stepMs ?? this.config.defaultStepMs;
    params.set("start", String(range.start / 1000));
    params.set("end", String(range.end / 1000));
    params.set("step", `${stepMs / 1000}s`);
    return `${this.config.baseUrl}/api/v1/query_range?${params.toString()}`;
  }
}
