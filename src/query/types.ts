/**
 * メトリクスクエリ - 型定義
 */

import { Labels } from "../labels";

/**
 * クエリ結果の1サンプル
 */
export interface Sample {
  readonly labels: Labels;
  readonly value: number;
  /** ミリ秒 */
  readonly timestamp: number;
}

/**
 * クエリ対象の時間範囲（ミリ秒）。start === end なら即時クエリ
 */
export interface TimeRange {
  readonly start: number;
  readonly end: number;
  /** 範囲クエリのステップ（ミリ秒） */
  readonly stepMs?: number;
}

/**
 * メトリクスソース
 *
 * 失敗時は QueryError を投げる。空配列は「データなし」を意味する
 */
export interface MetricsSource {
  query(expression: string, range: TimeRange): Promise<Sample[]>;
}
