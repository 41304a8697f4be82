/**
 * エンジン - ヘルスビューの型定義
 */

import { AlertState } from "../alerts/types";
import { DeliveryFailure } from "../notify/types";
import { QueueStats } from "../queue/transitionQueue";
import { RuleDiagnostic } from "../rules/types";

/**
 * 直近で失敗しているルールのクエリ
 */
export interface QueryFailure {
  ruleId: string;
  expression: string;
  message: string;
  failedAt: string;
  consecutiveFailures: number;
}

export interface InconsistencyEvent {
  message: string;
  details: Record<string, unknown>;
  at: string;
}

export interface EngineHealth {
  status: "healthy" | "degraded";
  timestamp: string;
  running: boolean;
  startedAt: string | null;
  rules: {
    version: number;
    count: number;
    diagnostics: RuleDiagnostic[];
  };
  alerts: Record<AlertState, number>;
  groups: number;
  queue: QueueStats;
  queryFailures: QueryFailure[];
  deliveryFailures: DeliveryFailure[];
  pendingDeliveries: number;
  inconsistencies: InconsistencyEvent[];
}
