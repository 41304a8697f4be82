/**
 * しきい値アラートエンジン - 管理APIのバリデーションスキーマ
 */

import { z } from "zod";
import { MatcherInputSchema, DurationSchema } from "./rules/schema";
import { ALERT_STATES } from "./alerts/types";

// =============================================================================
// 基本型のスキーマ
// =============================================================================

/** ISO 8601 文字列またはエポックミリ秒 */
export const TimestampSchema = z.union([
  z.string().datetime({ offset: true, message: "must be an ISO 8601 timestamp" }).transform((v) => Date.parse(v)),
  z.number().int().nonnegative(),
]);

// =============================================================================
// サイレンス
// =============================================================================

/**
 * サイレンス作成リクエスト
 *
 * 終了時刻は endsAt か duration のどちらかで指定する
 */
export const SilenceCreateSchema = z
  .object({
    matchers: z.array(MatcherInputSchema).min(1, "at least one matcher is required"),
    startsAt: TimestampSchema.optional(),
    endsAt: TimestampSchema.optional(),
    duration: DurationSchema.optional(),
    createdBy: z.string().min(1, "createdBy is required"),
    comment: z.string().default(""),
  })
  .refine((v) => v.endsAt !== undefined || v.duration !== undefined, {
    message: "either endsAt or duration is required",
    path: ["endsAt"],
  });

export type SilenceCreateInput = z.input<typeof SilenceCreateSchema>;

// =============================================================================
// アラート一覧
// =============================================================================

export const AlertListQuerySchema = z.object({
  state: z
    .string()
    .transform((v) => v.toUpperCase())
    .pipe(z.enum(ALERT_STATES))
    .optional(),
  ruleId: z.string().min(1).optional(),
});

export type AlertListQuery = z.infer<typeof AlertListQuerySchema>;

