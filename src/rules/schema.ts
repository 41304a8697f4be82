/**
 * アラートルール - バリデーションスキーマ
 */

import { z } from "zod";
import { LabelMatcherSchema } from "../labels";
import { COMPARISON_OPERATORS, SEVERITIES } from "./types";

// =============================================================================
// 基本型のスキーマ
// =============================================================================

const LABEL_NAME_PATTERN = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

export const LabelNameSchema = z
  .string()
  .regex(LABEL_NAME_PATTERN, "label name must match [a-zA-Z_][a-zA-Z0-9_]*");

export const LabelSetSchema = z.record(LabelNameSchema, z.string());

export const OperatorSchema = z.enum(COMPARISON_OPERATORS);

export const SeveritySchema = z.enum(SEVERITIES);

/** "1m" のような文字列、または秒数 */
export const DurationSchema = z.union([z.string().min(1), z.number().nonnegative()]);

/** 文字列形式（severity="critical"）またはオブジェクト形式 */
export const MatcherInputSchema = z.union([z.string().min(1), LabelMatcherSchema]);

// =============================================================================
// ルール定義スキーマ
// =============================================================================

export const RuleInputSchema = z.object({
  id: z.string().min(1).optional(),
  name: z.string().min(1, "name is required"),
  expr: z.string().min(1, "expr is required"),
  operator: OperatorSchema,
  threshold: z.number().finite("threshold must be a finite number"),
  for: DurationSchema.default(0),
  interval: DurationSchema,
  labels: LabelSetSchema.default({}),
  annotations: z.record(z.string()).default({}),
  severity: SeveritySchema.default("warning"),
  groupBy: z.array(LabelNameSchema).default([]),
  receiver: z.string().min(1).optional(),
  enabled: z.boolean().default(true),
});

export type RuleInput = z.infer<typeof RuleInputSchema>;

export const InhibitRuleInputSchema = z.object({
  sourceMatchers: z.array(MatcherInputSchema).min(1, "sourceMatchers must not be empty"),
  targetMatchers: z.array(MatcherInputSchema).min(1, "targetMatchers must not be empty"),
  equal: z.array(LabelNameSchema).default([]),
});

export type InhibitRuleInput = z.infer<typeof InhibitRuleInputSchema>;

export const RouteInputSchema = z.object({
  matchers: z.array(MatcherInputSchema).default([]),
  receiver: z.string().min(1, "receiver is required"),
  continue: z.boolean().default(false),
});

export type RouteInput = z.infer<typeof RouteInputSchema>;

/**
 * ルール文書全体
 *
 * 個々の定義はここでは unknown のまま受け取り、1件ずつ検証して
 * 不正なものだけを拒否する
 */
export const RuleDocumentSchema = z.object({
  version: z.union([z.string(), z.number()]).optional(),
  rules: z.array(z.unknown()),
  inhibitRules: z.array(z.unknown()).default([]),
  routes: z.array(z.unknown()).default([]),
});

export type RuleDocument = z.infer<typeof RuleDocumentSchema>;
