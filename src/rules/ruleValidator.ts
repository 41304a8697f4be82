/**
 * ルール定義のバリデーターとコンパイラー
 *
 * 文書内の定義を1件ずつ検証し、不正な定義だけを診断付きで拒否する
 */

import { ZodError } from "zod";
import { RuleConfigError, ValidationErrorDetail, errorMessage } from "../errors";
import { LabelMatcher, compileMatcher, parseMatcher, LabelMatcherInput } from "../labels";
import { parseDuration } from "./duration";
import {
  RuleInputSchema,
  InhibitRuleInputSchema,
  RouteInputSchema,
  RuleDocument,
} from "./schema";
import { Rule, InhibitRule, Route, RuleDiagnostic } from "./types";

// =============================================================================
// 型定義
// =============================================================================

/**
 * 1件の検証結果
 */
export type CompileResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: RuleConfigError };

/**
 * 文書全体のコンパイル結果
 */
export interface CompiledDocument {
  rules: Rule[];
  /** enabled: false で無効化されたルールID */
  disabled: string[];
  inhibitRules: InhibitRule[];
  routes: Route[];
  diagnostics: RuleDiagnostic[];
}

// =============================================================================
// ヘルパー関数
// =============================================================================

function zodDetails(error: ZodError): ValidationErrorDetail[] {
  return error.issues.map((issue) => ({
    field: issue.path.join("."),
    message: issue.message,
  }));
}

function nameOf(raw: unknown): string {
  if (typeof raw === "object" && raw !== null && "name" in raw && typeof raw.name === "string") {
    return raw.name;
  }
  return "<unnamed>";
}

function compileMatchers(
  inputs: ReadonlyArray<string | LabelMatcherInput>,
  field: string,
  details: ValidationErrorDetail[]
): LabelMatcher[] {
  const matchers: LabelMatcher[] = [];
  inputs.forEach((input, index) => {
    try {
      matchers.push(typeof input === "string" ? parseMatcher(input) : compileMatcher(input));
    } catch (error) {
      details.push({ field: `${field}.${index}`, message: errorMessage(error), received: input });
    }
  });
  return matchers;
}

// =============================================================================
// 個別定義のコンパイル
// =============================================================================

/**
 * ルール定義を検証し、不変の Rule に変換する
 */
export function compileRule(raw: unknown): CompileResult<Rule> & { enabled?: boolean } {
  const parsed = RuleInputSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, error: new RuleConfigError(nameOf(raw), zodDetails(parsed.error)) };
  }

  const input = parsed.data;
  const details: ValidationErrorDetail[] = [];

  const intervalMs = parseDuration(input.interval);
  if (intervalMs === null) {
    details.push({ field: "interval", message: "invalid duration", received: input.interval });
  } else if (intervalMs <= 0) {
    details.push({ field: "interval", message: "interval must be greater than zero", received: input.interval });
  }

  const forMs = parseDuration(input.for);
  if (forMs === null) {
    details.push({ field: "for", message: "invalid duration", received: input.for });
  }

  if (input.groupBy.length !== new Set(input.groupBy).size) {
    details.push({ field: "groupBy", message: "groupBy contains duplicate label names" });
  }

  if (details.length > 0 || intervalMs === null || forMs === null) {
    return { ok: false, error: new RuleConfigError(input.name, details) };
  }

  const rule: Rule = Object.freeze({
    id: input.id ?? input.name,
    name: input.name,
    expr: input.expr,
    operator: input.operator,
    threshold: input.threshold,
    intervalMs,
    forMs,
    labels: Object.freeze({ ...input.labels }),
    annotations: Object.freeze({ ...input.annotations }),
    severity: input.severity,
    groupBy: Object.freeze([...input.groupBy]),
    receiver: input.receiver,
  });

  return { ok: true, value: rule, enabled: input.enabled };
}

/**
 * 抑制ルールのコンパイル
 */
export function compileInhibitRule(raw: unknown): CompileResult<InhibitRule> {
  const parsed = InhibitRuleInputSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, error: new RuleConfigError("inhibit rule", zodDetails(parsed.error)) };
  }

  const details: ValidationErrorDetail[] = [];
  const sourceMatchers = compileMatchers(parsed.data.sourceMatchers, "sourceMatchers", details);
  const targetMatchers = compileMatchers(parsed.data.targetMatchers, "targetMatchers", details);
  if (details.length > 0) {
    return { ok: false, error: new RuleConfigError("inhibit rule", details) };
  }

  return {
    ok: true,
    value: Object.freeze({
      sourceMatchers: Object.freeze(sourceMatchers),
      targetMatchers: Object.freeze(targetMatchers),
      equal: Object.freeze([...parsed.data.equal]),
    }),
  };
}

/**
 * ルーティング定義のコンパイル
 */
export function compileRoute(raw: unknown): CompileResult<Route> {
  const parsed = RouteInputSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, error: new RuleConfigError("route", zodDetails(parsed.error)) };
  }

  const details: ValidationErrorDetail[] = [];
  const matchers = compileMatchers(parsed.data.matchers, "matchers", details);
  if (details.length > 0) {
    return { ok: false, error: new RuleConfigError(`route to ${parsed.data.receiver}`, details) };
  }

  return {
    ok: true,
    value: Object.freeze({
      matchers: Object.freeze(matchers),
      receiver: parsed.data.receiver,
      continue: parsed.data.continue,
    }),
  };
}

// =============================================================================
// 文書全体のコンパイル
// =============================================================================

/**
 * 文書内の全定義をコンパイルする
 *
 * 不正な定義・重複IDは診断に積み、有効な定義だけを返す
 */
export function compileDocument(document: RuleDocument): CompiledDocument {
  const result: CompiledDocument = {
    rules: [],
    disabled: [],
    inhibitRules: [],
    routes: [],
    diagnostics: [],
  };
  const seenIds = new Set<string>();

  document.rules.forEach((raw, index) => {
    const location = `rules[${index}]`;
    const compiled = compileRule(raw);
    if (!compiled.ok) {
      result.diagnostics.push({
        location,
        name: compiled.error.ruleName,
        message: compiled.error.message,
      });
      return;
    }

    const rule = compiled.value;
    if (seenIds.has(rule.id)) {
      result.diagnostics.push({
        location,
        name: rule.name,
        message: `Duplicate rule id "${rule.id}"`,
      });
      return;
    }
    seenIds.add(rule.id);

    if (compiled.enabled === false) {
      result.disabled.push(rule.id);
      return;
    }
    result.rules.push(rule);
  });

  document.inhibitRules.forEach((raw, index) => {
    const compiled = compileInhibitRule(raw);
    if (compiled.ok) {
      result.inhibitRules.push(compiled.value);
    } else {
      result.diagnostics.push({ location: `inhibitRules[${index}]`, message: compiled.error.message });
    }
  });

  document.routes.forEach((raw, index) => {
    const compiled = compileRoute(raw);
    if (compiled.ok) {
      result.routes.push(compiled.value);
    } else {
      result.diagnostics.push({ location: `routes[${index}]`, message: compiled.error.message });
    }
  });

  return result;
}
