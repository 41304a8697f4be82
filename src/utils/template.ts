/**
 * 注釈テンプレートの展開
 *
 * 対応する記法:
 * - {{ $labels.<name> }}  ラベル値（存在しなければ空文字）
 * - {{ $value }}          評価値
 */

import { Labels } from "../labels";

const PLACEHOLDER = /\{\{\s*\$(labels\.([a-zA-Z_][a-zA-Z0-9_]*)|value)\s*\}\}/g;

export interface TemplateData {
  labels: Labels;
  value: number;
}

/**
 * 数値を表示用に整形（整数はそのまま、小数は有効桁4桁）
 */
export function formatValue(value: number): string {
  if (!Number.isFinite(value)) {
    return String(value);
  }
  if (Number.isInteger(value)) {
    return String(value);
  }
  return String(Number(value.toPrecision(4)));
}

export function expandTemplate(template: string, data: TemplateData): string {
  return template.replace(PLACEHOLDER, (_match, _expr: string, labelName: string | undefined) => {
    if (labelName !== undefined) {
      return data.labels[labelName] ?? "";
    }
    return formatValue(data.value);
  });
}

export function expandAnnotations(
  annotations: Readonly<Record<string, string>>,
  data: TemplateData
): Readonly<Record<string, string>> {
  const expanded: Record<string, string> = {};
  for (const [name, template] of Object.entries(annotations)) {
    expanded[name] = expandTemplate(template, data);
  }
  return Object.freeze(expanded);
}
