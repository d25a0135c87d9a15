/**
 * 报告输出：终端文本与 JSON 两种形态。
 */

import type { JsonObject } from "../types/json.js";
import type { FindingLevel, ValidationReport } from "../types/report.js";

const RED = "0;31";
const GREEN = "0;32";
const YELLOW = "0;33";

const RULE = "=".repeat(42);

export type FormatOptions = {
  color?: boolean;
};

const LEVEL_LABEL: Record<FindingLevel, { text: string; color: string }> = {
  ok: { text: "OK:", color: GREEN },
  warning: { text: "WARNING:", color: YELLOW },
  error: { text: "ERROR:", color: RED },
};

export function formatReport(
  report: ValidationReport,
  options: FormatOptions = {},
): string[] {
  const paint = (code: string, text: string): string =>
    options.color ? `\x1b[${code}m${text}\x1b[0m` : text;

  const lines: string[] = [RULE, "Skill Repository Validation", RULE, ""];

  report.results.forEach((result, index) => {
    if (index > 0) lines.push("");
    lines.push(`Checking ${result.title}...`);
    for (const f of result.findings) {
      const label = LEVEL_LABEL[f.level];
      lines.push(`${paint(label.color, label.text)} ${f.message}`);
      for (const sample of f.samples ?? []) lines.push(`  ${sample}`);
    }
  });

  lines.push(
    "",
    RULE,
    "Validation Summary",
    RULE,
    `Errors:   ${paint(RED, String(report.errors))}`,
    `Warnings: ${paint(YELLOW, String(report.warnings))}`,
    "",
  );
  if (report.strict) lines.push("Mode:     strict (warnings fail)", "");
  lines.push(
    report.passed
      ? paint(GREEN, "Validation PASSED")
      : paint(RED, "Validation FAILED"),
  );
  return lines;
}

export function reportToJson(report: ValidationReport): JsonObject {
  return {
    root: report.root,
    strict: report.strict,
    passed: report.passed,
    errors: report.errors,
    warnings: report.warnings,
    durationMs: report.durationMs,
    checks: report.results.map((result) => ({
      check: result.check,
      title: result.title,
      findings: result.findings.map((f) => ({
        level: f.level,
        message: f.message,
        ...(f.samples ? { samples: f.samples } : {}),
      })),
    })),
  };
}
