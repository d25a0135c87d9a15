/**
 * 校验报告类型。
 */

/**
 * 检查项 id，同时决定执行与输出顺序。
 */
export const CHECK_IDS = [
  "rules-file",
  "structure",
  "front-matter",
  "references",
  "forbidden-dependencies",
  "credentials",
  "execution-steps",
] as const;

export type CheckId = (typeof CHECK_IDS)[number];

export type FindingLevel = "ok" | "warning" | "error";

export type Finding = {
  check: CheckId;
  level: FindingLevel;
  message: string;
  /**
   * 命中行样本，格式 `path:line: text`。
   */
  samples?: string[];
};

export type CheckResult = {
  check: CheckId;
  title: string;
  findings: Finding[];
};

export type ValidationReport = {
  root: string;
  strict: boolean;
  results: CheckResult[];
  errors: number;
  warnings: number;
  passed: boolean;
  durationMs: number;
};
