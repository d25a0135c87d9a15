import type { SkillbaseConfig } from "../types/config.js";
import type { CheckId, Finding, FindingLevel } from "../types/report.js";
import type { SkillRepository } from "../types/skill.js";

export type CheckContext = {
  root: string;
  config: SkillbaseConfig;
  repository: SkillRepository;
};

/**
 * 单个检查项。
 *
 * 关键点（中文）
 * - 检查只产出 finding，不抛异常、不打印。
 * - title 依赖配置（例如 rulesFile 路径），所以是函数。
 */
export interface RepositoryCheck {
  id: CheckId;
  title(ctx: CheckContext): string;
  run(ctx: CheckContext): Finding[];
}

export function finding(
  check: CheckId,
  level: FindingLevel,
  message: string,
  samples?: string[],
): Finding {
  return samples && samples.length > 0
    ? { check, level, message, samples }
    : { check, level, message };
}
