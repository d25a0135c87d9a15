/**
 * 仓库校验入口。
 *
 * 流程（中文）
 * 1) discovery 扫描一次，所有检查共享结果
 * 2) 按固定顺序执行未禁用的检查
 * 3) 汇总 error/warning 计数，strict 模式下 warning 同样判失败
 */

import path from "path";
import { discoverSkillRepository } from "../skills/discovery.js";
import type { SkillbaseConfig } from "../types/config.js";
import type { CheckResult, ValidationReport } from "../types/report.js";
import { getLogger } from "../utils/logger/logger.js";
import { formatDuration } from "../utils/time.js";
import { REPOSITORY_CHECKS } from "./checks/index.js";
import type { CheckContext } from "./types.js";

export type ValidateOptions = {
  strict?: boolean;
};

export function validateRepository(
  projectRoot: string,
  config: SkillbaseConfig,
  options: ValidateOptions = {},
): ValidationReport {
  const startedAt = Date.now();
  const root = path.resolve(projectRoot);
  const strict = Boolean(options.strict);
  const logger = getLogger();

  const ctx: CheckContext = {
    root,
    config,
    repository: discoverSkillRepository(root, config),
  };

  const results: CheckResult[] = [];
  for (const check of REPOSITORY_CHECKS) {
    if (config.disabledChecks.includes(check.id)) {
      logger.debug(`Check skipped: ${check.id}`);
      continue;
    }
    const findings = check.run(ctx);
    logger.debug(`Check finished: ${check.id}`, { findings: findings.length });
    results.push({ check: check.id, title: check.title(ctx), findings });
  }

  let errors = 0;
  let warnings = 0;
  for (const result of results) {
    for (const f of result.findings) {
      if (f.level === "error") errors += 1;
      else if (f.level === "warning") warnings += 1;
    }
  }

  const durationMs = Date.now() - startedAt;
  logger.debug(`Validation finished in ${formatDuration(durationMs)}`, {
    errors,
    warnings,
  });

  return {
    root,
    strict,
    results,
    errors,
    warnings,
    passed: errors === 0 && (!strict || warnings === 0),
    durationMs,
  };
}
