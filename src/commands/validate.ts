/**
 * `skillbase validate`：校验 skill 仓库结构与规则。
 *
 * 退出码
 * - 0：通过
 * - 1：存在 error（strict 模式下 warning 也算），或命令本身失败
 */

import { getLogger } from "../utils/logger/logger.js";
import { formatReport, reportToJson } from "../validation/report.js";
import { validateRepository } from "../validation/validator.js";
import { openProject, reportCommandError } from "./project.js";
import type { ValidateCommandOptions } from "./types/validate.js";

function shouldUseColor(options: ValidateCommandOptions): boolean {
  if (options.color === false) return false;
  if (process.env.NO_COLOR) return false;
  return Boolean(process.stdout.isTTY);
}

export async function validateCommand(
  cwd: string = ".",
  options: ValidateCommandOptions = {},
): Promise<void> {
  try {
    const { root, config } = openProject(cwd);
    getLogger().info(`Validating ${root}`);

    const report = validateRepository(root, config, { strict: options.strict });

    if (options.json) {
      console.log(JSON.stringify(reportToJson(report), null, 2));
    } else {
      for (const line of formatReport(report, { color: shouldUseColor(options) })) {
        console.log(line);
      }
    }

    if (!report.passed) process.exitCode = 1;
  } catch (error) {
    reportCommandError(error);
  } finally {
    await getLogger().flush();
  }
}
