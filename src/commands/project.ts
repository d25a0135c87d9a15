/**
 * 命令层公共准备：解析根目录、加载配置、配置 logger。
 */

import path from "path";
import { loadSkillbaseConfig } from "../project/config.js";
import type { SkillbaseConfig } from "../types/config.js";
import { getLogger } from "../utils/logger/logger.js";

export type OpenedProject = {
  root: string;
  config: SkillbaseConfig;
};

export function openProject(cwd: string = "."): OpenedProject {
  const root = path.resolve(String(cwd || "."));
  const config = loadSkillbaseConfig(root);
  const logger = getLogger();
  logger.setLevel(config.logging.level);
  logger.bindProjectRoot(root, config.logging.persist);
  return { root, config };
}

export function reportCommandError(error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`❌ ${message}`);
  process.exitCode = 1;
}
