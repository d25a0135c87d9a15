/**
 * 路径构造工具模块。
 *
 * 职责说明：
 * 1. 统一管理仓库内 skills / 模板 / 配置 / `.skillbase` 路径规则。
 * 2. finding 中展示的路径统一为相对仓库根目录的 POSIX 形式。
 */
import path from "path";
import type { SkillbaseConfig } from "../types/config.js";
import {
  CONFIG_FILE_NAME,
  KNOWLEDGE_SKILL_TEMPLATE,
  STATE_DIR_NAME,
} from "./defaults.js";

export function getConfigPath(cwd: string): string {
  return path.join(cwd, CONFIG_FILE_NAME);
}

export function getDotenvPath(cwd: string): string {
  return path.join(cwd, ".env");
}

export function getSkillsDirPath(cwd: string, config: SkillbaseConfig): string {
  return path.resolve(cwd, config.skillsDir);
}

export function getRulesFilePath(cwd: string, config: SkillbaseConfig): string {
  return path.resolve(cwd, config.rulesFile);
}

export function getRepositoryTemplatePath(
  cwd: string,
  config: SkillbaseConfig,
): string {
  return path.resolve(
    cwd,
    config.templatesDir,
    KNOWLEDGE_SKILL_TEMPLATE,
    "SKILL.md",
  );
}

export function getStateDirPath(cwd: string): string {
  return path.join(cwd, STATE_DIR_NAME);
}

export function getLogsDirPath(cwd: string): string {
  return path.join(getStateDirPath(cwd), "logs");
}

export function toPosixRelative(root: string, target: string): string {
  return path.relative(root, target).split(path.sep).join("/");
}
