/**
 * 配置读取工具模块。
 *
 * 职责说明：
 * 1. 从仓库根目录加载 `.env`，仅加载当前仓库，不向上级目录递归查找。
 * 2. 读取 `skillbase.json` 并将 `${ENV_KEY}` 占位符解析为环境变量值。
 * 3. 用 zod 校验并补全默认值，业务模块只拿到完整的 SkillbaseConfig。
 */
import dotenv from "dotenv";
import fs from "fs-extra";
import type { ZodIssue } from "zod";
import {
  LogLevelSchema,
  SkillbaseConfigSchema,
} from "../schemas/config-schema.js";
import type { SkillbaseConfig } from "../types/config.js";
import { isRecord } from "../types/json.js";
import { CONFIG_FILE_NAME } from "./defaults.js";
import { getConfigPath, getDotenvPath } from "./paths.js";

export type { SkillbaseConfig };

export function loadProjectDotenv(projectRoot: string): void {
  // 仅加载仓库根目录 .env（不向上搜索）
  dotenv.config({ path: getDotenvPath(projectRoot) });
}

export function resolveEnvPlaceholdersDeep(value: unknown): unknown {
  if (typeof value === "string") {
    const match = value.match(/^\$\{([A-Z0-9_]+)\}$/);
    if (!match) return value;
    return process.env[match[1]];
  }

  if (Array.isArray(value)) {
    return value.map((item) => resolveEnvPlaceholdersDeep(item));
  }

  if (isRecord(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = resolveEnvPlaceholdersDeep(v);
    }
    return out;
  }

  return value;
}

function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => {
      const at = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `- ${at}: ${issue.message}`;
    })
    .join("\n");
}

export function parseSkillbaseConfig(raw: unknown): SkillbaseConfig {
  const result = SkillbaseConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new Error(
      `Invalid ${CONFIG_FILE_NAME}:\n${formatIssues(result.error.issues)}`,
    );
  }
  return result.data;
}

export function getDefaultConfig(): SkillbaseConfig {
  return SkillbaseConfigSchema.parse({});
}

/**
 * 加载仓库配置。
 *
 * 流程（中文）
 * 1) `.env` -> process.env
 * 2) 读取 `skillbase.json`（不存在则视为空对象）
 * 3) 占位符替换 + schema 校验
 * 4) `SKILLBASE_LOG_LEVEL` 覆盖 logging.level
 */
export function loadSkillbaseConfig(projectRoot: string): SkillbaseConfig {
  loadProjectDotenv(projectRoot);

  const configPath = getConfigPath(projectRoot);
  let raw: unknown = {};
  if (fs.existsSync(configPath)) {
    try {
      raw = fs.readJsonSync(configPath);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to read ${CONFIG_FILE_NAME}: ${reason}`);
    }
  }

  const config = parseSkillbaseConfig(resolveEnvPlaceholdersDeep(raw));

  const envLevel = process.env.SKILLBASE_LOG_LEVEL;
  if (envLevel && envLevel.trim()) {
    const level = LogLevelSchema.safeParse(envLevel.trim().toLowerCase());
    if (!level.success) {
      throw new Error(
        `Invalid SKILLBASE_LOG_LEVEL: ${envLevel} (expected one of ${LogLevelSchema.options.join(", ")})`,
      );
    }
    config.logging.level = level.data;
  }

  return config;
}
