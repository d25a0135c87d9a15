/**
 * front-matter -> SkillFrontMatter 归一化。
 *
 * 关键点（中文）
 * - 这里是宽松读取：字段类型不对就当作缺省，不报错（报错由 schema 校验负责）。
 * - list 命令与 allowed-tools 写法统计都依赖这里。
 */

import { isRecord } from "../types/json.js";
import type { AllowedToolsFormat, SkillFrontMatter } from "../types/skill.js";

export function normalizeAllowedTools(value: unknown): {
  tools: string[];
  format: AllowedToolsFormat;
} {
  if (Array.isArray(value)) {
    const tools = value
      .filter((item): item is string => typeof item === "string")
      .map((item) => item.trim())
      .filter(Boolean);
    return { tools, format: "list" };
  }

  if (typeof value === "string") {
    let text = value.trim();
    // `"[Read, Grep]"` 这种带引号的列表写法
    if (text.startsWith("[") && text.endsWith("]")) text = text.slice(1, -1);
    const tools = text
      .split(/[\s,]+/)
      .map((item) => item.trim())
      .filter(Boolean);
    return { tools, format: "string" };
  }

  return { tools: [], format: "none" };
}

function readString(value: unknown): string | undefined {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed ? trimmed : undefined;
  }
  if (typeof value === "number") return String(value);
  return undefined;
}

export function readSkillFrontMatter(
  data: Record<string, unknown>,
  fallbackName: string,
): SkillFrontMatter {
  const meta: Record<string, unknown> = isRecord(data.metadata)
    ? data.metadata
    : {};
  const { tools, format } = normalizeAllowedTools(
    data["allowed-tools"] ?? data.allowedTools ?? data.allowed_tools,
  );
  const userInvocable = data["user-invocable"];

  return {
    name: readString(data.name) ?? fallbackName,
    description: readString(data.description) ?? "",
    license: readString(data.license),
    compatibility: readString(data.compatibility),
    allowedTools: tools,
    allowedToolsFormat: format,
    userInvocable: typeof userInvocable === "boolean" ? userInvocable : undefined,
    metadata: {
      author: readString(meta.author),
      version: readString(meta.version),
      category: readString(meta.category),
    },
  };
}
