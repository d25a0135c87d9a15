/**
 * Markdown frontmatter parser。
 *
 * 关键点（中文）
 * - 解析规则保持稳定：仅识别文档起始的 `--- yaml ---` 头块（忽略开头的 BOM）。
 * - YAML 解析失败不抛异常，以结果类型返回，交给校验层变成 finding。
 */

import yaml from "js-yaml";
import { isRecord } from "../types/json.js";
import type { FrontMatterLoadResult } from "../types/skill.js";

export type FrontMatterParseResult = {
  frontMatterYaml: string | null;
  body: string;
};

export function parseFrontMatter(markdown: string): FrontMatterParseResult {
  // 兼容带 UTF-8 BOM 保存的文件
  const text = String(markdown ?? "").replace(/^\uFEFF/, "");
  if (!text.startsWith("---")) return { frontMatterYaml: null, body: text };

  const match = text.match(/^---\r?\n([\s\S]*?)\r?\n---(?:\r?\n|$)/);
  if (!match) return { frontMatterYaml: null, body: text };

  const frontMatterYaml = match[1] ?? "";
  const body = text.slice(match[0].length);
  return { frontMatterYaml, body };
}

export function loadFrontMatter(markdown: string): {
  result: FrontMatterLoadResult;
  body: string;
} {
  const { frontMatterYaml, body } = parseFrontMatter(markdown);
  if (frontMatterYaml === null) return { result: { status: "missing" }, body };

  let loaded: unknown;
  try {
    loaded = yaml.load(frontMatterYaml);
  } catch (error) {
    const reason =
      error instanceof yaml.YAMLException
        ? error.reason
        : error instanceof Error
          ? error.message
          : String(error);
    return { result: { status: "invalid", reason }, body };
  }

  if (!isRecord(loaded)) return { result: { status: "not-mapping" }, body };
  return { result: { status: "ok", data: loaded }, body };
}
