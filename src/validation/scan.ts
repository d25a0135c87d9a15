/**
 * 逐行扫描工具（检查项共用）。
 *
 * 关键点（中文）
 * - 含 NUL 字符的文件视为二进制，跳过。
 * - match 回调拿到两个参数：行文本，以及 `path:text` 形式的位置串（忽略规则作用在后者上）。
 * - skipFrontMatter 时跳过文件开头的 front-matter 块，行号仍按整个文件计算。
 */

import fg from "fast-glob";
import fs from "fs-extra";
import { toPosixRelative } from "../project/paths.js";
import { parseFrontMatter } from "../skills/frontmatter.js";
import { getLogger } from "../utils/logger/logger.js";

export type LineHit = {
  file: string;
  line: number;
  text: string;
};

const MAX_SAMPLE_CHARS = 160;

export function listFilesRecursive(dir: string): string[] {
  if (!fs.existsSync(dir)) return [];
  return fg
    .sync("**/*", {
      cwd: dir,
      onlyFiles: true,
      dot: true,
      absolute: true,
      followSymbolicLinks: true,
    })
    .sort();
}

export function readTextFile(file: string): string | null {
  let content: string;
  try {
    content = fs.readFileSync(file, "utf-8");
  } catch (error) {
    getLogger().debug(`Cannot read ${file}`, { error: String(error) });
    return null;
  }
  if (content.includes("\u0000")) return null;
  return content;
}

export type ScanOptions = {
  skipFrontMatter?: boolean;
};

function frontMatterLineCount(content: string): number {
  const { frontMatterYaml } = parseFrontMatter(content);
  if (frontMatterYaml === null) return 0;
  // 两行 `---` 分隔符 + YAML 本体
  return frontMatterYaml.split(/\r?\n/).length + 2;
}

export function scanLines(
  root: string,
  dir: string,
  match: (text: string, location: string) => boolean,
  options: ScanOptions = {},
): LineHit[] {
  const hits: LineHit[] = [];
  for (const file of listFilesRecursive(dir)) {
    const content = readTextFile(file);
    if (content === null) continue;
    const rel = toPosixRelative(root, file);
    const skip = options.skipFrontMatter ? frontMatterLineCount(content) : 0;
    content.split(/\r?\n/).forEach((text, index) => {
      if (index < skip) return;
      if (match(text, `${rel}:${text}`)) {
        hits.push({ file: rel, line: index + 1, text });
      }
    });
  }
  return hits;
}

export function formatHit(hit: LineHit): string {
  const text = hit.text.trim();
  const clipped =
    text.length > MAX_SAMPLE_CHARS ? `${text.slice(0, MAX_SAMPLE_CHARS)}…` : text;
  return `${hit.file}:${hit.line}: ${clipped}`;
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
