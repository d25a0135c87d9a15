/**
 * 文档间引用提取。
 *
 * 关键点（中文）
 * - 只识别两种约定写法：`references/x.md` 路径，以及 "See `code/api-design` skill"。
 * - 只做文本提取，不加载被引用的文档。
 */

export type ReferenceMention = {
  target: string;
  line: number;
};

export type SkillMention = {
  category: string;
  name: string;
  line: number;
};

// 前面不能紧跟路径字符：`skills/data/x/references/a.md` 这种长路径不算；
// `.md` 之后不能继续路径（`a.md-old`、`a.md.bak`），句末的 `.` 仍可。
const REFERENCE_PATH_PATTERN =
  /(?<![\w./-])references\/[\w./-]+?\.md(?![\w/-]|\.\w)/g;

const SKILL_MENTION_PATTERN = /`([a-z][a-z0-9-]*)\/([a-z][a-z0-9-]*)`\s+skill\b/g;

function splitLines(text: string): string[] {
  return String(text ?? "").split(/\r?\n/);
}

export function extractReferencePaths(text: string): ReferenceMention[] {
  const out: ReferenceMention[] = [];
  splitLines(text).forEach((lineText, index) => {
    for (const match of lineText.matchAll(REFERENCE_PATH_PATTERN)) {
      out.push({ target: match[0], line: index + 1 });
    }
  });
  return out;
}

export function extractSkillReferences(text: string): SkillMention[] {
  const out: SkillMention[] = [];
  splitLines(text).forEach((lineText, index) => {
    for (const match of lineText.matchAll(SKILL_MENTION_PATTERN)) {
      out.push({ category: match[1], name: match[2], line: index + 1 });
    }
  });
  return out;
}
