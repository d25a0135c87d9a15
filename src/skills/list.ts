import type { SkillbaseConfig } from "../types/config.js";
import type { SkillSummary } from "../types/skill.js";
import { allSkills, discoverSkillRepository } from "./discovery.js";
import { readSkillFrontMatter } from "./metadata.js";

export type ListSkillsOptions = {
  category?: string;
};

/**
 * 列出可读 front-matter 的 skills。
 *
 * 关键点（中文）
 * - 缺失/损坏 front-matter 的 skill 不出现在列表里（validate 会报错）。
 * - name 缺省回退为目录名，description 缺省为空串。
 */
export function listSkills(
  projectRoot: string,
  config: SkillbaseConfig,
  options: ListSkillsOptions = {},
): SkillSummary[] {
  const repository = discoverSkillRepository(projectRoot, config);
  const category = options.category?.trim();
  const out: SkillSummary[] = [];

  for (const skill of allSkills(repository)) {
    if (category && skill.category !== category) continue;
    if (skill.frontMatter.status !== "ok") continue;
    const fm = readSkillFrontMatter(skill.frontMatter.data, skill.id);
    out.push({
      id: skill.id,
      category: skill.category,
      name: fm.name,
      description: fm.description,
      ...(fm.metadata.version ? { version: fm.metadata.version } : {}),
      allowedTools: fm.allowedTools,
      path: skill.relativePath,
    });
  }

  return out;
}
