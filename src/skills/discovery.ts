/**
 * Skills discovery：扫描仓库并生成 skill 索引。
 *
 * 关键点（中文）
 * - 目录布局固定两层：`<skillsDir>/<category>/<skill>/SKILL.md`。
 * - 同步实现：一次命令只扫描一次，后续所有检查共享同一份结果。
 * - 缺失 SKILL.md 的目录同样记录（skillMdPath=null），由 structure 检查报错。
 */

import fg from "fast-glob";
import fs from "fs-extra";
import path from "path";
import { getSkillsDirPath, toPosixRelative } from "../project/paths.js";
import type { SkillbaseConfig } from "../types/config.js";
import type {
  CategoryEntry,
  SkillEntry,
  SkillRepository,
} from "../types/skill.js";
import { getLogger } from "../utils/logger/logger.js";
import { loadFrontMatter } from "./frontmatter.js";
import { isDirectorySync, isFileSync, listVisibleDirectories } from "./utils.js";

function listReferenceFiles(skillDir: string): string[] {
  const referencesDir = path.join(skillDir, "references");
  if (!isDirectorySync(referencesDir)) return [];
  return fg
    .sync("**/*.md", { cwd: referencesDir, onlyFiles: true, dot: false })
    .map((file) => `references/${file}`)
    .sort();
}

function readSkill(
  root: string,
  category: string,
  categoryDir: string,
  id: string,
): SkillEntry {
  const directoryPath = path.join(categoryDir, id);
  const skillMdPath = path.join(directoryPath, "SKILL.md");
  const base = {
    id,
    category,
    directoryPath,
    relativePath: toPosixRelative(root, directoryPath),
    referenceFiles: listReferenceFiles(directoryPath),
  };

  if (!isFileSync(skillMdPath)) {
    return {
      ...base,
      skillMdPath: null,
      content: "",
      frontMatter: { status: "missing" },
    };
  }

  let content = "";
  try {
    content = fs.readFileSync(skillMdPath, "utf-8");
  } catch (error) {
    getLogger().debug(`Cannot read ${skillMdPath}`, { error: String(error) });
  }

  const { result } = loadFrontMatter(content);
  return { ...base, skillMdPath, content, frontMatter: result };
}

/**
 * 发现算法（中文）
 * 1) skillsDir 下每个可见目录是一个 category
 * 2) category 下每个可见目录是一个 skill
 * 3) 读取 SKILL.md 与 frontmatter、枚举 references/
 * 4) category/skill 均按名称排序，保证输出稳定
 */
export function discoverSkillRepository(
  projectRoot: string,
  config: SkillbaseConfig,
): SkillRepository {
  const root = path.resolve(projectRoot);
  const skillsDirPath = getSkillsDirPath(root, config);

  if (!isDirectorySync(skillsDirPath)) {
    return { root, skillsDirPath, exists: false, categories: [] };
  }

  const categories: CategoryEntry[] = listVisibleDirectories(skillsDirPath).map(
    (name) => {
      const directoryPath = path.join(skillsDirPath, name);
      const skills = listVisibleDirectories(directoryPath).map((id) =>
        readSkill(root, name, directoryPath, id),
      );
      return {
        name,
        directoryPath,
        relativePath: toPosixRelative(root, directoryPath),
        skills,
      };
    },
  );

  getLogger().debug("Skill repository discovered", {
    root,
    categories: categories.length,
    skills: categories.reduce((sum, c) => sum + c.skills.length, 0),
  });

  return { root, skillsDirPath, exists: true, categories };
}

export function allSkills(repository: SkillRepository): SkillEntry[] {
  return repository.categories.flatMap((category) => category.skills);
}
