/**
 * 新建 knowledge skill 骨架。
 *
 * 关键点（中文）
 * - 模板优先取仓库内 `.templates/knowledge-skill/SKILL.md`，没有时使用发布包内置模板。
 * - 不传 description 时保留 `__DESCRIPTION__` 占位符，由作者手动补写。
 * - frontmatter 内的 description 按 YAML 标量写入（含 `: `、`#` 等也能解析）；正文里原样替换。
 */

import fs from "fs-extra";
import yaml from "js-yaml";
import path from "path";
import { parseFrontMatter } from "./frontmatter.js";
import { KNOWLEDGE_SKILL_TEMPLATE } from "../project/defaults.js";
import { resolvePackageAsset } from "../project/package-assets.js";
import { getRepositoryTemplatePath, getSkillsDirPath } from "../project/paths.js";
import type { SkillbaseConfig } from "../types/config.js";
import { getLogger } from "../utils/logger/logger.js";

export const NEW_SKILL_NAME_PATTERN = /^[a-z][-a-z]*$/;

export type ScaffoldSkillInput = {
  root: string;
  category: string;
  name: string;
  description?: string;
  config: SkillbaseConfig;
};

export type ScaffoldSkillResult = {
  skillDir: string;
  skillMdPath: string;
  templateSource: "repository" | "builtin";
};

export function validateNewSkillInput(
  category: string,
  name: string,
  config: SkillbaseConfig,
): void {
  if (!category || !name) {
    throw new Error("Usage: skillbase new <category> <name>");
  }
  if (!config.categories.includes(category)) {
    throw new Error(
      `CATEGORY must be one of: ${config.categories.join(", ")}`,
    );
  }
  if (!NEW_SKILL_NAME_PATTERN.test(name)) {
    throw new Error(
      `NAME must match ${NEW_SKILL_NAME_PATTERN.source} (lowercase, hyphenated)`,
    );
  }
  if (name.startsWith("x-")) {
    throw new Error(
      "NAME must NOT start with x- (knowledge skills don't use x- prefix)",
    );
  }
}

function toYamlScalar(value: string): string {
  return yaml.dump(value, { lineWidth: -1 }).trimEnd();
}

// 替换值用函数给出：`$&`、`$$` 等不被当作替换模式
function fill(text: string, placeholder: string, value: string): string {
  return text.replaceAll(placeholder, () => value);
}

export function renderSkillTemplate(
  template: string,
  values: { name: string; category: string; description?: string },
): string {
  let out = fill(template, "__NAME__", values.name);
  out = fill(out, "__CATEGORY__", values.category);
  const description = values.description?.trim();
  if (!description) return out;

  const { frontMatterYaml, body } = parseFrontMatter(out);
  if (frontMatterYaml === null) return fill(out, "__DESCRIPTION__", description);
  const header = out.slice(0, out.length - body.length);
  return (
    fill(header, "__DESCRIPTION__", toYamlScalar(description)) +
    fill(body, "__DESCRIPTION__", description)
  );
}

function readTemplate(
  root: string,
  config: SkillbaseConfig,
): { template: string; source: ScaffoldSkillResult["templateSource"] } {
  const repositoryTemplate = getRepositoryTemplatePath(root, config);
  if (fs.existsSync(repositoryTemplate)) {
    return {
      template: fs.readFileSync(repositoryTemplate, "utf-8"),
      source: "repository",
    };
  }
  const builtin = resolvePackageAsset(
    "templates",
    KNOWLEDGE_SKILL_TEMPLATE,
    "SKILL.md",
  );
  return { template: fs.readFileSync(builtin, "utf-8"), source: "builtin" };
}

export async function scaffoldSkill(
  input: ScaffoldSkillInput,
): Promise<ScaffoldSkillResult> {
  const root = path.resolve(input.root);
  const category = String(input.category || "").trim();
  const name = String(input.name || "").trim();
  validateNewSkillInput(category, name, input.config);

  const skillsDir = getSkillsDirPath(root, input.config);
  const skillDir = path.join(skillsDir, category, name);
  const displayDir = `${input.config.skillsDir}/${category}/${name}`;
  if (await fs.pathExists(skillDir)) {
    throw new Error(`${displayDir} already exists`);
  }

  const { template, source } = readTemplate(root, input.config);
  const skillMdPath = path.join(skillDir, "SKILL.md");

  await fs.ensureDir(path.join(skillDir, "references"));
  await fs.writeFile(
    skillMdPath,
    renderSkillTemplate(template, {
      name,
      category,
      description: input.description,
    }),
    "utf-8",
  );

  getLogger().debug(`Scaffolded ${displayDir}`, { template: source });
  return { skillDir, skillMdPath, templateSource: source };
}
