/**
 * `skillbase new <category> <name>`：生成 knowledge skill 骨架。
 *
 * 关键点（中文）
 * - 交互终端下未传 --description 时询问一次；直接回车则保留占位符。
 * - 非交互环境（CI/管道）不提问。
 */

import prompts from "prompts";
import { toPosixRelative } from "../project/paths.js";
import { scaffoldSkill, validateNewSkillInput } from "../skills/scaffold.js";
import { getLogger } from "../utils/logger/logger.js";
import { openProject, reportCommandError } from "./project.js";
import type { NewSkillCommandOptions } from "./types/new-skill.js";

async function askDescription(): Promise<string | undefined> {
  const response = await prompts({
    type: "text",
    name: "description",
    message: "One-line description (leave empty to fill in later)",
  });
  const value: unknown = response.description;
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

export async function newSkillCommand(
  category: string,
  name: string,
  options: NewSkillCommandOptions = {},
): Promise<void> {
  try {
    const { root, config } = openProject(options.root);
    validateNewSkillInput(category, name, config);

    let description = options.description;
    if (description === undefined && process.stdin.isTTY) {
      description = await askDescription();
    }

    const result = await scaffoldSkill({
      root,
      category,
      name,
      description,
      config,
    });

    const rel = toPosixRelative(root, result.skillMdPath);
    getLogger().action(`Created ${rel}`, { template: result.templateSource });
    console.log(`✅ Created ${rel}`);
    if (!description) {
      console.log(
        `Next: edit ${rel} and replace __DESCRIPTION__ with actual description`,
      );
    }
  } catch (error) {
    reportCommandError(error);
  } finally {
    await getLogger().flush();
  }
}
