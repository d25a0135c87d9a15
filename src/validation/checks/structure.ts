import type { Finding } from "../../types/report.js";
import { finding, type RepositoryCheck } from "../types.js";

/**
 * 目录结构：category 是否为标准分类、每个 skill 目录是否有 SKILL.md。
 */
export const structureCheck: RepositoryCheck = {
  id: "structure",
  title: () => "category structure",
  run({ config, repository }) {
    if (!repository.exists) {
      return [
        finding("structure", "warning", `${config.skillsDir}/ directory not found`),
      ];
    }

    const out: Finding[] = [];
    for (const category of repository.categories) {
      if (config.categories.includes(category.name)) {
        out.push(
          finding("structure", "ok", `${category.relativePath} is a valid category`),
        );
      } else {
        out.push(
          finding(
            "structure",
            "warning",
            `${category.relativePath} is not a standard category`,
          ),
        );
      }

      for (const skill of category.skills) {
        out.push(
          skill.skillMdPath
            ? finding("structure", "ok", `${skill.relativePath} has SKILL.md`)
            : finding("structure", "error", `${skill.relativePath} is missing SKILL.md`),
        );
      }
    }
    return out;
  },
};
