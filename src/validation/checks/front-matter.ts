/**
 * front-matter 校验。
 *
 * 关键点（中文）
 * - name/description 违规记 error，其余约定字段违规记 warning。
 * - 跨 skill 规则：name 唯一、allowed-tools 写法统一。
 */

import {
  REQUIRED_FRONT_MATTER_FIELDS,
  SkillFrontMatterSchema,
} from "../../schemas/skill-frontmatter-schema.js";
import { allSkills } from "../../skills/discovery.js";
import { readSkillFrontMatter } from "../../skills/metadata.js";
import type { Finding } from "../../types/report.js";
import type { SkillEntry } from "../../types/skill.js";
import { finding, type RepositoryCheck } from "../types.js";

type SkillFrontMatterFindings = {
  findings: Finding[];
  declaredName?: string;
  allowedToolsFormat?: "list" | "string";
};

function checkSkill(skill: SkillEntry): SkillFrontMatterFindings {
  const file = `${skill.relativePath}/SKILL.md`;
  const fm = skill.frontMatter;

  if (fm.status === "missing") {
    return {
      findings: [
        finding("front-matter", "error", `${file} has no front-matter block`),
      ],
    };
  }
  if (fm.status === "invalid") {
    return {
      findings: [
        finding(
          "front-matter",
          "error",
          `${file} front-matter is not valid YAML: ${fm.reason}`,
        ),
      ],
    };
  }
  if (fm.status === "not-mapping") {
    return {
      findings: [
        finding("front-matter", "error", `${file} front-matter is not a mapping`),
      ],
    };
  }

  const findings: Finding[] = [];
  const parsed = SkillFrontMatterSchema.safeParse(fm.data);
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      const field = issue.path.length > 0 ? issue.path.join(".") : "front-matter";
      const level = REQUIRED_FRONT_MATTER_FIELDS.includes(String(issue.path[0]))
        ? "error"
        : "warning";
      findings.push(
        finding("front-matter", level, `${file}: ${field} ${issue.message}`),
      );
    }
  }

  const meta = readSkillFrontMatter(fm.data, skill.id);
  if (meta.name !== skill.id) {
    findings.push(
      finding(
        "front-matter",
        "warning",
        `${file}: name "${meta.name}" does not match directory "${skill.id}"`,
      ),
    );
  }
  if (meta.metadata.category && meta.metadata.category !== skill.category) {
    findings.push(
      finding(
        "front-matter",
        "warning",
        `${file}: metadata.category "${meta.metadata.category}" does not match category directory "${skill.category}"`,
      ),
    );
  }

  if (findings.length === 0) {
    findings.push(finding("front-matter", "ok", `${file} front-matter is valid`));
  }

  const rawName = fm.data.name;
  return {
    findings,
    declaredName:
      typeof rawName === "string" && rawName.trim() ? rawName.trim() : undefined,
    allowedToolsFormat:
      meta.allowedToolsFormat === "none" ? undefined : meta.allowedToolsFormat,
  };
}

export const frontMatterCheck: RepositoryCheck = {
  id: "front-matter",
  title: () => "skill front-matter",
  run({ repository }) {
    const out: Finding[] = [];
    const declaredBy = new Map<string, string[]>();
    const formatCounts = { list: 0, string: 0 };

    for (const skill of allSkills(repository)) {
      if (!skill.skillMdPath) continue;
      const result = checkSkill(skill);
      out.push(...result.findings);

      if (result.declaredName) {
        const paths = declaredBy.get(result.declaredName) ?? [];
        paths.push(skill.relativePath);
        declaredBy.set(result.declaredName, paths);
      }
      if (result.allowedToolsFormat) formatCounts[result.allowedToolsFormat] += 1;
    }

    for (const [name, paths] of declaredBy) {
      if (paths.length < 2) continue;
      out.push(
        finding(
          "front-matter",
          "error",
          `Skill name "${name}" is declared by ${paths.join(", ")}`,
        ),
      );
    }

    if (formatCounts.list > 0 && formatCounts.string > 0) {
      out.push(
        finding(
          "front-matter",
          "warning",
          `allowed-tools uses mixed formats: list in ${formatCounts.list} skill(s), string in ${formatCounts.string} skill(s)`,
        ),
      );
    }

    return out;
  },
};
