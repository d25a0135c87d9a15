/**
 * 引用校验：`references/*.md` 是否存在、是否有孤立的 reference 文件、
 * "See `category/skill` skill" 是否指向已存在的 skill。
 */

import path from "path";
import { allSkills } from "../../skills/discovery.js";
import {
  extractReferencePaths,
  extractSkillReferences,
} from "../../skills/references.js";
import { isFileSync } from "../../skills/utils.js";
import type { Finding } from "../../types/report.js";
import type { SkillEntry } from "../../types/skill.js";
import { readTextFile } from "../scan.js";
import { finding, type RepositoryCheck } from "../types.js";

type SkillDocument = {
  /**
   * 相对 skill 目录：`SKILL.md` 或 `references/x.md`。
   */
  docPath: string;
  content: string;
};

function collectDocuments(skill: SkillEntry): SkillDocument[] {
  const docs: SkillDocument[] = [];
  if (skill.skillMdPath) docs.push({ docPath: "SKILL.md", content: skill.content });
  for (const ref of skill.referenceFiles) {
    const content = readTextFile(path.join(skill.directoryPath, ref));
    if (content !== null) docs.push({ docPath: ref, content });
  }
  return docs;
}

export const referencesCheck: RepositoryCheck = {
  id: "references",
  title: () => "skill references",
  run({ repository }) {
    const skills = allSkills(repository);
    if (skills.length === 0) {
      return [finding("references", "ok", "No skills to check")];
    }

    const known = new Set(skills.map((s) => `${s.category}/${s.id}`));
    const out: Finding[] = [];
    let resolved = 0;

    for (const skill of skills) {
      const mentioned = new Set<string>();

      for (const doc of collectDocuments(skill)) {
        const docRel = `${skill.relativePath}/${doc.docPath}`;

        for (const mention of extractReferencePaths(doc.content)) {
          const target = path.posix.normalize(mention.target);
          if (target !== doc.docPath) mentioned.add(target);
          if (isFileSync(path.join(skill.directoryPath, target))) {
            resolved += 1;
          } else {
            out.push(
              finding(
                "references",
                "error",
                `${docRel}:${mention.line} references missing file ${mention.target}`,
              ),
            );
          }
        }

        for (const mention of extractSkillReferences(doc.content)) {
          const key = `${mention.category}/${mention.name}`;
          if (known.has(key)) continue;
          out.push(
            finding(
              "references",
              "warning",
              `${docRel}:${mention.line} refers to unknown skill ${key}`,
            ),
          );
        }
      }

      for (const ref of skill.referenceFiles) {
        if (mentioned.has(ref)) continue;
        out.push(
          finding(
            "references",
            "warning",
            `${skill.relativePath}/${ref} is never referenced`,
          ),
        );
      }
    }

    if (out.length === 0) {
      out.push(
        finding(
          "references",
          "ok",
          `${resolved} reference(s) resolved across ${skills.length} skill(s)`,
        ),
      );
    }
    return out;
  },
};
