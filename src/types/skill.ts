/**
 * Knowledge skill 模型。
 *
 * 说明（中文）
 * - skill 的最小单元是一个目录：`<skillsDir>/<category>/<skill-id>/SKILL.md`
 * - discovery 只读取文件，不做任何校验；校验结果由 validation 产出 finding
 */

export type FrontMatterLoadResult =
  | { status: "missing" }
  | { status: "invalid"; reason: string }
  | { status: "not-mapping" }
  | { status: "ok"; data: Record<string, unknown> };

export type AllowedToolsFormat = "list" | "string" | "none";

export type SkillFrontMatter = {
  name: string;
  description: string;
  license?: string;
  compatibility?: string;
  allowedTools: string[];
  /**
   * 原始写法：YAML 列表 / 空格分隔字符串 / 未声明。
   */
  allowedToolsFormat: AllowedToolsFormat;
  userInvocable?: boolean;
  metadata: {
    author?: string;
    version?: string;
    category?: string;
  };
};

export type SkillEntry = {
  /**
   * skill id（目录名）。
   */
  id: string;
  category: string;
  directoryPath: string;
  /**
   * 相对仓库根目录的 POSIX 路径，例如 `skills/data/sql-design`。
   */
  relativePath: string;
  /**
   * SKILL.md 不存在时为 null。
   */
  skillMdPath: string | null;
  content: string;
  frontMatter: FrontMatterLoadResult;
  /**
   * `references/` 下的 Markdown 文件，相对 skill 目录（`references/x.md`）。
   */
  referenceFiles: string[];
};

export type CategoryEntry = {
  name: string;
  directoryPath: string;
  relativePath: string;
  skills: SkillEntry[];
};

export type SkillRepository = {
  root: string;
  skillsDirPath: string;
  exists: boolean;
  categories: CategoryEntry[];
};

export type SkillSummary = {
  id: string;
  category: string;
  name: string;
  description: string;
  version?: string;
  allowedTools: string[];
  path: string;
};
