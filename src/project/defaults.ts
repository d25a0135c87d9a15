/**
 * 默认配置常量。
 *
 * 关键点（中文）
 * - 与 `skillbase.json` 缺省字段一一对应；schema 的 default 直接引用这里。
 * - 正则以 source 字符串保存，便于写进 JSON 配置覆盖。
 */

export const CONFIG_FILE_NAME = "skillbase.json";

export const STATE_DIR_NAME = ".skillbase";

export const DEFAULT_SKILLS_DIR = "skills";

export const DEFAULT_RULES_FILE = ".claude/rules.md";

export const DEFAULT_TEMPLATES_DIR = ".templates";

export const KNOWLEDGE_SKILL_TEMPLATE = "knowledge-skill";

export const DEFAULT_CATEGORIES: readonly string[] = [
  "security",
  "quality",
  "code",
  "data",
  "delivery",
  "operations",
  "meta",
];

export const DEFAULT_FORBIDDEN_TERMS: readonly string[] = [
  "ccsetup",
  "x-workflows",
];

export const DEFAULT_CREDENTIAL_CATEGORIES: readonly string[] = ["security"];

export const DEFAULT_CREDENTIAL_MIN_LENGTH = 32;

export const DEFAULT_CREDENTIAL_ALLOW_PATTERNS: readonly string[] = [
  "placeholder",
  "example",
  "<.*>",
  "\\$\\{",
  "your-",
];

export const DEFAULT_STEP_PATTERNS: readonly string[] = [
  "Step [0-9]",
  "Phase [0-9]",
  "First,.*Then,",
  "^\\s*[1-3]\\.\\s",
];

export const DEFAULT_STEP_IGNORE_PATTERNS: readonly string[] = [
  "references",
  "examples",
];
