import { z } from "zod";
import { CHECK_IDS } from "../types/report.js";
import {
  DEFAULT_CATEGORIES,
  DEFAULT_CREDENTIAL_ALLOW_PATTERNS,
  DEFAULT_CREDENTIAL_CATEGORIES,
  DEFAULT_CREDENTIAL_MIN_LENGTH,
  DEFAULT_FORBIDDEN_TERMS,
  DEFAULT_RULES_FILE,
  DEFAULT_SKILLS_DIR,
  DEFAULT_STEP_IGNORE_PATTERNS,
  DEFAULT_STEP_PATTERNS,
  DEFAULT_TEMPLATES_DIR,
} from "../project/defaults.js";

function isValidRegexSource(source: string): boolean {
  try {
    new RegExp(source);
    return true;
  } catch {
    return false;
  }
}

const RegexSourceSchema = z
  .string()
  .min(1)
  .refine(isValidRegexSource, { message: "must be a valid regular expression" });

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

/**
 * `skillbase.json` schema。
 *
 * 关键点（中文）
 * - 所有字段都有默认值：没有配置文件时等价于 `parse({})`。
 * - 嵌套对象同样 `.default({})`，只写部分字段也能补全。
 */
export const SkillbaseConfigSchema = z.object({
  $schema: z.string().optional(),
  skillsDir: z.string().min(1).default(DEFAULT_SKILLS_DIR),
  rulesFile: z.string().min(1).default(DEFAULT_RULES_FILE),
  templatesDir: z.string().min(1).default(DEFAULT_TEMPLATES_DIR),
  categories: z
    .array(z.string().min(1))
    .min(1)
    .default([...DEFAULT_CATEGORIES]),
  forbiddenTerms: z.array(z.string().min(1)).default([...DEFAULT_FORBIDDEN_TERMS]),
  credentials: z
    .object({
      categories: z
        .array(z.string().min(1))
        .default([...DEFAULT_CREDENTIAL_CATEGORIES]),
      minLength: z.number().int().positive().default(DEFAULT_CREDENTIAL_MIN_LENGTH),
      allowPatterns: z
        .array(RegexSourceSchema)
        .default([...DEFAULT_CREDENTIAL_ALLOW_PATTERNS]),
      maxSamples: z.number().int().positive().default(5),
    })
    .default({}),
  executionSteps: z
    .object({
      patterns: z.array(RegexSourceSchema).default([...DEFAULT_STEP_PATTERNS]),
      ignorePatterns: z
        .array(RegexSourceSchema)
        .default([...DEFAULT_STEP_IGNORE_PATTERNS]),
      maxSamples: z.number().int().positive().default(3),
    })
    .default({}),
  disabledChecks: z.array(z.enum(CHECK_IDS)).default([]),
  logging: z
    .object({
      level: LogLevelSchema.default("info"),
      persist: z.boolean().default(false),
    })
    .default({}),
});
