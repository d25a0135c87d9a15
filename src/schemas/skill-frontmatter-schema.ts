import { z } from "zod";

export const SKILL_NAME_PATTERN = /^[a-z0-9][a-z0-9-]*$/;

export const SKILL_VERSION_PATTERN = /^\d+(\.\d+){0,2}([-+].+)?$/;

const requiredString = () =>
  z
    .string({
      required_error: "is required",
      invalid_type_error: "must be a string",
    })
    .trim()
    .min(1, { message: "must not be empty" });

const optionalString = () =>
  z.string({ invalid_type_error: "must be a string" }).optional();

/**
 * SKILL.md front-matter schema。
 *
 * 关键点（中文）
 * - 未知字段原样保留（passthrough），只约束约定字段。
 * - `allowed-tools` 两种写法都接受：YAML 列表或空格分隔字符串。
 * - `metadata.version` 允许 YAML 数字（`1.0` 会被解析成 number）。
 */
export const SkillFrontMatterSchema = z
  .object({
    name: requiredString().regex(SKILL_NAME_PATTERN, {
      message: "must be a lowercase hyphenated slug",
    }),
    description: requiredString(),
    license: optionalString(),
    compatibility: optionalString(),
    "allowed-tools": z
      .union([z.string(), z.array(z.string())], {
        errorMap: () => ({ message: "must be a string or a list of strings" }),
      })
      .optional(),
    "user-invocable": z
      .boolean({ invalid_type_error: "must be a boolean" })
      .optional(),
    metadata: z
      .object(
        {
          author: optionalString(),
          version: z
            .union([z.string(), z.number()], {
              errorMap: () => ({ message: "must be a string" }),
            })
            .transform((value) => String(value))
            .pipe(
              z.string().regex(SKILL_VERSION_PATTERN, {
                message: "must be a semver-like version (e.g. 1.0.0)",
              }),
            )
            .optional(),
          category: optionalString(),
        },
        { invalid_type_error: "must be a mapping" },
      )
      .passthrough()
      .optional(),
  })
  .passthrough();

/**
 * 违反后按 error 处理的顶层字段；其余字段只给 warning。
 */
export const REQUIRED_FRONT_MATTER_FIELDS: readonly string[] = [
  "name",
  "description",
];
