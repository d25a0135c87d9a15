/**
 * JSON 通用类型定义。
 *
 * 关键点（中文）
 * - front-matter 经 js-yaml 解析后只在边界处收窄为这些类型。
 * - `--json` 输出与日志落盘共用同一组类型。
 */

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonObject | JsonValue[];

export type JsonObject = {
  [key: string]: JsonValue;
};

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
