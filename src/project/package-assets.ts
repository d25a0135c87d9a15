/**
 * 发布包内静态资源定位（package.json、默认模板）。
 *
 * 关键点（中文）
 * - 源码运行时该文件在 `src/project/`，编译后在 `dist/src/project/`，层级不同。
 * - 因此从当前模块目录逐级向上查找，而不是写死 `../..`。
 */

import fs from "fs-extra";
import path from "node:path";
import { fileURLToPath } from "node:url";

const MAX_ASCENT = 5;

export function resolvePackageAsset(...segments: string[]): string {
  let dir = path.dirname(fileURLToPath(import.meta.url));
  for (let i = 0; i <= MAX_ASCENT; i += 1) {
    const candidate = path.join(dir, ...segments);
    if (fs.existsSync(candidate)) return candidate;
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  throw new Error(`Package asset not found: ${segments.join("/")}`);
}

export function readPackageVersion(): string {
  const raw: unknown = fs.readJsonSync(resolvePackageAsset("package.json"));
  if (raw && typeof raw === "object" && "version" in raw) {
    const version = raw.version;
    if (typeof version === "string") return version;
  }
  return "0.0.0";
}
