import fs from "fs-extra";
import path from "path";
import type { Dirent } from "node:fs";
import { getLogger } from "../utils/logger/logger.js";

/**
 * 列出目录下的可见子目录（跟随符号链接），按 UTF-16 码元排序（与 locale 无关）。
 */
export function listVisibleDirectories(dir: string): string[] {
  let entries: Dirent[] = [];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true });
  } catch (error) {
    getLogger().debug(`Cannot read directory ${dir}`, { error: String(error) });
    return [];
  }

  const out: string[] = [];
  for (const entry of entries) {
    if (!entry.name || entry.name.startsWith(".")) continue;
    let isDirectory = entry.isDirectory();
    if (!isDirectory && entry.isSymbolicLink()) {
      try {
        isDirectory = fs.statSync(path.join(dir, entry.name)).isDirectory();
      } catch {
        isDirectory = false;
      }
    }
    if (isDirectory) out.push(entry.name);
  }
  return out.sort();
}

export function isDirectorySync(target: string): boolean {
  try {
    return fs.statSync(target).isDirectory();
  } catch {
    return false;
  }
}

export function isFileSync(target: string): boolean {
  try {
    return fs.statSync(target).isFile();
  } catch {
    return false;
  }
}
