/**
 * 凭据泄露粗筛。
 *
 * 关键点（中文）
 * - 只扫描配置的 category（默认 security），目录不存在时整个检查不输出。
 * - 长字母数字串即视为可疑；`path:text` 命中任一 allowPattern 则放行。
 * - 结果只是 warning：需要人工复核。
 */

import path from "path";
import type { Finding } from "../../types/report.js";
import { isDirectorySync } from "../../skills/utils.js";
import { formatHit, scanLines, type LineHit } from "../scan.js";
import { finding, type RepositoryCheck } from "../types.js";

export const credentialsCheck: RepositoryCheck = {
  id: "credentials",
  title: () => "potential credential leaks",
  run({ root, config, repository }) {
    const { categories, minLength, allowPatterns, maxSamples } = config.credentials;
    const dirs = categories
      .map((category) => path.join(repository.skillsDirPath, category))
      .filter((dir) => repository.exists && isDirectorySync(dir));
    if (dirs.length === 0) return [];

    const secret = new RegExp(`[A-Za-z0-9]{${minLength},}`);
    const allow = allowPatterns.map((source) => new RegExp(source));

    const hits: LineHit[] = [];
    for (const dir of dirs) {
      hits.push(
        ...scanLines(
          root,
          dir,
          (text, location) =>
            secret.test(text) && !allow.some((re) => re.test(location)),
        ),
      );
    }

    const scope = categories.join("/");
    const out: Finding[] = [];
    if (hits.length > 0) {
      out.push(
        finding(
          "credentials",
          "warning",
          `Potential credentials found in ${scope} skills (review manually)`,
          hits.slice(0, maxSamples).map(formatHit),
        ),
      );
    } else {
      out.push(finding("credentials", "ok", "No obvious credential patterns found"));
    }
    return out;
  },
};
