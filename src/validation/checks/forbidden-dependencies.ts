import { escapeRegExp, formatHit, scanLines } from "../scan.js";
import { finding, type RepositoryCheck } from "../types.js";

/**
 * knowledge skills 不得依赖执行层仓库：任何文件中出现禁用词即报一条 error，
 * 全部命中行作为样本列出。
 */
export const forbiddenDependenciesCheck: RepositoryCheck = {
  id: "forbidden-dependencies",
  title: () => "forbidden dependencies",
  run({ root, config, repository }) {
    const terms = config.forbiddenTerms;
    const label = terms.join("/");
    if (terms.length === 0 || !repository.exists) {
      return [
        finding(
          "forbidden-dependencies",
          "ok",
          terms.length === 0
            ? "No forbidden terms configured"
            : `No ${label} dependencies found`,
        ),
      ];
    }

    const pattern = new RegExp(`(${terms.map(escapeRegExp).join("|")})`);
    const hits = scanLines(root, repository.skillsDirPath, (text) =>
      pattern.test(text),
    );

    if (hits.length === 0) {
      return [
        finding("forbidden-dependencies", "ok", `No ${label} dependencies found`),
      ];
    }
    return [
      finding(
        "forbidden-dependencies",
        "error",
        `Found references to ${terms.join(" or ")} (forbidden dependency)`,
        hits.map(formatHit),
      ),
    ];
  },
};
