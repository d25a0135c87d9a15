import { formatHit, scanLines } from "../scan.js";
import { finding, type RepositoryCheck } from "../types.js";

/**
 * knowledge skills 只描述 WHAT，不写 HOW：编号步骤、Phase/Step 等写法给 warning。
 * references/ 与 examples 路径下的内容不计入；front-matter（version: 1.0.0 等）不扫描。
 */
export const executionStepsCheck: RepositoryCheck = {
  id: "execution-steps",
  title: () => "execution steps in knowledge skills",
  run({ root, config, repository }) {
    const { patterns, ignorePatterns, maxSamples } = config.executionSteps;
    if (!repository.exists || patterns.length === 0) {
      return [
        finding("execution-steps", "ok", "No obvious execution patterns found"),
      ];
    }

    const step = new RegExp(patterns.join("|"));
    const ignore = ignorePatterns.map((source) => new RegExp(source));
    const hits = scanLines(
      root,
      repository.skillsDirPath,
      (text, location) =>
        step.test(text) && !ignore.some((re) => re.test(location)),
      { skipFrontMatter: true },
    );

    if (hits.length === 0) {
      return [
        finding("execution-steps", "ok", "No obvious execution patterns found"),
      ];
    }
    return [
      finding(
        "execution-steps",
        "warning",
        "Possible execution steps found (belongs in a workflow repository)",
        hits.slice(0, maxSamples).map(formatHit),
      ),
    ];
  },
};
