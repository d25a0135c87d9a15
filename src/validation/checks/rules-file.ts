import { getRulesFilePath } from "../../project/paths.js";
import { isFileSync } from "../../skills/utils.js";
import { finding, type RepositoryCheck } from "../types.js";

export const rulesFileCheck: RepositoryCheck = {
  id: "rules-file",
  title: (ctx) => ctx.config.rulesFile,
  run(ctx) {
    const rulesFile = ctx.config.rulesFile;
    if (isFileSync(getRulesFilePath(ctx.root, ctx.config))) {
      return [finding("rules-file", "ok", `${rulesFile} exists`)];
    }
    return [finding("rules-file", "error", `${rulesFile} is missing`)];
  },
};
