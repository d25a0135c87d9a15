import type { RepositoryCheck } from "../types.js";
import { credentialsCheck } from "./credentials.js";
import { executionStepsCheck } from "./execution-steps.js";
import { forbiddenDependenciesCheck } from "./forbidden-dependencies.js";
import { frontMatterCheck } from "./front-matter.js";
import { referencesCheck } from "./references.js";
import { rulesFileCheck } from "./rules-file.js";
import { structureCheck } from "./structure.js";

/**
 * 执行顺序即输出顺序。
 */
export const REPOSITORY_CHECKS: readonly RepositoryCheck[] = [
  rulesFileCheck,
  structureCheck,
  frontMatterCheck,
  referencesCheck,
  forbiddenDependenciesCheck,
  credentialsCheck,
  executionStepsCheck,
];
