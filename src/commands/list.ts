/**
 * `skillbase list`：列出仓库内可发现的 skills。
 */

import { listSkills } from "../skills/list.js";
import { getLogger } from "../utils/logger/logger.js";
import { openProject, reportCommandError } from "./project.js";
import type { ListCommandOptions } from "./types/list.js";

export async function listCommand(
  cwd: string = ".",
  options: ListCommandOptions = {},
): Promise<void> {
  try {
    const { root, config } = openProject(cwd);
    const skills = listSkills(root, config, { category: options.category });

    if (options.json) {
      console.log(JSON.stringify(skills, null, 2));
      return;
    }

    console.log(`Found: ${skills.length}`);
    for (const s of skills) {
      const version = s.version ? `@${s.version}` : "";
      const desc = s.description ? ` — ${s.description.split("\n")[0]}` : "";
      console.log(`- [${s.category}] ${s.name}${version}${desc}`);
    }
  } catch (error) {
    reportCommandError(error);
  } finally {
    await getLogger().flush();
  }
}
