import { afterEach, describe, expect, it } from "vitest";
import { getDefaultConfig } from "../project/config.js";
import { createRepo, removeRepo, skillMd } from "../testing/repo-fixture.js";
import { listSkills } from "./list.js";

describe("listSkills", () => {
  const config = getDefaultConfig();
  let root = "";

  afterEach(async () => {
    if (root) await removeRepo(root);
    root = "";
  });

  it("summarises skills with readable front-matter and skips the rest", async () => {
    root = await createRepo({
      "skills/data/sql/SKILL.md": skillMd(
        "name: sql-design\ndescription: Schema design.\nallowed-tools: [Read, Grep]\nmetadata:\n  version: 1.1.0",
      ),
      "skills/data/broken/SKILL.md": "no front matter\n",
      "skills/meta/commits/SKILL.md": skillMd("description: Commit conventions."),
    });

    expect(listSkills(root, config)).toEqual([
      {
        id: "sql",
        category: "data",
        name: "sql-design",
        description: "Schema design.",
        version: "1.1.0",
        allowedTools: ["Read", "Grep"],
        path: "skills/data/sql",
      },
      {
        id: "commits",
        category: "meta",
        name: "commits",
        description: "Commit conventions.",
        allowedTools: [],
        path: "skills/meta/commits",
      },
    ]);
  });

  it("filters by category", async () => {
    root = await createRepo({
      "skills/data/sql/SKILL.md": skillMd("name: sql\ndescription: d"),
      "skills/meta/commits/SKILL.md": skillMd("name: commits\ndescription: d"),
    });
    expect(listSkills(root, config, { category: "meta" }).map((s) => s.id)).toEqual([
      "commits",
    ]);
  });
});
