import fs from "fs-extra";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { getDefaultConfig } from "../project/config.js";
import { createRepo, RULES_FILE, removeRepo } from "../testing/repo-fixture.js";
import { validateRepository } from "../validation/validator.js";
import { loadFrontMatter } from "./frontmatter.js";
import { renderSkillTemplate, scaffoldSkill } from "./scaffold.js";

describe("renderSkillTemplate", () => {
  it("substitutes every placeholder occurrence", () => {
    expect(
      renderSkillTemplate("__NAME__/__CATEGORY__ __NAME__: __DESCRIPTION__", {
        name: "rbac",
        category: "security",
        description: "Role based access control.",
      }),
    ).toBe("rbac/security rbac: Role based access control.");
  });

  it("keeps the description placeholder when none is given", () => {
    expect(
      renderSkillTemplate("__NAME__: __DESCRIPTION__", {
        name: "rbac",
        category: "security",
        description: "  ",
      }),
    ).toBe("rbac: __DESCRIPTION__");
  });

  it("keeps dollar sequences in the description literal", () => {
    expect(
      renderSkillTemplate("__NAME__: __DESCRIPTION__", {
        name: "budget",
        category: "meta",
        description: "Costs in $$ and $& and $` terms",
      }),
    ).toBe("budget: Costs in $$ and $& and $` terms");
  });

  it("writes the front-matter description as a YAML scalar", () => {
    const rendered = renderSkillTemplate(
      "---\nname: __NAME__\ndescription: __DESCRIPTION__\n---\n> __DESCRIPTION__\n",
      { name: "kafka", category: "data", description: "Kafka: topics and partitions" },
    );

    const { result, body } = loadFrontMatter(rendered);
    expect(result).toEqual({
      status: "ok",
      data: { name: "kafka", description: "Kafka: topics and partitions" },
    });
    expect(body).toBe("> Kafka: topics and partitions\n");
  });
});

describe("scaffoldSkill", () => {
  const config = getDefaultConfig();
  let root = "";

  afterEach(async () => {
    if (root) await removeRepo(root);
    root = "";
  });

  it("creates SKILL.md and references/ from the packaged template", async () => {
    root = await createRepo({});
    const result = await scaffoldSkill({ root, category: "security", name: "rbac", config });

    expect(result.templateSource).toBe("builtin");
    expect(result.skillDir).toBe(path.join(root, "skills", "security", "rbac"));
    expect(await fs.pathExists(path.join(result.skillDir, "references"))).toBe(true);

    const content = await fs.readFile(result.skillMdPath, "utf-8");
    expect(content.startsWith("---\nname: rbac\ndescription: __DESCRIPTION__\n")).toBe(
      true,
    );
    expect(content).toContain("  category: security\n");
  });

  it("prefers the repository template", async () => {
    root = await createRepo({
      ".templates/knowledge-skill/SKILL.md":
        "---\nname: __NAME__\ndescription: __DESCRIPTION__\n---\n# __NAME__ in __CATEGORY__\n",
    });
    const result = await scaffoldSkill({
      root,
      category: "data",
      name: "event-store",
      description: "Append-only event storage.",
      config,
    });

    expect(result.templateSource).toBe("repository");
    expect(await fs.readFile(result.skillMdPath, "utf-8")).toBe(
      "---\nname: event-store\ndescription: Append-only event storage.\n---\n# event-store in data\n",
    );
  });

  it("produces a skill that passes validation", async () => {
    root = await createRepo(RULES_FILE);
    await scaffoldSkill({
      root,
      category: "security",
      name: "rbac",
      description: "Role based access control.",
      config,
    });

    const report = validateRepository(root, config);
    expect(report.errors).toBe(0);
    expect(report.warnings).toBe(0);
    expect(report.passed).toBe(true);
  });

  it.each([
    ["Kafka: topics and partitions"],
    ["# not a comment"],
    ["[bracketed] start"],
    ["'quoted' start"],
    ["Budget in $$ and $& terms"],
  ])("keeps the description %s loadable and valid", async (description) => {
    root = await createRepo(RULES_FILE);
    const result = await scaffoldSkill({
      root,
      category: "data",
      name: "streams",
      description,
      config,
    });

    const { result: frontMatter } = loadFrontMatter(
      await fs.readFile(result.skillMdPath, "utf-8"),
    );
    expect(frontMatter.status).toBe("ok");
    if (frontMatter.status === "ok") {
      expect(frontMatter.data.description).toBe(description);
    }
    expect(validateRepository(root, config).errors).toBe(0);
  });

  it("rejects an unknown category", async () => {
    root = await createRepo({});
    await expect(
      scaffoldSkill({ root, category: "misc", name: "rbac", config }),
    ).rejects.toThrow(
      "CATEGORY must be one of: security, quality, code, data, delivery, operations, meta",
    );
  });

  it.each([["Bad"], ["rbac2"], ["-rbac"]])("rejects the name %s", async (name) => {
    root = await createRepo({});
    await expect(
      scaffoldSkill({ root, category: "security", name, config }),
    ).rejects.toThrow("NAME must match ^[a-z][-a-z]*$ (lowercase, hyphenated)");
  });

  it("rejects the x- prefix", async () => {
    root = await createRepo({});
    await expect(
      scaffoldSkill({ root, category: "meta", name: "x-review", config }),
    ).rejects.toThrow("NAME must NOT start with x-");
  });

  it("refuses to overwrite an existing skill", async () => {
    root = await createRepo({ "skills/security/rbac/SKILL.md": "keep me\n" });
    await expect(
      scaffoldSkill({ root, category: "security", name: "rbac", config }),
    ).rejects.toThrow("skills/security/rbac already exists");
    expect(
      await fs.readFile(path.join(root, "skills/security/rbac/SKILL.md"), "utf-8"),
    ).toBe("keep me\n");
  });
});
