import fs from "fs-extra";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createRepo, removeRepo, RULES_FILE, skillMd } from "../testing/repo-fixture.js";
import { listCommand } from "./list.js";
import { newSkillCommand } from "./new-skill.js";
import { validateCommand } from "./validate.js";

describe("commands", () => {
  let root = "";

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    if (root) await removeRepo(root);
    root = "";
  });

  function printed(): string[] {
    return vi.mocked(console.log).mock.calls.map((call) => String(call[0]));
  }

  it("validate --json prints the report and sets the exit code", async () => {
    root = await createRepo({ "skills/data/sql/SKILL.md": "# no front matter\n" });

    await validateCommand(root, { json: true });

    const output = JSON.parse(printed().join("\n"));
    expect(output.passed).toBe(false);
    expect(output.errors).toBe(2);
    expect(process.exitCode).toBe(1);
  });

  it("validate prints plain text for a passing repository", async () => {
    root = await createRepo({
      ...RULES_FILE,
      "skills/data/sql/SKILL.md": skillMd("name: sql\ndescription: d"),
    });

    await validateCommand(root, { color: false });

    expect(printed().at(-1)).toBe("Validation PASSED");
    expect(process.exitCode).toBeUndefined();
  });

  it("validate reports an invalid configuration", async () => {
    root = await createRepo({ "skillbase.json": JSON.stringify({ skillsDir: 3 }) });

    await validateCommand(root, {});

    expect(console.error).toHaveBeenCalledWith(
      "❌ Invalid skillbase.json:\n- skillsDir: Expected string, received number",
    );
    expect(process.exitCode).toBe(1);
  });

  it("new creates the skill without prompting when a description is given", async () => {
    root = await createRepo({});

    await newSkillCommand("data", "event-store", {
      root,
      description: "Append-only event storage.",
    });

    const skillMdPath = path.join(root, "skills/data/event-store/SKILL.md");
    expect(await fs.readFile(skillMdPath, "utf-8")).toContain(
      "description: Append-only event storage.\n",
    );
    expect(printed()).toEqual(["✅ Created skills/data/event-store/SKILL.md"]);
  });

  it("new rejects an invalid name", async () => {
    root = await createRepo({});

    await newSkillCommand("data", "Event", { root, description: "d" });

    expect(console.error).toHaveBeenCalledWith(
      "❌ NAME must match ^[a-z][-a-z]*$ (lowercase, hyphenated)",
    );
    expect(process.exitCode).toBe(1);
    expect(await fs.pathExists(path.join(root, "skills"))).toBe(false);
  });

  it("list prints one line per skill", async () => {
    root = await createRepo({
      "skills/data/sql/SKILL.md": skillMd(
        "name: sql-design\ndescription: Schema design.\nmetadata:\n  version: 1.2.0",
      ),
    });

    await listCommand(root, {});

    expect(printed()).toEqual(["Found: 1", "- [data] sql-design@1.2.0 — Schema design."]);
  });
});
