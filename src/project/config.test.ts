import fs from "fs-extra";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { createRepo, removeRepo } from "../testing/repo-fixture.js";
import {
  getDefaultConfig,
  loadSkillbaseConfig,
  resolveEnvPlaceholdersDeep,
} from "./config.js";

const ENV_KEYS = ["SKILLBASE_TEST_DIR", "SKILLBASE_TEST_DOTENV", "SKILLBASE_LOG_LEVEL"];

describe("loadSkillbaseConfig", () => {
  let root = "";

  afterEach(async () => {
    for (const key of ENV_KEYS) delete process.env[key];
    if (root) await removeRepo(root);
    root = "";
  });

  it("returns defaults without a config file", async () => {
    root = await createRepo({});
    const config = loadSkillbaseConfig(root);
    expect(config).toEqual(getDefaultConfig());
    expect(config.skillsDir).toBe("skills");
    expect(config.rulesFile).toBe(".claude/rules.md");
    expect(config.categories).toEqual([
      "security",
      "quality",
      "code",
      "data",
      "delivery",
      "operations",
      "meta",
    ]);
    expect(config.logging).toEqual({ level: "info", persist: false });
  });

  it("resolves env placeholders and fills nested defaults", async () => {
    process.env.SKILLBASE_TEST_DIR = "docs/skills";
    root = await createRepo({
      "skillbase.json": JSON.stringify({
        skillsDir: "${SKILLBASE_TEST_DIR}",
        credentials: { minLength: 40 },
      }),
    });
    const config = loadSkillbaseConfig(root);
    expect(config.skillsDir).toBe("docs/skills");
    expect(config.credentials.minLength).toBe(40);
    expect(config.credentials.maxSamples).toBe(5);
    expect(config.credentials.categories).toEqual(["security"]);
  });

  it("loads .env from the repository root", async () => {
    root = await createRepo({
      ".env": "SKILLBASE_TEST_DOTENV=knowledge\n",
      "skillbase.json": JSON.stringify({ skillsDir: "${SKILLBASE_TEST_DOTENV}" }),
    });
    expect(loadSkillbaseConfig(root).skillsDir).toBe("knowledge");
  });

  it("falls back to the default when a placeholder is unset", async () => {
    root = await createRepo({
      "skillbase.json": JSON.stringify({ rulesFile: "${SKILLBASE_TEST_DIR}" }),
    });
    expect(loadSkillbaseConfig(root).rulesFile).toBe(".claude/rules.md");
  });

  it("names every invalid field", async () => {
    root = await createRepo({
      "skillbase.json": JSON.stringify({ categories: [], disabledChecks: ["nope"] }),
    });
    expect(() => loadSkillbaseConfig(root)).toThrow(/Invalid skillbase\.json/);
    expect(() => loadSkillbaseConfig(root)).toThrow(/- categories: /);
    expect(() => loadSkillbaseConfig(root)).toThrow(/- disabledChecks\.0: /);
  });

  it("rejects patterns that are not regular expressions", async () => {
    root = await createRepo({
      "skillbase.json": JSON.stringify({ executionSteps: { patterns: ["("] } }),
    });
    expect(() => loadSkillbaseConfig(root)).toThrow(
      "- executionSteps.patterns.0: must be a valid regular expression",
    );
  });

  it("reports unreadable json", async () => {
    root = await createRepo({ "skillbase.json": "{ nope" });
    expect(() => loadSkillbaseConfig(root)).toThrow(/Failed to read skillbase\.json/);
  });

  it("lets SKILLBASE_LOG_LEVEL override the configured level", async () => {
    root = await createRepo({
      "skillbase.json": JSON.stringify({ logging: { level: "warn" } }),
    });
    process.env.SKILLBASE_LOG_LEVEL = "DEBUG";
    expect(loadSkillbaseConfig(root).logging.level).toBe("debug");

    process.env.SKILLBASE_LOG_LEVEL = "loud";
    expect(() => loadSkillbaseConfig(root)).toThrow(/Invalid SKILLBASE_LOG_LEVEL: loud/);
  });

  it("does not create files while loading", async () => {
    root = await createRepo({});
    loadSkillbaseConfig(root);
    expect(await fs.pathExists(path.join(root, ".skillbase"))).toBe(false);
  });
});

describe("resolveEnvPlaceholdersDeep", () => {
  afterEach(() => {
    delete process.env.SKILLBASE_TEST_DIR;
  });

  it("replaces whole-string placeholders only", () => {
    process.env.SKILLBASE_TEST_DIR = "x";
    expect(
      resolveEnvPlaceholdersDeep({
        a: "${SKILLBASE_TEST_DIR}",
        b: ["prefix-${SKILLBASE_TEST_DIR}", "${SKILLBASE_TEST_DIR}"],
        c: 3,
      }),
    ).toEqual({ a: "x", b: ["prefix-${SKILLBASE_TEST_DIR}", "x"], c: 3 });
  });
});
