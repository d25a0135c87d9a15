#!/usr/bin/env node

import { Command } from "commander";
import { listCommand } from "./commands/list.js";
import { newSkillCommand } from "./commands/new-skill.js";
import { validateCommand } from "./commands/validate.js";
import { readPackageVersion } from "./project/package-assets.js";

const program = new Command();

program
  .name("skillbase")
  .description("Validate, scaffold and list Markdown knowledge-skill repositories")
  .version(readPackageVersion(), "-v, --version");

program
  .command("validate [path]")
  .description("Check repository structure, front-matter and references")
  .option("--json", "print the report as JSON", false)
  .option("--strict", "treat warnings as failures", false)
  .option("--no-color", "disable ANSI colors")
  .action(validateCommand);

program
  .command("new <category> <name>")
  .alias("new-skill")
  .description("Create a new knowledge skill (e.g. new security rbac)")
  .option("-r, --root <path>", "repository root", ".")
  .option("-d, --description <text>", "front-matter description")
  .action(newSkillCommand);

program
  .command("list [path]")
  .description("List skills discovered in the repository")
  .option("-c, --category <category>", "only list one category")
  .option("--json", "print as JSON", false)
  .action(listCommand);

if (process.argv.length <= 2) {
  program.outputHelp();
} else {
  await program.parseAsync();
}
