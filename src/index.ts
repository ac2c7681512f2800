#!/usr/bin/env node

/**
 * node-compat CLI
 *
 * Main entry point for the node-compat command-line interface.
 * Compares the custom nodes declared by two checkouts of a repository and
 * fails when a node that still exists changes its return types.
 */

import { Command, Option } from "commander";
import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { dirname, join } from "path";
import chalk from "chalk";

// Import commands
import { check, exitCodeFor } from "./commands/check.js";
import { inspect } from "./commands/inspect.js";
import { DiscoveryError } from "./errors.js";
import { DEFAULT_MANIFEST_FILE } from "./utils/node-manifest.js";
import type { CheckOptions, InspectOptions } from "./types.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Read package.json for version
const packageJson: { version: string } = JSON.parse(
  readFileSync(join(__dirname, "../package.json"), "utf-8")
);

const sourceOption = () =>
  new Option("--source <source>", "Where to read node declarations from")
    .choices(["auto", "python", "manifest"])
    .default("auto");

const program = new Command();

program
  .name("node-compat")
  .description(
    "🧩 Detect breaking changes to custom node return types between two checkouts"
  )
  .version(packageJson.version, "-v, --version", "Output the current version");

// check command
program
  .command("check")
  .description("Compare a base checkout with a proposed change")
  .argument("<base_path>", "Checkout of the base branch")
  .argument("<pr_path>", "Checkout of the proposed change")
  .addOption(sourceOption())
  .option("--manifest <file>", "Manifest file name", DEFAULT_MANIFEST_FILE)
  .option("--fail-on-removed", "Also fail when a node is removed")
  .option("--allow-appended", "Allow new outputs after the existing ones")
  .option("--json", "Print the report as JSON")
  .action(async (basePath: string, prPath: string, options: CheckOptions) => {
    const report = await check(basePath, prPath, options);
    process.exitCode = exitCodeFor(report);
  });

// inspect command
program
  .command("inspect")
  .description("List the custom nodes declared by one checkout")
  .argument("[directory]", "Repository directory", ".")
  .addOption(sourceOption())
  .option("--manifest <file>", "Manifest file name", DEFAULT_MANIFEST_FILE)
  .option("--json", "Print the registry as JSON")
  .action(async (directory: string, options: InspectOptions) => {
    await inspect(directory, options);
  });

try {
  await program.parseAsync(process.argv);
} catch (error: unknown) {
  const message = error instanceof Error ? error.message : String(error);
  console.error(chalk.red("\n❌ Error:"), message || "Unknown error");

  if (error instanceof DiscoveryError) {
    console.error(
      chalk.yellow("\n💡 Expected"),
      chalk.cyan("__init__.py"),
      chalk.yellow("exporting NODE_CLASS_MAPPINGS, or a"),
      chalk.cyan(DEFAULT_MANIFEST_FILE),
      chalk.yellow("at the repository root.")
    );
  } else if (error instanceof Error && error.stack) {
    console.error(chalk.gray("\nDetails:"));
    console.error(chalk.gray(error.stack));
  }

  process.exit(1);
}
