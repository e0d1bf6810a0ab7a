#!/usr/bin/env node
import { program } from "commander";

import { getPackageVersion } from "../core/paths.js";

import type { CheckOptions } from "../types/index.js";

program
  .name("crate-checkup")
  .description("Health checks for Cargo projects: manifest, dependencies, code patterns, audit")
  .version(getPackageVersion());

program
  .command("check [path]", { isDefault: true })
  .description("Run all enabled checks against a Cargo project")
  .option("-p, --project-path <path>", "Project root (default: current directory)")
  .option("-f, --format <format>", "Output format (human|json)", "human")
  .option("--timeout <seconds>", "Per-check timeout for network and subprocess checks")
  .option("--concurrency <n>", "Maximum checks running at once")
  .option("--offline", "Skip checks that need the network or cargo audit")
  .option("--verbose", "Print per-check progress to stderr")
  .option("--debug-log <file>", "Append JSON debug logs to this file")
  .action(async (projectPath: string | undefined, options: CheckOptions) => {
    const { checkCommand } = await import("../commands/check.js");
    const exitCode = await checkCommand(projectPath, options);
    process.exit(exitCode);
  });

program
  .command("list")
  .description("List every built-in check with its code and severity")
  .action(async () => {
    const { listCommand } = await import("../commands/list.js");
    await listCommand();
    process.exit(0);
  });

await program.parseAsync();
