import Table from "cli-table3";

import { ALL_CHECKS, ENGINE_CODES } from "../core/registry.js";

import type { CheckDefinition } from "../types/index.js";

export function formatCheckTable(checks: readonly CheckDefinition[]): string {
  const table = new Table({
    head: ["Code", "Severity", "Category", "Runs", "Check", "Also emits"],
    style: { head: [], border: [] },
  });

  for (const check of checks) {
    table.push([
      check.code,
      check.defaultSeverity,
      check.category,
      check.capability,
      check.name,
      (check.relatedCodes ?? []).join(", "),
    ]);
  }

  return table.toString();
}

export async function listCommand(): Promise<void> {
  const chalk = (await import("chalk")).default;

  console.log(chalk.bold(`Built-in checks (${ALL_CHECKS.length})\n`));
  console.log(formatCheckTable(ALL_CHECKS));
  console.log(
    chalk.dim(
      `\nEngine codes: ${ENGINE_CODES.checkFault} (check failed), ${ENGINE_CODES.checkTimeout} (check timed out)`,
    ),
  );
  console.log(chalk.dim("Disable any code in .crate-checkup.toml under [checks.enabled]."));
}
