import type { ChalkInstance } from "chalk";
import type { Diagnostic, Report, Severity } from "../types/index.js";

type ChalkColor = "red" | "yellow" | "blue";

const SECTIONS: Array<{ severity: Severity; title: string; color: ChalkColor }> = [
  { severity: "error", title: "ERRORS", color: "red" },
  { severity: "warning", title: "WARNINGS", color: "yellow" },
  { severity: "note", title: "NOTES", color: "blue" },
];

export function formatLocation(d: Diagnostic): string {
  if (!d.location) return "";
  return d.location.line !== undefined
    ? `${d.location.file}:${d.location.line}`
    : d.location.file;
}

export async function formatReportHuman(report: Report, projectName: string): Promise<string> {
  const chalk = (await import("chalk")).default;
  const lines: string[] = [];

  lines.push(chalk.bold(`crate-checkup: ${projectName}`));
  lines.push("");

  for (const section of SECTIONS) {
    const group = report.diagnostics.filter((d) => d.severity === section.severity);
    if (group.length === 0) continue;
    const colorFn = chalk[section.color];
    lines.push(colorFn.bold(`${section.title} (${group.length})`));
    lines.push(colorFn("─".repeat(60)));
    for (const d of group) {
      lines.push(formatDiagnostic(chalk, d, section.color));
    }
    lines.push("");
  }

  const s = report.summary;
  lines.push(chalk.bold("SUMMARY"));
  lines.push("─".repeat(60));
  lines.push(`  Total diagnostics: ${report.diagnostics.length}`);
  if (s.errors > 0) lines.push(chalk.red(`  Errors: ${s.errors}`));
  if (s.warnings > 0) lines.push(chalk.yellow(`  Warnings: ${s.warnings}`));
  if (s.notes > 0) lines.push(chalk.blue(`  Notes: ${s.notes}`));

  lines.push("");
  if (s.errors > 0) {
    lines.push(chalk.red.bold("RESULT: FAIL"));
  } else if (s.warnings > 0) {
    lines.push(chalk.yellow.bold("RESULT: PASS (with warnings)"));
  } else {
    lines.push(chalk.green.bold("RESULT: PASS"));
  }

  return lines.join("\n");
}

// one line per diagnostic: code, severity, message, then location and fix hint when present
function formatDiagnostic(chalk: ChalkInstance, d: Diagnostic, color: ChalkColor): string {
  const where = formatLocation(d);
  let line = chalk[color](`  [${d.code}] ${d.severity}: ${d.message}`);
  if (where) line += chalk.dim(` (${where})`);
  if (d.fixHint) line += ` Fix: ${d.fixHint}`;
  return line;
}
