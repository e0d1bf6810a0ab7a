import { SEVERITY_RANK } from "./diagnostic.js";
import { compareOrdinal } from "./file-tree.js";

import type { Diagnostic, Report, ReportSummary } from "../types/index.js";

/**
 * Canonical order: severity descending, then code (ordinal), then input order.
 */
export function sortDiagnostics(diagnostics: readonly Diagnostic[]): Diagnostic[] {
  return diagnostics
    .map((diagnostic, index) => ({ diagnostic, index }))
    .sort(
      (a, b) =>
        SEVERITY_RANK[b.diagnostic.severity] - SEVERITY_RANK[a.diagnostic.severity] ||
        compareOrdinal(a.diagnostic.code, b.diagnostic.code) ||
        a.index - b.index,
    )
    .map(({ diagnostic }) => diagnostic);
}

export function summarize(diagnostics: readonly Diagnostic[]): ReportSummary {
  const summary: ReportSummary = { errors: 0, warnings: 0, notes: 0 };
  for (const d of diagnostics) {
    if (d.severity === "error") summary.errors++;
    else if (d.severity === "warning") summary.warnings++;
    else summary.notes++;
  }
  return summary;
}

export function buildReport(diagnostics: readonly Diagnostic[]): Report {
  const sorted = sortDiagnostics(diagnostics);
  return { diagnostics: sorted, summary: summarize(sorted) };
}

/** 1 when any Error is present; warnings and notes pass CI */
export function exitCodeFor(report: Report): number {
  return report.summary.errors > 0 ? 1 : 0;
}
