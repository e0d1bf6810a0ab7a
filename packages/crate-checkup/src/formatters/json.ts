import type { Diagnostic, Report } from "../types/index.js";

interface JsonDiagnostic {
  code: string;
  severity: string;
  message: string;
  location?: { file: string; line?: number };
  fix_hint?: string;
}

function toJsonDiagnostic(d: Diagnostic): JsonDiagnostic {
  const out: JsonDiagnostic = { code: d.code, severity: d.severity, message: d.message };
  if (d.location) {
    out.location =
      d.location.line !== undefined
        ? { file: d.location.file, line: d.location.line }
        : { file: d.location.file };
  }
  if (d.fixHint !== undefined) out.fix_hint = d.fixHint;
  return out;
}

/** stable key order and no timestamps: equal reports serialize byte-identically */
export function formatReportJson(report: Report): string {
  return JSON.stringify(
    {
      diagnostics: report.diagnostics.map(toJsonDiagnostic),
      summary: {
        error_count: report.summary.errors,
        warning_count: report.summary.warnings,
        note_count: report.summary.notes,
      },
    },
    null,
    2,
  );
}
