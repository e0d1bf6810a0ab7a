export type Severity = "error" | "warning" | "note";

export interface DiagnosticLocation {
  /** POSIX path relative to the project root */
  file: string;
  /** 1-based */
  line?: number;
}

export interface Diagnostic {
  readonly code: string;
  readonly severity: Severity;
  readonly message: string;
  readonly location?: DiagnosticLocation;
  readonly fixHint?: string;
}

export interface ReportSummary {
  errors: number;
  warnings: number;
  notes: number;
}

export interface Report {
  diagnostics: Diagnostic[];
  summary: ReportSummary;
}
