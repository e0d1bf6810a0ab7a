import { createDiagnostic } from "../core/diagnostic.js";

import type {
  CheckDefinition,
  CheckRuntime,
  Diagnostic,
  ProjectContext,
  ProjectFile,
  Severity,
} from "../types/index.js";

interface LinePattern {
  code: string;
  severity: Severity;
  pattern: RegExp;
  appliesTo: (file: ProjectFile) => boolean;
  message: (match: RegExpExecArray) => string;
  fixHint?: string;
}

const libraryCode = (file: ProjectFile): boolean => file.isLibraryCode;
const anyRustSource = (file: ProjectFile): boolean => file.isRustSource;

/**
 * Line-by-line regex scan. Files that cannot be read are skipped here;
 * IO001 reports them once.
 */
async function scanLines(
  context: ProjectContext,
  runtime: CheckRuntime,
  rule: LinePattern,
): Promise<Diagnostic[]> {
  const diagnostics: Diagnostic[] = [];
  for (const file of context.files) {
    if (!rule.appliesTo(file)) continue;
    const read = await runtime.cache.readSource(context.root, file.path);
    if (!read.ok) continue;

    const lines = read.text.split(/\r?\n/);
    lines.forEach((text, index) => {
      const match = rule.pattern.exec(text);
      if (!match) return;
      diagnostics.push(
        createDiagnostic({
          code: rule.code,
          severity: rule.severity,
          message: rule.message(match),
          location: { file: file.path, line: index + 1 },
          ...(rule.fixHint ? { fixHint: rule.fixHint } : {}),
        }),
      );
    });
  }
  return diagnostics;
}

function lineCheck(name: string, rule: LinePattern): CheckDefinition {
  return {
    code: rule.code,
    name,
    category: "code-pattern",
    capability: "file-scan",
    defaultSeverity: rule.severity,
    run: (context, runtime) => scanLines(context, runtime, rule),
  };
}

export const unwrapUsage = lineCheck("unwrap() in library code", {
  code: "CODE001",
  severity: "warning",
  pattern: /\.unwrap\(\)/,
  appliesTo: libraryCode,
  message: () => "'.unwrap()' used in library context. Consider using '?' or pattern matching.",
  fixHint: "Propagate the error with '?' or handle the None/Err case",
});

export const expectUsage = lineCheck("expect() in library code", {
  code: "CODE002",
  severity: "note",
  pattern: /\.expect\s*\(/,
  appliesTo: libraryCode,
  message: () =>
    "'.expect()' used in library context. While better than unwrap, prefer '?' or specific error handling.",
});

export const debugMacros = lineCheck("println!/dbg! in library code", {
  code: "CODE003",
  severity: "note",
  pattern: /\b(println!|dbg!)\s*\(/,
  appliesTo: libraryCode,
  message: (match) =>
    `Diagnostic macro (${match[1] ?? "println!"}) found in library context. Remove before release.`,
});

export const pendingWorkComments = lineCheck("TODO/FIXME/XXX comments", {
  code: "CODE004",
  severity: "note",
  pattern: /\/\/\s*(TODO|FIXME|XXX)/,
  appliesTo: anyRustSource,
  message: (match) =>
    `Found '${match[1] ?? "TODO"}' comment. Address or create an issue for it.`,
});

export const unreadableSources: CheckDefinition = {
  code: "IO001",
  name: "Unreadable source files",
  category: "io",
  capability: "file-scan",
  defaultSeverity: "warning",
  run: async (context, runtime) => {
    const diagnostics: Diagnostic[] = [];
    for (const file of context.files) {
      if (!file.isRustSource) continue;
      const read = await runtime.cache.readSource(context.root, file.path);
      if (read.ok) continue;
      diagnostics.push(
        createDiagnostic({
          code: "IO001",
          severity: "warning",
          message: `Failed to read file ${file.path}: ${read.error}`,
          location: { file: file.path },
        }),
      );
    }
    return diagnostics;
  },
};

export const CODE_PATTERN_CHECKS: CheckDefinition[] = [
  unwrapUsage,
  expectUsage,
  debugMacros,
  pendingWorkComments,
  unreadableSources,
];
