import { createDiagnostic } from "../core/diagnostic.js";

import type { CheckDefinition, Diagnostic } from "../types/index.js";

const DENY_ATTRIBUTE = /#!\[deny\(([^)]+)\)\]/g;
const RECOMMENDED_DENIALS = ["warnings"];

export function deniedLints(source: string): Set<string> {
  const found = new Set<string>();
  for (const match of source.matchAll(DENY_ATTRIBUTE)) {
    for (const lint of (match[1] ?? "").split(",")) {
      const name = lint.trim();
      if (name) found.add(name);
    }
  }
  return found;
}

export const missingDeniedLints: CheckDefinition = {
  code: "LINT001",
  name: "Crate-level lint denials",
  category: "lint-config",
  capability: "file-scan",
  defaultSeverity: "note",
  run: async (context, runtime) => {
    const diagnostics: Diagnostic[] = [];
    const roots = context.files.filter((f) => f.isLibraryEntry || f.path === "src/main.rs");

    for (const file of roots) {
      const read = await runtime.cache.readSource(context.root, file.path);
      if (!read.ok) continue;
      const denied = deniedLints(read.text);
      const fileName = file.path.split("/").pop() ?? file.path;
      for (const lint of RECOMMENDED_DENIALS) {
        if (denied.has(lint)) continue;
        diagnostics.push(
          createDiagnostic({
            code: "LINT001",
            severity: "note",
            message: `Consider adding \`#![deny(${lint})]\` to the top of ${fileName} for stricter linting.`,
            location: { file: file.path },
          }),
        );
      }
    }
    return diagnostics;
  },
};

export const LINT_CHECKS: CheckDefinition[] = [missingDeniedLints];
