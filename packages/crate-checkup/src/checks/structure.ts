import { createDiagnostic } from "../core/diagnostic.js";
import { normalizeRelative } from "../core/file-tree.js";

import type { CheckDefinition, ProjectContext } from "../types/index.js";

function hasFile(context: ProjectContext, relPath: string): boolean {
  const wanted = normalizeRelative(relPath);
  return context.files.some((f) => f.path === wanted);
}

export const missingTargets: CheckDefinition = {
  code: "STRUCT001",
  name: "Crate targets",
  category: "structure",
  capability: "pure",
  defaultSeverity: "warning",
  run: (context) => {
    const manifest = context.manifest;
    if (manifest && !manifest.package && manifest.hasWorkspace) return [];

    const hasLib = context.files.some((f) => f.isLibraryEntry);
    const hasMain = hasFile(context, "src/main.rs");
    const hasBinDir = context.directories.includes("src/bin");
    if (hasLib || hasMain || hasBinDir) return [];

    return [
      createDiagnostic({
        code: "STRUCT001",
        severity: "warning",
        message:
          "Project has neither src/lib.rs, src/main.rs, nor src/bin/ directory. Is it a virtual workspace or missing source files?",
        location: { file: "Cargo.toml" },
      }),
    ];
  },
};

export const missingReadme: CheckDefinition = {
  code: "STRUCT002",
  name: "README present",
  category: "structure",
  capability: "pure",
  defaultSeverity: "note",
  run: (context) => {
    if (context.files.some((f) => f.isReadme)) return [];

    const pkg = context.manifest?.package;
    if (pkg) {
      if (pkg.readme === false || pkg.inherited.includes("readme")) return [];
      if (typeof pkg.readme === "string" && hasFile(context, pkg.readme)) return [];
    }

    return [
      createDiagnostic({
        code: "STRUCT002",
        severity: "note",
        message: "Missing README.md file in project root. Consider adding one.",
        location: { file: "README.md" },
      }),
    ];
  },
};

export const missingLicenseFile: CheckDefinition = {
  code: "STRUCT003",
  name: "LICENSE present",
  category: "structure",
  capability: "pure",
  defaultSeverity: "warning",
  run: (context) => {
    if (context.files.some((f) => f.isLicense)) return [];

    const pkg = context.manifest?.package;
    const declared =
      pkg !== undefined &&
      pkg !== null &&
      (Boolean(pkg.license?.trim()) ||
        Boolean(pkg.licenseFile?.trim()) ||
        pkg.inherited.includes("license") ||
        pkg.inherited.includes("license-file"));
    if (declared) return [];

    return [
      createDiagnostic({
        code: "STRUCT003",
        severity: "warning",
        message:
          "Missing LICENSE file in project root. Consider adding one (e.g., LICENSE-MIT or LICENSE-APACHE).",
      }),
    ];
  },
};

export const STRUCTURE_CHECKS: CheckDefinition[] = [
  missingTargets,
  missingReadme,
  missingLicenseFile,
];
