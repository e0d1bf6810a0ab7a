import { createDiagnostic } from "../core/diagnostic.js";

import type {
  CheckDefinition,
  Diagnostic,
  PackageSection,
  ProjectContext,
} from "../types/index.js";

export const LATEST_STABLE_EDITION = "2024";

const AT_MANIFEST = { file: "Cargo.toml" };

function isBlank(value: string | undefined): boolean {
  return value === undefined || value.trim() === "";
}

function isSet(pkg: PackageSection, key: string, value: string | undefined): boolean {
  return !isBlank(value) || pkg.inherited.includes(key);
}

/** run `body` against `[package]` when there is one */
function withPackage(
  context: ProjectContext,
  body: (pkg: PackageSection) => Diagnostic[],
): Diagnostic[] {
  const pkg = context.manifest?.package;
  return pkg ? body(pkg) : [];
}

export const missingDescription: CheckDefinition = {
  code: "MD001",
  name: "Package description",
  category: "manifest",
  capability: "pure",
  defaultSeverity: "warning",
  run: (context) =>
    withPackage(context, (pkg) =>
      isSet(pkg, "description", pkg.description)
        ? []
        : [
            createDiagnostic({
              code: "MD001",
              severity: "warning",
              message: "Missing 'description' in [package] section of Cargo.toml.",
              location: AT_MANIFEST,
              fixHint: 'Add description = "..." under [package]',
            }),
          ],
    ),
};

export const missingLicense: CheckDefinition = {
  code: "MD002",
  name: "Package license",
  category: "manifest",
  capability: "pure",
  defaultSeverity: "warning",
  run: (context) =>
    withPackage(context, (pkg) =>
      isSet(pkg, "license", pkg.license) || isSet(pkg, "license-file", pkg.licenseFile)
        ? []
        : [
            createDiagnostic({
              code: "MD002",
              severity: "warning",
              message: "Missing 'license' (or 'license-file') in [package] section of Cargo.toml.",
              location: AT_MANIFEST,
              fixHint: 'Add an SPDX expression, e.g. license = "MIT OR Apache-2.0"',
            }),
          ],
    ),
};

export const missingRepository: CheckDefinition = {
  code: "MD003",
  name: "Package repository",
  category: "manifest",
  capability: "pure",
  defaultSeverity: "note",
  run: (context) =>
    withPackage(context, (pkg) =>
      isSet(pkg, "repository", pkg.repository)
        ? []
        : [
            createDiagnostic({
              code: "MD003",
              severity: "note",
              message: "Missing 'repository' in [package] section of Cargo.toml.",
              location: AT_MANIFEST,
            }),
          ],
    ),
};

export const missingReadmeField: CheckDefinition = {
  code: "MD004",
  name: "Package readme field",
  category: "manifest",
  capability: "pure",
  defaultSeverity: "note",
  run: (context) =>
    withPackage(context, (pkg) =>
      pkg.readme !== undefined || pkg.inherited.includes("readme")
        ? []
        : [
            createDiagnostic({
              code: "MD004",
              severity: "note",
              message: "Missing 'readme' field in [package] section of Cargo.toml.",
              location: AT_MANIFEST,
              fixHint: 'Add readme = "README.md" or readme = false',
            }),
          ],
    ),
};

export const missingPackageSection: CheckDefinition = {
  code: "MD005",
  name: "Package section",
  category: "manifest",
  capability: "pure",
  defaultSeverity: "error",
  run: (context) => {
    const manifest = context.manifest;
    // virtual workspace manifests have no [package] on purpose
    if (!manifest || manifest.package || manifest.hasWorkspace) return [];
    return [
      createDiagnostic({
        code: "MD005",
        severity: "error",
        message: "Missing section [package]",
        location: AT_MANIFEST,
      }),
    ];
  },
};

export const unparseableManifest: CheckDefinition = {
  code: "MD006",
  name: "Manifest syntax",
  category: "manifest",
  capability: "pure",
  defaultSeverity: "error",
  run: (context) =>
    context.manifestError === null
      ? []
      : [
          createDiagnostic({
            code: "MD006",
            severity: "error",
            message: `Cargo.toml could not be parsed: ${context.manifestError}`,
            location: AT_MANIFEST,
          }),
        ],
};

export const invalidReadmeValue: CheckDefinition = {
  code: "MD007",
  name: "Package readme value",
  category: "manifest",
  capability: "pure",
  defaultSeverity: "warning",
  run: (context) =>
    withPackage(context, (pkg) => {
      const readme = pkg.readme;
      if (readme === undefined || typeof readme === "string" || readme === false) return [];
      return [
        createDiagnostic({
          code: "MD007",
          severity: "warning",
          message: `The 'readme' field in Cargo.toml has an unexpected value (${JSON.stringify(readme)}). Expected a file path string or false.`,
          location: AT_MANIFEST,
        }),
      ];
    }),
};

export const outdatedEdition: CheckDefinition = {
  code: "ED001",
  name: "Edition is current",
  category: "manifest",
  capability: "pure",
  defaultSeverity: "note",
  run: (context) =>
    withPackage(context, (pkg) =>
      pkg.edition === undefined || pkg.edition === LATEST_STABLE_EDITION
        ? []
        : [
            createDiagnostic({
              code: "ED001",
              severity: "note",
              message: `Project uses Rust edition '${pkg.edition}', consider updating to '${LATEST_STABLE_EDITION}'.`,
              location: AT_MANIFEST,
            }),
          ],
    ),
};

export const missingEdition: CheckDefinition = {
  code: "ED002",
  name: "Edition is declared",
  category: "manifest",
  capability: "pure",
  defaultSeverity: "note",
  run: (context) =>
    withPackage(context, (pkg) =>
      pkg.edition !== undefined || pkg.inherited.includes("edition")
        ? []
        : [
            createDiagnostic({
              code: "ED002",
              severity: "note",
              message: `Project does not specify a Rust edition (implicitly 2015), consider specifying and updating to '${LATEST_STABLE_EDITION}'.`,
              location: AT_MANIFEST,
              fixHint: `Add edition = "${LATEST_STABLE_EDITION}" under [package]`,
            }),
          ],
    ),
};

export const MANIFEST_CHECKS: CheckDefinition[] = [
  missingDescription,
  missingLicense,
  missingRepository,
  missingReadmeField,
  missingPackageSection,
  unparseableManifest,
  invalidReadmeValue,
  outdatedEdition,
  missingEdition,
];
