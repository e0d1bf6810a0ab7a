import { parse, TomlError } from "smol-toml";

import type {
  CargoManifest,
  DependencyKind,
  DependencySpec,
  PackageSection,
} from "../types/index.js";

export const MANIFEST_FILENAME = "Cargo.toml";

export type ManifestParseResult =
  | { ok: true; manifest: CargoManifest }
  | { ok: false; error: string };

const DEPENDENCY_TABLES: Array<[string, DependencyKind]> = [
  ["dependencies", "runtime"],
  ["dev-dependencies", "dev"],
  ["dev_dependencies", "dev"],
  ["build-dependencies", "build"],
  ["build_dependencies", "build"],
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isWorkspaceInherited(value: unknown): boolean {
  return isRecord(value) && value.workspace === true;
}

export function parseManifest(source: string): ManifestParseResult {
  let data: Record<string, unknown>;
  try {
    data = parse(source);
  } catch (error) {
    if (error instanceof TomlError) {
      const summary = error.message.split("\n")[0] ?? error.message;
      return { ok: false, error: `line ${error.line}, column ${error.column}: ${summary}` };
    }
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }

  const dependencies: DependencySpec[] = [];
  for (const [table, kind] of DEPENDENCY_TABLES) {
    dependencies.push(...readDependencyTable(data[table], kind));
  }

  // [target.'cfg(...)'.dependencies] and friends
  if (isRecord(data.target)) {
    for (const platform of Object.values(data.target)) {
      if (!isRecord(platform)) continue;
      for (const [table, kind] of DEPENDENCY_TABLES) {
        dependencies.push(...readDependencyTable(platform[table], kind));
      }
    }
  }

  const lib = isRecord(data.lib)
    ? typeof data.lib.path === "string"
      ? { path: data.lib.path }
      : {}
    : null;

  return {
    ok: true,
    manifest: {
      package: isRecord(data.package) ? readPackage(data.package) : null,
      dependencies,
      hasWorkspace: isRecord(data.workspace),
      lib,
    },
  };
}

function readPackage(table: Record<string, unknown>): PackageSection {
  const inherited = Object.keys(table).filter((key) => isWorkspaceInherited(table[key]));
  const text = (key: string): string | undefined => {
    const value = table[key];
    return typeof value === "string" ? value : undefined;
  };

  const pkg: PackageSection = { inherited };
  const name = text("name");
  if (name !== undefined) pkg.name = name;
  const version = text("version");
  if (version !== undefined) pkg.version = version;
  const edition = text("edition");
  if (edition !== undefined) pkg.edition = edition;
  const description = text("description");
  if (description !== undefined) pkg.description = description;
  const license = text("license");
  if (license !== undefined) pkg.license = license;
  const licenseFile = text("license-file");
  if (licenseFile !== undefined) pkg.licenseFile = licenseFile;
  const repository = text("repository");
  if (repository !== undefined) pkg.repository = repository;
  if ("readme" in table && !inherited.includes("readme")) {
    pkg.readme = table.readme;
  }
  return pkg;
}

function readDependencyTable(value: unknown, kind: DependencyKind): DependencySpec[] {
  if (!isRecord(value)) return [];

  const specs: DependencySpec[] = [];
  for (const [name, entry] of Object.entries(value)) {
    if (typeof entry === "string") {
      specs.push({ name, kind, version: entry });
      continue;
    }
    if (!isRecord(entry)) continue;

    // `package = "real-name"` renames the dependency; the registry knows the real one
    const crateName = typeof entry.package === "string" ? entry.package : name;
    const spec: DependencySpec = {
      name: crateName,
      kind,
      version: typeof entry.version === "string" ? entry.version : null,
    };
    if (typeof entry.path === "string") spec.path = entry.path;
    if (typeof entry.git === "string") spec.git = entry.git;
    if (typeof entry.registry === "string") spec.registry = entry.registry;
    if (entry.workspace === true) spec.workspace = true;
    specs.push(spec);
  }
  return specs;
}
