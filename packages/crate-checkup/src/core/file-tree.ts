import { glob } from "glob";

import type { CargoManifest, ProjectFile } from "../types/index.js";

const IGNORED = [
  "**/target",
  "**/target/**",
  "**/.git",
  "**/.git/**",
  "**/node_modules",
  "**/node_modules/**",
];

const README_NAMES = new Set(["README", "README.MD", "README.RST", "README.TXT"]);
const LICENSE_NAMES = new Set([
  "LICENSE",
  "LICENSE.TXT",
  "LICENSE.MD",
  "LICENSE-MIT",
  "LICENSE-APACHE",
  "LICENCE",
  "COPYING",
  "UNLICENSE",
]);

export interface FileTree {
  files: ProjectFile[];
  directories: string[];
}

export function normalizeRelative(p: string): string {
  return p.replace(/\\/g, "/").replace(/^(\.\/)+/, "");
}

export function libraryEntryPath(manifest: CargoManifest | null): string {
  const custom = manifest?.lib?.path;
  return custom ? normalizeRelative(custom) : "src/lib.rs";
}

export function classifyFile(relPath: string, libEntry: string): ProjectFile {
  const isRustSource = relPath.endsWith(".rs");
  const isTopLevel = !relPath.includes("/");
  const upperName = relPath.toUpperCase();

  const isLibraryEntry = relPath === libEntry;
  const isBinaryEntry =
    relPath === "src/main.rs" ||
    /^src\/bin\/[^/]+\.rs$/.test(relPath) ||
    /^src\/bin\/[^/]+\/main\.rs$/.test(relPath);
  const isBuildScript = relPath === "build.rs";
  const isLibraryCode =
    isRustSource &&
    (relPath.startsWith("src/") || isLibraryEntry) &&
    relPath !== "src/main.rs" &&
    !relPath.startsWith("src/bin/") &&
    !isBuildScript;

  return {
    path: relPath,
    isRustSource,
    isLibraryEntry,
    isBinaryEntry,
    isBuildScript,
    isLibraryCode,
    isReadme: isTopLevel && README_NAMES.has(upperName),
    isLicense: isTopLevel && LICENSE_NAMES.has(upperName),
  };
}

/**
 * List the project tree once, sorted, with every file classified.
 */
export async function scanFileTree(
  root: string,
  manifest: CargoManifest | null,
): Promise<FileTree> {
  const entries = await glob("**/*", {
    cwd: root,
    dot: true,
    ignore: IGNORED,
    withFileTypes: true,
  });

  const libEntry = libraryEntryPath(manifest);
  const files: ProjectFile[] = [];
  const directories: string[] = [];

  for (const entry of entries) {
    const rel = entry.relativePosix();
    if (!rel) continue;
    if (entry.isDirectory()) {
      directories.push(rel);
    } else if (entry.isFile()) {
      files.push(classifyFile(rel, libEntry));
    }
  }

  files.sort((a, b) => compareOrdinal(a.path, b.path));
  directories.sort(compareOrdinal);
  return { files, directories };
}

export function compareOrdinal(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
