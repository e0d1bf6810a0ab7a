import type { CargoManifest } from "./manifest.js";

export interface ProjectFile {
  /** POSIX path relative to the project root */
  path: string;
  isRustSource: boolean;
  isLibraryEntry: boolean;
  isBinaryEntry: boolean;
  isBuildScript: boolean;
  /** under src/, outside binary targets and the build script */
  isLibraryCode: boolean;
  isReadme: boolean;
  isLicense: boolean;
}

export interface ProjectContext {
  root: string;
  manifestPath: string;
  manifest: CargoManifest | null;
  /** parse failure message when `manifest` is null */
  manifestError: string | null;
  files: readonly ProjectFile[];
  /** directories present in the tree, POSIX, relative */
  directories: readonly string[];
}
