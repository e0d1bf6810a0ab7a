export type DependencyKind = "runtime" | "dev" | "build";

export interface DependencySpec {
  name: string;
  kind: DependencyKind;
  /** version requirement as written, null for path/git/workspace deps without one */
  version: string | null;
  path?: string;
  git?: string;
  /** alternate registry name; absent means crates.io */
  registry?: string;
  workspace?: boolean;
}

export interface PackageSection {
  name?: string;
  version?: string;
  edition?: string;
  description?: string;
  license?: string;
  licenseFile?: string;
  /** `readme` accepts a path string or `false`; anything else is kept raw for MD007 */
  readme?: unknown;
  repository?: string;
  /** keys written as `{ workspace = true }`, inherited from the workspace root */
  inherited: string[];
}

export interface CargoManifest {
  package: PackageSection | null;
  dependencies: DependencySpec[];
  hasWorkspace: boolean;
  lib: { path?: string } | null;
}
