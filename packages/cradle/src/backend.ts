/* =======================================================================================
 * Build-tool backend contract
 * ---------------------------------------------------------------------------------------
 * - Project discovery, package listing and lazy unit introspection
 * - Everything returned is read-only and may be shared across resolutions
 * ======================================================================================= */

import type { ProjectReference } from "./project.js";

export type UnitKind = "lib" | "exe" | "test" | "bench";

/** Buildable target of a package, not yet introspected. */
export interface UnitRef {
  /** e.g. `lib:mypkg`, `exe:mytool` */
  readonly id: string;
  readonly packageName: string;
  readonly kind: UnitKind;
}

export interface PackageInfo {
  readonly name: string;
  /** Absolute directory the package's relative paths are rooted at. */
  readonly sourceDir: string;
  /** Manifest the package was read from, when there is one. */
  readonly manifestFile?: string;
  readonly units: readonly [UnitRef, ...UnitRef[]];
}

export type ComponentEntrypoint =
  | {
      readonly kind: "library";
      readonly exposedModules: readonly string[];
      readonly otherModules: readonly string[];
    }
  | { readonly kind: "executable"; readonly mainIs: string; readonly otherModules: readonly string[] }
  | { readonly kind: "setup"; readonly mainIs: string };

export interface ComponentInfo {
  readonly name: string;
  /** Relative to the package source directory. */
  readonly sourceDirs: readonly string[];
  readonly entrypoint: ComponentEntrypoint;
  /** Compiler flags, relative paths still relative to the package. */
  readonly flags: readonly string[];
}

export interface UnitInfo {
  readonly unitId: string;
  readonly components: readonly ComponentInfo[];
}

export type UnitIntrospection =
  | { readonly kind: "ok"; readonly info: UnitInfo }
  | { readonly kind: "io-error"; readonly error: Error };

export interface BuildToolBackend {
  /** Project markers directly inside `dir`. Never throws; unreadable reads as absent. */
  findProjects(dir: string): ProjectReference[];

  listPackages(project: ProjectReference): Promise<PackageInfo[]>;

  /** Expensive: may configure dependencies. Called at most once per unit per configuration. */
  introspectUnit(project: ProjectReference, pkg: PackageInfo, unit: UnitRef): Promise<UnitIntrospection>;
}
