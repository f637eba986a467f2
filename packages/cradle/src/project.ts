/* =======================================================================================
 * Project references
 * ---------------------------------------------------------------------------------------
 * - One variant per build-tool layout a project root can be recognized by
 * - Re-derived on every resolution; never cached across calls
 * ======================================================================================= */

import { takeDirectory } from "@cradlekit/shared";

export type ProjectReference =
  | { readonly kind: "stack-yaml"; readonly stackYaml: string }
  | { readonly kind: "v2-file"; readonly projectDir: string; readonly projectFile: string }
  | { readonly kind: "v2-dir"; readonly projectDir: string }
  | { readonly kind: "v1-cabal-file"; readonly projectDir: string; readonly cabalFile: string }
  | { readonly kind: "v1-dir"; readonly projectDir: string };

export type ProjectKind = ProjectReference["kind"];

export type ProjectSuffix = "Stack" | "Cabal-V2" | "Cabal-V2-Dir" | "Cabal-V1" | "Cabal-V1-Dir";

export type BuildTool = "stack" | "cabal";

export function projectRootDir(ref: ProjectReference): string {
  switch (ref.kind) {
    case "stack-yaml":
      return takeDirectory(ref.stackYaml);
    case "v2-file":
    case "v2-dir":
    case "v1-cabal-file":
    case "v1-dir":
      return ref.projectDir;
  }
}

export function projectSuffix(ref: ProjectReference): ProjectSuffix {
  switch (ref.kind) {
    case "stack-yaml":
      return "Stack";
    case "v2-file":
      return "Cabal-V2";
    case "v2-dir":
      return "Cabal-V2-Dir";
    case "v1-cabal-file":
      return "Cabal-V1";
    case "v1-dir":
      return "Cabal-V1-Dir";
  }
}

export function requiredTool(ref: ProjectReference): BuildTool {
  return ref.kind === "stack-yaml" ? "stack" : "cabal";
}

/** Stack and Cabal v2 layouts win over v1 ones when both are present. */
export function isModernProject(ref: ProjectReference): boolean {
  return ref.kind === "stack-yaml" || ref.kind === "v2-file" || ref.kind === "v2-dir";
}

export function isLegacyProject(ref: ProjectReference): boolean {
  return ref.kind === "v1-cabal-file" || ref.kind === "v1-dir";
}

/** File the project was recognized by, if it was recognized by a file. */
export function projectMarkerFile(ref: ProjectReference): string | null {
  switch (ref.kind) {
    case "stack-yaml":
      return ref.stackYaml;
    case "v2-file":
      return ref.projectFile;
    case "v1-cabal-file":
      return ref.cabalFile;
    case "v2-dir":
    case "v1-dir":
      return null;
  }
}

export function describeProject(ref: ProjectReference): string {
  const marker = projectMarkerFile(ref);
  return marker === null
    ? `${projectSuffix(ref)}(${projectRootDir(ref)})`
    : `${projectSuffix(ref)}(${marker})`;
}
