/* =======================================================================================
 * Configurations
 * ---------------------------------------------------------------------------------------
 * - What a resolved project offers for compiling a file
 * - Flags are computed lazily, per file, through `resolve`
 * ======================================================================================= */

import type { ProjectReference } from "./project.js";

export interface ComponentOptions {
  /** Compiler flags followed by the targets to load. */
  readonly flags: readonly string[];
  /** Files whose change invalidates these options. */
  readonly dependencies: readonly string[];
}

export interface CradleError {
  readonly code: "no-component";
  readonly file: string;
  readonly message: string;
}

export type NoneReason = "no-project" | "no-package";

export type ConfigurationResult =
  | { readonly kind: "success"; readonly options: ComponentOptions }
  | { readonly kind: "none"; readonly reason: NoneReason }
  | { readonly kind: "failure"; readonly error: CradleError };

export interface Configuration {
  /** `none` configurations can describe a project but never compile a file. */
  readonly kind: "none" | "component";
  readonly rootDir: string;
  /** e.g. `Cabal-Helper-Stack`, `Cabal-Helper-Cabal-V2-None` */
  readonly actionName: string;
  /** Null when no project was found at all. */
  readonly project: ProjectReference | null;
  resolve(file: string): Promise<ConfigurationResult>;
}

export const NONE_ACTION_NAME = "Cabal-Helper-None";
export const ACTION_NAME_PREFIX = "Cabal-Helper-";

export function noneConfiguration(
  rootDir: string,
  actionName: string,
  project: ProjectReference | null,
  reason: NoneReason,
): Configuration {
  const result: ConfigurationResult = { kind: "none", reason };
  return {
    kind: "none",
    rootDir,
    actionName,
    project,
    resolve: () => Promise.resolve(result),
  };
}

export function noComponentError(file: string): CradleError {
  return { code: "no-component", file, message: `Could not obtain flags for ${file}` };
}

const STACK_ACTION_NAMES: ReadonlySet<string> = new Set([
  "stack",
  `${ACTION_NAME_PREFIX}Stack`,
  `${ACTION_NAME_PREFIX}Stack-None`,
]);

export function isStackConfiguration(configuration: Pick<Configuration, "actionName">): boolean {
  return STACK_ACTION_NAMES.has(configuration.actionName);
}
