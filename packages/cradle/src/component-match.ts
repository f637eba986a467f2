/* =======================================================================================
 * Component membership
 * ---------------------------------------------------------------------------------------
 * - Which component of a package claims a file
 * - Which targets are loaded alongside it
 * All paths here are relative to the package source directory.
 * ======================================================================================= */

import {
  SILENT_LOGGER,
  debug,
  isFilePathPrefixOf,
  joinPath,
  moduleNameFromPath,
  relativeTo,
  type Logger,
} from "@cradlekit/shared";
import type { ComponentInfo, UnitIntrospection, UnitRef } from "./backend.js";

/**
 * Everything the compiler should load with the file: all modules of a
 * library, or the main file (under the source dir holding the file) plus
 * other modules of an executable. Setup scripts contribute nothing.
 */
export function getTargets(component: ComponentInfo, relativeFile: string): string[] {
  const entry = component.entrypoint;
  switch (entry.kind) {
    case "setup":
      return [];
    case "library":
      return [...entry.exposedModules, ...entry.otherModules];
    case "executable": {
      const sourceDir = component.sourceDirs.find((dir) => isFilePathPrefixOf(dir, relativeFile));
      const main = sourceDir === undefined ? [] : [joinPath(sourceDir, entry.mainIs)];
      return [...main, ...entry.otherModules];
    }
  }
}

function isMainFile(component: ComponentInfo, sourceRelative: string): boolean {
  const entry = component.entrypoint;
  return entry.kind !== "library" && entry.mainIs === sourceRelative;
}

/**
 * A file belongs to a component when one of its source dirs prefixes the
 * file and the remainder, as a module name or as the raw path, is a target,
 * or the remainder is the component's main file.
 */
export function partOfComponent(relativeFile: string, component: ComponentInfo): boolean {
  const sourceRelative = relativeTo(relativeFile, component.sourceDirs);
  if (sourceRelative === null) return false;
  const targets = getTargets(component, relativeFile);
  return (
    targets.includes(moduleNameFromPath(sourceRelative)) ||
    targets.includes(relativeFile) ||
    isMainFile(component, sourceRelative)
  );
}

export type IntrospectUnit = (unit: UnitRef) => Promise<UnitIntrospection>;

/**
 * First component across `units`, in order, claiming the file. Units whose
 * introspection fails are skipped with a warning. When several components
 * would match, the first one encountered wins.
 */
export async function findComponent(
  units: readonly UnitRef[],
  relativeFile: string,
  introspect: IntrospectUnit,
  logger: Logger = SILENT_LOGGER,
): Promise<ComponentInfo | null> {
  for (const unit of units) {
    const result = await introspect(unit);
    if (result.kind === "io-error") {
      logger.warn(`[cradle] skipping unit ${unit.id} while looking for "${relativeFile}": ${result.error.message}`);
      continue;
    }
    const component = result.info.components.find((c) => partOfComponent(relativeFile, c));
    debug.cradle("unit", { unit: unit.id, file: relativeFile, matched: component?.name ?? null });
    if (component) return component;
  }
  return null;
}
