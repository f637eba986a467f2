/**
 * Configuration resolution
 *
 * Turns a source file into a {@link Configuration} in two stages:
 *
 * 1. **Package match** (eager): locate the project, list its packages and
 *    pick the one whose source directory is the longest prefix of the file.
 * 2. **Component match** (lazy, inside `resolve`): introspect the package's
 *    units in order until a component claims the file, then derive flags.
 *
 * Unit introspection may configure dependencies, so a configuration
 * remembers each successful introspection and never repeats it.
 */

import {
  SILENT_LOGGER,
  debug,
  describeError,
  dropTrailingSeparator,
  isFilePathPrefixOf,
  makeRelative,
  normalise,
  toFsPath,
  type FileSystemContext,
  type Logger,
} from "@cradlekit/shared";
import type { BuildToolBackend, PackageInfo, UnitIntrospection, UnitRef } from "./backend.js";
import { findComponent, getTargets } from "./component-match.js";
import {
  ACTION_NAME_PREFIX,
  NONE_ACTION_NAME,
  noComponentError,
  noneConfiguration,
  type Configuration,
  type ConfigurationResult,
} from "./configuration.js";
import { fixImportDirs } from "./flags.js";
import { ProjectLocator } from "./locator.js";
import { projectMarkerFile, projectRootDir, projectSuffix, type ProjectReference } from "./project.js";
import { createPathToolLocator, type ToolLocator } from "./tools.js";

export interface ConfigurationResolverOptions {
  readonly backend: BuildToolBackend;
  readonly fileSystem: FileSystemContext;
  /** Defaults to a locator over `backend` and `tools`. */
  readonly locator?: ProjectLocator;
  /** Defaults to a `PATH` lookup. Ignored when `locator` is given. */
  readonly tools?: ToolLocator;
  readonly logger?: Logger;
}

/**
 * Package whose source directory is the longest prefix of `file`, or null.
 */
export function findPackageFor(packages: readonly PackageInfo[], file: string): PackageInfo | null {
  let best: PackageInfo | null = null;
  let bestLength = -1;
  for (const pkg of packages) {
    if (!isFilePathPrefixOf(pkg.sourceDir, file)) continue;
    const length = dropTrailingSeparator(normalise(pkg.sourceDir)).length;
    if (length > bestLength) {
      best = pkg;
      bestLength = length;
    }
  }
  return best;
}

export class ConfigurationResolver {
  readonly #backend: BuildToolBackend;
  readonly #fs: FileSystemContext;
  readonly #locator: ProjectLocator;
  readonly #logger: Logger;

  constructor(options: ConfigurationResolverOptions) {
    this.#backend = options.backend;
    this.#fs = options.fileSystem;
    this.#logger = options.logger ?? SILENT_LOGGER;
    this.#locator =
      options.locator ??
      new ProjectLocator({
        backend: options.backend,
        tools: options.tools ?? createPathToolLocator(),
        logger: this.#logger,
      });
  }

  async resolve(file: string): Promise<Configuration> {
    const absolute = this.#fs.normalizePath(toFsPath(file));
    const project = this.#locator.findEntryPoint(absolute);
    if (project === null) {
      this.#logger.error(`[cradle] could not find a project for ${absolute}`);
      return noneConfiguration(this.#fs.cwd(), NONE_ACTION_NAME, null, "no-project");
    }

    const root = projectRootDir(project);
    const suffix = projectSuffix(project);
    this.#logger.log(`[cradle] ${suffix} project at ${root} for ${absolute}`);

    const packages = await this.#listPackages(project);
    const pkg = findPackageFor(packages, absolute);
    if (pkg === null) {
      debug.cradle("no-package", { file: absolute, packages: packages.map((p) => p.sourceDir) });
      return noneConfiguration(root, `${ACTION_NAME_PREFIX}${suffix}-None`, project, "no-package");
    }

    const packageRoot = this.#fs.realPath(pkg.sourceDir);
    debug.cradle("package", { file: absolute, package: pkg.name, root: packageRoot });
    return this.#componentConfiguration(project, pkg, packageRoot, `${ACTION_NAME_PREFIX}${suffix}`);
  }

  async #listPackages(project: ProjectReference): Promise<PackageInfo[]> {
    try {
      return await this.#backend.listPackages(project);
    } catch (error) {
      this.#logger.warn(`[cradle] cannot list packages of ${projectRootDir(project)}: ${describeError(error)}`);
      return [];
    }
  }

  #componentConfiguration(
    project: ProjectReference,
    pkg: PackageInfo,
    packageRoot: string,
    actionName: string,
  ): Configuration {
    const introspected = new Map<string, Promise<UnitIntrospection>>();
    const introspect = (unit: UnitRef): Promise<UnitIntrospection> => {
      const known = introspected.get(unit.id);
      if (known) return known;
      const pending = Promise.resolve()
        .then(() => this.#backend.introspectUnit(project, pkg, unit))
        .then(
          (result): UnitIntrospection => {
            // failed introspections are retried on the next request
            if (result.kind === "io-error") introspected.delete(unit.id);
            return result;
          },
          (error: unknown): UnitIntrospection => {
            introspected.delete(unit.id);
            return { kind: "io-error", error: error instanceof Error ? error : new Error(String(error)) };
          },
        );
      introspected.set(unit.id, pending);
      return pending;
    };

    const dependencies = [...new Set([pkg.manifestFile, projectMarkerFile(project)])].filter(
      (dep): dep is string => typeof dep === "string",
    );

    return {
      kind: "component",
      rootDir: packageRoot,
      actionName,
      project,
      resolve: async (file: string): Promise<ConfigurationResult> => {
        const target = this.#fs.realPath(toFsPath(file));
        const relative = makeRelative(packageRoot, target);
        const component = await findComponent(pkg.units, relative, introspect, this.#logger);
        if (component === null) {
          return { kind: "failure", error: noComponentError(target) };
        }

        const flags = [
          ...component.flags.map((flag) => fixImportDirs(packageRoot, flag)),
          ...getTargets(component, relative),
        ];
        debug.cradle("flags", { file: target, component: component.name, flags });
        return { kind: "success", options: { flags, dependencies } };
      },
    };
  }
}
