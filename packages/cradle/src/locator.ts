import { SILENT_LOGGER, ancestors, debug, describeError, takeDirectory, type Logger } from "@cradlekit/shared";
import type { BuildToolBackend } from "./backend.js";
import {
  describeProject,
  isLegacyProject,
  isModernProject,
  requiredTool,
  type BuildTool,
  type ProjectReference,
} from "./project.js";
import type { ToolLocator } from "./tools.js";

export interface ProjectLocatorOptions {
  readonly backend: BuildToolBackend;
  readonly tools: ToolLocator;
  /** Executable names to look for; defaults to `stack` and `cabal`. */
  readonly toolNames?: Partial<Record<BuildTool, string>>;
  readonly logger?: Logger;
}

/**
 * Finds the project a file belongs to by walking up from its directory.
 *
 * Candidates from every ancestor are collected, then filtered by whether
 * their build tool is installed. A Stack or Cabal v2 project wins over any
 * Cabal v1 project regardless of depth; within each group the nearest one
 * found first is taken.
 */
export class ProjectLocator {
  readonly #backend: BuildToolBackend;
  readonly #tools: ToolLocator;
  readonly #toolNames: Record<BuildTool, string>;
  readonly #logger: Logger;
  readonly #installed = new Map<BuildTool, boolean>();

  constructor(options: ProjectLocatorOptions) {
    this.#backend = options.backend;
    this.#tools = options.tools;
    this.#toolNames = {
      stack: options.toolNames?.stack ?? "stack",
      cabal: options.toolNames?.cabal ?? "cabal",
    };
    this.#logger = options.logger ?? SILENT_LOGGER;
  }

  findEntryPoint(file: string): ProjectReference | null {
    const candidates = ancestors(takeDirectory(file)).flatMap((dir) => this.#projectsIn(dir));
    debug.project("candidates", { file, projects: candidates.map(describeProject) });

    const supported = candidates.filter((ref) => this.#isInstalled(requiredTool(ref)));
    debug.project("supported", { file, projects: supported.map(describeProject) });

    return supported.find(isModernProject) ?? supported.find(isLegacyProject) ?? null;
  }

  #projectsIn(dir: string): ProjectReference[] {
    try {
      return this.#backend.findProjects(dir);
    } catch (error) {
      this.#logger.warn(`[project] cannot inspect ${dir}: ${describeError(error)}`);
      return [];
    }
  }

  #isInstalled(tool: BuildTool): boolean {
    const known = this.#installed.get(tool);
    if (known !== undefined) return known;
    const installed = this.#tools.isExecutableOnPath(this.#toolNames[tool]);
    this.#installed.set(tool, installed);
    return installed;
  }
}
