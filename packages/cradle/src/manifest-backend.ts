/**
 * File-based build-tool backend
 *
 * Recognizes projects by their marker files and reads packages and units
 * straight from the manifests, without running either build tool.
 */

import {
  SILENT_LOGGER,
  debug,
  joinPath,
  isAbsolutePath,
  normalise,
  takeDirectory,
  type FileSystemContext,
  type Logger,
} from "@cradlekit/shared";
import type { BuildToolBackend, PackageInfo, UnitIntrospection, UnitRef } from "./backend.js";
import { componentsForUnit, listUnits, packageName, parseCabalFile, splitList } from "./cabal-file.js";
import { projectRootDir, type ProjectReference } from "./project.js";

export interface ManifestBackendOptions {
  readonly fileSystem: FileSystemContext;
  readonly logger?: Logger;
}

export const STACK_YAML = "stack.yaml";
export const CABAL_PROJECT = "cabal.project";
export const V2_DIST_DIR = "dist-newstyle";
export const V1_DIST_DIR = "dist";

export class ManifestBackend implements BuildToolBackend {
  readonly #fs: FileSystemContext;
  readonly #logger: Logger;

  constructor(options: ManifestBackendOptions) {
    this.#fs = options.fileSystem;
    this.#logger = options.logger ?? SILENT_LOGGER;
  }

  findProjects(dir: string): ProjectReference[] {
    const found: ProjectReference[] = [];
    const projectDir = normalise(dir);

    const cabalProject = joinPath(projectDir, CABAL_PROJECT);
    if (this.#fs.fileExists(cabalProject)) {
      found.push({ kind: "v2-file", projectDir, projectFile: cabalProject });
    }

    const stackYaml = joinPath(projectDir, STACK_YAML);
    if (this.#fs.fileExists(stackYaml)) {
      found.push({ kind: "stack-yaml", stackYaml });
    }

    if (this.#fs.isDirectory(joinPath(projectDir, V2_DIST_DIR))) {
      found.push({ kind: "v2-dir", projectDir });
    }

    const cabalFile = this.#firstCabalFile(projectDir);
    if (cabalFile !== null) {
      found.push({ kind: "v1-cabal-file", projectDir, cabalFile });
    }

    if (this.#fs.fileExists(joinPath(projectDir, `${V1_DIST_DIR}/setup-config`))) {
      found.push({ kind: "v1-dir", projectDir });
    }

    return found;
  }

  async listPackages(project: ProjectReference): Promise<PackageInfo[]> {
    const root = this.#fs.normalizePath(projectRootDir(project));
    const manifests = new Set<string>();
    for (const entry of this.#packageEntries(project)) {
      for (const manifest of this.#resolvePackageEntry(root, entry)) {
        manifests.add(manifest);
      }
    }

    const packages: PackageInfo[] = [];
    const seenDirs = new Set<string>();
    for (const manifest of manifests) {
      const pkg = this.#readPackage(manifest);
      if (pkg === null || seenDirs.has(pkg.sourceDir)) continue;
      seenDirs.add(pkg.sourceDir);
      packages.push(pkg);
    }

    debug.project("packages", {
      root,
      manifests: [...manifests],
      packages: packages.map((p) => p.name),
    });
    return packages;
  }

  async introspectUnit(
    _project: ProjectReference,
    pkg: PackageInfo,
    unit: UnitRef,
  ): Promise<UnitIntrospection> {
    const manifest = pkg.manifestFile;
    if (manifest === undefined) {
      return { kind: "io-error", error: new Error(`package ${pkg.name} has no manifest`) };
    }
    const content = this.#fs.readFile(manifest);
    if (content === undefined) {
      return { kind: "io-error", error: new Error(`cannot read ${manifest}`) };
    }
    const components = componentsForUnit(parseCabalFile(content), unit);
    return { kind: "ok", info: { unitId: unit.id, components } };
  }

  // ==========================================================================
  // Package discovery
  // ==========================================================================

  #packageEntries(project: ProjectReference): string[] {
    switch (project.kind) {
      case "stack-yaml": {
        const content = this.#readManifest(project.stackYaml);
        const entries = content === undefined ? null : parseStackPackages(content);
        return entries ?? ["."];
      }
      case "v2-file":
      case "v2-dir": {
        const projectFile =
          project.kind === "v2-file" ? project.projectFile : joinPath(project.projectDir, CABAL_PROJECT);
        const content = this.#fs.fileExists(projectFile) ? this.#readManifest(projectFile) : undefined;
        const entries = content === undefined ? null : parseCabalProjectPackages(content);
        return entries ?? ["./*.cabal"];
      }
      case "v1-cabal-file":
        return [project.cabalFile];
      case "v1-dir":
        return ["."];
    }
  }

  /** Expand one `packages:` entry to the `.cabal` files it names. */
  #resolvePackageEntry(root: string, entry: string): string[] {
    const target = isAbsolutePath(entry) ? normalise(entry) : joinPath(root, entry);
    const matches = this.#expandGlob(target);
    const manifests: string[] = [];
    for (const match of matches) {
      if (match.endsWith(".cabal") && this.#fs.fileExists(match)) {
        manifests.push(match);
      } else if (this.#fs.isDirectory(match)) {
        const cabalFile = this.#firstCabalFile(match);
        if (cabalFile !== null) manifests.push(cabalFile);
      }
    }
    if (manifests.length === 0) {
      debug.project("entry.unmatched", { root, entry });
    }
    return manifests;
  }

  /** Segment-wise `*` / `?` expansion; other segments are taken literally. */
  #expandGlob(pattern: string): string[] {
    const absolute = pattern.startsWith("/");
    const parts = pattern.split("/").filter((p) => p.length > 0);
    let current: string[] = [absolute ? "/" : ""];

    for (const part of parts) {
      const next: string[] = [];
      const isGlob = part.includes("*") || part.includes("?");
      const matcher = isGlob ? globSegment(part) : null;
      for (const base of current) {
        if (matcher === null) {
          next.push(base === "" ? part : joinPath(base, part));
          continue;
        }
        for (const name of this.#fs.readDirectory(base === "" ? "." : base)) {
          if (matcher.test(name)) next.push(base === "" ? name : joinPath(base, name));
        }
      }
      current = next.sort();
    }
    return current;
  }

  #firstCabalFile(dir: string): string | null {
    const names = this.#fs
      .readDirectory(dir)
      .filter((name) => name.endsWith(".cabal") && name.length > ".cabal".length)
      .sort();
    const first = names[0];
    if (first === undefined) return null;
    const file = joinPath(dir, first);
    return this.#fs.fileExists(file) ? file : null;
  }

  #readPackage(manifest: string): PackageInfo | null {
    const content = this.#readManifest(manifest);
    if (content === undefined) return null;

    const parsed = parseCabalFile(content);
    const fileName = manifest.slice(manifest.lastIndexOf("/") + 1);
    const name = packageName(parsed) ?? fileName.slice(0, -".cabal".length);
    const [first, ...rest] = listUnits(parsed, name);
    if (first === undefined) {
      debug.project("package.no-units", { manifest });
      return null;
    }
    return {
      name,
      sourceDir: this.#fs.normalizePath(takeDirectory(manifest)),
      manifestFile: manifest,
      units: [first, ...rest],
    };
  }

  #readManifest(file: string): string | undefined {
    const content = this.#fs.readFile(file);
    if (content === undefined) {
      this.#logger.warn(`[cradle] cannot read ${file}; ignoring it`);
    }
    return content;
  }
}

// =============================================================================
// Manifest fragments
// =============================================================================

function globSegment(segment: string): RegExp {
  const source = segment
    .replace(/[.+^${}()|[\]\\]/g, "\\$&")
    .replace(/\*/g, "[^/]*")
    .replace(/\?/g, "[^/]");
  return new RegExp(`^${source}$`);
}

function unquote(value: string): string {
  if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
    return value.slice(1, -1);
  }
  return value;
}

/**
 * `packages:` of a stack.yaml, block or flow style. Null when the key is
 * absent, meaning "the project directory only".
 */
export function parseStackPackages(content: string): string[] | null {
  const lines = content.split(/\r?\n/);
  const start = lines.findIndex((line) => /^packages\s*:/.test(line));
  if (start < 0) return null;

  const inline = (lines[start] ?? "").replace(/^packages\s*:/, "").trim();
  if (inline.startsWith("[")) {
    return inline
      .replace(/^\[|\]$/g, "")
      .split(",")
      .map((item) => unquote(item.trim()))
      .filter((item) => item.length > 0);
  }

  const patterns: string[] = [];
  for (const line of lines.slice(start + 1)) {
    const trimmed = line.trim();
    if (trimmed === "" || trimmed.startsWith("#")) continue;
    if (!trimmed.startsWith("- ")) break;
    const item = unquote(trimmed.slice(2).trim());
    // `- location: ...` style entries point outside the project
    if (!item.includes(":")) patterns.push(item);
  }
  return patterns;
}

/** `packages:` of a cabal.project, continuation lines included. */
export function parseCabalProjectPackages(content: string): string[] | null {
  const lines = content.split(/\r?\n/);
  const start = lines.findIndex((line) => /^packages\s*:/i.test(line));
  if (start < 0) return null;

  const values = [(lines[start] ?? "").replace(/^packages\s*:/i, "")];
  for (const line of lines.slice(start + 1)) {
    if (line.trim() === "" || line.trim().startsWith("--")) continue;
    if (!/^\s/.test(line)) break;
    values.push(line);
  }
  return values.flatMap(splitList);
}
