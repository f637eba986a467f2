/**
 * Mock File System Context Implementation
 *
 * In-memory file system for testing. Enables fast, deterministic tests
 * without touching the real file system.
 */

import { normalizePathForId, type NormalizedPath } from "../identity.js";
import { takeDirectory } from "../path-matcher.js";
import type { FileSystemContext } from "./context.js";

interface MockFileEntry {
  readonly kind: "file";
  readonly path: NormalizedPath;
  readonly content: string;
}

interface MockDirectoryEntry {
  readonly kind: "directory";
  readonly path: NormalizedPath;
}

interface MockSymlinkEntry {
  readonly kind: "symlink";
  readonly path: NormalizedPath;
  readonly target: NormalizedPath;
}

type MockEntry = MockFileEntry | MockDirectoryEntry | MockSymlinkEntry;

/**
 * Options for creating a mock file system.
 */
export interface MockFileSystemOptions {
  /**
   * Initial file contents.
   * Keys are file paths, values are contents.
   */
  readonly files?: Record<string, string>;

  /** Case sensitivity. Defaults to true. */
  readonly caseSensitive?: boolean;

  /** Working directory for relative paths. Defaults to `/`. */
  readonly root?: string;
}

/**
 * Mock file system context with mutation methods.
 */
export interface MockFileSystemContext extends FileSystemContext {
  /** Add or overwrite a file; parent directories are created. */
  addFile(path: string, content: string): void;

  addDirectory(path: string): void;

  /** `path` resolves to `target` (absolute or relative to the link's directory). */
  addSymlink(path: string, target: string): void;

  /** Remove a file, directory or link, along with everything beneath it. */
  remove(path: string): void;

  clear(): void;
}

/**
 * Create a mock file system context for testing.
 *
 * @example
 * ```typescript
 * const mockFs = createMockFileSystem({
 *   files: {
 *     "/repo/stack.yaml": "packages:\n- .\n",
 *     "/repo/src/Lib.hs": "module Lib where",
 *   },
 * });
 *
 * mockFs.isDirectory("/repo/src"); // true
 * ```
 */
export function createMockFileSystem(options?: MockFileSystemOptions): MockFileSystemContext {
  const caseSensitive = options?.caseSensitive ?? true;
  const root: NormalizedPath = resolveAgainst("/", options?.root ?? "/");

  const entries = new Map<string, MockEntry>();

  function resolveAgainst(base: string, path: string): NormalizedPath {
    const slashed = path.split("\\").join("/");
    const joined = slashed.startsWith("/") ? slashed : `${base}/${slashed}`;
    const resolved: string[] = [];
    for (const part of joined.split("/")) {
      if (part === "" || part === ".") continue;
      if (part === "..") {
        resolved.pop();
      } else {
        resolved.push(part);
      }
    }
    return normalizePathForId("/" + resolved.join("/"));
  }

  function normalizePath(path: string): NormalizedPath {
    return resolveAgainst(root, path);
  }

  function keyOf(path: string): string {
    return caseSensitive ? path : path.toLowerCase();
  }

  // Follow links segment by segment. Bounded so a cycle terminates.
  function resolveLinks(path: NormalizedPath): NormalizedPath {
    let current = path;
    for (let hops = 0; hops < 40; hops++) {
      const parts = current.split("/").filter(Boolean);
      let prefix = "";
      let rewritten: NormalizedPath | null = null;
      for (let i = 0; i < parts.length; i++) {
        prefix = `${prefix}/${parts[i]}`;
        const entry = entries.get(keyOf(prefix));
        if (entry?.kind === "symlink") {
          const rest = parts.slice(i + 1).join("/");
          rewritten = rest ? resolveAgainst(entry.target, rest) : entry.target;
          break;
        }
      }
      if (rewritten === null) return current;
      current = rewritten;
    }
    return current;
  }

  function lookup(path: string): MockEntry | undefined {
    const resolved = resolveLinks(normalizePath(path));
    if (resolved === "/") return { kind: "directory", path: resolved };
    return entries.get(keyOf(resolved));
  }

  function ensureDirectory(path: NormalizedPath): void {
    if (path === "/") return;
    const existing = entries.get(keyOf(path));
    if (existing) return;
    ensureDirectory(normalizePathForId(takeDirectory(path)));
    entries.set(keyOf(path), { kind: "directory", path });
  }

  function addFile(path: string, content: string): void {
    const normalized = normalizePath(path);
    ensureDirectory(normalizePathForId(takeDirectory(normalized)));
    entries.set(keyOf(normalized), { kind: "file", path: normalized, content });
  }

  if (options?.files) {
    for (const [path, content] of Object.entries(options.files)) {
      addFile(path, content);
    }
  }

  return {
    platform: "posix",
    caseSensitive,

    fileExists(path: string): boolean {
      return lookup(path)?.kind === "file";
    },

    isDirectory(path: string): boolean {
      return lookup(path)?.kind === "directory";
    },

    readDirectory(path: string): string[] {
      if (lookup(path)?.kind !== "directory") return [];
      const dir = resolveLinks(normalizePath(path));
      const dirKey = keyOf(dir === "/" ? "" : dir);
      const names: string[] = [];
      for (const [key, entry] of entries) {
        if (!key.startsWith(dirKey + "/")) continue;
        const rest = key.slice(dirKey.length + 1);
        if (rest.length === 0 || rest.includes("/")) continue;
        names.push(entry.path.slice(entry.path.lastIndexOf("/") + 1));
      }
      return names.sort();
    },

    readFile(path: string): string | undefined {
      const entry = lookup(path);
      return entry?.kind === "file" ? entry.content : undefined;
    },

    readBytes(path: string): Uint8Array | undefined {
      const entry = lookup(path);
      return entry?.kind === "file" ? new TextEncoder().encode(entry.content) : undefined;
    },

    realPath(path: string): NormalizedPath {
      const resolved = resolveLinks(normalizePath(path));
      // Report the stored spelling, as a case-insensitive disk would.
      const entry = entries.get(keyOf(resolved));
      return entry && entry.kind !== "symlink" ? entry.path : resolved;
    },

    normalizePath,

    cwd(): NormalizedPath {
      return root;
    },

    addFile,

    addDirectory(path: string): void {
      ensureDirectory(normalizePath(path));
    },

    addSymlink(path: string, target: string): void {
      const normalized = normalizePath(path);
      const dir = normalizePathForId(takeDirectory(normalized));
      ensureDirectory(dir);
      entries.set(keyOf(normalized), {
        kind: "symlink",
        path: normalized,
        target: resolveAgainst(dir, target),
      });
    },

    remove(path: string): void {
      const key = keyOf(normalizePath(path));
      for (const existing of [...entries.keys()]) {
        if (existing === key || existing.startsWith(key + "/")) {
          entries.delete(existing);
        }
      }
    },

    clear(): void {
      entries.clear();
    },
  };
}
