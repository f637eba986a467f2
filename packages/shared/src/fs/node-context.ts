/**
 * Node.js File System Context Implementation
 *
 * Production implementation using Node.js fs module.
 */

import * as fs from "node:fs";
import * as nodePath from "node:path";
import { normalizePathForId, type NormalizedPath } from "../identity.js";
import type { FileSystemContext, FileSystemContextOptions } from "./context.js";

/**
 * Create a Node.js file system context.
 *
 * @example
 * ```typescript
 * const fileSystem = createNodeFileSystem();
 * fileSystem.realPath("./src/Lib.hs");
 * // → "/home/me/project/src/Lib.hs"
 * ```
 */
export function createNodeFileSystem(options?: FileSystemContextOptions): FileSystemContext {
  const root = nodePath.resolve(options?.root ?? process.cwd());
  const platform = options?.platform ?? (process.platform === "win32" ? "win32" : "posix");
  const caseSensitive = options?.caseSensitive ?? (platform !== "win32");

  function normalizePath(path: string): NormalizedPath {
    return normalizePathForId(nodePath.resolve(root, path));
  }

  return {
    platform,
    caseSensitive,

    fileExists(path: string): boolean {
      try {
        return fs.statSync(normalizePath(path)).isFile();
      } catch {
        return false;
      }
    },

    isDirectory(path: string): boolean {
      try {
        return fs.statSync(normalizePath(path)).isDirectory();
      } catch {
        return false;
      }
    },

    readDirectory(path: string): string[] {
      try {
        return fs.readdirSync(normalizePath(path));
      } catch {
        return [];
      }
    },

    readFile(path: string): string | undefined {
      try {
        return fs.readFileSync(normalizePath(path), "utf-8");
      } catch {
        return undefined;
      }
    },

    readBytes(path: string): Uint8Array | undefined {
      try {
        return fs.readFileSync(normalizePath(path));
      } catch {
        return undefined;
      }
    },

    realPath(path: string): NormalizedPath {
      const absolute = normalizePath(path);
      try {
        return normalizePathForId(fs.realpathSync.native(absolute));
      } catch {
        return absolute;
      }
    },

    normalizePath,

    cwd(): NormalizedPath {
      return normalizePathForId(root);
    },
  };
}
