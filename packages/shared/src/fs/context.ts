/**
 * File System Context
 *
 * Abstract interface for the file system operations project discovery and
 * the artifact cache need. Hosts pass the Node.js implementation; tests pass
 * the in-memory one.
 */

import type { NormalizedPath } from "../identity.js";

// ============================================================================
// Core Interface
// ============================================================================

/**
 * File system context interface.
 *
 * Implementations:
 * - `createNodeFileSystem()` - Node.js fs module
 * - `createMockFileSystem()` - In-memory for tests
 */
export interface FileSystemContext {
  // === Core Operations ===

  /** True if `path` exists and is a regular file. */
  fileExists(path: string): boolean;

  /** True if `path` exists and is a directory. */
  isDirectory(path: string): boolean;

  /** Entry names (not full paths) of a directory, or `[]` when unreadable. */
  readDirectory(path: string): string[];

  /** UTF-8 contents, or undefined if the file doesn't exist. */
  readFile(path: string): string | undefined;

  /** Raw bytes, or undefined if the file doesn't exist. */
  readBytes(path: string): Uint8Array | undefined;

  // === Path Operations ===

  /**
   * Resolve symlinks. A path that doesn't exist comes back normalized but
   * otherwise unchanged.
   */
  realPath(path: string): NormalizedPath;

  /**
   * Absolute, `/`-separated, with `.` and `..` resolved against `cwd()`.
   * Case is preserved.
   */
  normalizePath(path: string): NormalizedPath;

  /** Directory relative paths are resolved against. */
  cwd(): NormalizedPath;

  // === Context Info ===

  readonly platform: "win32" | "posix";

  readonly caseSensitive: boolean;
}

/**
 * Options for creating a file system context.
 */
export interface FileSystemContextOptions {
  /** Root for relative path resolution. Defaults to the process cwd. */
  readonly root?: string;

  readonly platform?: "win32" | "posix";

  /** Defaults to true except on win32. */
  readonly caseSensitive?: boolean;
}
