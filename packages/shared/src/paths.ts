import { URI } from "vscode-uri";
import { brandString, type CanonicalPath } from "./identity.js";
import type { FileSystemContext } from "./fs/context.js";

/** Accept either a `file:` URI or a plain path. */
export function toFsPath(input: string): string {
  if (input.startsWith("file:")) return URI.parse(input).fsPath;
  return input;
}

/**
 * Cache key for a file: absolute, symlinks resolved, and lower-cased where
 * the file system ignores case. Two spellings of the same file agree.
 */
export function canonicalPath(fileSystem: FileSystemContext, input: string): CanonicalPath {
  const resolved = fileSystem.realPath(toFsPath(input));
  return brandString<"CanonicalPath">(fileSystem.caseSensitive ? resolved : resolved.toLowerCase());
}
