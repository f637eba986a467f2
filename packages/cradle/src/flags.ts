import { isAbsolutePath, joinPath } from "@cradlekit/shared";

const IMPORT_DIR_FLAG = "-i";

/**
 * Anchor a relative `-i<dir>` at `root`. A bare `-i` clears the search path
 * and is kept as is, as are absolute directories and every other flag.
 *
 * ```ts
 * fixImportDirs("/repo/pkg", "-isrc")   // "-i/repo/pkg/src"
 * fixImportDirs("/repo/pkg", "-i")      // "-i"
 * fixImportDirs("/repo/pkg", "-Wall")   // "-Wall"
 * ```
 */
export function fixImportDirs(root: string, flag: string): string {
  if (!flag.startsWith(IMPORT_DIR_FLAG)) return flag;
  const dir = flag.slice(IMPORT_DIR_FLAG.length);
  if (dir.length === 0 || isAbsolutePath(dir)) return flag;
  return IMPORT_DIR_FLAG + joinPath(root, dir);
}

/** Directories named by `-i<dir>` flags, in order. */
export function importDirsOf(flags: readonly string[]): string[] {
  return flags
    .filter((flag) => flag.startsWith(IMPORT_DIR_FLAG) && flag.length > IMPORT_DIR_FLAG.length)
    .map((flag) => flag.slice(IMPORT_DIR_FLAG.length));
}
