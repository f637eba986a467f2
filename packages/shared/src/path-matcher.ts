/**
 * Pure path utilities used by project discovery and component matching.
 *
 * Every function accepts either separator and answers in `/` form. Nothing
 * here touches the file system; symlinks and case are the caller's concern.
 */
import path from "node:path";

const DRIVE_ROOT = /^[A-Za-z]:$/;

export function toSlashes(filePath: string): string {
  return filePath.split("\\").join("/");
}

/**
 * Collapse `.` segments and duplicate separators.
 *
 * ```ts
 * normalise("./src/././")  // "src/"
 * normalise("src\\Lib.hs") // "src/Lib.hs"
 * ```
 */
export function normalise(filePath: string): string {
  const slashed = toSlashes(filePath);
  if (slashed === "") return "";
  return path.posix.normalize(slashed);
}

export function isAbsolutePath(filePath: string): boolean {
  const slashed = toSlashes(filePath);
  return path.posix.isAbsolute(slashed) || /^[A-Za-z]:\//.test(slashed);
}

export function dropTrailingSeparator(filePath: string): string {
  const slashed = toSlashes(filePath);
  const trimmed = slashed.replace(/\/+$/, "");
  if (trimmed === "") return slashed.startsWith("/") ? "/" : slashed;
  return DRIVE_ROOT.test(trimmed) ? `${trimmed}/` : trimmed;
}

export function equalFilePath(a: string, b: string): boolean {
  return dropTrailingSeparator(normalise(a)) === dropTrailingSeparator(normalise(b));
}

/**
 * Directory part of a path; `.` for a bare name, the root for the root.
 *
 * ```ts
 * takeDirectory("/a/b.hs") // "/a"
 * takeDirectory("a/b/")    // "a/b"
 * takeDirectory("a")       // "."
 * ```
 */
export function takeDirectory(filePath: string): string {
  const slashed = toSlashes(filePath);
  const idx = slashed.lastIndexOf("/");
  if (idx < 0) return ".";
  if (idx === 0) return "/";
  const head = slashed.slice(0, idx).replace(/\/+$/, "");
  if (head === "") return "/";
  return DRIVE_ROOT.test(head) ? `${head}/` : head;
}

/**
 * The directory itself, then every parent up to and including the root
 * (or `.` for relative paths).
 *
 * ```ts
 * ancestors("/a/b/c") // ["/a/b/c", "/a/b", "/a", "/"]
 * ancestors("a/b")    // ["a/b", "a", "."]
 * ```
 */
export function ancestors(dir: string): string[] {
  const result: string[] = [];
  let current = dropTrailingSeparator(dir === "" ? "." : dir);
  for (;;) {
    result.push(current);
    const parent = takeDirectory(current);
    if (equalFilePath(parent, current)) return result;
    current = parent;
  }
}

function segments(filePath: string): string[] {
  const normalized = normalise(filePath);
  const parts = normalized.split("/").filter((s) => s.length > 0 && s !== ".");
  return normalized.startsWith("/") ? ["/", ...parts] : parts;
}

/**
 * Strip `dir` from `file` when `dir` is a segment-wise prefix of it.
 *
 * ```ts
 * stripFilePath("app/", "./app/Lib/File.hs")  // "Lib/File.hs"
 * stripFilePath("src", "src-dir/File.hs")     // null
 * stripFilePath(".", "src/File.hs")           // "src/File.hs"
 * stripFilePath("/app/", "./app/Lib/File.hs") // null, "/app/" is absolute
 * ```
 */
export function stripFilePath(dir: string, file: string): string | null {
  const dirParts = segments(dir);
  if (dirParts.length === 0) {
    return isAbsolutePath(file) ? null : segments(file).join("/");
  }
  const fileParts = segments(file);
  if (dirParts.length > fileParts.length) return null;
  for (let i = 0; i < dirParts.length; i++) {
    if (dirParts[i] !== fileParts[i]) return null;
  }
  return fileParts.slice(dirParts.length).join("/");
}

export function isFilePathPrefixOf(dir: string, file: string): boolean {
  return stripFilePath(dir, file) !== null;
}

/** `file` relative to `root`, or `file` unchanged when `root` is not a prefix. */
export function makeRelative(root: string, file: string): string {
  const stripped = stripFilePath(root, file);
  if (stripped === null) return file;
  return stripped === "" ? "." : stripped;
}

/**
 * Strip the first directory of `dirs` that prefixes `file`.
 *
 * ```ts
 * relativeTo("src/Lib/Lib.hs", ["src", "src/Lib"]) // "Lib/Lib.hs"
 * relativeTo("src/Lib/Lib.hs", ["app"])            // null
 * ```
 */
export function relativeTo(file: string, dirs: readonly string[]): string | null {
  for (const dir of dirs) {
    const stripped = stripFilePath(dir, file);
    if (stripped !== null) return stripped;
  }
  return null;
}

/** `</>`: join unless the right-hand side is already absolute. */
export function joinPath(dir: string, file: string): string {
  if (isAbsolutePath(file)) return toSlashes(file);
  return path.posix.join(toSlashes(dir), toSlashes(file));
}

export function dropExtension(filePath: string): string {
  const slashed = toSlashes(filePath);
  const slash = slashed.lastIndexOf("/");
  const dot = slashed.lastIndexOf(".");
  return dot > slash + 1 ? slashed.slice(0, dot) : slashed;
}

/** `Lib/Foo.hs` becomes `Lib.Foo`. */
export function moduleNameFromPath(relativeFile: string): string {
  return dropExtension(relativeFile).split("/").join(".");
}
