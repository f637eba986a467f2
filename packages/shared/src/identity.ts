/* =======================================================================================
 * Identity primitives
 * ---------------------------------------------------------------------------------------
 * - String brands shared by the resolver and the module cache
 * - Separator normalisation for path-like ids
 * ======================================================================================= */

export type Brand<T extends string> = { readonly __brand: T };
export type Branded<TValue, TBrand extends string> = TValue & Brand<TBrand>;

export type StringId<TBrand extends string> = Branded<string, TBrand>;

/** Absolute path with `/` separators. Case and symlinks are left as given. */
export type NormalizedPath = StringId<"NormalizedPath">;
/** Symlink-resolved, case-folded (where the file system ignores case) cache key. */
export type CanonicalPath = StringId<"CanonicalPath">;
/** Hex digest of a file's bytes. A freshness token, not an identity. */
export type ContentHash = StringId<"ContentHash">;

export function brandString<TBrand extends string>(value: string): StringId<TBrand> {
  return value as StringId<TBrand>;
}

export function unbrand<TBrand extends string>(value: StringId<TBrand>): string {
  return value;
}

export function normalizePathForId(filePath: string): NormalizedPath {
  return brandString<"NormalizedPath">(filePath.split("\\").join("/"));
}
