import type { CanonicalPath, ContentHash } from "@cradlekit/shared";
import type { DerivedData } from "./derived-data.js";

export interface SuccessEntry<A, D extends object> {
  readonly kind: "success";
  readonly path: CanonicalPath;
  readonly artifact: A;
  /** Null when the file could not be read at store time; such an entry is never fresh. */
  readonly hash: ContentHash | null;
  readonly derived: DerivedData<D>;
}

export interface FailedEntry {
  readonly kind: "failed";
  readonly path: CanonicalPath;
}

export type CacheEntry<A, D extends object> = SuccessEntry<A, D> | FailedEntry;

export type Continuation<A, D extends object> = (entry: CacheEntry<A, D>) => void;
