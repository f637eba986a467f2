import { debug } from "@cradlekit/shared";
import type { ArtifactCache, WithCachedOptions } from "./artifact-cache.js";
import type { SuccessEntry } from "./types.js";

/**
 * Per-artifact memo of values derived from it, one value per kind.
 *
 * No lock is held while a producer runs, so two callers racing on the same
 * missing kind may both run it; producers must be idempotent. A value
 * computed while the entry was replaced, or while the file changed under
 * it, is returned to its caller but not stored.
 */
export class DerivedDataCache<A, D extends object> {
  readonly #cache: ArtifactCache<A, D>;

  constructor(cache: ArtifactCache<A, D>) {
    this.#cache = cache;
  }

  /** Stored value of `kind` for the fresh entry of `file`, if any. */
  peek<K extends keyof D>(file: string, kind: K): D[K] | undefined {
    const entry = this.#cache.lookup(file);
    return entry?.kind === "success" ? entry.derived.get(kind) : undefined;
  }

  getOrCompute<K extends keyof D>(entry: SuccessEntry<A, D>, kind: K, producer: (artifact: A) => D[K]): D[K] {
    const cached = entry.derived.find(kind);
    if (cached) return cached.value;

    const value = producer(entry.artifact);
    if (this.#cache.isCurrent(entry)) {
      entry.derived.set(kind, value);
    } else {
      debug.cache("derived.discarded", { path: entry.path, kind: String(kind) });
    }
    return value;
  }

  /**
   * Wait for the artifact of `file`, then hand the callback the artifact and
   * its `kind` value, computing the value on first use.
   */
  withArtifactAndData<K extends keyof D, R>(
    file: string,
    kind: K,
    fallback: R,
    producer: (artifact: A) => D[K],
    callback: (artifact: A, data: D[K]) => R,
    options?: WithCachedOptions<A>,
  ): Promise<R> {
    return this.#cache.withCached(
      file,
      fallback,
      (artifact, entry) => callback(artifact, this.getOrCompute(entry, kind, producer)),
      options,
    );
  }
}
