/**
 * Artifact cache
 *
 * One entry per canonical path, validated lazily against the file's content
 * hash on every read. Callers that need an artifact which is not there yet
 * register a continuation; continuations for a path run exactly once, in
 * arrival order, when the path next gets an entry (success or failure).
 *
 * All mutations are synchronous, so on the event loop a check-then-enqueue
 * in {@link ArtifactCache.awaitOrDefer} can never interleave with a store.
 */

import {
  SILENT_LOGGER,
  canonicalPath,
  debug,
  describeError,
  hashContent,
  type CanonicalPath,
  type ContentHash,
  type FileSystemContext,
  type Logger,
} from "@cradlekit/shared";
import { DerivedData } from "./derived-data.js";
import { PendingQueue } from "./pending-queue.js";
import type { CacheEntry, Continuation, FailedEntry, SuccessEntry } from "./types.js";

export interface ArtifactCacheOptions {
  readonly fileSystem: FileSystemContext;
  readonly logger?: Logger;
}

export interface WithCachedOptions<A> {
  /**
   * Whether a stored artifact is complete enough for the callback. When it
   * is not, the callback waits for the next entry for the path instead.
   */
  readonly isReady?: (artifact: A) => boolean;
}

export class ArtifactCache<A, D extends object = Record<never, never>> {
  readonly #fs: FileSystemContext;
  readonly #logger: Logger;
  readonly #entries = new Map<CanonicalPath, CacheEntry<A, D>>();
  readonly #pending = new PendingQueue<Continuation<A, D>>();
  #disposed = false;

  constructor(options: ArtifactCacheOptions) {
    this.#fs = options.fileSystem;
    this.#logger = options.logger ?? SILENT_LOGGER;
  }

  // ==========================================================================
  // Keys and freshness
  // ==========================================================================

  canonicalize(file: string): CanonicalPath {
    return canonicalPath(this.#fs, file);
  }

  /** Hash of the file's current bytes, or null when it cannot be read. */
  contentHash(path: string): ContentHash | null {
    const bytes = this.#fs.readBytes(path);
    return bytes === undefined ? null : hashContent(bytes);
  }

  /** True while `entry` is the stored entry for its path and matches the file. */
  isCurrent(entry: SuccessEntry<A, D>): boolean {
    return this.#entries.get(entry.path) === entry && this.#isFresh(entry);
  }

  #isFresh(entry: SuccessEntry<A, D>): boolean {
    return entry.hash !== null && this.contentHash(entry.path) === entry.hash;
  }

  // ==========================================================================
  // Reads
  // ==========================================================================

  /**
   * The entry for `file`. A success entry whose hash no longer matches the
   * file reads as a miss; the entry itself stays in place.
   */
  lookup(file: string): CacheEntry<A, D> | null {
    return this.#lookupCanonical(this.canonicalize(file));
  }

  #lookupCanonical(path: CanonicalPath): CacheEntry<A, D> | null {
    const entry = this.#entries.get(path);
    if (!entry) return null;
    if (entry.kind === "success" && !this.#isFresh(entry)) {
      debug.cache("stale", { path });
      return null;
    }
    return entry;
  }

  has(file: string): boolean {
    return this.#entries.has(this.canonicalize(file));
  }

  get size(): number {
    return this.#entries.size;
  }

  /** Continuations currently waiting on `file`. */
  waiting(file: string): number {
    return this.#pending.count(this.canonicalize(file));
  }

  /** Non-deferring read: `fallback` unless a fresh success entry exists. */
  ifCached<R>(file: string, fallback: R, callback: (artifact: A, entry: SuccessEntry<A, D>) => R): R {
    const entry = this.lookup(file);
    return entry?.kind === "success" ? callback(entry.artifact, entry) : fallback;
  }

  // ==========================================================================
  // Writes
  // ==========================================================================

  store(file: string, artifact: A): SuccessEntry<A, D> {
    const entry = this.#put(this.canonicalize(file), artifact);
    this.#deliver(entry.path, entry);
    return entry;
  }

  /**
   * Store the artifacts of one compile. Every entry is in place before any
   * waiter runs. A path given twice keeps its last artifact.
   */
  storeMany(items: Iterable<readonly [file: string, artifact: A]>): SuccessEntry<A, D>[] {
    const latest = new Map<CanonicalPath, A>();
    for (const [file, artifact] of items) {
      const path = this.canonicalize(file);
      latest.delete(path);
      latest.set(path, artifact);
    }
    const stored = [...latest].map(([path, artifact]) => this.#put(path, artifact));
    for (const entry of stored) {
      this.#deliver(entry.path, entry);
    }
    return stored;
  }

  /**
   * Record a failed compile. An existing entry, successful or not, is kept;
   * waiters are released with a failed entry either way.
   */
  markFailed(file: string): void {
    this.#assertUsable();
    const path = this.canonicalize(file);
    const existing = this.#entries.get(path);
    const failed: FailedEntry = existing?.kind === "failed" ? existing : { kind: "failed", path };
    if (!existing) this.#entries.set(path, failed);
    debug.cache("failed", { path, kept: existing?.kind ?? null });
    this.#deliver(path, failed);
  }

  /** Drop the entry for `file`. Waiters stay queued. */
  delete(file: string): boolean {
    return this.#entries.delete(this.canonicalize(file));
  }

  #put(path: CanonicalPath, artifact: A): SuccessEntry<A, D> {
    this.#assertUsable();
    const entry: SuccessEntry<A, D> = {
      kind: "success",
      path,
      artifact,
      hash: this.contentHash(path),
      derived: new DerivedData<D>(),
    };
    this.#entries.set(path, entry);
    debug.cache("store", { path, hash: entry.hash });
    return entry;
  }

  // ==========================================================================
  // Waiting
  // ==========================================================================

  /**
   * Run `continuation` now with the fresh entry for `file`, or queue it
   * until the path next gets an entry.
   */
  awaitOrDefer(file: string, continuation: Continuation<A, D>): void {
    this.#assertUsable();
    const path = this.canonicalize(file);
    const entry = this.#lookupCanonical(path);
    if (entry) {
      this.#invoke(continuation, entry);
      return;
    }
    debug.cache("defer", { path, waiting: this.#pending.count(path) + 1 });
    this.#pending.enqueue(path, continuation);
  }

  whenReady(file: string): Promise<CacheEntry<A, D>> {
    return new Promise<CacheEntry<A, D>>((resolve) => this.awaitOrDefer(file, resolve));
  }

  /**
   * Deferring read. A failed entry yields `fallback`; a success entry whose
   * artifact is not ready puts the callback back in the queue.
   */
  withCached<R>(
    file: string,
    fallback: R,
    callback: (artifact: A, entry: SuccessEntry<A, D>) => R,
    options?: WithCachedOptions<A>,
  ): Promise<R> {
    return new Promise<R>((resolve, reject) => {
      const attempt: Continuation<A, D> = (entry) => {
        if (entry.kind === "failed") {
          resolve(fallback);
          return;
        }
        if (options?.isReady && !options.isReady(entry.artifact)) {
          debug.cache("redefer", { path: entry.path });
          this.#pending.enqueue(entry.path, attempt);
          return;
        }
        try {
          resolve(callback(entry.artifact, entry));
        } catch (error) {
          reject(error);
        }
      };
      this.awaitOrDefer(file, attempt);
    });
  }

  #deliver(path: CanonicalPath, entry: CacheEntry<A, D>): void {
    // re-deferrals during delivery land in a fresh queue for the next entry
    const waiting = this.#pending.take(path);
    for (const continuation of waiting) {
      this.#invoke(continuation, entry);
    }
  }

  #invoke(continuation: Continuation<A, D>, entry: CacheEntry<A, D>): void {
    try {
      continuation(entry);
    } catch (error) {
      this.#logger.error(`[cache] continuation for ${entry.path} failed: ${describeError(error)}`);
    }
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /** Drop every entry and every waiter. */
  clear(): void {
    this.#entries.clear();
    this.#pending.clear();
  }

  /** Clear and refuse further writes. Queued waiters are abandoned. */
  dispose(): void {
    this.clear();
    this.#disposed = true;
  }

  #assertUsable(): void {
    if (this.#disposed) {
      throw new Error("ArtifactCache has been disposed");
    }
  }
}
