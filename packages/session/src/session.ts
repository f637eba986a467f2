/**
 * Module session
 *
 * The load pipeline: find the configuration for a file, compile it, and
 * record the outcome in the artifact cache so that deferred readers are
 * woken with either the artifact or a failure.
 */

import {
  importDirsOf,
  ConfigurationCache,
  type ComponentOptions,
  type Configuration,
  type ConfigurationResolver,
  type ConfigurationResult,
} from "@cradlekit/cradle";
import {
  ArtifactCache,
  DerivedDataCache,
  type CacheEntry,
  type SuccessEntry,
  type WithCachedOptions,
} from "@cradlekit/module-cache";
import {
  SILENT_LOGGER,
  debug,
  describeError,
  type CanonicalPath,
  type ContentHash,
  type FileSystemContext,
  type Logger,
} from "@cradlekit/shared";
import type { CompileFunction, CompileResult } from "./compile.js";

export interface ModuleSessionOptions<A> {
  readonly fileSystem: FileSystemContext;
  readonly resolver: Pick<ConfigurationResolver, "resolve">;
  readonly compile: CompileFunction<A>;
  readonly logger?: Logger;
}

/** A configuration together with what it says about one file. */
export interface FileConfiguration {
  readonly configuration: Configuration;
  readonly result: ConfigurationResult;
}

export type LoadOutcome<A> =
  | {
      readonly kind: "compiled";
      readonly path: CanonicalPath;
      readonly configuration: Configuration;
      readonly options: ComponentOptions;
      readonly artifact: A;
    }
  | {
      readonly kind: "compile-failed";
      readonly path: CanonicalPath;
      readonly configuration: Configuration;
      readonly message: string;
    }
  | {
      readonly kind: "not-configured";
      readonly path: CanonicalPath;
      readonly configuration: Configuration;
      readonly result: Exclude<ConfigurationResult, { kind: "success" }>;
    };

export class ModuleSession<A, D extends object = Record<never, never>> {
  readonly cache: ArtifactCache<A, D>;
  readonly derived: DerivedDataCache<A, D>;

  readonly #resolver: Pick<ConfigurationResolver, "resolve">;
  readonly #compile: CompileFunction<A>;
  readonly #logger: Logger;
  readonly #configurations = new ConfigurationCache();
  readonly #dependencyHashes = new Map<Configuration, ReadonlyMap<string, ContentHash | null>>();
  readonly #inFlight = new Map<CanonicalPath, Promise<LoadOutcome<A>>>();
  #disposed = false;

  constructor(options: ModuleSessionOptions<A>) {
    this.#resolver = options.resolver;
    this.#compile = options.compile;
    this.#logger = options.logger ?? SILENT_LOGGER;
    this.cache = new ArtifactCache<A, D>({ fileSystem: options.fileSystem, logger: this.#logger });
    this.derived = new DerivedDataCache(this.cache);
  }

  /** Configuration that currently covers the most recently loaded files. */
  get activeConfiguration(): Configuration | null {
    return this.#configurations.current;
  }

  // ==========================================================================
  // Loading
  // ==========================================================================

  /**
   * Compile `file` and record the outcome. Loads of the same canonical path
   * that overlap share one run.
   */
  load(file: string): Promise<LoadOutcome<A>> {
    this.#assertUsable();
    const path = this.cache.canonicalize(file);
    const running = this.#inFlight.get(path);
    if (running) {
      debug.session("load.join", { path });
      return running;
    }

    const pending = this.#load(path).finally(() => {
      if (this.#inFlight.get(path) === pending) this.#inFlight.delete(path);
    });
    this.#inFlight.set(path, pending);
    return pending;
  }

  /** Resolve the configuration for `file` without compiling it. */
  configurationFor(file: string): Promise<FileConfiguration> {
    this.#assertUsable();
    return this.#configure(this.cache.canonicalize(file));
  }

  async #load(path: CanonicalPath): Promise<LoadOutcome<A>> {
    debug.session("load.start", { path });
    const { configuration, result } = await this.#configure(path);

    if (result.kind !== "success") {
      this.#logger.warn(`[session] ${path} is not covered by ${configuration.actionName} (${describeResult(result)})`);
      this.#record(path, () => this.cache.markFailed(path));
      return { kind: "not-configured", path, configuration, result };
    }

    this.#activate(configuration, result.options);

    const compiled = await this.#runCompile(configuration, path, result.options);
    if (compiled.kind === "error") {
      debug.session("load.failed", { path, message: compiled.message });
      this.#record(path, () => this.cache.markFailed(path));
      return { kind: "compile-failed", path, configuration, message: compiled.message };
    }

    const related = compiled.related ?? [];
    debug.session("load.compiled", { path, related: related.length });
    this.#record(path, () => this.cache.storeMany([[path, compiled.artifact], ...related]));
    return { kind: "compiled", path, configuration, options: result.options, artifact: compiled.artifact };
  }

  /**
   * Ask the closest known configuration first. One that rejects the file
   * stays loadable for the files it does cover; a fresh resolution then
   * decides, and is swapped for a known configuration of the same package
   * so that units are never introspected twice.
   */
  async #configure(path: CanonicalPath): Promise<FileConfiguration> {
    const lookup = this.#configurations.lookup(path);
    let rejected: FileConfiguration | null = null;
    if (lookup.kind !== "new" && !this.#evictIfChanged(lookup.configuration)) {
      const result = await lookup.configuration.resolve(path);
      if (result.kind === "success") {
        debug.session("configuration", { path, source: lookup.kind, action: lookup.configuration.actionName });
        return { configuration: lookup.configuration, result };
      }
      debug.session("configuration.rejected", { path, action: lookup.configuration.actionName });
      rejected = { configuration: lookup.configuration, result };
    }

    const fresh = await this.#resolver.resolve(path);
    const known = this.#configurations.equivalent(fresh);
    if (known !== null && !this.#evictIfChanged(known)) {
      if (rejected !== null && known === rejected.configuration) return rejected;
      const result = await known.resolve(path);
      debug.session("configuration", { path, source: "known", action: known.actionName, result: result.kind });
      return { configuration: known, result };
    }

    const result = await fresh.resolve(path);
    debug.session("configuration", { path, source: "new", action: fresh.actionName, result: result.kind });
    return { configuration: fresh, result };
  }

  #activate(configuration: Configuration, options: ComponentOptions): void {
    const importDirs = importDirsOf(options.flags);
    this.#configurations.activate(configuration, importDirs.length > 0 ? importDirs : [configuration.rootDir]);
    if (this.#dependencyHashes.has(configuration)) return;
    const hashes = new Map<string, ContentHash | null>();
    for (const file of options.dependencies) {
      hashes.set(file, this.cache.contentHash(file));
    }
    this.#dependencyHashes.set(configuration, hashes);
  }

  /** Forget `configuration` when a manifest it was built from has changed since. */
  #evictIfChanged(configuration: Configuration): boolean {
    const recorded = this.#dependencyHashes.get(configuration);
    if (recorded === undefined) return false;
    for (const [file, hash] of recorded) {
      if (this.cache.contentHash(file) !== hash) {
        debug.session("configuration.changed", { action: configuration.actionName, file });
        this.#configurations.evict(configuration);
        this.#dependencyHashes.delete(configuration);
        return true;
      }
    }
    return false;
  }

  async #runCompile(
    configuration: Configuration,
    path: CanonicalPath,
    options: ComponentOptions,
  ): Promise<CompileResult<A>> {
    try {
      return await this.#compile(configuration, path, options);
    } catch (error) {
      this.#logger.error(`[session] compiling ${path} threw: ${describeError(error)}`);
      return { kind: "error", message: describeError(error) };
    }
  }

  #record(path: CanonicalPath, write: () => void): void {
    if (this.#disposed) {
      debug.session("load.discarded", { path });
      return;
    }
    write();
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  /** Wait for the artifact of `file`; `fallback` when it failed to load. */
  query<R>(
    file: string,
    fallback: R,
    callback: (artifact: A, entry: SuccessEntry<A, D>) => R,
    options?: WithCachedOptions<A>,
  ): Promise<R> {
    return this.cache.withCached(file, fallback, callback, options);
  }

  /** Answer from the fresh cached artifact only. */
  queryNow<R>(file: string, fallback: R, callback: (artifact: A, entry: SuccessEntry<A, D>) => R): R {
    return this.cache.ifCached(file, fallback, callback);
  }

  queryData<K extends keyof D, R>(
    file: string,
    kind: K,
    fallback: R,
    producer: (artifact: A) => D[K],
    callback: (artifact: A, data: D[K]) => R,
    options?: WithCachedOptions<A>,
  ): Promise<R> {
    return this.derived.withArtifactAndData(file, kind, fallback, producer, callback, options);
  }

  lookup(file: string): CacheEntry<A, D> | null {
    return this.cache.lookup(file);
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /** Drop every artifact and configuration. Loads still running are not recorded. */
  dispose(): void {
    if (this.#disposed) return;
    this.#disposed = true;
    this.cache.dispose();
    this.#configurations.clear();
    this.#dependencyHashes.clear();
    this.#inFlight.clear();
  }

  #assertUsable(): void {
    if (this.#disposed) {
      throw new Error("ModuleSession has been disposed");
    }
  }
}

function describeResult(result: Exclude<ConfigurationResult, { kind: "success" }>): string {
  return result.kind === "none" ? result.reason : result.error.message;
}
