import { dropTrailingSeparator, isFilePathPrefixOf, normalise } from "@cradlekit/shared";
import type { Configuration } from "./configuration.js";

export type ConfigurationLookup =
  /** The file lies under the active configuration. */
  | { readonly kind: "reuse"; readonly configuration: Configuration }
  /** A previously active configuration covers the file. */
  | { readonly kind: "load"; readonly configuration: Configuration }
  | { readonly kind: "new" };

interface CachedConfiguration {
  readonly configuration: Configuration;
  readonly importDirs: readonly string[];
}

function longestMatch(entry: CachedConfiguration, file: string): number {
  let best = -1;
  for (const dir of entry.importDirs) {
    if (isFilePathPrefixOf(dir, file)) {
      best = Math.max(best, dropTrailingSeparator(normalise(dir)).length);
    }
  }
  return best;
}

/**
 * Remembers resolved configurations by the directories they cover, so a
 * file next to one already loaded does not pay for resolution again.
 */
export class ConfigurationCache {
  #current: CachedConfiguration | null = null;
  readonly #previous: CachedConfiguration[] = [];

  get current(): Configuration | null {
    return this.#current?.configuration ?? null;
  }

  get size(): number {
    return this.#previous.length + (this.#current ? 1 : 0);
  }

  /**
   * The configuration whose import dirs cover `file` most closely, current
   * or remembered. On a tie the current one wins.
   */
  lookup(file: string): ConfigurationLookup {
    let best: CachedConfiguration | null = null;
    let bestLength = -1;
    for (const entry of this.#entries()) {
      const length = longestMatch(entry, file);
      if (length > bestLength) {
        best = entry;
        bestLength = length;
      }
    }
    if (best === null) return { kind: "new" };
    return best === this.#current
      ? { kind: "reuse", configuration: best.configuration }
      : { kind: "load", configuration: best.configuration };
  }

  /** A known configuration for the same package root and action as `configuration`. */
  equivalent(configuration: Configuration): Configuration | null {
    const match = this.#entries().find(
      (entry) =>
        entry.configuration.rootDir === configuration.rootDir &&
        entry.configuration.actionName === configuration.actionName,
    );
    return match?.configuration ?? null;
  }

  /** Make `configuration` current; the one it replaces stays loadable. */
  activate(configuration: Configuration, importDirs: readonly string[]): void {
    const previous = this.#current;
    this.#forget(configuration);
    if (previous && previous.configuration !== configuration) {
      this.#previous.push(previous);
    }
    this.#current = { configuration, importDirs: [...importDirs] };
  }

  /** Forget a configuration, e.g. once a file it depends on has changed. */
  evict(configuration: Configuration): void {
    this.#forget(configuration);
    if (this.#current?.configuration === configuration) this.#current = null;
  }

  clear(): void {
    this.#current = null;
    this.#previous.length = 0;
  }

  #entries(): CachedConfiguration[] {
    return this.#current ? [this.#current, ...this.#previous] : [...this.#previous];
  }

  #forget(configuration: Configuration): void {
    const index = this.#previous.findIndex((entry) => entry.configuration === configuration);
    if (index >= 0) this.#previous.splice(index, 1);
  }
}
