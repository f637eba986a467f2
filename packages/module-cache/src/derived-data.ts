/**
 * Values computed from one artifact, keyed by a caller-declared kind.
 *
 * `D` maps kind names to value types:
 *
 * ```ts
 * interface ModuleData {
 *   symbols: SymbolTable;
 *   outline: OutlineNode[];
 * }
 * const data = new DerivedData<ModuleData>();
 * data.set("outline", []);
 * ```
 *
 * A fresh instance is created for every stored artifact, so nothing here
 * outlives the artifact it was derived from.
 */
export class DerivedData<D extends object> {
  readonly #values = new Map<keyof D, unknown>();

  get<K extends keyof D>(kind: K): D[K] | undefined {
    return this.#values.get(kind) as D[K] | undefined;
  }

  /** Stored value in a box, so a stored `undefined` reads differently from a miss. */
  find<K extends keyof D>(kind: K): { readonly value: D[K] } | undefined {
    if (!this.#values.has(kind)) return undefined;
    return { value: this.#values.get(kind) as D[K] };
  }

  set<K extends keyof D>(kind: K, value: D[K]): void {
    this.#values.set(kind, value);
  }

  has(kind: keyof D): boolean {
    return this.#values.has(kind);
  }

  get size(): number {
    return this.#values.size;
  }
}
