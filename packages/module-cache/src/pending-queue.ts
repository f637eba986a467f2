import type { CanonicalPath } from "@cradlekit/shared";

/**
 * Waiters per path, in arrival order. A path with no waiters has no slot.
 */
export class PendingQueue<T> {
  readonly #waiting = new Map<CanonicalPath, T[]>();

  enqueue(path: CanonicalPath, item: T): void {
    const queue = this.#waiting.get(path);
    if (queue) {
      queue.push(item);
    } else {
      this.#waiting.set(path, [item]);
    }
  }

  /** Remove and return every waiter for `path`. */
  take(path: CanonicalPath): T[] {
    const queue = this.#waiting.get(path);
    if (!queue) return [];
    this.#waiting.delete(path);
    return queue;
  }

  count(path: CanonicalPath): number {
    return this.#waiting.get(path)?.length ?? 0;
  }

  /** Number of paths with at least one waiter. */
  get size(): number {
    return this.#waiting.size;
  }

  clear(): void {
    this.#waiting.clear();
  }
}
