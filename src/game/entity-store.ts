/**
 * Live entity set keyed by handle. Iteration follows insertion order and
 * handles are never reused, so a removed entity cannot come back.
 */
export class EntityStore<T> {
  private readonly items = new Map<number, T>();
  private nextHandle = 1;

  insert(item: T): number {
    const handle = this.nextHandle++;
    this.items.set(handle, item);
    return handle;
  }

  replace(handle: number, item: T): void {
    if (!this.items.has(handle)) {
      throw new Error(`No live entity with handle ${handle}`);
    }
    this.items.set(handle, item);
  }

  remove(handle: number): boolean {
    return this.items.delete(handle);
  }

  get size(): number {
    return this.items.size;
  }

  /** Stable copy of the current entries; safe to mutate the store while walking it. */
  snapshot(): Array<[number, T]> {
    return Array.from(this.items.entries());
  }

  entries(): IterableIterator<[number, T]> {
    return this.items.entries();
  }

  values(): IterableIterator<T> {
    return this.items.values();
  }
}
