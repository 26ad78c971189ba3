/**
 * A string-keyed lookup of weakly held objects. An entry disappears once
 * nothing else references its object, so interning never keeps values
 * alive on its own.
 */
export class InternTable<T extends object> {
  private readonly entries = new Map<string, WeakRef<T>>();
  private readonly registry = new FinalizationRegistry<string>(key => {
    const ref = this.entries.get(key);
    if (ref && ref.deref() === undefined) {
      this.entries.delete(key);
    }
  });

  get(key: string): T | undefined {
    const ref = this.entries.get(key);
    if (!ref) {
      return undefined;
    }
    const value = ref.deref();
    if (value === undefined) {
      this.entries.delete(key);
    }
    return value;
  }

  /**
   * Returns the live object for the key, creating and registering one if
   * there is none.
   */
  intern(key: string, create: () => T): T {
    const existing = this.get(key);
    if (existing) {
      return existing;
    }
    const value = create();
    this.entries.set(key, new WeakRef(value));
    this.registry.register(value, key);
    return value;
  }

  /** Number of entries, including ones whose objects were just collected */
  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
