/**
 * An ordered list with a key index. Appended values are indexed under every
 * key `keys` returns, so lookups are a single map access.
 */
export class ByKeyLookup<T> implements Iterable<T> {
  private readonly items: T[] = [];
  private readonly index = new Map<string, T>();

  constructor(
    values: Iterable<T>,
    private readonly keys: (value: T) => readonly string[]
  ) {
    for (const value of values) {
      this.append(value);
    }
  }

  append(value: T): void {
    this.items.push(value);
    for (const key of this.keys(value)) {
      this.index.set(key, value);
    }
  }

  get(key: string): T | undefined {
    return this.index.get(key);
  }

  has(key: string): boolean {
    return this.index.has(key);
  }

  includes(value: T): boolean {
    return this.items.includes(value);
  }

  at(position: number): T | undefined {
    return this.items.at(position);
  }

  get length(): number {
    return this.items.length;
  }

  toArray(): T[] {
    return [...this.items];
  }

  [Symbol.iterator](): Iterator<T> {
    return this.items[Symbol.iterator]();
  }

  toString(): string {
    return `[${this.items.map(String).join(", ")}]`;
  }
}
