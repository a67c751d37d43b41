/**
 * Insertion-ordered set. `add` keeps the first position of a value seen twice.
 */
export class OrderedSet<T> {
  private readonly index = new Map<T, number>();
  private readonly items: T[] = [];

  constructor(values: Iterable<T> = []) {
    this.addAll(values);
  }

  add(value: T): boolean {
    if (this.index.has(value)) return false;
    this.index.set(value, this.items.length);
    this.items.push(value);
    return true;
  }

  addAll(values: Iterable<T>): this {
    for (const v of values) this.add(v);
    return this;
  }

  has(value: T): boolean {
    return this.index.has(value);
  }

  get size(): number {
    return this.items.length;
  }

  toArray(): T[] {
    return [...this.items];
  }

  [Symbol.iterator](): Iterator<T> {
    return this.items[Symbol.iterator]();
  }
}
