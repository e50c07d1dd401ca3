/**
 * Growable, append-only sequence. Elements are never reordered or removed,
 * so an index handed out once stays valid for the life of the vector.
 */
export class AppendVec<T> implements Iterable<T> {
  private items: T[];
  private len: number = 0;

  constructor(capacityHint: number = 16) {
    this.items = new Array<T>(Math.max(1, Math.floor(capacityHint)));
  }

  get length(): number {
    return this.len;
  }

  /** Returns the index of the new element. */
  push(value: T): number {
    if (this.len === this.items.length) {
      this.items.length = this.items.length * 2;
    }
    this.items[this.len] = value;
    return this.len++;
  }

  get(index: number): T | undefined {
    if (!Number.isInteger(index) || index < 0 || index >= this.len) return undefined;
    return this.items[index];
  }

  last(): T | undefined {
    return this.get(this.len - 1);
  }

  toArray(): T[] {
    return this.items.slice(0, this.len);
  }

  *[Symbol.iterator](): Iterator<T> {
    for (let i = 0; i < this.len; i++) {
      yield this.items[i];
    }
  }
}
