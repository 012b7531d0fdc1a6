/**
 * Fixed-capacity ring buffer. Appending to a full buffer overwrites the
 * oldest slot.
 */
export class CircularBuffer<T> {
  #slots: (T | undefined)[];
  #head = 0;
  #count = 0;
  readonly capacity: number;

  constructor(capacity = 10) {
    this.capacity = Math.max(1, Math.floor(capacity));
    this.#slots = new Array<T | undefined>(this.capacity).fill(undefined);
  }

  append(item: T): void {
    this.#slots[this.#head] = item;
    this.#head = (this.#head + 1) % this.capacity;
    if (this.#count < this.capacity) {
      this.#count++;
    }
  }

  // oldest → newest, rebuilt from the wrapped physical layout
  get elements(): T[] {
    const result: T[] = [];
    const start = this.#count === this.capacity ? this.#head : 0;
    for (let i = 0; i < this.#count; i++) {
      const item = this.#slots[(start + i) % this.capacity];
      if (item !== undefined) result.push(item);
    }
    return result;
  }

  reversed(): T[] {
    return this.elements.reverse();
  }

  get isEmpty(): boolean {
    return this.#count === 0;
  }

  get isFull(): boolean {
    return this.#count === this.capacity;
  }

  get size(): number {
    return this.#count;
  }
}
