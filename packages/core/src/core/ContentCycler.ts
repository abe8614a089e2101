/**
 * Cycles through a fixed list of content ids (channels, videos, clips),
 * wrapping around at the end. Backs "next" buttons in host apps.
 */
export class ContentCycler<T> {
  private readonly items: readonly T[];
  private nextIndex = 0;

  constructor(items: readonly T[]) {
    if (items.length === 0) {
      throw new Error("ContentCycler needs at least one item");
    }
    this.items = [...items];
  }

  get size(): number {
    return this.items.length;
  }

  /** Item the next call to next() returns */
  peek(): T {
    return this.items[this.nextIndex];
  }

  next(): T {
    const item = this.items[this.nextIndex];
    this.nextIndex = (this.nextIndex + 1) % this.items.length;
    return item;
  }

  reset(): void {
    this.nextIndex = 0;
  }
}

export default ContentCycler;
