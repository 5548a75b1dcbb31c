import type { Bounds } from "../fractals/types";

export const DEFAULT_HISTORY_CAPACITY = 20;

/**
 * Bounded log of past viewport bounds. Pushing past capacity evicts the oldest
 * entry, so the log always holds the most recent `capacity` views in push order.
 */
export class HistoryStack {
  private items: Bounds[] = [];
  readonly capacity: number;

  constructor(capacity = DEFAULT_HISTORY_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`History capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  push(bounds: Bounds): void {
    this.items.push({ ...bounds });
    if (this.items.length > this.capacity) {
      this.items.shift();
    }
  }

  /** Most recently pushed entry, or null when empty. */
  peek(): Bounds | null {
    const last = this.items[this.items.length - 1];
    return last ? { ...last } : null;
  }

  entries(): Bounds[] {
    return this.items.map((entry) => ({ ...entry }));
  }

  get size(): number {
    return this.items.length;
  }

  clear(): void {
    this.items = [];
  }
}
