import type { FrequencyTable } from '../pipeline/types.js';

/** Insertion-ordered tally; ties in `top` keep first-seen order. */
export class FrequencyCounter {
  private readonly counts = new Map<string, number>();

  add(key: string, amount = 1): void {
    this.counts.set(key, (this.counts.get(key) ?? 0) + amount);
  }

  get total(): number {
    let sum = 0;
    for (const value of this.counts.values()) sum += value;
    return sum;
  }

  top(limit: number): FrequencyTable {
    return Array.from(this.counts.entries())
      .sort((a, b) => b[1] - a[1])
      .slice(0, limit);
  }

  toRecord(): Record<string, number> {
    return Object.fromEntries(this.counts);
  }
}
