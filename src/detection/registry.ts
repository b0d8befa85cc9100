import type { CanonicalCategory } from '../pipeline/types.js';

const SUPERCATEGORY = 'clothing';

/**
 * Category names collected during one conversion run. The first name seen
 * for an id is kept; ids are emitted as found in the source, not renumbered.
 */
export class CategoryRegistry {
  private readonly names = new Map<number, string>();

  register(id: number, name: string): void {
    if (!this.names.has(id)) {
      this.names.set(id, name);
    }
  }

  get size(): number {
    return this.names.size;
  }

  private sortedIds(): number[] {
    return Array.from(this.names.keys()).sort((a, b) => a - b);
  }

  toCategories(): CanonicalCategory[] {
    return this.sortedIds().map((id) => ({
      id,
      name: this.names.get(id) ?? '',
      supercategory: SUPERCATEGORY,
    }));
  }

  /** `id<TAB>name` per line, ascending by id. */
  toListing(): string {
    return this.sortedIds()
      .map((id) => `${id}\t${this.names.get(id) ?? ''}\n`)
      .join('');
  }
}
