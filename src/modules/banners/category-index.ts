/**
 * Category → banner positions, in load order. Written only while the
 * inventory is being built.
 */
export class CategoryIndex {
  private readonly positions = new Map<string, number[]>();

  add(category: string, position: number): void {
    const list = this.positions.get(category);
    if (list) {
      list.push(position);
    } else {
      this.positions.set(category, [position]);
    }
  }

  /** Positions tagged with a category; empty for an unknown key. */
  lookup(category: string): readonly number[] {
    return this.positions.get(category) ?? [];
  }

  /**
   * Union of the positions of every given category, deduplicated and in
   * ascending order. Unknown categories contribute nothing.
   */
  candidates(categories: Iterable<string>): number[] {
    const union = new Set<number>();
    for (const category of categories) {
      for (const position of this.lookup(category)) {
        union.add(position);
      }
    }
    return [...union].sort((a, b) => a - b);
  }

  entries(): IterableIterator<[string, number[]]> {
    return this.positions.entries();
  }
}
