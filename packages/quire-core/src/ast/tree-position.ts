/**
 * Tree positions
 *
 * The coordinates of a document or tree from the root, as a list of 1-based
 * indices: [2, 1] is the first child of the second child of the root.
 * Used for autonumbering and for ordering documents.
 */

export class TreePosition {
  static readonly root = new TreePosition([]);

  constructor(readonly coordinates: readonly number[]) {}

  get depth(): number {
    return this.coordinates.length;
  }

  forChild(childPosition: number): TreePosition {
    return new TreePosition([...this.coordinates, childPosition]);
  }

  /**
   * Lexicographic comparison, the shorter position is padded with zeros
   */
  compare(other: TreePosition): number {
    const length = Math.max(this.depth, other.depth);
    for (let i = 0; i < length; i++) {
      const diff = (this.coordinates[i] ?? 0) - (other.coordinates[i] ?? 0);
      if (diff !== 0) return diff < 0 ? -1 : 1;
    }
    return 0;
  }

  toString(): string {
    return this.depth === 0 ? 'root' : this.coordinates.join('.');
  }
}
