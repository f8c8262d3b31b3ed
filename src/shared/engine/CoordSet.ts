import type { Coord } from './types';

/**
 * Immutable set of grid coordinates.
 *
 * Membership is keyed on the cell's row-major index for a fixed grid width,
 * so two coordinate objects with the same row and column are the same
 * member. Every "mutating" method returns a new set, or the receiver itself
 * when membership would not change, which lets callers detect no-ops by
 * reference equality.
 */
export class CoordSet implements Iterable<Coord> {
  private constructor(
    readonly cols: number,
    private readonly indices: ReadonlySet<number>
  ) {}

  static empty(cols: number): CoordSet {
    return new CoordSet(cols, new Set());
  }

  static of(cols: number, coords: Iterable<Coord>): CoordSet {
    const builder = new CoordSetBuilder(cols);
    for (const coord of coords) {
      builder.add(coord);
    }
    return builder.build();
  }

  /** @internal Used by CoordSetBuilder; indices must already be valid. */
  static fromIndices(cols: number, indices: Iterable<number>): CoordSet {
    return new CoordSet(cols, new Set(Array.from(indices).sort((a, b) => a - b)));
  }

  get size(): number {
    return this.indices.size;
  }

  has(coord: Coord): boolean {
    const index = indexOf(this.cols, coord);
    return index !== null && this.indices.has(index);
  }

  with(coord: Coord): CoordSet {
    return this.withAll([coord]);
  }

  withAll(coords: Iterable<Coord>): CoordSet {
    const builder = new CoordSetBuilder(this.cols, this);
    for (const coord of coords) {
      builder.add(coord);
    }
    return builder.size === this.size ? this : builder.build();
  }

  without(coord: Coord): CoordSet {
    const index = indexOf(this.cols, coord);
    if (index === null || !this.indices.has(index)) {
      return this;
    }
    const next = new Set(this.indices);
    next.delete(index);
    return new CoordSet(this.cols, next);
  }

  /** True when every member of this set is also in `other`. */
  isSubsetOf(other: CoordSet): boolean {
    for (const coord of this) {
      if (!other.has(coord)) {
        return false;
      }
    }
    return true;
  }

  intersects(other: CoordSet): boolean {
    const [small, large] = this.size <= other.size ? [this, other] : [other, this];
    for (const coord of small) {
      if (large.has(coord)) {
        return true;
      }
    }
    return false;
  }

  *[Symbol.iterator](): Iterator<Coord> {
    for (const index of this.indices) {
      yield coordOf(this.cols, index);
    }
  }

  /** Members in row-major order. */
  toArray(): Coord[] {
    return Array.from(this.indices)
      .sort((a, b) => a - b)
      .map((index) => coordOf(this.cols, index));
  }
}

/**
 * Mutable accumulator used while a single transition is being computed
 * (flood fill, mine sampling). Never escapes the engine.
 */
export class CoordSetBuilder {
  private readonly indices = new Set<number>();

  constructor(
    private readonly cols: number,
    initial?: CoordSet
  ) {
    if (initial) {
      for (const coord of initial) {
        this.add(coord);
      }
    }
  }

  get size(): number {
    return this.indices.size;
  }

  has(coord: Coord): boolean {
    const index = indexOf(this.cols, coord);
    return index !== null && this.indices.has(index);
  }

  add(coord: Coord): void {
    const index = indexOf(this.cols, coord);
    if (index === null) {
      throw new RangeError(
        `Coordinate (${coord.row}, ${coord.col}) is outside a ${this.cols}-column grid`
      );
    }
    this.indices.add(index);
  }

  build(): CoordSet {
    return CoordSet.fromIndices(this.cols, this.indices);
  }
}

function indexOf(cols: number, coord: Coord): number | null {
  const { row, col } = coord;
  if (!Number.isInteger(row) || !Number.isInteger(col) || row < 0 || col < 0 || col >= cols) {
    return null;
  }
  return row * cols + col;
}

function coordOf(cols: number, index: number): Coord {
  return { row: Math.floor(index / cols), col: index % cols };
}
