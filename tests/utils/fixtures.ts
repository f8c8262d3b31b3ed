/**
 * Test Fixtures and Utilities
 * Hand-laid boards and helpers shared by the engine and session tests
 */

import {
  CoordSet,
  computeAdjacentCounts,
  type Coord,
  type GameOutcome,
  type InitializedBoard,
  type RandomSource,
} from '../../src/shared/engine';

export type CellPair = [number, number];

/**
 * Position helper - creates a coordinate object
 */
export function pos(row: number, col: number): Coord {
  return { row, col };
}

/**
 * Members of a set as [row, col] pairs in row-major order
 */
export function pairs(set: CoordSet): CellPair[] {
  return set.toArray().map(({ row, col }) => [row, col]);
}

export interface TestBoardOptions {
  revealed?: CellPair[];
  flagged?: CellPair[];
  immuneFlags?: CellPair[];
  outcome?: GameOutcome;
}

/**
 * Creates an initialized board with mines at exactly the given cells.
 * Adjacency counts are computed from the layout; reveal/flag sets are taken
 * as given, so callers are responsible for keeping them consistent.
 */
export function createTestBoard(
  rows: number,
  cols: number,
  mines: CellPair[],
  options: TestBoardOptions = {}
): InitializedBoard {
  const toSet = (cells: CellPair[] = []): CoordSet =>
    CoordSet.of(
      cols,
      cells.map(([row, col]) => pos(row, col))
    );
  const mineSet = toSet(mines);

  return {
    phase: 'initialized',
    rows,
    cols,
    mines: mineSet,
    revealed: toSet(options.revealed),
    flagged: toSet(options.flagged),
    immuneFlags: toSet(options.immuneFlags),
    adjacentCounts: computeAdjacentCounts({ rows, cols }, mineSet),
    outcome: options.outcome ?? 'playing',
  };
}

/**
 * Random source that replays `values` in order and then keeps returning the
 * last one (or 0 when empty).
 */
export function sequenceRandom(values: number[]): RandomSource {
  let index = 0;
  return () => {
    const value = index < values.length ? values[index] : (values[values.length - 1] ?? 0);
    index += 1;
    return value;
  };
}

/**
 * Replays the draws that make initializeBoard lay a full wall of mines
 * across row 2 of a 4x4 board when the first click is (0,0).
 *
 * Candidates outside the (0,0) safe zone, row-major, are
 * (0,2) (0,3) (1,2) (1,3) (2,0) (2,1) (2,2) (2,3) (3,0) ... and each draw
 * swaps the next row-2 cell to the front of the unpicked range.
 */
export function rowTwoWallRandom(): RandomSource {
  return sequenceRandom([0.35, 0.4, 0.45, 0.5]);
}

/**
 * Runs `fn` and returns what it threw; fails the test when nothing is thrown
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('Expected function to throw');
}
