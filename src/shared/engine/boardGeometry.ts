import type { BoardDimensions, BoardState, Coord, InitializedBoard } from './types';

/** The eight king-move offsets, in row-major order. */
export const NEIGHBOR_OFFSETS: ReadonlyArray<readonly [number, number]> = [
  [-1, -1],
  [-1, 0],
  [-1, 1],
  [0, -1],
  [0, 1],
  [1, -1],
  [1, 0],
  [1, 1],
];

export function coord(row: number, col: number): Coord {
  return { row, col };
}

export function isInBounds(dims: BoardDimensions, row: number, col: number): boolean {
  return (
    Number.isInteger(row) &&
    Number.isInteger(col) &&
    row >= 0 &&
    row < dims.rows &&
    col >= 0 &&
    col < dims.cols
  );
}

/** In-bounds neighbours of a cell, in the fixed order of NEIGHBOR_OFFSETS. */
export function getNeighbors(dims: BoardDimensions, cell: Coord): Coord[] {
  const neighbors: Coord[] = [];
  for (const [dr, dc] of NEIGHBOR_OFFSETS) {
    const row = cell.row + dr;
    const col = cell.col + dc;
    if (isInBounds(dims, row, col)) {
      neighbors.push({ row, col });
    }
  }
  return neighbors;
}

export function totalCells(dims: BoardDimensions): number {
  return dims.rows * dims.cols;
}

export function* allCells(dims: BoardDimensions): Generator<Coord> {
  for (let row = 0; row < dims.rows; row++) {
    for (let col = 0; col < dims.cols; col++) {
      yield { row, col };
    }
  }
}

// -----------------------------------------------------------------------------
// State predicates
// -----------------------------------------------------------------------------

export function isInitialized(state: BoardState): state is InitializedBoard {
  return state.phase === 'initialized';
}

export function isGameOver(state: BoardState): boolean {
  return state.phase === 'initialized' && state.outcome !== 'playing';
}

export function isWon(state: BoardState): boolean {
  return state.phase === 'initialized' && state.outcome === 'won';
}

/** Adjacent-mine count of a cell, or `null` for a mine. */
export function adjacentCountAt(board: InitializedBoard, cell: Coord): number | null {
  return board.adjacentCounts[cell.row]?.[cell.col] ?? null;
}
