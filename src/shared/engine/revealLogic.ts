import { CoordSet, CoordSetBuilder } from './CoordSet';
import {
  adjacentCountAt,
  coord,
  getNeighbors,
  isGameOver,
  isInBounds,
  totalCells,
} from './boardGeometry';
import { MissingConfiguration } from './errors';
import { initializeBoard } from './minePlacement';
import type { BoardState, Coord, InitializedBoard, RandomSource } from './types';

/**
 * Reveal a single cell.
 *
 * - No-op on a finished board, out-of-bounds coordinates, or a cell that is
 *   already flagged or revealed.
 * - On an uninitialized board, lays mines with the target as the safe cell
 *   first; `mineCount` is then mandatory.
 * - Hitting a mine loses the game and reveals every mine, flagged or not.
 * - Otherwise flood-fills from the target and re-evaluates the win condition.
 *
 * @throws MissingConfiguration when the board is uninitialized and no
 *   mine count was supplied.
 */
export function revealCell(
  state: BoardState,
  row: number,
  col: number,
  mineCount?: number,
  random: RandomSource = Math.random
): BoardState {
  if (isGameOver(state) || !isInBounds(state, row, col)) {
    return state;
  }

  const target = coord(row, col);
  if (state.flagged.has(target)) {
    return state;
  }

  let board: InitializedBoard;
  if (state.phase === 'uninitialized') {
    if (mineCount === undefined) {
      throw new MissingConfiguration('mineCount must be provided for an uninitialized board', {
        row,
        col,
      });
    }
    board = initializeBoard(state.rows, state.cols, mineCount, target, random);
  } else {
    if (state.revealed.has(target)) {
      return state;
    }
    board = state;
  }

  if (board.mines.has(target)) {
    return {
      ...board,
      outcome: 'lost',
      revealed: board.revealed.withAll(board.mines),
    };
  }

  return evaluateWin({ ...board, revealed: floodFill(board, target) });
}

/**
 * Iterative flood fill from `start`.
 *
 * Each popped cell is revealed; cells with zero adjacent mines push their
 * in-bounds neighbours. Revealed, flagged and mined cells are skipped, so
 * the result is the connected zero-region around `start` plus its numbered
 * border. An explicit stack keeps call depth constant on large grids.
 */
export function floodFill(board: InitializedBoard, start: Coord): CoordSet {
  const revealed = new CoordSetBuilder(board.cols, board.revealed);
  const stack: Coord[] = [start];

  while (stack.length > 0) {
    const cell = stack.pop();
    if (
      cell === undefined ||
      revealed.has(cell) ||
      board.flagged.has(cell) ||
      board.mines.has(cell)
    ) {
      continue;
    }

    revealed.add(cell);

    if (adjacentCountAt(board, cell) === 0) {
      for (const neighbor of getNeighbors(board, cell)) {
        if (!revealed.has(neighbor)) {
          stack.push(neighbor);
        }
      }
    }
  }

  return revealed.size === board.revealed.size ? board.revealed : revealed.build();
}

/** Number of safe cells a player must reveal to win. */
export function safeCellCount(board: InitializedBoard): number {
  return totalCells(board) - board.mines.size;
}

/** Marks the board won once every non-mine cell is revealed. */
export function evaluateWin(board: InitializedBoard): InitializedBoard {
  if (board.outcome === 'playing' && board.revealed.size === safeCellCount(board)) {
    return { ...board, outcome: 'won' };
  }
  return board;
}
