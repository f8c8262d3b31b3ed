import { adjacentCountAt, coord, getNeighbors, isGameOver, isInBounds } from './boardGeometry';
import { revealCell } from './revealLogic';
import type { BoardState } from './types';

/**
 * Chord on a revealed number: when the flags around it match its count,
 * reveal every other covered neighbour.
 *
 * Neighbours are revealed one at a time in NEIGHBOR_OFFSETS order and the
 * sweep stops at the first reveal that ends the game, so a wrong flag
 * discloses the mines exactly as a single losing click would.
 */
export function chordReveal(state: BoardState, row: number, col: number): BoardState {
  if (state.phase !== 'initialized' || isGameOver(state) || !isInBounds(state, row, col)) {
    return state;
  }

  const target = coord(row, col);
  if (!state.revealed.has(target)) {
    return state;
  }

  const count = adjacentCountAt(state, target);
  if (count === null || count === 0) {
    return state;
  }

  const neighbors = getNeighbors(state, target);
  const flags = neighbors.filter((n) => state.flagged.has(n)).length;
  if (flags !== count) {
    return state;
  }

  let board: BoardState = state;
  for (const neighbor of neighbors) {
    if (state.flagged.has(neighbor) || state.revealed.has(neighbor)) {
      continue;
    }
    board = revealCell(board, neighbor.row, neighbor.col);
    if (isGameOver(board)) {
      break;
    }
  }
  return board;
}
