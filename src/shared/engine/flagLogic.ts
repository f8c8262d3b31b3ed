import { coord, isGameOver, isInBounds } from './boardGeometry';
import { revealCell } from './revealLogic';
import type { BoardState, RandomSource } from './types';

/**
 * Flip a player flag on a covered cell.
 *
 * No-op on a finished board, out of bounds, on a revealed cell, or on an
 * immune flag. Flags may be placed before mines are laid; they are cleared
 * when the first reveal initializes the board.
 */
export function toggleFlag(state: BoardState, row: number, col: number): BoardState {
  if (isGameOver(state) || !isInBounds(state, row, col)) {
    return state;
  }

  const target = coord(row, col);
  if (state.phase === 'initialized') {
    if (state.revealed.has(target) || state.immuneFlags.has(target)) {
      return state;
    }
  }

  const flagged = state.flagged.has(target)
    ? state.flagged.without(target)
    : state.flagged.with(target);
  return { ...state, flagged };
}

/**
 * Clue power-up: probe a cell without risk.
 *
 * A mine is marked with a permanent (immune) flag and the game continues;
 * a safe cell is revealed as usual. On an uninitialized board the clue is a
 * plain first reveal. Applying a clue never loses the game, and repeating
 * it on the same mine changes nothing.
 *
 * @throws MissingConfiguration when the board is uninitialized and no
 *   mine count was supplied.
 */
export function applyClue(
  state: BoardState,
  row: number,
  col: number,
  mineCount?: number,
  random: RandomSource = Math.random
): BoardState {
  if (isGameOver(state) || !isInBounds(state, row, col)) {
    return state;
  }

  if (state.phase === 'uninitialized') {
    return revealCell(state, row, col, mineCount, random);
  }

  const target = coord(row, col);
  if (state.revealed.has(target) || state.flagged.has(target)) {
    return state;
  }

  if (state.mines.has(target)) {
    return {
      ...state,
      flagged: state.flagged.with(target),
      immuneFlags: state.immuneFlags.with(target),
    };
  }

  return revealCell(state, row, col);
}
