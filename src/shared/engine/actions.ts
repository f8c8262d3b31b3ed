import { chordReveal } from './chordLogic';
import { applyClue, toggleFlag } from './flagLogic';
import { revealCell } from './revealLogic';
import type { BoardAction, BoardActionOptions, BoardState } from './types';

/**
 * Single entry point for hosts that receive player actions as data.
 * Returns the input state unchanged when the action is a no-op.
 */
export function applyBoardAction(
  state: BoardState,
  action: BoardAction,
  options: BoardActionOptions = {}
): BoardState {
  const { row, col } = action;
  switch (action.type) {
    case 'reveal':
      return revealCell(state, row, col, options.mineCount, options.random);
    case 'flag':
      return toggleFlag(state, row, col);
    case 'chord':
      return chordReveal(state, row, col);
    case 'clue':
      return applyClue(state, row, col, options.mineCount, options.random);
  }
}
