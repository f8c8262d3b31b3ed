import { adjacentCountAt, coord, isGameOver, isWon } from './boardGeometry';
import type { BoardState, CellState, ClientView } from './types';

/**
 * Client-safe projection of a board.
 *
 * Mine positions appear only once the game is over or when
 * `revealAllOverride` is set; while a game is in progress the client sees
 * nothing but covered markers and the counts of revealed cells.
 */
export function renderForClient(state: BoardState, revealAllOverride: boolean = false): ClientView {
  const gameOver = isGameOver(state);
  const showMines = gameOver || revealAllOverride;
  const cells: CellState[][] = [];

  for (let row = 0; row < state.rows; row++) {
    const line: CellState[] = [];
    for (let col = 0; col < state.cols; col++) {
      const cell = coord(row, col);

      if (state.phase === 'uninitialized') {
        line.push(state.flagged.has(cell) ? 'flagged' : 'hidden');
        continue;
      }

      const isMine = state.mines.has(cell);
      if (state.revealed.has(cell)) {
        line.push(isMine ? 'mine_hit' : (adjacentCountAt(state, cell) ?? 0));
      } else if (state.immuneFlags.has(cell)) {
        line.push('flagged_immune');
      } else if (state.flagged.has(cell)) {
        line.push('flagged');
      } else if (showMines && isMine) {
        line.push('mine');
      } else {
        line.push('hidden');
      }
    }
    cells.push(line);
  }

  return {
    rows: state.rows,
    cols: state.cols,
    cells,
    gameOver,
    won: isWon(state),
    initialized: state.phase === 'initialized',
    flagsCount: state.flagged.size,
    minesCount: state.phase === 'initialized' ? state.mines.size : 0,
    revealedCount: state.phase === 'initialized' ? state.revealed.size : 0,
  };
}
