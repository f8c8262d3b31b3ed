export const SCORE_PER_LEVEL = 100;
export const SCORE_PER_CELL = 10;
export const TIME_BONUS_SECONDS = 300;
export const CLUE_PENALTY = 50;
export const WIN_BONUS_PER_LEVEL = 500;

export interface ScoreInput {
  level: number;
  cellsRevealed: number;
  /** Seconds spent on the level. */
  timeElapsed: number;
  cluesUsed: number;
  won: boolean;
}

/**
 * Points for one level:
 *
 *   100·level + 10·cellsRevealed + max(0, 300 − timeElapsed)
 *     − 50·cluesUsed + (won ? 500·level : 0)
 *
 * floored at zero.
 */
export function computeScore(
  level: number,
  cellsRevealed: number,
  timeElapsed: number,
  cluesUsed: number,
  won: boolean
): number {
  const base = SCORE_PER_LEVEL * level;
  const cellBonus = SCORE_PER_CELL * cellsRevealed;
  const timeBonus = Math.max(0, TIME_BONUS_SECONDS - timeElapsed);
  const cluePenalty = CLUE_PENALTY * cluesUsed;
  const winBonus = won ? WIN_BONUS_PER_LEVEL * level : 0;

  return Math.max(0, base + cellBonus + timeBonus - cluePenalty + winBonus);
}

export function computeLevelScore(input: ScoreInput): number {
  return computeScore(
    input.level,
    input.cellsRevealed,
    input.timeElapsed,
    input.cluesUsed,
    input.won
  );
}
