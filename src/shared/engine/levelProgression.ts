import { EngineErrorCode, InvalidConfiguration } from './errors';
import type { BoardDimensions } from './types';

/**
 * Level-scaling policy. Grids grow by a fixed increment per level up to a
 * cap, and mine counts grow likewise up to a quarter of the grid.
 */
export interface LevelPolicy {
  baseRows: number;
  baseCols: number;
  rowIncrement: number;
  colIncrement: number;
  maxRows: number;
  maxCols: number;
  baseMines: number;
  mineIncrement: number;
}

export const DEFAULT_LEVEL_POLICY: Readonly<LevelPolicy> = Object.freeze({
  baseRows: 8,
  baseCols: 8,
  rowIncrement: 1,
  colIncrement: 1,
  maxRows: 30,
  maxCols: 30,
  baseMines: 10,
  mineIncrement: 2,
});

/** Upper bound on mine density for a level, as a divisor of the cell count. */
export const MAX_MINE_DENSITY_DIVISOR = 4;

export interface LevelConfig extends BoardDimensions {
  level: number;
  mineCount: number;
}

function assertLevel(level: number): void {
  if (!Number.isInteger(level) || level < 1) {
    throw new InvalidConfiguration(
      EngineErrorCode.CONFIG_INVALID_LEVEL,
      `Level must be a positive integer, got ${level}`,
      { level },
      'LevelProgression'
    );
  }
}

export function levelDimensions(
  level: number,
  policy: LevelPolicy = DEFAULT_LEVEL_POLICY
): BoardDimensions {
  assertLevel(level);
  return {
    rows: Math.min(policy.baseRows + (level - 1) * policy.rowIncrement, policy.maxRows),
    cols: Math.min(policy.baseCols + (level - 1) * policy.colIncrement, policy.maxCols),
  };
}

export function levelMineCount(level: number, policy: LevelPolicy = DEFAULT_LEVEL_POLICY): number {
  const { rows, cols } = levelDimensions(level, policy);
  const maxMines = Math.floor((rows * cols) / MAX_MINE_DENSITY_DIVISOR);
  return Math.min(policy.baseMines + (level - 1) * policy.mineIncrement, maxMines);
}

export function levelConfig(level: number, policy: LevelPolicy = DEFAULT_LEVEL_POLICY): LevelConfig {
  return { level, ...levelDimensions(level, policy), mineCount: levelMineCount(level, policy) };
}
