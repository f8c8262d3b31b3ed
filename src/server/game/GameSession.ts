import {
  applyBoardAction,
  computeScore,
  createBoard,
  isEngineError,
  isGameOver,
  isInBounds,
  isWon,
  levelConfig,
  renderForClient,
  type BoardAction,
  type BoardState,
  type ClientView,
  type LevelConfig,
  type LevelPolicy,
  type RandomSource,
} from '../../shared/engine';
import {
  GameNotActiveError,
  InvalidMoveError,
  InvalidPositionError,
  LevelNotWonError,
  NoCluesRemainingError,
} from '../../shared/errors';
import { GameActionSchema } from '../../shared/validation/schemas';
import { createSeededRandom } from '../../shared/utils/rng';
import { createComponentLogger } from '../utils/logger';

const log = createComponentLogger('GameSession');

export type SessionStatus = 'active' | 'won' | 'lost' | 'abandoned';

export interface GameSessionSettings {
  levelPolicy: Readonly<LevelPolicy>;
  cluesPerLevel: number;
}

export interface GameSessionOptions {
  id: string;
  ownerId: string;
  settings: GameSessionSettings;
  /** Seed for deterministic mine placement; Math.random is used when absent. */
  seed?: number | undefined;
  /** Explicit random source; takes precedence over `seed`. */
  random?: RandomSource;
  /** Millisecond clock, injectable for tests. */
  clock?: () => number;
}

export interface SessionSummary {
  id: string;
  ownerId: string;
  status: SessionStatus;
  level: number;
  score: number;
  cluesRemaining: number;
  levelsCompleted: number;
  totalCellsRevealed: number;
  elapsedSeconds: number;
  board: ClientView;
}

export interface ActionResult {
  /** False when the engine treated the action as a no-op. */
  applied: boolean;
  /** Points earned for the level, present only when the action ended it. */
  levelScore?: number;
  session: SessionSummary;
}

/**
 * One player's run through consecutive levels.
 *
 * The session owns the board value between actions, feeds the level's mine
 * count to the engine for the first click, meters clue usage and converts a
 * finished level into points. Callers must not run two actions on the same
 * session concurrently; GameSessionManager.withSession serializes them.
 */
export class GameSession {
  public readonly id: string;
  public readonly ownerId: string;
  public readonly createdAt: number;

  private readonly settings: GameSessionSettings;
  private readonly random: RandomSource;
  private readonly clock: () => number;

  private status: SessionStatus = 'active';
  private level = 1;
  private levelSpec: LevelConfig;
  private board: BoardState;
  private cluesRemaining: number;
  private score = 0;
  private levelsCompleted = 0;
  private totalCellsRevealed = 0;
  private levelStartedAt: number;
  private levelEndedAt: number | null = null;

  constructor(options: GameSessionOptions) {
    this.id = options.id;
    this.ownerId = options.ownerId;
    this.settings = options.settings;
    this.random =
      options.random ??
      (options.seed === undefined ? Math.random : createSeededRandom(options.seed));
    this.clock = options.clock ?? Date.now;

    this.createdAt = this.clock();
    this.levelSpec = levelConfig(this.level, this.settings.levelPolicy);
    this.board = createBoard(this.levelSpec.rows, this.levelSpec.cols);
    this.cluesRemaining = this.settings.cluesPerLevel;
    this.levelStartedAt = this.createdAt;

    log.info('Game session started', {
      gameId: this.id,
      ownerId: this.ownerId,
      seeded: options.seed !== undefined,
      rows: this.levelSpec.rows,
      cols: this.levelSpec.cols,
      mineCount: this.levelSpec.mineCount,
    });
  }

  get currentStatus(): SessionStatus {
    return this.status;
  }

  get currentBoard(): BoardState {
    return this.board;
  }

  /**
   * Validate and apply one player action.
   *
   * @throws GameError subclasses when the action is rejected; the board is
   *   left untouched in that case.
   */
  public applyAction(input: unknown): ActionResult {
    const parsed = GameActionSchema.safeParse(input);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new InvalidMoveError(issue ? issue.message : 'Invalid action payload', {
        gameId: this.id,
        path: issue ? issue.path.join('.') : '',
      });
    }
    const { action: type, row, col } = parsed.data;

    if (this.status !== 'active') {
      log.warn('Action rejected on inactive session', { gameId: this.id, status: this.status });
      throw new GameNotActiveError(this.id, this.status);
    }
    if (!isInBounds(this.board, row, col)) {
      throw new InvalidPositionError(row, col, this.board.rows, this.board.cols);
    }
    if (type === 'clue' && this.cluesRemaining <= 0) {
      throw new NoCluesRemainingError(this.id, { level: this.level });
    }

    const action: BoardAction = { type, row, col };
    let next: BoardState;
    try {
      next = applyBoardAction(this.board, action, {
        mineCount: this.levelSpec.mineCount,
        random: this.random,
      });
    } catch (err) {
      if (isEngineError(err)) {
        log.warn('Engine rejected action', { gameId: this.id, action, error: err.toJSON() });
        throw new InvalidMoveError(err.message, { gameId: this.id, engineCode: err.code });
      }
      throw err;
    }

    const applied = next !== this.board;
    this.board = next;
    if (applied && type === 'clue') {
      this.cluesRemaining -= 1;
    }

    const levelScore = isGameOver(next) ? this.finishLevel(next) : undefined;
    return {
      applied,
      ...(levelScore !== undefined && { levelScore }),
      session: this.toSummary(),
    };
  }

  /**
   * Move a won session on to the next level with a fresh board and a new
   * allowance of clues.
   */
  public advanceLevel(): SessionSummary {
    if (this.status !== 'won') {
      throw new LevelNotWonError(this.id, this.status);
    }

    this.level += 1;
    this.levelSpec = levelConfig(this.level, this.settings.levelPolicy);
    this.board = createBoard(this.levelSpec.rows, this.levelSpec.cols);
    this.cluesRemaining = this.settings.cluesPerLevel;
    this.levelStartedAt = this.clock();
    this.levelEndedAt = null;
    this.status = 'active';

    log.info('Advanced to next level', {
      gameId: this.id,
      level: this.level,
      rows: this.levelSpec.rows,
      cols: this.levelSpec.cols,
      mineCount: this.levelSpec.mineCount,
    });
    return this.toSummary();
  }

  /**
   * End the run early. A lost or already abandoned run cannot be abandoned.
   */
  public abandon(): SessionSummary {
    if (this.status === 'lost' || this.status === 'abandoned') {
      throw new GameNotActiveError(this.id, this.status);
    }
    this.status = 'abandoned';
    if (this.levelEndedAt === null) {
      this.levelEndedAt = this.clock();
    }
    log.info('Game session abandoned', { gameId: this.id, level: this.level, score: this.score });
    return this.toSummary();
  }

  /** Whether the run can still change (used by the manager to pick a player's current run). */
  public isOpen(): boolean {
    return this.status === 'active' || this.status === 'won';
  }

  public elapsedSeconds(): number {
    const end = this.levelEndedAt ?? this.clock();
    return Math.max(0, Math.floor((end - this.levelStartedAt) / 1000));
  }

  public toSummary(): SessionSummary {
    return {
      id: this.id,
      ownerId: this.ownerId,
      status: this.status,
      level: this.level,
      score: this.score,
      cluesRemaining: this.cluesRemaining,
      levelsCompleted: this.levelsCompleted,
      totalCellsRevealed: this.totalCellsRevealed,
      elapsedSeconds: this.elapsedSeconds(),
      // An abandoned run can no longer be played, so its layout is shown.
      board: renderForClient(this.board, this.status === 'abandoned'),
    };
  }

  private finishLevel(board: BoardState): number {
    this.levelEndedAt = this.clock();
    const won = isWon(board);
    const cellsRevealed = safeCellsRevealed(board);
    const levelScore = computeScore(
      this.level,
      cellsRevealed,
      this.elapsedSeconds(),
      this.settings.cluesPerLevel - this.cluesRemaining,
      won
    );

    this.score += levelScore;
    this.totalCellsRevealed += cellsRevealed;
    if (won) {
      this.levelsCompleted += 1;
      this.status = 'won';
    } else {
      this.status = 'lost';
    }

    log.info(won ? 'Level won' : 'Level lost', {
      gameId: this.id,
      level: this.level,
      levelScore,
      score: this.score,
      elapsedSeconds: this.elapsedSeconds(),
    });
    return levelScore;
  }
}

function safeCellsRevealed(board: BoardState): number {
  if (board.phase === 'uninitialized') {
    return 0;
  }
  let count = 0;
  for (const cell of board.revealed) {
    if (!board.mines.has(cell)) {
      count += 1;
    }
  }
  return count;
}
