/**
 * Game Domain Errors - Structured error types for the session layer
 *
 * The board engine signals configuration problems with its own EngineError
 * hierarchy (src/shared/engine/errors.ts) and treats bad actions as no-ops.
 * The session layer sits in front of it and rejects requests the player
 * should be told about: acting on a finished game, spending a clue that is
 * not there, advancing without a win.
 *
 * Usage:
 * ```typescript
 * import { GameError, GameErrorCode, NoCluesRemainingError } from './GameDomainErrors';
 *
 * throw new NoCluesRemainingError('3f2c…', { level: 4 });
 *
 * if (error instanceof GameError) {
 *   console.log(error.code, error.context);
 * }
 * ```
 *
 * @module GameDomainErrors
 */

// ═══════════════════════════════════════════════════════════════════════════
// ERROR CODES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Error codes are prefixed by category:
 * - GAME_*: Session state errors
 * - MOVE_*: Action errors
 * - POWERUP_*: Power-up errors
 */
export enum GameErrorCode {
  // Session State Errors
  GAME_NOT_FOUND = 'GAME_NOT_FOUND',
  GAME_NOT_ACTIVE = 'GAME_NOT_ACTIVE',
  GAME_LEVEL_NOT_WON = 'GAME_LEVEL_NOT_WON',
  GAME_SESSION_LIMIT = 'GAME_SESSION_LIMIT',

  // Action Errors
  MOVE_INVALID = 'MOVE_INVALID',
  MOVE_INVALID_POSITION = 'MOVE_INVALID_POSITION',

  // Power-up Errors
  POWERUP_NO_CLUES_REMAINING = 'POWERUP_NO_CLUES_REMAINING',
}

// ═══════════════════════════════════════════════════════════════════════════
// BASE ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════

export class GameError extends Error {
  /** Error code for programmatic handling */
  readonly code: GameErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Timestamp when error occurred */
  readonly timestamp: Date;

  constructor(code: GameErrorCode, message: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = 'GameError';
    this.code = code;
    this.context = context;
    this.timestamp = new Date();

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, GameError.prototype);
  }

  /** Serialize to a JSON-safe object for logs and callers */
  toJSON(): GameErrorJSON {
    return {
      error: true,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

export interface GameErrorJSON {
  error: true;
  code: string;
  message: string;
  context: Record<string, unknown>;
  timestamp: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// SPECIFIC ERROR CLASSES
// ═══════════════════════════════════════════════════════════════════════════

export class InvalidMoveError extends GameError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(GameErrorCode.MOVE_INVALID, message, context);
    this.name = 'InvalidMoveError';
    Object.setPrototypeOf(this, InvalidMoveError.prototype);
  }
}

export class InvalidPositionError extends GameError {
  constructor(row: number, col: number, rows: number, cols: number) {
    super(
      GameErrorCode.MOVE_INVALID_POSITION,
      `Coordinates (${row}, ${col}) out of bounds. Board is ${rows}x${cols}.`,
      { row, col, rows, cols }
    );
    this.name = 'InvalidPositionError';
    Object.setPrototypeOf(this, InvalidPositionError.prototype);
  }
}

export class GameNotFoundError extends GameError {
  constructor(gameId: string, context: Record<string, unknown> = {}) {
    super(GameErrorCode.GAME_NOT_FOUND, `Game not found: ${gameId}`, { gameId, ...context });
    this.name = 'GameNotFoundError';
    Object.setPrototypeOf(this, GameNotFoundError.prototype);
  }
}

export class GameNotActiveError extends GameError {
  constructor(gameId: string, status: string, context: Record<string, unknown> = {}) {
    super(
      GameErrorCode.GAME_NOT_ACTIVE,
      `Game ${gameId} is not active (status: ${status})`,
      { gameId, status, ...context }
    );
    this.name = 'GameNotActiveError';
    Object.setPrototypeOf(this, GameNotActiveError.prototype);
  }
}

export class LevelNotWonError extends GameError {
  constructor(gameId: string, status: string) {
    super(
      GameErrorCode.GAME_LEVEL_NOT_WON,
      `Game ${gameId} cannot advance: current level is not won (status: ${status})`,
      { gameId, status }
    );
    this.name = 'LevelNotWonError';
    Object.setPrototypeOf(this, LevelNotWonError.prototype);
  }
}

export class NoCluesRemainingError extends GameError {
  constructor(gameId: string, context: Record<string, unknown> = {}) {
    super(GameErrorCode.POWERUP_NO_CLUES_REMAINING, 'No clues remaining for this level.', {
      gameId,
      ...context,
    });
    this.name = 'NoCluesRemainingError';
    Object.setPrototypeOf(this, NoCluesRemainingError.prototype);
  }
}

export class SessionLimitError extends GameError {
  constructor(limit: number) {
    super(GameErrorCode.GAME_SESSION_LIMIT, `Session limit of ${limit} reached`, { limit });
    this.name = 'SessionLimitError';
    Object.setPrototypeOf(this, SessionLimitError.prototype);
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

export function isGameError(error: unknown): error is GameError {
  return error instanceof GameError;
}
