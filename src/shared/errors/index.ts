/**
 * Shared Errors Module
 *
 * Structured error types for the game session layer. Board-engine errors
 * live in src/shared/engine/errors.ts.
 *
 * @module errors
 */

export {
  // Error codes
  GameErrorCode,
  // Base class
  GameError,
  type GameErrorJSON,
  // Specific errors
  InvalidMoveError,
  InvalidPositionError,
  GameNotFoundError,
  GameNotActiveError,
  LevelNotWonError,
  NoCluesRemainingError,
  SessionLimitError,
  // Utilities
  isGameError,
} from './GameDomainErrors';
