// =============================================================================
// SESSION LAYER - PUBLIC API
// =============================================================================
// The calling layer around the board engine: per-run game sessions, the
// in-memory session registry, configuration and logging. A transport (HTTP,
// WebSocket) can be mounted on top of GameSessionManager; none ships here.
// =============================================================================

export { GameSession } from './game/GameSession';
export type {
  ActionResult,
  GameSessionOptions,
  GameSessionSettings,
  SessionStatus,
  SessionSummary,
} from './game/GameSession';
export { GameSessionManager } from './game/GameSessionManager';
export type { GameSessionManagerOptions } from './game/GameSessionManager';

export { config } from './config';
export type { AppConfig } from './config';
export { logger, createComponentLogger } from './utils/logger';

export * from '../shared/engine';
export * from '../shared/errors';
export { GameActionSchema, StartGameSchema } from '../shared/validation/schemas';
export type { GameActionInput, StartGameInput } from '../shared/validation/schemas';
export { createSeededRandom, generateGameSeed } from '../shared/utils/rng';
