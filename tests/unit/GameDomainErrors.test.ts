import {
  GameError,
  GameErrorCode,
  GameNotActiveError,
  GameNotFoundError,
  InvalidPositionError,
  LevelNotWonError,
  NoCluesRemainingError,
  SessionLimitError,
  isGameError,
} from '../../src/shared/errors';

describe('GameDomainErrors', () => {
  it('formats out-of-bounds positions with the board size', () => {
    const error = new InvalidPositionError(9, 2, 8, 8);

    expect(error.message).toBe('Coordinates (9, 2) out of bounds. Board is 8x8.');
    expect(error.code).toBe(GameErrorCode.MOVE_INVALID_POSITION);
    expect(error.context).toEqual({ row: 9, col: 2, rows: 8, cols: 8 });
  });

  it('tags each session error with its code', () => {
    expect(new GameNotFoundError('g-1').code).toBe(GameErrorCode.GAME_NOT_FOUND);
    expect(new GameNotActiveError('g-1', 'lost').code).toBe(GameErrorCode.GAME_NOT_ACTIVE);
    expect(new LevelNotWonError('g-1', 'active').code).toBe(GameErrorCode.GAME_LEVEL_NOT_WON);
    expect(new SessionLimitError(5).code).toBe(GameErrorCode.GAME_SESSION_LIMIT);
    expect(new NoCluesRemainingError('g-1').code).toBe(GameErrorCode.POWERUP_NO_CLUES_REMAINING);
  });

  it('describes a level that cannot be advanced and a full registry', () => {
    expect(new LevelNotWonError('g-1', 'active').message).toBe(
      'Game g-1 cannot advance: current level is not won (status: active)'
    );
    expect(new SessionLimitError(5).message).toBe('Session limit of 5 reached');
    expect(new SessionLimitError(5).context).toEqual({ limit: 5 });
  });

  it('describes an inactive game by its status', () => {
    const error = new GameNotActiveError('g-1', 'lost');

    expect(error.message).toBe('Game g-1 is not active (status: lost)');
    expect(error.context).toEqual({ gameId: 'g-1', status: 'lost' });
  });

  it('serializes to a JSON-safe object', () => {
    const error = new NoCluesRemainingError('g-1', { level: 3 });

    expect(error.toJSON()).toEqual({
      error: true,
      code: 'POWERUP_NO_CLUES_REMAINING',
      message: 'No clues remaining for this level.',
      context: { gameId: 'g-1', level: 3 },
      timestamp: error.timestamp.toISOString(),
    });
  });

  it('keeps subclasses recognisable as GameError', () => {
    const error = new GameNotFoundError('g-2');

    expect(error).toBeInstanceOf(GameError);
    expect(error).toBeInstanceOf(GameNotFoundError);
    expect(isGameError(error)).toBe(true);
    expect(isGameError(new Error('plain'))).toBe(false);
  });
});
