import { createComponentLogger, logger, maskSensitiveData } from '../../src/server/utils/logger';

describe('maskSensitiveData', () => {
  it('redacts short secrets entirely and keeps a prefix of long ones', () => {
    expect(
      maskSensitiveData({
        password: 'test-pw',
        apiKey: 'test-secret-value',
        gameId: 'game-1',
      })
    ).toEqual({
      password: '[REDACTED]',
      apiKey: 'test...[REDACTED]',
      gameId: 'game-1',
    });
  });

  it('walks nested objects and arrays', () => {
    expect(
      maskSensitiveData({
        sessions: [{ ownerId: 'player-1', token: 'abc' }],
        meta: { cookie: 42 },
      })
    ).toEqual({
      sessions: [{ ownerId: 'player-1', token: '[REDACTED]' }],
      meta: { cookie: '[REDACTED]' },
    });
  });

  it('leaves primitives untouched', () => {
    expect(maskSensitiveData('plain')).toBe('plain');
    expect(maskSensitiveData(null)).toBeNull();
  });

  it('stops at the depth limit', () => {
    expect(maskSensitiveData({ a: { b: 1 } }, 1)).toEqual({ a: '[MAX_DEPTH_EXCEEDED]' });
  });
});

describe('logger', () => {
  it('uses the configured level', () => {
    expect(logger.level).toBe('error');
  });

  it('tags child loggers with their component', () => {
    const write = jest.spyOn(logger, 'write').mockImplementation(() => true);
    try {
      createComponentLogger('GameSession').error('boom', { gameId: 'game-1' });

      expect(write).toHaveBeenCalledWith(
        expect.objectContaining({
          level: 'error',
          message: 'boom',
          component: 'GameSession',
          gameId: 'game-1',
          service: 'roguesweeper',
        })
      );
    } finally {
      write.mockRestore();
    }
  });
});
