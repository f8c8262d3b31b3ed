/**
 * Test suite for src/shared/engine/errors.ts
 */

import {
  EngineError,
  EngineErrorCode,
  InvalidConfiguration,
  InvalidState,
  MissingConfiguration,
  isEngineError,
  isInvalidConfiguration,
  isInvalidState,
  isMissingConfiguration,
} from '../../../src/shared/engine';

describe('EngineErrors', () => {
  describe('EngineError base class', () => {
    it('should create an EngineError with all fields', () => {
      const error = new EngineError(
        EngineErrorCode.CONFIG_INVALID_MINE_COUNT,
        'Too many mines',
        { mineCount: 99 },
        'MinePlacement'
      );

      expect(error.code).toBe(EngineErrorCode.CONFIG_INVALID_MINE_COUNT);
      expect(error.message).toBe('Too many mines');
      expect(error.context).toEqual({ mineCount: 99 });
      expect(error.domain).toBe('MinePlacement');
      expect(error.name).toBe('EngineError');
      expect(error.timestamp).toBeInstanceOf(Date);
    });

    it('should use default domain when not specified', () => {
      const error = new EngineError(EngineErrorCode.STATE_INVALID_SNAPSHOT, 'Bad snapshot');

      expect(error.domain).toBe('Engine');
      expect(error.context).toEqual({});
    });

    it('should return category description based on error code prefix', () => {
      expect(new EngineError(EngineErrorCode.CONFIG_INVALID_LEVEL, 'x').category).toBe(
        'Board configuration error'
      );
      expect(new EngineError(EngineErrorCode.STATE_INVALID_SNAPSHOT, 'x').category).toBe(
        'Corrupted or inconsistent board state'
      );
    });

    it('should serialize to JSON', () => {
      const error = new EngineError(
        EngineErrorCode.CONFIG_INVALID_DIMENSIONS,
        'Bad grid',
        { rows: 0 },
        'MinePlacement'
      );
      const json = error.toJSON();

      expect(json).toEqual({
        error: true,
        type: 'EngineError',
        code: 'CONFIG_INVALID_DIMENSIONS',
        message: 'Bad grid',
        domain: 'MinePlacement',
        context: { rows: 0 },
        category: 'Board configuration error',
        timestamp: error.timestamp.toISOString(),
      });
    });
  });

  describe('subclasses', () => {
    it('InvalidConfiguration keeps its code and default domain', () => {
      const error = new InvalidConfiguration(EngineErrorCode.CONFIG_INVALID_MINE_COUNT, 'Too many');

      expect(error).toBeInstanceOf(EngineError);
      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe('InvalidConfiguration');
      expect(error.domain).toBe('Configuration');
    });

    it('MissingConfiguration always uses the mine-count code', () => {
      const error = new MissingConfiguration('mineCount required', { row: 1, col: 2 });

      expect(error.code).toBe(EngineErrorCode.CONFIG_MINE_COUNT_REQUIRED);
      expect(error.domain).toBe('Reveal');
      expect(error.context).toEqual({ row: 1, col: 2 });
    });

    it('InvalidState defaults to the State domain', () => {
      const error = new InvalidState(EngineErrorCode.STATE_INVALID_SNAPSHOT, 'Corrupt');

      expect(error.name).toBe('InvalidState');
      expect(error.domain).toBe('State');
    });
  });

  describe('type guards', () => {
    const config = new InvalidConfiguration(EngineErrorCode.CONFIG_INVALID_LEVEL, 'x');
    const missing = new MissingConfiguration('x');
    const state = new InvalidState(EngineErrorCode.STATE_INVALID_SNAPSHOT, 'x');

    it('should narrow each subclass', () => {
      expect(isInvalidConfiguration(config)).toBe(true);
      expect(isInvalidConfiguration(missing)).toBe(false);
      expect(isMissingConfiguration(missing)).toBe(true);
      expect(isInvalidState(state)).toBe(true);
      expect(isInvalidState(config)).toBe(false);
    });

    it('should recognise any engine error and nothing else', () => {
      expect(isEngineError(config)).toBe(true);
      expect(isEngineError(missing)).toBe(true);
      expect(isEngineError(state)).toBe(true);
      expect(isEngineError(new Error('plain'))).toBe(false);
      expect(isEngineError('CONFIG_INVALID_LEVEL')).toBe(false);
    });
  });
});
