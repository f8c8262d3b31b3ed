/**
 * Environment Configuration Tests
 *
 * Tests for the Zod-based environment variable validation system.
 * These tests verify that:
 * - Valid configurations pass validation
 * - Invalid configurations fail with the offending variable named
 * - Defaults are applied correctly
 * - Type coercion works as expected
 */

import { buildConfig, parseEnv, getEffectiveNodeEnv, type RawEnv } from '../../src/server/config';
import { DEFAULT_LEVEL_POLICY } from '../../src/shared/engine';

// Minimal valid environment for testing
const baseValidEnv: Record<string, string> = {
  NODE_ENV: 'development',
  LOG_LEVEL: 'info',
};

function parsedOrThrow(env: Record<string, string | undefined>): RawEnv {
  const result = parseEnv(env);
  if (!result.success || !result.data) {
    throw new Error(`expected env to parse: ${JSON.stringify(result.errors)}`);
  }
  return result.data;
}

describe('EnvSchema', () => {
  describe('NODE_ENV validation', () => {
    it('should accept valid NODE_ENV values', () => {
      for (const nodeEnv of ['development', 'staging', 'production', 'test']) {
        const result = parseEnv({ ...baseValidEnv, NODE_ENV: nodeEnv });
        expect(result.success).toBe(true);
        expect(result.data?.NODE_ENV).toBe(nodeEnv);
      }
    });

    it('should default to development when NODE_ENV is not set', () => {
      expect(parsedOrThrow({}).NODE_ENV).toBe('development');
    });

    it('should reject invalid NODE_ENV values', () => {
      const result = parseEnv({ ...baseValidEnv, NODE_ENV: 'invalid' });
      expect(result.success).toBe(false);
      expect(result.errors?.some((e) => e.path === 'NODE_ENV')).toBe(true);
    });
  });

  describe('logging', () => {
    it('should default to info level and json format', () => {
      const env = parsedOrThrow({});
      expect(env.LOG_LEVEL).toBe('info');
      expect(env.LOG_FORMAT).toBe('json');
      expect(env.LOG_FILE).toBeUndefined();
    });

    it('should reject unknown log levels', () => {
      const result = parseEnv({ LOG_LEVEL: 'verbose' });
      expect(result.success).toBe(false);
      expect(result.errors?.[0]?.path).toBe('LOG_LEVEL');
    });
  });

  describe('level progression', () => {
    it('should default to the standard policy', () => {
      const env = parsedOrThrow({});
      expect(env.ROGUESWEEPER_BASE_ROWS).toBe(8);
      expect(env.ROGUESWEEPER_BASE_MINES).toBe(10);
      expect(env.ROGUESWEEPER_MINE_INCREMENT).toBe(2);
      expect(env.ROGUESWEEPER_CLUES_PER_LEVEL).toBe(1);
      expect(env.ROGUESWEEPER_MAX_SESSIONS).toBe(10000);
    });

    it('should coerce numeric strings', () => {
      const env = parsedOrThrow({ ROGUESWEEPER_BASE_ROWS: '12', ROGUESWEEPER_MAX_ROWS: '20' });
      expect(env.ROGUESWEEPER_BASE_ROWS).toBe(12);
      expect(env.ROGUESWEEPER_MAX_ROWS).toBe(20);
    });

    it('should reject grids below 4 cells a side', () => {
      const result = parseEnv({ ROGUESWEEPER_BASE_COLS: '3' });
      expect(result.success).toBe(false);
      expect(result.errors?.[0]?.path).toBe('ROGUESWEEPER_BASE_COLS');
    });

    it('should reject a cap below the base size', () => {
      const result = parseEnv({ ROGUESWEEPER_BASE_ROWS: '12', ROGUESWEEPER_MAX_ROWS: '10' });
      expect(result.success).toBe(false);
      expect(result.errors).toEqual([
        {
          path: 'ROGUESWEEPER_MAX_ROWS',
          message: 'ROGUESWEEPER_MAX_ROWS must be at least ROGUESWEEPER_BASE_ROWS',
        },
      ]);
    });

    it('should reject non-numeric values', () => {
      const result = parseEnv({ ROGUESWEEPER_BASE_MINES: 'lots' });
      expect(result.success).toBe(false);
      expect(result.errors?.[0]?.path).toBe('ROGUESWEEPER_BASE_MINES');
    });
  });
});

describe('getEffectiveNodeEnv', () => {
  it('should report test under Jest regardless of NODE_ENV', () => {
    expect(getEffectiveNodeEnv(parsedOrThrow({ NODE_ENV: 'production' }))).toBe('test');
  });
});

describe('buildConfig', () => {
  it('should assemble the level policy from the environment', () => {
    const config = buildConfig(parsedOrThrow({}));
    expect(config.game.levelPolicy).toEqual(DEFAULT_LEVEL_POLICY);
    expect(config.game.cluesPerLevel).toBe(1);
    expect(config.sessions.maxSessions).toBe(10000);
  });

  it('should treat a blank LOG_FILE as unset', () => {
    const config = buildConfig(parsedOrThrow({ LOG_FILE: '   ' }));
    expect(config.logging.file).toBeUndefined();
  });

  it('should freeze the result', () => {
    const config = buildConfig(parsedOrThrow({ npm_package_version: '2.1.0' }));
    expect(config.version).toBe('2.1.0');
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.game.levelPolicy)).toBe(true);
  });
});
