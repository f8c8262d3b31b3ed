/**
 * Unified Application Configuration
 *
 * This module is the canonical source of truth for application configuration.
 * It parses environment variables, validates them with Zod, and exports a frozen
 * config object that all server code should use.
 *
 * Architecture:
 * - `env.ts` defines the raw environment variable schema
 * - `unified.ts` (this file) assembles the typed application config
 * - `index.ts` re-exports everything for convenient imports
 */

import dotenv from 'dotenv';
import type { LevelPolicy } from '../../shared/engine';
import {
  getEffectiveNodeEnv,
  parseEnv,
  type LogFormat,
  type LogLevel,
  type NodeEnv,
  type RawEnv,
} from './env';

// Load .env into process.env before we read anything from it.
// Skip in test mode so .env cannot override test-specific env vars.
if (process.env.NODE_ENV !== 'test') {
  dotenv.config();
}

export interface AppConfig {
  nodeEnv: NodeEnv;
  isProduction: boolean;
  isDevelopment: boolean;
  isTest: boolean;
  version: string;
  logging: {
    level: LogLevel;
    format: LogFormat;
    file: string | undefined;
  };
  game: {
    levelPolicy: Readonly<LevelPolicy>;
    cluesPerLevel: number;
  };
  sessions: {
    maxSessions: number;
  };
}

/**
 * Assemble the typed application config from validated environment values.
 */
export function buildConfig(env: RawEnv): Readonly<AppConfig> {
  const nodeEnv = getEffectiveNodeEnv(env);

  return Object.freeze({
    nodeEnv,
    isProduction: nodeEnv === 'production',
    isDevelopment: nodeEnv === 'development',
    isTest: nodeEnv === 'test',
    version: env.npm_package_version ?? '0.0.0',
    logging: Object.freeze({
      level: env.LOG_LEVEL,
      format: env.LOG_FORMAT,
      file: env.LOG_FILE?.trim() || undefined,
    }),
    game: Object.freeze({
      levelPolicy: Object.freeze({
        baseRows: env.ROGUESWEEPER_BASE_ROWS,
        baseCols: env.ROGUESWEEPER_BASE_COLS,
        rowIncrement: env.ROGUESWEEPER_ROW_INCREMENT,
        colIncrement: env.ROGUESWEEPER_COL_INCREMENT,
        maxRows: env.ROGUESWEEPER_MAX_ROWS,
        maxCols: env.ROGUESWEEPER_MAX_COLS,
        baseMines: env.ROGUESWEEPER_BASE_MINES,
        mineIncrement: env.ROGUESWEEPER_MINE_INCREMENT,
      }),
      cluesPerLevel: env.ROGUESWEEPER_CLUES_PER_LEVEL,
    }),
    sessions: Object.freeze({
      maxSessions: env.ROGUESWEEPER_MAX_SESSIONS,
    }),
  });
}

// Parse the raw environment with comprehensive Zod schema validation.
const envResult = parseEnv(process.env);
if (!envResult.success) {
  console.error('Invalid environment configuration:');
  for (const error of envResult.errors ?? []) {
    console.error(`  - ${error.path || 'root'}: ${error.message}`);
  }
  process.exit(1);
}
const env =
  envResult.data ??
  (() => {
    throw new Error('Missing env data after successful parse');
  })();

export const config: Readonly<AppConfig> = buildConfig(env);
