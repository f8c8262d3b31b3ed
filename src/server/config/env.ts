/**
 * Environment Variable Schema and Validation
 *
 * This module defines the Zod schema for all environment variables,
 * validates them, and exports the typed result. All environment variables
 * should be defined here with appropriate validation rules and defaults.
 */

import { z } from 'zod';
import { isJestRuntime } from '../../shared/utils/envFlags';

/**
 * Node environment schema - supports development, staging, production, and test.
 */
export const NodeEnvSchema = z.enum(['development', 'staging', 'production', 'test']);
export type NodeEnv = z.infer<typeof NodeEnvSchema>;

/**
 * Log level schema (winston npm levels).
 */
export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Log format schema.
 */
export const LogFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof LogFormatSchema>;

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonNegativeInt = (fallback: number) => z.coerce.number().int().min(0).default(fallback);

/**
 * Complete environment variable schema with validation rules and defaults.
 *
 * Variables are organized by category:
 * - Environment
 * - Logging
 * - Level progression
 * - Sessions
 */
export const EnvSchema = z
  .object({
    // ===================================================================
    // ENVIRONMENT
    // ===================================================================

    /** Application environment mode */
    NODE_ENV: NodeEnvSchema.default('development'),

    /** Application version (injected by npm) */
    npm_package_version: z.string().optional(),

    // ===================================================================
    // LOGGING
    // ===================================================================

    /** Application log level */
    LOG_LEVEL: LogLevelSchema.default('info'),

    /** Log output format */
    LOG_FORMAT: LogFormatSchema.default('json'),

    /** Log file path (optional; file logging is off when unset) */
    LOG_FILE: z.string().optional(),

    // ===================================================================
    // LEVEL PROGRESSION
    // ===================================================================

    /** Grid rows on level 1 */
    ROGUESWEEPER_BASE_ROWS: z.coerce.number().int().min(4).default(8),

    /** Grid columns on level 1 */
    ROGUESWEEPER_BASE_COLS: z.coerce.number().int().min(4).default(8),

    /** Rows added per level */
    ROGUESWEEPER_ROW_INCREMENT: nonNegativeInt(1),

    /** Columns added per level */
    ROGUESWEEPER_COL_INCREMENT: nonNegativeInt(1),

    /** Row cap */
    ROGUESWEEPER_MAX_ROWS: positiveInt(30),

    /** Column cap */
    ROGUESWEEPER_MAX_COLS: positiveInt(30),

    /** Mines on level 1 */
    ROGUESWEEPER_BASE_MINES: nonNegativeInt(10),

    /** Mines added per level */
    ROGUESWEEPER_MINE_INCREMENT: nonNegativeInt(2),

    /** Clue power-ups granted at the start of each level */
    ROGUESWEEPER_CLUES_PER_LEVEL: nonNegativeInt(1),

    // ===================================================================
    // SESSIONS
    // ===================================================================

    /** Maximum number of in-memory sessions held at once */
    ROGUESWEEPER_MAX_SESSIONS: positiveInt(10000),
  })
  .refine((env) => env.ROGUESWEEPER_MAX_ROWS >= env.ROGUESWEEPER_BASE_ROWS, {
    message: 'ROGUESWEEPER_MAX_ROWS must be at least ROGUESWEEPER_BASE_ROWS',
    path: ['ROGUESWEEPER_MAX_ROWS'],
  })
  .refine((env) => env.ROGUESWEEPER_MAX_COLS >= env.ROGUESWEEPER_BASE_COLS, {
    message: 'ROGUESWEEPER_MAX_COLS must be at least ROGUESWEEPER_BASE_COLS',
    path: ['ROGUESWEEPER_MAX_COLS'],
  });

/**
 * Inferred type for raw environment variables.
 */
export type RawEnv = z.infer<typeof EnvSchema>;

/**
 * Result of environment validation.
 */
export interface EnvValidationResult {
  success: boolean;
  data?: RawEnv;
  errors?: Array<{ path: string; message: string }>;
}

/**
 * Parse and validate environment variables.
 *
 * @param env - Environment object to parse (defaults to process.env)
 * @returns Validation result with data or errors
 */
export function parseEnv(
  env: Record<string, string | undefined> = process.env
): EnvValidationResult {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    const errors =
      result.error.issues.length > 0
        ? result.error.issues.map((e) => ({
            path: e.path.join('.'),
            message: e.message,
          }))
        : [
            {
              path: '',
              message: result.error.message,
            },
          ];

    return {
      success: false,
      errors,
    };
  }

  return {
    success: true,
    data: result.data,
  };
}

/**
 * Determine effective node environment.
 *
 * When running under Jest, always treats the environment as 'test'
 * regardless of NODE_ENV to ensure test-specific behavior.
 *
 * @param rawEnv - Raw environment variables
 * @returns Effective node environment
 */
export function getEffectiveNodeEnv(rawEnv: RawEnv): NodeEnv {
  return isJestRuntime() ? 'test' : rawEnv.NODE_ENV;
}
