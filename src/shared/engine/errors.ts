/**
 * Engine Domain Errors - Structured error types for the board engine
 *
 * The engine is total over malformed *actions*: out-of-bounds coordinates,
 * actions against a finished board and actions against an already-resolved
 * cell are no-ops that return the input state. Errors are reserved for
 * malformed *configuration*:
 *
 * - **InvalidConfiguration**: dimensions, mine count or safe cell that cannot
 *   produce a board (for example more mines than cells outside the safe zone)
 * - **MissingConfiguration**: a reveal or clue reached an uninitialized board
 *   without a mine count
 * - **InvalidState**: a persisted board snapshot that fails validation
 *
 * Usage:
 * ```typescript
 * import { InvalidConfiguration, EngineErrorCode } from './errors';
 *
 * throw new InvalidConfiguration(
 *   EngineErrorCode.CONFIG_INVALID_MINE_COUNT,
 *   'Cannot place 60 mines; only 55 cells are available',
 *   { mineCount: 60, available: 55 }
 * );
 * ```
 *
 * @module EngineErrors
 */

// =============================================================================
// ERROR CODES
// =============================================================================

/**
 * Error codes are prefixed by category:
 * - CONFIG_*: Board configuration problems
 * - STATE_*: Corrupted or inconsistent board state
 */
export enum EngineErrorCode {
  /** Mine count is negative, fractional, or exceeds the cells outside the safe zone */
  CONFIG_INVALID_MINE_COUNT = 'CONFIG_INVALID_MINE_COUNT',
  /** Rows or columns are not positive integers */
  CONFIG_INVALID_DIMENSIONS = 'CONFIG_INVALID_DIMENSIONS',
  /** Safe cell lies outside the grid */
  CONFIG_INVALID_SAFE_CELL = 'CONFIG_INVALID_SAFE_CELL',
  /** Level number is not a positive integer */
  CONFIG_INVALID_LEVEL = 'CONFIG_INVALID_LEVEL',
  /** Uninitialized board acted on without a mine count */
  CONFIG_MINE_COUNT_REQUIRED = 'CONFIG_MINE_COUNT_REQUIRED',

  /** Board snapshot failed schema or invariant validation */
  STATE_INVALID_SNAPSHOT = 'STATE_INVALID_SNAPSHOT',
}

export const ERROR_CATEGORY_DESCRIPTIONS: Record<string, string> = {
  CONFIG_: 'Board configuration error',
  STATE_: 'Corrupted or inconsistent board state',
};

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

export class EngineError extends Error {
  /** Error code for programmatic handling */
  readonly code: EngineErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Engine area that raised the error (e.g. 'MinePlacement', 'Snapshot') */
  readonly domain: string;

  readonly timestamp: Date;

  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Engine'
  ) {
    super(message);
    this.name = 'EngineError';
    this.code = code;
    this.context = context;
    this.domain = domain;
    this.timestamp = new Date();

    Object.setPrototypeOf(this, EngineError.prototype);
  }

  /** Get error category from code prefix */
  get category(): string {
    const prefix = this.code.split('_')[0] + '_';
    return ERROR_CATEGORY_DESCRIPTIONS[prefix] ?? 'Unknown error category';
  }

  /** Serialize to a JSON-safe object for logging/debugging */
  toJSON(): EngineErrorJSON {
    return {
      error: true,
      type: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      context: this.context,
      category: this.category,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

export interface EngineErrorJSON {
  error: true;
  type: string;
  code: string;
  message: string;
  domain: string;
  context: Record<string, unknown>;
  category: string;
  timestamp: string;
}

// =============================================================================
// SPECIFIC ERROR CLASSES
// =============================================================================

/**
 * The requested board cannot be built. Fatal to the call that raised it;
 * the caller must pick a smaller mine count or a larger grid.
 */
export class InvalidConfiguration extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Configuration'
  ) {
    super(code, message, context, domain);
    this.name = 'InvalidConfiguration';
    Object.setPrototypeOf(this, InvalidConfiguration.prototype);
  }
}

/**
 * A reveal or clue arrived for an uninitialized board without the mine
 * count needed to lay mines. Indicates a bug in the calling layer.
 */
export class MissingConfiguration extends EngineError {
  constructor(message: string, context: Record<string, unknown> = {}, domain: string = 'Reveal') {
    super(EngineErrorCode.CONFIG_MINE_COUNT_REQUIRED, message, context, domain);
    this.name = 'MissingConfiguration';
    Object.setPrototypeOf(this, MissingConfiguration.prototype);
  }
}

export class InvalidState extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'State'
  ) {
    super(code, message, context, domain);
    this.name = 'InvalidState';
    Object.setPrototypeOf(this, InvalidState.prototype);
  }
}

// =============================================================================
// TYPE GUARDS
// =============================================================================

export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}

export function isInvalidConfiguration(error: unknown): error is InvalidConfiguration {
  return error instanceof InvalidConfiguration;
}

export function isMissingConfiguration(error: unknown): error is MissingConfiguration {
  return error instanceof MissingConfiguration;
}

export function isInvalidState(error: unknown): error is InvalidState {
  return error instanceof InvalidState;
}
