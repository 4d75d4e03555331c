/**
 * Engine Domain Errors - Structured error types for the puzzle engine
 *
 * Illegal moves are NOT errors: move queries return `false`/`null` and
 * `applyAction` is a no-op for them. The classes below cover the genuinely
 * exceptional inputs:
 *
 * - **BoardFormatError**: malformed board text (corrupted save, peer desync)
 * - **PieceContractError**: bad bulk piece replacement or blocked-piece id
 * - **VariantNotFoundError**: unknown level-variant selector
 * - **SaveRecordError**: save record that fails schema validation
 *
 * Usage:
 * ```typescript
 * import { BoardFormatError, EngineErrorCode, isEngineError } from './errors';
 *
 * try {
 *   game.fromString(payload);
 * } catch (err) {
 *   if (isEngineError(err) && err.code === EngineErrorCode.BOARD_ROW_COUNT) {
 *     // ask the peer for a full resync
 *   }
 * }
 * ```
 *
 * @module EngineErrors
 */

// =============================================================================
// ERROR CODES
// =============================================================================

/**
 * Error codes are prefixed by category:
 * - BOARD_*: board text parsing
 * - PIECES_*: piece catalogue contract violations
 * - VARIANT_*: level variant lookup
 * - SAVE_*: save record validation
 */
export enum EngineErrorCode {
  /** Board text does not have exactly BOARD_HEIGHT rows */
  BOARD_ROW_COUNT = 'BOARD_ROW_COUNT',
  /** A row does not have exactly BOARD_WIDTH cells */
  BOARD_COLUMN_COUNT = 'BOARD_COLUMN_COUNT',
  /** A cell token is not a single known symbol */
  BOARD_UNKNOWN_SYMBOL = 'BOARD_UNKNOWN_SYMBOL',
  /** A symbol cell could not be covered by any unplaced piece */
  BOARD_UNMATCHED_CELL = 'BOARD_UNMATCHED_CELL',
  /** A piece that was on the board was not found in the text */
  BOARD_UNPLACED_PIECE = 'BOARD_UNPLACED_PIECE',

  /** Replacement piece list has the wrong length */
  PIECES_COUNT_MISMATCH = 'PIECES_COUNT_MISMATCH',
  /** Replacement piece list contains null/undefined */
  PIECES_NULL_ENTRY = 'PIECES_NULL_ENTRY',
  /** Replacement piece is not a well-formed piece record */
  PIECES_INVALID_RECORD = 'PIECES_INVALID_RECORD',
  /** Blocked id does not name a piece on this board */
  PIECES_UNKNOWN_ID = 'PIECES_UNKNOWN_ID',

  /** Variant selector does not match any layout */
  VARIANT_UNKNOWN = 'VARIANT_UNKNOWN',

  /** Save record failed validation */
  SAVE_INVALID_RECORD = 'SAVE_INVALID_RECORD',

  /** Assertion failed - indicates a bug */
  INTERNAL_ASSERTION_FAILED = 'INTERNAL_ASSERTION_FAILED',
}

export const ERROR_CATEGORY_DESCRIPTIONS: Record<string, string> = {
  BOARD_: 'Malformed board text',
  PIECES_: 'Piece catalogue contract violation',
  VARIANT_: 'Unknown level variant',
  SAVE_: 'Invalid save record',
  INTERNAL_: 'Internal engine error (bug)',
};

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

export class EngineError extends Error {
  /** Error code for programmatic handling */
  readonly code: EngineErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Component that raised the error (e.g. 'Notation', 'KlotskiGame') */
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

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, EngineError.prototype);
  }

  /** Get error category from code prefix */
  get category(): string {
    const prefix = this.code.split('_')[0] + '_';
    return ERROR_CATEGORY_DESCRIPTIONS[prefix] ?? 'Unknown error category';
  }

  /** Serialize to a JSON-safe object for logging */
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
 * Raised by board-text parsing. The board is left untouched when this is
 * thrown.
 */
export class BoardFormatError extends EngineError {
  constructor(code: EngineErrorCode, message: string, context: Record<string, unknown> = {}) {
    super(code, message, context, 'Notation');
    this.name = 'BoardFormatError';
    Object.setPrototypeOf(this, BoardFormatError.prototype);
  }
}

/**
 * Raised synchronously when a caller breaks the piece catalogue contract
 * (bulk replacement with the wrong shape, unknown blocked id).
 */
export class PieceContractError extends EngineError {
  constructor(code: EngineErrorCode, message: string, context: Record<string, unknown> = {}) {
    super(code, message, context, 'KlotskiGame');
    this.name = 'PieceContractError';
    Object.setPrototypeOf(this, PieceContractError.prototype);
  }
}

export class VariantNotFoundError extends EngineError {
  constructor(selector: string | number) {
    super(EngineErrorCode.VARIANT_UNKNOWN, `Unknown level variant: ${selector}`, { selector }, 'Variants');
    this.name = 'VariantNotFoundError';
    Object.setPrototypeOf(this, VariantNotFoundError.prototype);
  }
}

export class SaveRecordError extends EngineError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(EngineErrorCode.SAVE_INVALID_RECORD, message, context, 'SaveRecord');
    this.name = 'SaveRecordError';
    Object.setPrototypeOf(this, SaveRecordError.prototype);
  }
}

// =============================================================================
// TYPE GUARDS
// =============================================================================

export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}

export function isBoardFormatError(error: unknown): error is BoardFormatError {
  return error instanceof BoardFormatError;
}

export function isPieceContractError(error: unknown): error is PieceContractError {
  return error instanceof PieceContractError;
}

// =============================================================================
// UTILITIES
// =============================================================================

/**
 * Wrap an unknown error in an EngineError.
 *
 * Useful for catching and normalizing errors at the host boundary.
 */
export function wrapEngineError(
  error: unknown,
  domain: string = 'Engine',
  context: Record<string, unknown> = {}
): EngineError {
  if (isEngineError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return new EngineError(
    EngineErrorCode.INTERNAL_ASSERTION_FAILED,
    message,
    {
      ...context,
      originalStack: stack,
    },
    domain
  );
}
