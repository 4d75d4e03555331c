// =============================================================================
// PUZZLE ENGINE - PUBLIC API
// =============================================================================
// Hosts (the CLI, a UI, a network relay) should only import from this file.
//
// Design principles:
// - NARROW: Only the game class, pure helpers and their types are exported
// - SYNCHRONOUS: No operation blocks or awaits
// - HOST-AGNOSTIC: Logging is injected through setEngineLogger
// =============================================================================

// =============================================================================
// CORE TYPES
// =============================================================================

export type {
  Position,
  Piece,
  PieceSymbol,
  CellSymbol,
  Move,
  PieceMove,
  Direction,
} from '../types/puzzle';

export {
  BOARD_WIDTH,
  BOARD_HEIGHT,
  NO_BLOCKED_PIECE,
  PRIMARY_PIECE_ID,
  WIN_POSITION,
  OFF_BOARD,
  DIRECTION_ORDER,
  DIRECTION_DELTAS,
  positionsEqual,
} from '../types/puzzle';

// =============================================================================
// GAME
// =============================================================================

export { KlotskiGame, SHUFFLE_STEPS } from './KlotskiGame';
export type { KlotskiGameSnapshot } from './KlotskiGame';

// =============================================================================
// BOARD GEOMETRY & MOVES
// =============================================================================

export { isWithinBoard, isPiecePlaced, overlaps, findPieceAt, findPieceAtPrecise } from './core';

export {
  checkMove,
  isLegalMove,
  enumerateMovesForPiece,
  enumerateMovesByDirection,
  enumerateLegalMoves,
  isTerminalLayout,
} from './movementLogic';
export type { MoveCheck, MoveRejection } from './movementLogic';

// =============================================================================
// NOTATION
// =============================================================================

export {
  boardToString,
  parseBoardString,
  formatPosition,
  formatPieceMove,
  parsePieceMoveNotation,
  formatMoveList,
} from './notation';

// =============================================================================
// VARIANTS
// =============================================================================

export {
  DEFAULT_VARIANT_ID,
  PIECE_COUNT,
  PIECE_KINDS,
  listVariants,
  resolveVariant,
  createVariantPieces,
} from './variants';
export type { VariantDefinition, VariantSelector, PieceKind } from './variants';

// =============================================================================
// SOLVER
// =============================================================================

export { solvePuzzle, DEFAULT_SOLVER_MAX_STATES } from './solver';
export type { SolveOptions, SolveResult } from './solver';

// =============================================================================
// SAVE RECORDS
// =============================================================================

export { createSaveRecord, parseSaveRecord, restoreSaveRecord } from './saveRecord';
export type { CreateSaveRecordOptions } from './saveRecord';
export type { SaveRecord } from '../validation/schemas';

// =============================================================================
// ERRORS & LOGGING
// =============================================================================

export {
  EngineError,
  EngineErrorCode,
  BoardFormatError,
  PieceContractError,
  VariantNotFoundError,
  SaveRecordError,
  isEngineError,
  isBoardFormatError,
  isPieceContractError,
  wrapEngineError,
} from './errors';

export { setEngineLogger, getEngineLogger } from '../utils/engineLogger';
export type { EngineLogger, EngineLogMeta } from '../utils/engineLogger';
