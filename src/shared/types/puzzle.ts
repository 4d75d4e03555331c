/**
 * Core puzzle types shared by the engine, the solver and the CLI host.
 *
 * Coordinates are (row, col) with row 0 at the top of the board. A piece's
 * position is always its top-left cell; the cells it covers are
 * [row, row + height) × [col, col + width).
 */

export const BOARD_WIDTH = 4;
export const BOARD_HEIGHT = 5;

/** Sentinel for "no piece is blocked". */
export const NO_BLOCKED_PIECE = -1;

/** The primary piece; its arrival at {@link WIN_POSITION} ends the game. */
export const PRIMARY_PIECE_ID = 0;

export const EMPTY_CELL = '.';

export interface Position {
  row: number;
  col: number;
}

export const WIN_POSITION: Readonly<Position> = { row: 3, col: 1 };

/** Position used for pieces that are absent from the current layout. */
export const OFF_BOARD: Readonly<Position> = { row: -1, col: -1 };

export type PieceSymbol = 'C' | 'Y' | 'G' | 'S';
export type CellSymbol = PieceSymbol | typeof EMPTY_CELL;

export const PIECE_SYMBOLS: readonly PieceSymbol[] = ['C', 'Y', 'G', 'S'];

export interface Piece {
  readonly id: number;
  readonly name: string;
  /** Shared by every piece of the same kind; used only for text encoding. */
  readonly abbreviation: PieceSymbol;
  readonly width: number;
  readonly height: number;
  position: Position;
}

/**
 * A single-step move request. `from` may be any cell covered by the piece;
 * the piece is translated by (to - from).
 */
export interface Move {
  from: Position;
  to: Position;
}

/**
 * A step recorded against a specific piece. `from` and `to` are the piece's
 * top-left cell before and after the step.
 */
export interface PieceMove {
  pieceId: number;
  from: Position;
  to: Position;
}

export type Direction = 'up' | 'down' | 'left' | 'right';

/** Enumeration order used by every move query. */
export const DIRECTION_ORDER: readonly Direction[] = ['up', 'down', 'left', 'right'];

export const DIRECTION_DELTAS: Readonly<Record<Direction, Readonly<Position>>> = {
  up: { row: -1, col: 0 },
  down: { row: 1, col: 0 },
  left: { row: 0, col: -1 },
  right: { row: 0, col: 1 },
};

export function isPieceSymbol(value: string): value is PieceSymbol {
  return (PIECE_SYMBOLS as readonly string[]).includes(value);
}

export function positionsEqual(a: Position, b: Position): boolean {
  return a.row === b.row && a.col === b.col;
}

export function translate(pos: Position, delta: Position): Position {
  return { row: pos.row + delta.row, col: pos.col + delta.col };
}

export function clonePiece(piece: Piece): Piece {
  return { ...piece, position: { ...piece.position } };
}
