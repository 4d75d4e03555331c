import {
  BOARD_HEIGHT,
  BOARD_WIDTH,
  CellSymbol,
  EMPTY_CELL,
  OFF_BOARD,
  PIECE_SYMBOLS,
  Piece,
  PieceMove,
  Position,
  isPieceSymbol,
  positionsEqual,
} from '../types/puzzle';
import { isPiecePlaced, isWithinBoard } from './core';
import { BoardFormatError, EngineErrorCode } from './errors';

/**
 * Board text encoding and move notation.
 *
 * The board text is the wire format shared with network peers and save
 * files: BOARD_HEIGHT lines, each cell symbol followed by one space, each
 * line ending in "\n". For the classic start:
 *
 *   G C C G
 *   G C C G
 *   G . . G
 *   G Y Y G
 *   S S S S
 *
 * Symbols are piece abbreviations, so the text identifies piece kinds and
 * not piece ids.
 */

// =============================================================================
// BOARD TEXT
// =============================================================================

export function renderBoardGrid(pieces: readonly Piece[]): CellSymbol[][] {
  const grid: CellSymbol[][] = [];
  for (let row = 0; row < BOARD_HEIGHT; row++) {
    grid.push(new Array<CellSymbol>(BOARD_WIDTH).fill(EMPTY_CELL));
  }

  for (const piece of pieces) {
    // Absent pieces sit at (-1,-1) and are not drawn.
    if (!isPiecePlaced(piece)) continue;
    for (let i = 0; i < piece.height; i++) {
      for (let j = 0; j < piece.width; j++) {
        const cell = { row: piece.position.row + i, col: piece.position.col + j };
        if (isWithinBoard(cell)) {
          grid[cell.row][cell.col] = piece.abbreviation;
        }
      }
    }
  }
  return grid;
}

export function boardToString(pieces: readonly Piece[]): string {
  return renderBoardGrid(pieces)
    .map((row) => row.map((cell) => `${cell} `).join('') + '\n')
    .join('');
}

function tokenizeBoard(text: string): CellSymbol[][] {
  const rows = text.trim().split(/\r?\n/);
  if (rows.length !== BOARD_HEIGHT) {
    throw new BoardFormatError(
      EngineErrorCode.BOARD_ROW_COUNT,
      `Invalid board height. Expected ${BOARD_HEIGHT} rows.`,
      { rows: rows.length }
    );
  }

  return rows.map((line, row) => {
    const tokens = line.trim().split(/\s+/);
    if (tokens.length !== BOARD_WIDTH) {
      throw new BoardFormatError(
        EngineErrorCode.BOARD_COLUMN_COUNT,
        `Invalid board width at row ${row}. Expected ${BOARD_WIDTH} columns.`,
        { row, columns: tokens.length }
      );
    }

    return tokens.map((token, col): CellSymbol => {
      if (token === EMPTY_CELL || isPieceSymbol(token)) {
        return token;
      }
      throw new BoardFormatError(
        EngineErrorCode.BOARD_UNKNOWN_SYMBOL,
        `Unknown symbol "${token}" at (${row},${col}).`,
        { row, col, token }
      );
    });
  });
}

/**
 * Decode board text into new top-left positions for `pieces` (same order).
 *
 * Reconstruction is greedy: cells are scanned top-left to bottom-right and
 * each unconsumed symbol cell is given to the first unplaced piece (storage
 * order) with that abbreviation whose whole rectangle fits on cells bearing
 * the same symbol. The placements of each kind are then re-dealt so that a
 * piece whose top-left cell is still occupied by its kind keeps its id there;
 * only pieces that actually moved may trade ids.
 *
 * Pieces that are off the board in `pieces` may stay unplaced; every other
 * piece must be found. `pieces` is never mutated.
 */
export function parseBoardString(text: string, pieces: readonly Piece[]): Position[] {
  const grid = tokenizeBoard(text);
  const positions: Position[] = pieces.map(() => ({ ...OFF_BOARD }));
  const placed: boolean[] = pieces.map(() => false);

  const fitsAt = (piece: Piece, row: number, col: number, symbol: CellSymbol): boolean => {
    for (let i = 0; i < piece.height; i++) {
      for (let j = 0; j < piece.width; j++) {
        const r = row + i;
        const c = col + j;
        if (r >= BOARD_HEIGHT || c >= BOARD_WIDTH || grid[r][c] !== symbol) {
          return false;
        }
      }
    }
    return true;
  };

  for (let row = 0; row < BOARD_HEIGHT; row++) {
    for (let col = 0; col < BOARD_WIDTH; col++) {
      const symbol = grid[row][col];
      if (symbol === EMPTY_CELL) continue;

      const index = pieces.findIndex(
        (piece, k) => !placed[k] && piece.abbreviation === symbol && fitsAt(piece, row, col, symbol)
      );
      if (index === -1) {
        throw new BoardFormatError(
          EngineErrorCode.BOARD_UNMATCHED_CELL,
          `No unplaced piece fits symbol "${symbol}" at (${row},${col}).`,
          { row, col, symbol }
        );
      }

      const piece = pieces[index];
      positions[index] = { row, col };
      placed[index] = true;
      for (let i = 0; i < piece.height; i++) {
        for (let j = 0; j < piece.width; j++) {
          grid[row + i][col + j] = EMPTY_CELL;
        }
      }
    }
  }

  pieces.forEach((piece, k) => {
    if (!placed[k] && isPiecePlaced(piece)) {
      throw new BoardFormatError(
        EngineErrorCode.BOARD_UNPLACED_PIECE,
        `Piece ${piece.name} could not be placed on the board.`,
        { pieceId: piece.id }
      );
    }
  });

  return keepPieceIdentities(pieces, positions);
}

/**
 * Re-deal the placements found for each kind so that a piece whose top-left
 * cell still holds one of its kind keeps that cell. Left-over cells go to the
 * remaining pieces that were on the board, then to absent ones, in storage
 * order.
 */
function keepPieceIdentities(pieces: readonly Piece[], found: readonly Position[]): Position[] {
  const result: Position[] = pieces.map(() => ({ ...OFF_BOARD }));

  for (const symbol of PIECE_SYMBOLS) {
    const members: number[] = [];
    pieces.forEach((piece, index) => {
      if (piece.abbreviation === symbol) members.push(index);
    });

    const free = members.map((index) => found[index]).filter((cell) => isWithinBoard(cell));
    const waiting: number[] = [];

    for (const index of members) {
      const previous = pieces[index].position;
      const slot = free.findIndex((cell) => positionsEqual(cell, previous));
      if (slot === -1) {
        waiting.push(index);
        continue;
      }
      result[index] = { ...free[slot] };
      free.splice(slot, 1);
    }

    waiting.sort((a, b) => Number(isPiecePlaced(pieces[b])) - Number(isPiecePlaced(pieces[a])) || a - b);
    waiting.forEach((index, k) => {
      if (k < free.length) {
        result[index] = { ...free[k] };
      }
    });
  }

  return result;
}

// =============================================================================
// MOVE NOTATION
// =============================================================================

export function formatPosition(pos: Position): string {
  return `(${pos.row},${pos.col})`;
}

/**
 * Format a recorded step, e.g. `Move General 1 from (0,0) to (1,0)`.
 * Unknown piece ids are shown as `#<id>`.
 */
export function formatPieceMove(move: PieceMove, pieces: readonly Piece[]): string {
  const name = pieces.find((piece) => piece.id === move.pieceId)?.name ?? `#${move.pieceId}`;
  return `Move ${name} from ${formatPosition(move.from)} to ${formatPosition(move.to)}`;
}

const MOVE_NOTATION = /^Move (.+) from \((-?\d+),(-?\d+)\) to \((-?\d+),(-?\d+)\)$/;

/**
 * Inverse of {@link formatPieceMove}. Returns null when the text is not in
 * move notation or names no piece in `pieces`.
 */
export function parsePieceMoveNotation(text: string, pieces: readonly Piece[]): PieceMove | null {
  const match = MOVE_NOTATION.exec(text.trim());
  if (!match) {
    return null;
  }
  const [, name, fromRow, fromCol, toRow, toCol] = match;
  const piece = pieces.find((candidate) => candidate.name === name);
  if (!piece) {
    return null;
  }
  return {
    pieceId: piece.id,
    from: { row: Number(fromRow), col: Number(fromCol) },
    to: { row: Number(toRow), col: Number(toCol) },
  };
}

/**
 * Render moves as numbered notation lines. Primarily used by the CLI,
 * logs and tests.
 */
export function formatMoveList(moves: readonly PieceMove[], pieces: readonly Piece[]): string[] {
  return moves.map((move, idx) => `${idx + 1}. ${formatPieceMove(move, pieces)}`);
}
