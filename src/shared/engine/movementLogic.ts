import {
  DIRECTION_DELTAS,
  DIRECTION_ORDER,
  Direction,
  Move,
  NO_BLOCKED_PIECE,
  Piece,
  Position,
  PRIMARY_PIECE_ID,
  WIN_POSITION,
  translate,
} from '../types/puzzle';
import {
  findPieceAt,
  findPieceAtPrecise,
  isPiecePlaced,
  isWithinBoard,
  overlaps,
  rectangleFits,
} from './core';

/**
 * Shared helpers for single-step sliding moves.
 *
 * These functions operate on a plain piece list so they can back both the
 * stateful {@link KlotskiGame} and the solver, which works on detached
 * copies. Illegal input is reported through return values only.
 */

export type MoveRejection =
  | 'OUT_OF_BOUNDS'
  | 'NO_PIECE'
  | 'NOT_ONE_STEP'
  | 'PIECE_LEAVES_BOARD'
  | 'COLLISION';

export type MoveCheck =
  | { legal: true; piece: Piece; destination: Position }
  | { legal: false; reason: MoveRejection };

/**
 * Validate a move request and, when legal, return the moving piece and its
 * new top-left cell.
 *
 * Rules encoded:
 *
 * - Both cells are on the board.
 * - Some piece covers `from` (not necessarily at its top-left).
 * - `to` is exactly one orthogonal step from `from`.
 * - The piece, translated by the same delta, stays on the board.
 * - The translated rectangle does not overlap any other piece on the board.
 */
export function checkMove(pieces: readonly Piece[], from: Position, to: Position): MoveCheck {
  if (!isWithinBoard(from) || !isWithinBoard(to)) {
    return { legal: false, reason: 'OUT_OF_BOUNDS' };
  }

  const piece = findPieceAt(pieces, from);
  if (!piece) {
    return { legal: false, reason: 'NO_PIECE' };
  }

  const rowDiff = to.row - from.row;
  const colDiff = to.col - from.col;
  const oneStep =
    (Math.abs(rowDiff) === 1 && colDiff === 0) || (Math.abs(colDiff) === 1 && rowDiff === 0);
  if (!oneStep) {
    return { legal: false, reason: 'NOT_ONE_STEP' };
  }

  const destination = translate(piece.position, { row: rowDiff, col: colDiff });
  if (!rectangleFits(destination, piece.width, piece.height)) {
    return { legal: false, reason: 'PIECE_LEAVES_BOARD' };
  }

  for (const other of pieces) {
    if (other === piece || !isPiecePlaced(other)) continue;
    if (overlaps(other, destination, piece.width, piece.height)) {
      return { legal: false, reason: 'COLLISION' };
    }
  }

  return { legal: true, piece, destination };
}

export function isLegalMove(pieces: readonly Piece[], from: Position, to: Position): boolean {
  return checkMove(pieces, from, to).legal;
}

/**
 * Legal destinations for the piece covering `position`, taken as
 * `position + delta` for each direction.
 *
 * Returns `null` (rather than an empty list) when there is no piece at
 * `position`, the piece is off the board, or it is the blocked piece. An
 * empty list means the piece is present but stuck.
 */
export function enumerateMovesForPiece(
  pieces: readonly Piece[],
  position: Position,
  blockedId: number = NO_BLOCKED_PIECE
): Position[] | null {
  const piece = findPieceAt(pieces, position);
  if (!piece || !isWithinBoard(piece.position) || piece.id === blockedId) {
    return null;
  }

  const destinations: Position[] = [];
  for (const direction of DIRECTION_ORDER) {
    const to = translate(position, DIRECTION_DELTAS[direction]);
    if (isLegalMove(pieces, position, to)) {
      destinations.push(to);
    }
  }
  return destinations;
}

/**
 * One candidate per piece for a fixed direction, moving from each piece's
 * top-left cell. The blocked piece is not excluded.
 */
export function enumerateMovesByDirection(
  pieces: readonly Piece[],
  direction: Direction | Position
): Move[] {
  const delta = typeof direction === 'string' ? DIRECTION_DELTAS[direction] : direction;
  const moves: Move[] = [];

  for (const piece of pieces) {
    const from = { ...piece.position };
    const to = translate(from, delta);
    if (isLegalMove(pieces, from, to)) {
      moves.push({ from, to });
    }
  }
  return moves;
}

/**
 * Every legal single-step move on the board, piece by piece in storage
 * order and direction order within a piece. The blocked piece is not
 * excluded.
 */
export function enumerateLegalMoves(pieces: readonly Piece[]): Move[] {
  const moves: Move[] = [];

  for (const piece of pieces) {
    for (const direction of DIRECTION_ORDER) {
      const from = { ...piece.position };
      const to = translate(from, DIRECTION_DELTAS[direction]);
      if (isLegalMove(pieces, from, to)) {
        moves.push({ from, to });
      }
    }
  }
  return moves;
}

/** True when the piece whose top-left is the win cell is the primary piece. */
export function isTerminalLayout(pieces: readonly Piece[]): boolean {
  return findPieceAtPrecise(pieces, WIN_POSITION)?.id === PRIMARY_PIECE_ID;
}
