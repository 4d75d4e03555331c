import {
  BOARD_HEIGHT,
  BOARD_WIDTH,
  Piece,
  Position,
  positionsEqual,
} from '../types/puzzle';

/**
 * Board geometry shared by the move engine, serializer and solver.
 *
 * Every helper here is a non-throwing predicate or lookup over a piece
 * list; none of them mutate the pieces they are given.
 */

export function isWithinBoard(pos: Position): boolean {
  return pos.row >= 0 && pos.row < BOARD_HEIGHT && pos.col >= 0 && pos.col < BOARD_WIDTH;
}

/**
 * True when a `width` × `height` rectangle with top-left `pos` lies fully
 * inside the grid.
 */
export function rectangleFits(pos: Position, width: number, height: number): boolean {
  return pos.row >= 0 && pos.row + height <= BOARD_HEIGHT && pos.col >= 0 && pos.col + width <= BOARD_WIDTH;
}

/** False for pieces parked at the off-board marker. */
export function isPiecePlaced(piece: Piece): boolean {
  return isWithinBoard(piece.position);
}

/**
 * Axis-aligned rectangle intersection between `piece` and a candidate
 * rectangle. Rectangles that only touch along an edge do not overlap.
 */
export function overlaps(piece: Piece, position: Position, width: number, height: number): boolean {
  return !(
    position.row >= piece.position.row + piece.height ||
    position.row + height <= piece.position.row ||
    position.col >= piece.position.col + piece.width ||
    position.col + width <= piece.position.col
  );
}

/** Absent pieces cover no cell. */
export function pieceCovers(piece: Piece, pos: Position): boolean {
  return (
    isPiecePlaced(piece) &&
    pos.row >= piece.position.row &&
    pos.row < piece.position.row + piece.height &&
    pos.col >= piece.position.col &&
    pos.col < piece.position.col + piece.width
  );
}

/** First piece (in storage order) whose rectangle contains `pos`. */
export function findPieceAt(pieces: readonly Piece[], pos: Position): Piece | undefined {
  return pieces.find((piece) => pieceCovers(piece, pos));
}

/** First piece whose top-left cell is exactly `pos`. */
export function findPieceAtPrecise(pieces: readonly Piece[], pos: Position): Piece | undefined {
  return pieces.find((piece) => isPiecePlaced(piece) && positionsEqual(piece.position, pos));
}
