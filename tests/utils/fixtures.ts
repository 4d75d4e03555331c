/**
 * Test Fixtures and Utilities
 * Common boards and helper functions for puzzle engine tests
 */

import type { Piece, PieceMove, Position } from '../../src/shared/types/puzzle';
import { OFF_BOARD } from '../../src/shared/types/puzzle';
import { createVariantPieces, resolveVariant } from '../../src/shared/engine/variants';
import classicSolution from '../fixtures/classicSolution.json';

/**
 * Position helper - creates a position object
 */
export function pos(row: number, col: number): Position {
  return { row, col };
}

/** Join display rows ("G C C G") into canonical board text. */
export function boardText(rows: string[]): string {
  return rows.map((row) => `${row} \n`).join('');
}

export const CLASSIC_BOARD = boardText([
  'G C C G',
  'G C C G',
  'G . . G',
  'G Y Y G',
  'S S S S',
]);

export const ENHANCED_1_BOARD = boardText([
  'G C C G',
  'G C C G',
  'G . . .',
  'G Y Y .',
  'S S S .',
]);

export function classicPieces(): Piece[] {
  return createVariantPieces(resolveVariant('classic'));
}

/**
 * Classic pieces with the given ids moved to new top-left cells. Ids not
 * listed keep their classic position.
 */
export function piecesWith(overrides: Record<number, Position>): Piece[] {
  return classicPieces().map((piece) => {
    const position = overrides[piece.id];
    return position ? { ...piece, position: { ...position } } : piece;
  });
}

/** Classic catalogue with every piece removed from the board. */
export function emptyPieces(): Piece[] {
  return classicPieces().map((piece) => ({ ...piece, position: { ...OFF_BOARD } }));
}

/** Shortest classic solution (119 single steps) from the starting layout. */
export function loadClassicSolution(): PieceMove[] {
  return classicSolution.map((move) => ({
    pieceId: move.pieceId,
    from: { ...move.from },
    to: { ...move.to },
  }));
}
