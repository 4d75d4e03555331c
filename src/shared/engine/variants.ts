import variantData from './data/variants.json';
import { VariantTableSchema, type VariantDefinitionInput } from '../validation/schemas';
import type { Piece, PieceSymbol, Position } from '../types/puzzle';
import { VariantNotFoundError } from './errors';

/**
 * Level variants.
 *
 * Every variant is the same ten-slot piece catalogue with a different
 * starting layout and, optionally, a blocked piece. Layouts live in
 * data/variants.json and are validated once at module load. Absent pieces
 * are stored at (-1,-1) so that ids stay stable across variants.
 */

export interface PieceKind {
  symbol: PieceSymbol;
  name: string;
  width: number;
  height: number;
  count: number;
}

/** Catalogue in id order: id 0 is Cao Cao, ids 6-9 are the soldiers. */
export const PIECE_KINDS: readonly PieceKind[] = [
  { symbol: 'C', name: 'Cao Cao', width: 2, height: 2, count: 1 },
  { symbol: 'Y', name: 'Guan Yu', width: 2, height: 1, count: 1 },
  { symbol: 'G', name: 'General', width: 1, height: 2, count: 4 },
  { symbol: 'S', name: 'Soldier', width: 1, height: 1, count: 4 },
];

export const PIECE_COUNT = PIECE_KINDS.reduce((sum, kind) => sum + kind.count, 0);

export const DEFAULT_VARIANT_ID = 'classic';

export type VariantSelector = string | number;

export interface VariantDefinition {
  readonly id: string;
  readonly label: string;
  readonly blockedId: number;
  readonly layout: Readonly<Record<PieceSymbol, readonly Position[]>>;
}

function toDefinition(input: VariantDefinitionInput): VariantDefinition {
  const toPositions = (coords: Array<[number, number]>): Position[] =>
    coords.map(([row, col]) => ({ row, col }));

  return {
    id: input.id,
    label: input.label,
    blockedId: input.blockedId,
    layout: {
      C: toPositions(input.layout.C),
      Y: toPositions(input.layout.Y),
      G: toPositions(input.layout.G),
      S: toPositions(input.layout.S),
    },
  };
}

const VARIANTS: readonly VariantDefinition[] = VariantTableSchema.parse(variantData).variants.map(
  toDefinition
);

export function listVariants(): readonly VariantDefinition[] {
  return VARIANTS;
}

/**
 * Look up a variant by id or by its index in the table. Numeric strings
 * (as typed on a command line) are treated as indexes.
 */
export function resolveVariant(selector: VariantSelector): VariantDefinition {
  let index: number | undefined;
  if (typeof selector === 'number') {
    index = selector;
  } else if (/^\d+$/.test(selector)) {
    index = Number(selector);
  }

  const found =
    index !== undefined
      ? Number.isInteger(index)
        ? VARIANTS[index]
        : undefined
      : VARIANTS.find((variant) => variant.id === selector);

  if (!found) {
    throw new VariantNotFoundError(selector);
  }
  return found;
}

/**
 * Build the ten-piece arena for a variant. Ids follow {@link PIECE_KINDS}
 * order; kinds with several pieces are numbered from 1 ("General 3").
 */
export function createVariantPieces(variant: VariantDefinition): Piece[] {
  const pieces: Piece[] = [];
  for (const kind of PIECE_KINDS) {
    const positions = variant.layout[kind.symbol];
    for (let n = 0; n < kind.count; n++) {
      const position = positions[n];
      pieces.push({
        id: pieces.length,
        name: kind.count > 1 ? `${kind.name} ${n + 1}` : kind.name,
        abbreviation: kind.symbol,
        width: kind.width,
        height: kind.height,
        position: { row: position.row, col: position.col },
      });
    }
  }
  return pieces;
}
