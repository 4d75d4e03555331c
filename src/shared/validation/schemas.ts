import { z } from 'zod';

// Position validation. -1 is allowed so the off-board sentinel round-trips.
export const PositionSchema = z.object({
  row: z.number().int().min(-1),
  col: z.number().int().min(-1),
});

const PieceSymbolSchema = z.enum(['C', 'Y', 'G', 'S']);

// Piece record accepted by KlotskiGame.setPieces
export const PieceSchema = z.object({
  id: z.number().int().min(0),
  name: z.string().min(1),
  abbreviation: PieceSymbolSchema,
  width: z.number().int().min(1),
  height: z.number().int().min(1),
  position: PositionSchema,
});

export const PieceMoveSchema = z.object({
  pieceId: z.number().int().min(0),
  from: PositionSchema,
  to: PositionSchema,
});

// ---------------------------------------------------------------------------
// Level variant table (src/shared/engine/data/variants.json)
// ---------------------------------------------------------------------------

const CoordinateSchema = z.tuple([z.number().int().min(-1), z.number().int().min(-1)]);

const VariantLayoutSchema = z.object({
  C: z.array(CoordinateSchema).length(1),
  Y: z.array(CoordinateSchema).length(1),
  G: z.array(CoordinateSchema).length(4),
  S: z.array(CoordinateSchema).length(4),
});

export const VariantDefinitionSchema = z.object({
  id: z.string().regex(/^[a-z0-9-]+$/, 'Variant ids are lowercase slugs'),
  label: z.string().min(1),
  blockedId: z.number().int().min(-1).max(9),
  layout: VariantLayoutSchema,
});

export const VariantTableSchema = z.object({
  variants: z.array(VariantDefinitionSchema).min(1),
});

export type VariantDefinitionInput = z.infer<typeof VariantDefinitionSchema>;

// ---------------------------------------------------------------------------
// Save records
// ---------------------------------------------------------------------------

export const SAVE_RECORD_VERSION = 2;

// `positions` is indexed by piece id; `board` is kept as the readable payload.
export const SaveRecordSchema = z.object({
  version: z.literal(SAVE_RECORD_VERSION),
  variant: z.string().min(1),
  blockedId: z.number().int().min(-1),
  board: z.string().min(1),
  positions: z.array(PositionSchema).length(10),
  moveCount: z.number().int().min(0),
  moveHistory: z.array(PieceMoveSchema).default([]),
  redoMoves: z.array(PieceMoveSchema).default([]),
  elapsedSeconds: z.number().min(0).default(0),
  savedAt: z.string().datetime(),
});

export type SaveRecord = z.infer<typeof SaveRecordSchema>;

/**
 * Flatten zod issues into `path: message` pairs for error context.
 */
export function formatIssues(error: z.ZodError): Array<{ path: string; message: string }> {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}
