import {
  SAVE_RECORD_VERSION,
  SaveRecord,
  SaveRecordSchema,
  formatIssues,
} from '../validation/schemas';
import { SaveRecordError } from './errors';
import { KlotskiGame } from './KlotskiGame';

/**
 * Versioned JSON save records.
 *
 * A record stores every piece's top-left cell by id, so that ids (and with
 * them the blocked piece and the history) survive a reload. The board text
 * rides along as a readable copy and is checked against the positions.
 */

export interface CreateSaveRecordOptions {
  elapsedSeconds?: number;
  /** Timestamp to stamp the record with. Defaults to now. */
  savedAt?: Date;
}

export function createSaveRecord(game: KlotskiGame, options: CreateSaveRecordOptions = {}): SaveRecord {
  return {
    version: SAVE_RECORD_VERSION,
    variant: game.variant,
    blockedId: game.blockedId,
    board: game.toString(),
    positions: game.getPieces().map((piece) => ({ ...piece.position })),
    moveCount: game.getMoveCount(),
    moveHistory: game.getMoveHistory(),
    redoMoves: game.getRedoMoves(),
    elapsedSeconds: options.elapsedSeconds ?? 0,
    savedAt: (options.savedAt ?? new Date()).toISOString(),
  };
}

/**
 * Validate a record given as JSON text or as an already-parsed value.
 * @throws SaveRecordError when the input is not JSON or fails the schema
 */
export function parseSaveRecord(input: unknown): SaveRecord {
  let value = input;
  if (typeof input === 'string') {
    try {
      value = JSON.parse(input);
    } catch (err) {
      throw new SaveRecordError('Save record is not valid JSON', {
        cause: err instanceof Error ? err.message : String(err),
      });
    }
  }

  const parsed = SaveRecordSchema.safeParse(value);
  if (!parsed.success) {
    throw new SaveRecordError('Save record failed validation', {
      issues: formatIssues(parsed.error),
    });
  }
  return parsed.data;
}

/**
 * Rebuild a game from a validated record. Unknown variants and unknown
 * blocked ids surface as the engine's own errors.
 * @throws SaveRecordError when the positions do not draw the stored board
 */
export function restoreSaveRecord(record: SaveRecord): KlotskiGame {
  const game = new KlotskiGame(record.variant);
  game.setPieces(
    game.getPieces().map((piece) => ({ ...piece, position: { ...record.positions[piece.id] } }))
  );

  const board = game.toString();
  if (board !== record.board) {
    throw new SaveRecordError('Save record board does not match its piece positions', {
      expected: record.board,
      actual: board,
    });
  }

  game.setBlockedId(record.blockedId);
  game.restoreProgress(record.moveCount, record.moveHistory, record.redoMoves);
  return game;
}
