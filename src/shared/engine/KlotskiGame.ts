import {
  Direction,
  Move,
  NO_BLOCKED_PIECE,
  Piece,
  PieceMove,
  Position,
  clonePiece,
  positionsEqual,
} from '../types/puzzle';
import { PieceSchema, formatIssues } from '../validation/schemas';
import { getEngineLogger } from '../utils/engineLogger';
import { SeededRNG, generateGameSeed } from '../utils/rng';
import { findPieceAt, findPieceAtPrecise } from './core';
import { EngineErrorCode, PieceContractError } from './errors';
import {
  checkMove,
  enumerateLegalMoves,
  enumerateMovesByDirection,
  enumerateMovesForPiece,
  isTerminalLayout,
} from './movementLogic';
import { boardToString, parseBoardString } from './notation';
import { SolveResult, solvePuzzle } from './solver';
import {
  DEFAULT_VARIANT_ID,
  PIECE_COUNT,
  VariantSelector,
  createVariantPieces,
  resolveVariant,
} from './variants';

/** Upper bound on random steps taken by {@link KlotskiGame.randomShuffle}. */
export const SHUFFLE_STEPS = 100;

export interface KlotskiGameSnapshot {
  variant: string;
  blockedId: number;
  pieces: Piece[];
  moveCount: number;
  moveHistory: PieceMove[];
  redoMoves?: PieceMove[];
}

function copyMoves(moves: readonly PieceMove[]): PieceMove[] {
  return moves.map((move) => ({
    pieceId: move.pieceId,
    from: { ...move.from },
    to: { ...move.to },
  }));
}

/**
 * One puzzle instance: the ten-slot piece arena plus move counter, history
 * and blocked piece.
 *
 * Blocked-piece policy: the blocked id is honoured by the player-facing
 * queries ({@link getLegalMovesForPiece}, {@link solve}, {@link getHint}).
 * Raw board geometry ({@link isLegalMove}, {@link applyAction},
 * {@link getLegalMoves}, {@link getLegalMovesByDirection} and therefore
 * {@link randomShuffle}) ignores it, so a shuffle may move the blocked piece.
 *
 * Undo and redo replay history entries as single steps. Both count towards
 * the move counter, which only ever grows until the next `initialize`.
 *
 * The instance is synchronous and has no internal locking; callers keep a
 * single writer per game.
 */
export class KlotskiGame {
  private pieces: Piece[] = [];
  private variantId: string = DEFAULT_VARIANT_ID;
  private blocked: number = NO_BLOCKED_PIECE;
  private moveCount = 0;
  private moveHistory: PieceMove[] = [];
  /** Undone steps, most recently undone last. Cleared by any new move. */
  private redoMoves: PieceMove[] = [];

  constructor(variant: VariantSelector = DEFAULT_VARIANT_ID) {
    this.initialize(variant);
  }

  /**
   * Reset to a variant's starting layout. Move count, history and blocked
   * piece are reset with it. Defaults to the current variant.
   */
  public initialize(variant: VariantSelector = this.variantId): void {
    const definition = resolveVariant(variant);
    this.variantId = definition.id;
    this.pieces = createVariantPieces(definition);
    this.blocked = definition.blockedId;
    this.moveCount = 0;
    this.moveHistory = [];
    this.redoMoves = [];
  }

  public get variant(): string {
    return this.variantId;
  }

  public get blockedId(): number {
    return this.blocked;
  }

  /** Set or clear (with -1) the piece that single-piece queries refuse to move. */
  public setBlockedId(id: number): void {
    if (id !== NO_BLOCKED_PIECE && !this.pieces.some((piece) => piece.id === id)) {
      throw new PieceContractError(EngineErrorCode.PIECES_UNKNOWN_ID, `Unknown piece id: ${id}`, {
        id,
      });
    }
    this.blocked = id;
  }

  // ===========================================================================
  // Board model
  // ===========================================================================

  public getPieces(): Piece[] {
    return this.pieces.map(clonePiece);
  }

  public getPiece(index: number): Piece | undefined {
    const piece = this.pieces[index];
    return piece ? clonePiece(piece) : undefined;
  }

  /**
   * Replace every piece at once. The list must have one well-formed record
   * per slot; nothing is applied unless the whole list is accepted.
   */
  public setPieces(newPieces: ReadonlyArray<Piece | null | undefined>): void {
    if (newPieces.length !== PIECE_COUNT) {
      throw new PieceContractError(
        EngineErrorCode.PIECES_COUNT_MISMATCH,
        `Expected ${PIECE_COUNT} pieces, got ${newPieces.length}`,
        { expected: PIECE_COUNT, actual: newPieces.length }
      );
    }

    const accepted: Piece[] = [];
    newPieces.forEach((entry, index) => {
      if (entry === null || entry === undefined) {
        throw new PieceContractError(
          EngineErrorCode.PIECES_NULL_ENTRY,
          `Piece at index ${index} is missing`,
          { index }
        );
      }
      const parsed = PieceSchema.safeParse(entry);
      if (!parsed.success) {
        throw new PieceContractError(
          EngineErrorCode.PIECES_INVALID_RECORD,
          `Piece at index ${index} is not a valid piece record`,
          { index, issues: formatIssues(parsed.error) }
        );
      }
      accepted.push({ ...parsed.data, position: { ...parsed.data.position } });
    });

    this.pieces = accepted;
    this.redoMoves = [];
  }

  public getPieceAt(position: Position): Piece | undefined {
    const piece = findPieceAt(this.pieces, position);
    return piece ? clonePiece(piece) : undefined;
  }

  public getPieceAtPrecise(position: Position): Piece | undefined {
    const piece = findPieceAtPrecise(this.pieces, position);
    return piece ? clonePiece(piece) : undefined;
  }

  // ===========================================================================
  // Move engine
  // ===========================================================================

  public isLegalMove(from: Position, to: Position): boolean {
    return checkMove(this.pieces, from, to).legal;
  }

  /**
   * Move the piece covering `from` one step towards `to`. Illegal requests
   * leave the board untouched and return false.
   */
  public applyAction(from: Position, to: Position): boolean {
    const check = checkMove(this.pieces, from, to);
    if (!check.legal) {
      return false;
    }

    const { piece, destination } = check;
    this.moveHistory.push({
      pieceId: piece.id,
      from: { ...piece.position },
      to: { ...destination },
    });
    piece.position = destination;
    this.moveCount++;
    this.redoMoves = [];
    return true;
  }

  /**
   * Slide the most recently moved piece back. Returns false when there is
   * nothing to undo or the board no longer matches the last history entry.
   */
  public undo(): boolean {
    const last = this.moveHistory[this.moveHistory.length - 1];
    if (!last || !this.stepPiece(last.pieceId, last.to, last.from)) {
      return false;
    }
    this.moveHistory.pop();
    this.redoMoves.push(last);
    return true;
  }

  /** Re-apply the most recently undone step. */
  public redo(): boolean {
    const next = this.redoMoves[this.redoMoves.length - 1];
    if (!next || !this.stepPiece(next.pieceId, next.from, next.to)) {
      return false;
    }
    this.redoMoves.pop();
    this.moveHistory.push(next);
    return true;
  }

  public canUndo(): boolean {
    return this.moveHistory.length > 0;
  }

  public canRedo(): boolean {
    return this.redoMoves.length > 0;
  }

  /** Move piece `pieceId` from top-left `from` to `to` if that step is legal. */
  private stepPiece(pieceId: number, from: Position, to: Position): boolean {
    const check = checkMove(this.pieces, from, to);
    if (!check.legal || check.piece.id !== pieceId || !positionsEqual(check.piece.position, from)) {
      return false;
    }
    check.piece.position = check.destination;
    this.moveCount++;
    return true;
  }

  /**
   * Legal destinations for the piece covering `position`, or null when
   * there is no piece, it is off the board, or it is the blocked piece.
   */
  public getLegalMovesForPiece(position: Position): Position[] | null {
    return enumerateMovesForPiece(this.pieces, position, this.blocked);
  }

  public getLegalMovesByDirection(direction: Direction | Position): Move[] {
    return enumerateMovesByDirection(this.pieces, direction);
  }

  public getLegalMoves(): Move[] {
    return enumerateLegalMoves(this.pieces);
  }

  public isTerminal(): boolean {
    return isTerminalLayout(this.pieces);
  }

  public getMoveCount(): number {
    return this.moveCount;
  }

  public getMoveHistory(): PieceMove[] {
    return copyMoves(this.moveHistory);
  }

  public getRedoMoves(): PieceMove[] {
    return copyMoves(this.redoMoves);
  }

  // ===========================================================================
  // Shuffling
  // ===========================================================================

  /**
   * Random walk of up to {@link SHUFFLE_STEPS} legal moves. Each step counts
   * as a move. Returns the number of steps taken, which is lower only when
   * the board has no legal move left.
   */
  public randomShuffle(seed?: number): number {
    const effectiveSeed = seed ?? generateGameSeed();
    const rng = new SeededRNG(effectiveSeed);

    let steps = 0;
    while (steps < SHUFFLE_STEPS) {
      const moves = this.getLegalMoves();
      if (moves.length === 0) break;
      const move = moves[rng.nextInt(moves.length)];
      this.applyAction(move.from, move.to);
      steps++;
    }

    getEngineLogger()?.info('Board shuffled', {
      variant: this.variantId,
      seed: effectiveSeed,
      steps,
    });
    return steps;
  }

  // ===========================================================================
  // Serialization
  // ===========================================================================

  public toString(): string {
    return boardToString(this.pieces);
  }

  /**
   * Load piece positions from board text. Pieces whose top-left cell still
   * holds their kind keep their id, so the blocked piece stays blocked when
   * it has not moved; moved pieces of one kind may trade ids. Move count and
   * history are kept, pending redo steps are dropped. Throws
   * BoardFormatError and leaves the board unchanged on malformed text.
   */
  public fromString(text: string): void {
    const positions = parseBoardString(text, this.pieces);
    this.pieces = this.pieces.map((piece, index) => ({
      ...piece,
      position: positions[index],
    }));
    this.redoMoves = [];
  }

  // ===========================================================================
  // Solving
  // ===========================================================================

  public solve(options: { maxStates?: number } = {}): SolveResult {
    return solvePuzzle(this.pieces, { blockedId: this.blocked, maxStates: options.maxStates });
  }

  /** First step of a shortest solution, or null when none is found. */
  public getHint(options: { maxStates?: number } = {}): PieceMove | null {
    const { solution } = this.solve(options);
    return solution && solution.length > 0 ? solution[0] : null;
  }

  // ===========================================================================
  // Copies
  // ===========================================================================

  public clone(): KlotskiGame {
    return KlotskiGame.fromSnapshot(this.toSnapshot());
  }

  public toSnapshot(): KlotskiGameSnapshot {
    return {
      variant: this.variantId,
      blockedId: this.blocked,
      pieces: this.getPieces(),
      moveCount: this.moveCount,
      moveHistory: this.getMoveHistory(),
      redoMoves: this.getRedoMoves(),
    };
  }

  public static fromSnapshot(snapshot: KlotskiGameSnapshot): KlotskiGame {
    const game = new KlotskiGame(snapshot.variant);
    game.setPieces(snapshot.pieces);
    game.setBlockedId(snapshot.blockedId);
    game.restoreProgress(snapshot.moveCount, snapshot.moveHistory, snapshot.redoMoves);
    return game;
  }

  /** Overwrite move count, history and redo steps, as when resuming a saved game. */
  public restoreProgress(
    moveCount: number,
    moveHistory: readonly PieceMove[],
    redoMoves: readonly PieceMove[] = []
  ): void {
    this.moveCount = moveCount;
    this.moveHistory = copyMoves(moveHistory);
    this.redoMoves = copyMoves(redoMoves);
  }
}
