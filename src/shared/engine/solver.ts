import {
  DIRECTION_DELTAS,
  DIRECTION_ORDER,
  NO_BLOCKED_PIECE,
  Piece,
  PieceMove,
  clonePiece,
  translate,
} from '../types/puzzle';
import { getEngineLogger } from '../utils/engineLogger';
import { isWithinBoard } from './core';
import { isLegalMove, isTerminalLayout } from './movementLogic';
import { boardToString } from './notation';

/**
 * Breadth-first search over board states.
 *
 * States are deduplicated by their board text, so layouts that differ only
 * by swapping two same-kind pieces count once. Successors are generated
 * piece by piece in storage order and direction order within a piece; the
 * first terminal state dequeued therefore yields a shortest solution, and
 * the same input always yields the same solution.
 */

export const DEFAULT_SOLVER_MAX_STATES = 500_000;

export interface SolveOptions {
  /** Piece that may not move. Defaults to none. */
  blockedId?: number;
  /** Stop once this many distinct states have been visited. */
  maxStates?: number;
}

export interface SolveResult {
  /** Shortest list of single steps to a terminal state, or null. */
  solution: PieceMove[] | null;
  /** States taken off the queue and checked for a win. */
  statesExamined: number;
  /** Distinct states discovered, including the start. */
  statesVisited: number;
  elapsedMs: number;
  /** True when the search stopped at `maxStates` before finishing. */
  truncated: boolean;
}

interface SearchNode {
  pieces: Piece[];
  parent: number;
  move: PieceMove | null;
}

function reconstructPath(nodes: readonly SearchNode[], index: number): PieceMove[] {
  const path: PieceMove[] = [];
  let cursor = index;
  while (cursor >= 0) {
    const node = nodes[cursor];
    if (node.move) {
      path.push(node.move);
    }
    cursor = node.parent;
  }
  return path.reverse();
}

export function solvePuzzle(pieces: readonly Piece[], options: SolveOptions = {}): SolveResult {
  const blockedId = options.blockedId ?? NO_BLOCKED_PIECE;
  const maxStates = options.maxStates ?? DEFAULT_SOLVER_MAX_STATES;
  const startedAt = Date.now();

  const start = pieces.map(clonePiece);
  const nodes: SearchNode[] = [{ pieces: start, parent: -1, move: null }];
  const visited = new Set<string>([boardToString(start)]);

  let head = 0;
  let solution: PieceMove[] | null = null;
  let truncated = false;

  search: while (head < nodes.length) {
    const current = head++;
    const state = nodes[current].pieces;

    if (isTerminalLayout(state)) {
      solution = reconstructPath(nodes, current);
      break;
    }

    for (let index = 0; index < state.length; index++) {
      const piece = state[index];
      if (piece.id === blockedId || !isWithinBoard(piece.position)) continue;

      for (const direction of DIRECTION_ORDER) {
        const from = piece.position;
        const to = translate(from, DIRECTION_DELTAS[direction]);
        if (!isLegalMove(state, from, to)) continue;

        const next = state.map(clonePiece);
        next[index].position = to;
        const key = boardToString(next);
        if (visited.has(key)) continue;

        if (visited.size >= maxStates) {
          truncated = true;
          break search;
        }
        visited.add(key);
        nodes.push({
          pieces: next,
          parent: current,
          move: { pieceId: piece.id, from: { ...from }, to },
        });
      }
    }
  }

  const result: SolveResult = {
    solution,
    statesExamined: head,
    statesVisited: visited.size,
    elapsedMs: Date.now() - startedAt,
    truncated,
  };

  getEngineLogger()?.debug('Solver finished', {
    blockedId,
    solved: solution !== null,
    steps: solution?.length ?? null,
    statesExamined: result.statesExamined,
    statesVisited: result.statesVisited,
    elapsedMs: result.elapsedMs,
    truncated,
  });

  return result;
}
