import { KlotskiGame } from '../shared/engine/KlotskiGame';
import { isPiecePlaced } from '../shared/engine/core';
import { createSaveRecord, restoreSaveRecord } from '../shared/engine/saveRecord';
import { formatMoveList, formatPieceMove, formatPosition } from '../shared/engine/notation';
import { listVariants } from '../shared/engine/variants';
import { NO_BLOCKED_PIECE, Position, positionsEqual } from '../shared/types/puzzle';
import { generateGameSeed } from '../shared/utils/rng';
import { readSaveFile, resolveSavePath, writeSaveFile } from './persistence/saveStore';

export const COMMANDS = [
  'show',
  'moves',
  'move',
  'undo',
  'redo',
  'restart',
  'variants',
  'shuffle',
  'solve',
  'hint',
  'save',
  'load',
  'help',
] as const;
export type CommandName = (typeof COMMANDS)[number];

export interface CliArgs {
  command: CommandName;
  variant?: string;
  seed?: number;
  /** Board text with rows separated by "/" or newlines. */
  board?: string;
  file?: string;
  blocked?: number;
  maxStates?: number;
  from?: Position;
  to?: Position;
}

export const USAGE = [
  'Usage: klotski <command> [options]',
  '',
  'Commands:',
  '  show       Print the board',
  '  moves      List the legal single-step moves of every unblocked piece',
  '  move       Move the piece at --from (to --to when it has several moves)',
  '  undo       Take back the last move of a save file (--file)',
  '  redo       Replay the last undone move of a save file (--file)',
  '  restart    Reset a save file to its variant\'s starting layout (--file)',
  '  variants   List the level variants',
  '  shuffle    Scramble the board with a random walk',
  '  solve      Print a shortest solution',
  '  hint       Print the next step of a shortest solution',
  '  save       Write the board to a save file (--file)',
  '  load       Read and print a save file (--file)',
  '  help       Print this message',
  '',
  'Options:',
  '  --variant <id|index>   Starting layout',
  '  --seed <n>             Shuffle seed (shuffle, save)',
  '  --board <text>         Board text, rows separated by "/"',
  '  --file <path>          Save file; relative paths use KLOTSKI_SAVE_DIR',
  '  --blocked <id>         Piece that may not move (-1 for none)',
  '  --max-states <n>       Solver state cap',
  '  --from <row,col>       Cell of the piece to move',
  '  --to <row,col>         Target cell, one step from --from',
].join('\n');

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
    Object.setPrototypeOf(this, CliUsageError.prototype);
  }
}

function isCommandName(value: string): value is CommandName {
  return (COMMANDS as readonly string[]).includes(value);
}

function parseInteger(flag: string, value: string, min: number): number {
  if (!/^-?\d+$/.test(value)) {
    throw new CliUsageError(`Invalid ${flag} value: ${value}`);
  }
  const parsed = Number.parseInt(value, 10);
  if (parsed < min) {
    throw new CliUsageError(`Invalid ${flag} value: ${value}`);
  }
  return parsed;
}

function parsePosition(flag: string, value: string): Position {
  const match = /^(\d+),(\d+)$/.exec(value);
  if (!match) {
    throw new CliUsageError(`Invalid ${flag} value: ${value}`);
  }
  return { row: Number.parseInt(match[1], 10), col: Number.parseInt(match[2], 10) };
}

/**
 * Parse command-line arguments (without the node and script entries).
 * Flags take a value either as `--flag value` or `--flag=value`.
 * @throws CliUsageError on unknown commands, unknown flags or bad values
 */
export function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { command: 'show' };
  let commandSeen = false;

  for (let i = 0; i < argv.length; i += 1) {
    const raw = argv[i];

    if (!raw.startsWith('--')) {
      if (commandSeen) {
        throw new CliUsageError(`Unexpected argument: ${raw}`);
      }
      if (!isCommandName(raw)) {
        throw new CliUsageError(`Unknown command: ${raw}`);
      }
      args.command = raw;
      commandSeen = true;
      continue;
    }

    const eq = raw.indexOf('=');
    const flag = eq === -1 ? raw : raw.slice(0, eq);
    let value: string | undefined;
    if (eq !== -1) {
      value = raw.slice(eq + 1);
    } else if (i + 1 < argv.length) {
      value = argv[i + 1];
      i += 1;
    }
    if (value === undefined || value === '') {
      throw new CliUsageError(`Missing value for ${flag}`);
    }

    switch (flag) {
      case '--variant':
        args.variant = value;
        break;
      case '--seed':
        args.seed = parseInteger(flag, value, 0);
        break;
      case '--board':
        args.board = value;
        break;
      case '--file':
        args.file = value;
        break;
      case '--blocked':
        args.blocked = parseInteger(flag, value, NO_BLOCKED_PIECE);
        break;
      case '--max-states':
        args.maxStates = parseInteger(flag, value, 1);
        break;
      case '--from':
        args.from = parsePosition(flag, value);
        break;
      case '--to':
        args.to = parsePosition(flag, value);
        break;
      default:
        throw new CliUsageError(`Unknown option: ${flag}`);
    }
  }

  return args;
}

export interface CommandContext {
  saveDirectory: string;
  defaultVariant: string;
  solverMaxStates: number;
  out: (line: string) => void;
  now?: () => Date;
}

/** Board text as typed on a command line: "/" stands for a line break. */
export function boardArgToText(board: string): string {
  return board.split('/').join('\n');
}

function boardLines(game: KlotskiGame): string[] {
  return game
    .toString()
    .split('\n')
    .filter((line) => line.length > 0)
    .map((line) => line.trimEnd());
}

function blockedLabel(game: KlotskiGame): string {
  if (game.blockedId === NO_BLOCKED_PIECE) {
    return 'none';
  }
  return game.getPieces().find((piece) => piece.id === game.blockedId)?.name ?? `#${game.blockedId}`;
}

function buildGame(args: CliArgs, ctx: CommandContext): KlotskiGame {
  const game = new KlotskiGame(args.variant ?? ctx.defaultVariant);
  if (args.board !== undefined) {
    game.fromString(boardArgToText(args.board));
  }
  if (args.blocked !== undefined) {
    game.setBlockedId(args.blocked);
  }
  return game;
}

function printGame(game: KlotskiGame, ctx: CommandContext): void {
  for (const line of boardLines(game)) {
    ctx.out(line);
  }
  ctx.out(`Variant: ${game.variant}`);
  ctx.out(`Blocked piece: ${blockedLabel(game)}`);
  ctx.out(`Moves: ${game.getMoveCount()}`);
  ctx.out(`Solved: ${game.isTerminal() ? 'yes' : 'no'}`);
}

function requireFile(args: CliArgs): string {
  if (!args.file) {
    throw new CliUsageError(`The ${args.command} command requires --file`);
  }
  return args.file;
}

function pieceName(game: KlotskiGame, at: Position): string {
  return game.getPieceAt(at)?.name ?? '?';
}

interface LoadedGame {
  game: KlotskiGame;
  /** Save file the game came from, written back after a change. */
  filePath?: string;
  elapsedSeconds: number;
}

/** The game a save file holds when --file is given, otherwise one built from the flags. */
function openGame(args: CliArgs, ctx: CommandContext): LoadedGame {
  if (!args.file) {
    return { game: buildGame(args, ctx), elapsedSeconds: 0 };
  }
  if (args.board !== undefined) {
    throw new CliUsageError('Use either --file or --board, not both');
  }
  const filePath = resolveSavePath(args.file, ctx.saveDirectory);
  const record = readSaveFile(filePath);
  const game = restoreSaveRecord(record);
  if (args.blocked !== undefined) {
    game.setBlockedId(args.blocked);
  }
  return { game, filePath, elapsedSeconds: record.elapsedSeconds };
}

function finishTurn(loaded: LoadedGame, ctx: CommandContext): void {
  printGame(loaded.game, ctx);
  if (loaded.filePath !== undefined) {
    const savedAt = ctx.now ? ctx.now() : new Date();
    writeSaveFile(
      loaded.filePath,
      createSaveRecord(loaded.game, { elapsedSeconds: loaded.elapsedSeconds, savedAt })
    );
    ctx.out(`Saved to ${loaded.filePath}`);
  }
}

function runMove(args: CliArgs, ctx: CommandContext): number {
  if (!args.from) {
    throw new CliUsageError('The move command requires --from');
  }
  const from = args.from;
  const loaded = openGame(args, ctx);
  const { game } = loaded;

  const destinations = game.getLegalMovesForPiece(from);
  if (destinations === null) {
    const piece = game.getPieceAt(from);
    ctx.out(
      piece && piece.id === game.blockedId
        ? `${piece.name} is blocked.`
        : `No piece at ${formatPosition(from)}.`
    );
    return 1;
  }

  const name = pieceName(game, from);
  let target: Position;
  if (args.to) {
    const requested = args.to;
    if (!destinations.some((cell) => positionsEqual(cell, requested))) {
      ctx.out(`Illegal move from ${formatPosition(from)} to ${formatPosition(requested)}.`);
      return 1;
    }
    target = requested;
  } else if (destinations.length === 1) {
    target = destinations[0];
  } else if (destinations.length === 0) {
    ctx.out(`No legal moves for ${name} at ${formatPosition(from)}.`);
    return 1;
  } else {
    ctx.out(`Several moves possible for ${name}; pick one with --to:`);
    for (const cell of destinations) {
      ctx.out(`  -> ${formatPosition(cell)}`);
    }
    return 1;
  }

  game.applyAction(from, target);
  ctx.out(`Moved ${name} from ${formatPosition(from)} to ${formatPosition(target)}`);
  finishTurn(loaded, ctx);
  return 0;
}

function runHistoryStep(args: CliArgs, ctx: CommandContext, direction: 'undo' | 'redo'): number {
  requireFile(args);
  const loaded = openGame(args, ctx);
  const { game } = loaded;

  const pending = direction === 'undo' ? game.getMoveHistory() : game.getRedoMoves();
  const step = pending[pending.length - 1];
  const done = direction === 'undo' ? game.undo() : game.redo();
  if (!step || !done) {
    ctx.out(direction === 'undo' ? 'Nothing to undo.' : 'Nothing to redo.');
    return 1;
  }

  ctx.out(`${direction === 'undo' ? 'Undid' : 'Redid'}: ${formatPieceMove(step, game.getPieces())}`);
  finishTurn(loaded, ctx);
  return 0;
}

/**
 * Run one parsed command. Returns the process exit code; engine errors
 * propagate to the caller.
 */
export function runCommand(args: CliArgs, ctx: CommandContext): number {
  switch (args.command) {
    case 'help':
      ctx.out(USAGE);
      return 0;

    case 'variants':
      listVariants().forEach((variant, index) => {
        const blocked =
          variant.blockedId === NO_BLOCKED_PIECE ? 'no blocked piece' : `blocked piece ${variant.blockedId}`;
        ctx.out(`${index}. ${variant.id} - ${variant.label} (${blocked})`);
      });
      return 0;

    case 'show':
      printGame(buildGame(args, ctx), ctx);
      return 0;

    case 'moves': {
      const { game } = openGame(args, ctx);
      let listed = 0;
      for (const piece of game.getPieces()) {
        if (!isPiecePlaced(piece)) continue;
        for (const to of game.getLegalMovesForPiece(piece.position) ?? []) {
          ctx.out(`${piece.name}: ${formatPosition(piece.position)} -> ${formatPosition(to)}`);
          listed++;
        }
      }
      if (listed === 0) {
        ctx.out('No legal moves.');
      }
      return 0;
    }

    case 'move':
      return runMove(args, ctx);

    case 'undo':
    case 'redo':
      return runHistoryStep(args, ctx, args.command);

    case 'restart': {
      const filePath = resolveSavePath(requireFile(args), ctx.saveDirectory);
      const record = readSaveFile(filePath);
      const game = new KlotskiGame(record.variant);
      if (args.blocked !== undefined) {
        game.setBlockedId(args.blocked);
      }
      ctx.out(`Restarted ${game.variant}`);
      finishTurn({ game, filePath, elapsedSeconds: 0 }, ctx);
      return 0;
    }

    case 'shuffle': {
      const game = buildGame(args, ctx);
      const seed = args.seed ?? generateGameSeed();
      const steps = game.randomShuffle(seed);
      ctx.out(`Shuffled ${steps} steps with seed ${seed}`);
      for (const line of boardLines(game)) {
        ctx.out(line);
      }
      return 0;
    }

    case 'solve': {
      const game = buildGame(args, ctx);
      const result = game.solve({ maxStates: args.maxStates ?? ctx.solverMaxStates });
      if (!result.solution) {
        const reason = result.truncated ? 'state limit reached' : 'no solution exists';
        ctx.out(`No solution found (${reason}, ${result.statesVisited} states visited)`);
        return 1;
      }
      ctx.out(`Solution in ${result.solution.length} moves (${result.statesVisited} states visited)`);
      for (const line of formatMoveList(result.solution, game.getPieces())) {
        ctx.out(line);
      }
      return 0;
    }

    case 'hint': {
      const game = buildGame(args, ctx);
      if (game.isTerminal()) {
        ctx.out('Already solved.');
        return 0;
      }
      const hint = game.getHint({ maxStates: args.maxStates ?? ctx.solverMaxStates });
      if (!hint) {
        ctx.out('No hint available.');
        return 1;
      }
      ctx.out(`Hint: ${formatPieceMove(hint, game.getPieces())}`);
      return 0;
    }

    case 'save': {
      const filePath = resolveSavePath(requireFile(args), ctx.saveDirectory);
      const game = buildGame(args, ctx);
      if (args.seed !== undefined) {
        game.randomShuffle(args.seed);
      }
      const savedAt = ctx.now ? ctx.now() : new Date();
      writeSaveFile(filePath, createSaveRecord(game, { savedAt }));
      ctx.out(`Saved to ${filePath}`);
      return 0;
    }

    case 'load': {
      const filePath = resolveSavePath(requireFile(args), ctx.saveDirectory);
      const record = readSaveFile(filePath);
      const game = restoreSaveRecord(record);
      printGame(game, ctx);
      ctx.out(`Saved at: ${record.savedAt}`);
      return 0;
    }
  }
}
