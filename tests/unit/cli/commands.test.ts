import fs from 'fs';
import os from 'os';
import path from 'path';

import {
  CliUsageError,
  USAGE,
  boardArgToText,
  parseArgs,
  runCommand,
  type CliArgs,
  type CommandContext,
} from '../../../src/cli/commands';
import { BoardFormatError } from '../../../src/shared/engine/errors';

// Full searches visit tens of thousands of states.
jest.setTimeout(60000);

const SOLVED_BOARD = 'G G S S/G G G G/Y Y G G/S C C ./S C C .';

function run(args: CliArgs, overrides: Partial<CommandContext> = {}): { code: number; lines: string[] } {
  const lines: string[] = [];
  const code = runCommand(args, {
    saveDirectory: os.tmpdir(),
    defaultVariant: 'classic',
    solverMaxStates: 500000,
    out: (line) => lines.push(line),
    ...overrides,
  });
  return { code, lines };
}

describe('parseArgs', () => {
  it('defaults to the show command', () => {
    expect(parseArgs([])).toEqual({ command: 'show' });
  });

  it('reads flags in both spellings', () => {
    expect(parseArgs(['solve', '--variant', 'enhanced-1', '--max-states=1000'])).toEqual({
      command: 'solve',
      variant: 'enhanced-1',
      maxStates: 1000,
    });
    expect(parseArgs(['--seed', '42', 'shuffle', '--board=G C C G'])).toEqual({
      command: 'shuffle',
      seed: 42,
      board: 'G C C G',
    });
  });

  it('reads board cells for --from and --to', () => {
    expect(parseArgs(['move', '--from', '3,1', '--to=2,1'])).toEqual({
      command: 'move',
      from: { row: 3, col: 1 },
      to: { row: 2, col: 1 },
    });
  });

  it('accepts -1 to clear the blocked piece', () => {
    expect(parseArgs(['show', '--blocked', '-1'])).toEqual({ command: 'show', blocked: -1 });
  });

  it.each([
    [['dance'], 'Unknown command: dance'],
    [['show', 'extra'], 'Unexpected argument: extra'],
    [['--variant'], 'Missing value for --variant'],
    [['--seed', 'abc'], 'Invalid --seed value: abc'],
    [['--seed', '-3'], 'Invalid --seed value: -3'],
    [['--max-states', '0'], 'Invalid --max-states value: 0'],
    [['--color', 'red'], 'Unknown option: --color'],
    [['move', '--from', '3-1'], 'Invalid --from value: 3-1'],
    [['move', '--to', '2,'], 'Invalid --to value: 2,'],
  ])('rejects %j', (argv, message) => {
    expect(() => parseArgs(argv)).toThrow(CliUsageError);
    expect(() => parseArgs(argv)).toThrow(message);
  });
});

describe('runCommand', () => {
  it('prints usage', () => {
    expect(run({ command: 'help' }).lines).toEqual([USAGE]);
  });

  it('shows the starting board', () => {
    expect(run({ command: 'show' })).toEqual({
      code: 0,
      lines: [
        'G C C G',
        'G C C G',
        'G . . G',
        'G Y Y G',
        'S S S S',
        'Variant: classic',
        'Blocked piece: none',
        'Moves: 0',
        'Solved: no',
      ],
    });
  });

  it('names the blocked piece and honours the default variant', () => {
    const { lines } = run({ command: 'show' }, { defaultVariant: 'enhanced-1' });
    expect(lines.slice(5, 7)).toEqual(['Variant: enhanced-1', 'Blocked piece: General 2']);

    const cleared = run({ command: 'show', variant: 'enhanced-1', blocked: -1 });
    expect(cleared.lines[6]).toBe('Blocked piece: none');
  });

  it('accepts a board given on the command line', () => {
    expect(boardArgToText(SOLVED_BOARD)).toBe('G G S S\nG G G G\nY Y G G\nS C C .\nS C C .');

    const { lines } = run({ command: 'show', board: SOLVED_BOARD });
    expect(lines[0]).toBe('G G S S');
    expect(lines[8]).toBe('Solved: yes');
  });

  it('propagates malformed boards', () => {
    expect(() => run({ command: 'show', board: 'G C C G' })).toThrow(BoardFormatError);
  });

  it('lists legal moves with piece names', () => {
    expect(run({ command: 'moves' }).lines).toEqual(['Cao Cao: (0,1) -> (1,1)', 'Guan Yu: (3,1) -> (2,1)']);
  });

  it('leaves the blocked piece out of the move list', () => {
    expect(run({ command: 'moves', variant: 'enhanced-1' }).lines).toEqual([
      'Cao Cao: (0,1) -> (1,1)',
      'Guan Yu: (3,1) -> (2,1)',
      'Guan Yu: (3,1) -> (3,2)',
      'Soldier 3: (4,2) -> (4,3)',
    ]);
  });

  describe('move', () => {
    it('makes the only legal move of a piece', () => {
      expect(run({ command: 'move', from: { row: 3, col: 1 } })).toEqual({
        code: 0,
        lines: [
          'Moved Guan Yu from (3,1) to (2,1)',
          'G C C G',
          'G C C G',
          'G Y Y G',
          'G . . G',
          'S S S S',
          'Variant: classic',
          'Blocked piece: none',
          'Moves: 1',
          'Solved: no',
        ],
      });
    });

    it('asks for --to when a piece has several moves', () => {
      expect(run({ command: 'move', variant: 'enhanced-1', from: { row: 3, col: 1 } })).toEqual({
        code: 1,
        lines: ['Several moves possible for Guan Yu; pick one with --to:', '  -> (2,1)', '  -> (3,2)'],
      });

      const moved = run({
        command: 'move',
        variant: 'enhanced-1',
        from: { row: 3, col: 1 },
        to: { row: 3, col: 2 },
      });
      expect(moved.code).toBe(0);
      expect(moved.lines.slice(0, 6)).toEqual([
        'Moved Guan Yu from (3,1) to (3,2)',
        'G C C G',
        'G C C G',
        'G . . .',
        'G . Y Y',
        'S S S .',
      ]);
    });

    it('rejects targets the piece cannot reach', () => {
      const args: CliArgs = {
        command: 'move',
        variant: 'enhanced-1',
        from: { row: 3, col: 1 },
        to: { row: 1, col: 1 },
      };
      expect(run(args)).toEqual({ code: 1, lines: ['Illegal move from (3,1) to (1,1).'] });
    });

    it('refuses to move the blocked piece', () => {
      expect(run({ command: 'move', variant: 'enhanced-1', from: { row: 1, col: 3 } })).toEqual({
        code: 1,
        lines: ['General 2 is blocked.'],
      });
    });

    it('reports empty cells and stuck pieces', () => {
      expect(run({ command: 'move', from: { row: 2, col: 1 } }).lines).toEqual(['No piece at (2,1).']);
      expect(run({ command: 'move', from: { row: 4, col: 0 } }).lines).toEqual([
        'No legal moves for Soldier 1 at (4,0).',
      ]);
    });

    it('reports a win', () => {
      const { lines } = run({
        command: 'move',
        board: 'G G S S/G G G G/Y Y G G/S . C C/S . C C',
        from: { row: 3, col: 2 },
      });
      expect(lines[0]).toBe('Moved Cao Cao from (3,2) to (3,1)');
      expect(lines.slice(1, 6)).toEqual(['G G S S', 'G G G G', 'Y Y G G', 'S C C .', 'S C C .']);
      expect(lines[9]).toBe('Solved: yes');
    });

    it('requires --from', () => {
      expect(() => run({ command: 'move' })).toThrow('The move command requires --from');
    });
  });


  it('lists variants', () => {
    const { lines } = run({ command: 'variants' });
    expect(lines).toHaveLength(6);
    expect(lines[0]).toBe('0. classic - Classic (no blocked piece)');
    expect(lines[1]).toBe('1. enhanced-1 - Blocked Level 1 (blocked piece 3)');
  });

  it('shuffles with a seed', () => {
    expect(run({ command: 'shuffle', seed: 42 }).lines).toEqual([
      'Shuffled 100 steps with seed 42',
      'G C C G',
      'G C C G',
      'G Y Y G',
      'G S S G',
      '. S . S',
    ]);
  });

  it('prints a numbered solution', () => {
    const { code, lines } = run({ command: 'solve', variant: 'enhanced-1' });
    expect(code).toBe(0);
    expect(lines[0]).toBe('Solution in 23 moves (23528 states visited)');
    expect(lines[1]).toBe('1. Move Cao Cao from (0,1) to (1,1)');
    expect(lines).toHaveLength(24);
  });

  it('fails when the state cap stops the search', () => {
    expect(run({ command: 'solve', maxStates: 10 })).toEqual({
      code: 1,
      lines: ['No solution found (state limit reached, 10 states visited)'],
    });
  });

  it('gives hints', () => {
    expect(run({ command: 'hint' }).lines).toEqual(['Hint: Move Guan Yu from (3,1) to (2,1)']);
    expect(run({ command: 'hint', board: SOLVED_BOARD }).lines).toEqual(['Already solved.']);
    expect(run({ command: 'hint' }, { solverMaxStates: 3 })).toEqual({
      code: 1,
      lines: ['No hint available.'],
    });
  });

  describe('save and load', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'klotski-cli-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('writes a shuffled game and loads it back', () => {
      const now = () => new Date('2024-01-02T03:04:05.000Z');
      const saved = run({ command: 'save', file: 'slot1', seed: 42 }, { saveDirectory: dir, now });
      expect(saved.lines).toEqual([`Saved to ${path.join(dir, 'slot1.json')}`]);

      const loaded = run({ command: 'load', file: 'slot1' }, { saveDirectory: dir });
      expect(loaded.lines).toEqual([
        'G C C G',
        'G C C G',
        'G Y Y G',
        'G S S G',
        '. S . S',
        'Variant: classic',
        'Blocked piece: none',
        'Moves: 100',
        'Solved: no',
        'Saved at: 2024-01-02T03:04:05.000Z',
      ]);
    });

    it('requires --file', () => {
      expect(() => run({ command: 'save' }, { saveDirectory: dir })).toThrow(
        'The save command requires --file'
      );
      expect(() => run({ command: 'load' }, { saveDirectory: dir })).toThrow(CliUsageError);
      expect(() => run({ command: 'undo' }, { saveDirectory: dir })).toThrow(
        'The undo command requires --file'
      );
      expect(() => run({ command: 'restart' }, { saveDirectory: dir })).toThrow(CliUsageError);
    });

    it('plays, undoes, redoes and restarts a saved game', () => {
      const context = { saveDirectory: dir, now: () => new Date('2024-01-02T03:04:05.000Z') };
      const saved = path.join(dir, 'slot2.json');
      run({ command: 'save', file: 'slot2' }, context);

      const moved = run({ command: 'move', file: 'slot2', from: { row: 3, col: 1 } }, context);
      expect(moved.lines[0]).toBe('Moved Guan Yu from (3,1) to (2,1)');
      expect(moved.lines[moved.lines.length - 1]).toBe(`Saved to ${saved}`);

      const undone = run({ command: 'undo', file: 'slot2' }, context);
      expect(undone.lines).toEqual([
        'Undid: Move Guan Yu from (3,1) to (2,1)',
        'G C C G',
        'G C C G',
        'G . . G',
        'G Y Y G',
        'S S S S',
        'Variant: classic',
        'Blocked piece: none',
        'Moves: 2',
        'Solved: no',
        `Saved to ${saved}`,
      ]);

      const redone = run({ command: 'redo', file: 'slot2' }, context);
      expect(redone.lines[0]).toBe('Redid: Move Guan Yu from (3,1) to (2,1)');
      expect(redone.lines[8]).toBe('Moves: 3');
      expect(run({ command: 'redo', file: 'slot2' }, context)).toEqual({ code: 1, lines: ['Nothing to redo.'] });

      const restarted = run({ command: 'restart', file: 'slot2' }, context);
      expect(restarted.lines[0]).toBe('Restarted classic');
      expect(restarted.lines.slice(1, 6)).toEqual(['G C C G', 'G C C G', 'G . . G', 'G Y Y G', 'S S S S']);
      expect(restarted.lines[8]).toBe('Moves: 0');
      expect(run({ command: 'undo', file: 'slot2' }, context)).toEqual({ code: 1, lines: ['Nothing to undo.'] });
    });

    it('does not mix a save file with a board argument', () => {
      const args: CliArgs = { command: 'move', file: 'slot3', board: SOLVED_BOARD, from: { row: 0, col: 0 } };
      expect(() => run(args, { saveDirectory: dir })).toThrow('Use either --file or --board, not both');
    });
  });
});
