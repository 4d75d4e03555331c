/**
 * Test suite for src/shared/engine/errors.ts
 */

import {
  BoardFormatError,
  ERROR_CATEGORY_DESCRIPTIONS,
  EngineError,
  EngineErrorCode,
  PieceContractError,
  SaveRecordError,
  VariantNotFoundError,
  isBoardFormatError,
  isEngineError,
  isPieceContractError,
  wrapEngineError,
} from '../../../src/shared/engine/errors';

describe('EngineErrors', () => {
  describe('EngineError base class', () => {
    it('should create an EngineError with all fields', () => {
      const error = new EngineError(
        EngineErrorCode.BOARD_ROW_COUNT,
        'Invalid board height. Expected 5 rows.',
        { rows: 4 },
        'Notation'
      );

      expect(error.code).toBe(EngineErrorCode.BOARD_ROW_COUNT);
      expect(error.message).toBe('Invalid board height. Expected 5 rows.');
      expect(error.context).toEqual({ rows: 4 });
      expect(error.domain).toBe('Notation');
      expect(error.name).toBe('EngineError');
      expect(error.timestamp).toBeInstanceOf(Date);
    });

    it('should use default domain when not specified', () => {
      const error = new EngineError(EngineErrorCode.INTERNAL_ASSERTION_FAILED, 'Assertion failed');

      expect(error.domain).toBe('Engine');
      expect(error.context).toEqual({});
    });

    it('should return category description based on error code prefix', () => {
      expect(new EngineError(EngineErrorCode.BOARD_UNMATCHED_CELL, 'x').category).toBe('Malformed board text');
      expect(new EngineError(EngineErrorCode.PIECES_NULL_ENTRY, 'x').category).toBe(
        'Piece catalogue contract violation'
      );
      expect(new EngineError(EngineErrorCode.VARIANT_UNKNOWN, 'x').category).toBe('Unknown level variant');
      expect(new EngineError(EngineErrorCode.SAVE_INVALID_RECORD, 'x').category).toBe('Invalid save record');
      expect(new EngineError(EngineErrorCode.INTERNAL_ASSERTION_FAILED, 'x').category).toBe(
        'Internal engine error (bug)'
      );
    });

    it('should describe every code prefix', () => {
      for (const code of Object.values(EngineErrorCode)) {
        const prefix = code.split('_')[0] + '_';
        expect(ERROR_CATEGORY_DESCRIPTIONS[prefix]).toBeDefined();
      }
    });

    it('should serialize to JSON correctly', () => {
      const error = new EngineError(
        EngineErrorCode.PIECES_COUNT_MISMATCH,
        'Expected 10 pieces, got 9',
        { expected: 10, actual: 9 },
        'KlotskiGame'
      );

      const json = error.toJSON();

      expect(json.error).toBe(true);
      expect(json.type).toBe('EngineError');
      expect(json.code).toBe(EngineErrorCode.PIECES_COUNT_MISMATCH);
      expect(json.message).toBe('Expected 10 pieces, got 9');
      expect(json.domain).toBe('KlotskiGame');
      expect(json.context).toEqual({ expected: 10, actual: 9 });
      expect(json.category).toBe('Piece catalogue contract violation');
      expect(json.timestamp).toBe(error.timestamp.toISOString());
    });
  });

  describe('specific error classes', () => {
    it('BoardFormatError belongs to the notation domain', () => {
      const error = new BoardFormatError(EngineErrorCode.BOARD_COLUMN_COUNT, 'bad row', { row: 2 });

      expect(error.name).toBe('BoardFormatError');
      expect(error.domain).toBe('Notation');
      expect(error).toBeInstanceOf(EngineError);
      expect(error).toBeInstanceOf(Error);
    });

    it('PieceContractError belongs to the game domain', () => {
      const error = new PieceContractError(EngineErrorCode.PIECES_UNKNOWN_ID, 'Unknown piece id: 42');

      expect(error.name).toBe('PieceContractError');
      expect(error.domain).toBe('KlotskiGame');
      expect(error.context).toEqual({});
    });

    it('VariantNotFoundError carries the selector', () => {
      const error = new VariantNotFoundError(7);

      expect(error.message).toBe('Unknown level variant: 7');
      expect(error.code).toBe(EngineErrorCode.VARIANT_UNKNOWN);
      expect(error.context).toEqual({ selector: 7 });
      expect(error.domain).toBe('Variants');
    });

    it('SaveRecordError always uses the save code', () => {
      const error = new SaveRecordError('Save record failed validation', { issues: [] });

      expect(error.code).toBe(EngineErrorCode.SAVE_INVALID_RECORD);
      expect(error.domain).toBe('SaveRecord');
      expect(error.name).toBe('SaveRecordError');
    });
  });

  describe('type guards', () => {
    it('should identify engine errors by class', () => {
      const format = new BoardFormatError(EngineErrorCode.BOARD_ROW_COUNT, 'rows');
      const contract = new PieceContractError(EngineErrorCode.PIECES_NULL_ENTRY, 'null');

      expect(isEngineError(format)).toBe(true);
      expect(isEngineError(new Error('plain'))).toBe(false);
      expect(isEngineError('string')).toBe(false);
      expect(isBoardFormatError(format)).toBe(true);
      expect(isBoardFormatError(contract)).toBe(false);
      expect(isPieceContractError(contract)).toBe(true);
      expect(isPieceContractError(null)).toBe(false);
    });
  });

  describe('wrapEngineError', () => {
    it('should return engine errors unchanged', () => {
      const original = new VariantNotFoundError('nope');
      expect(wrapEngineError(original)).toBe(original);
    });

    it('should wrap plain errors with their stack', () => {
      const original = new Error('ENOENT: no such file');
      const wrapped = wrapEngineError(original, 'CLI', { file: 'slot.json' });

      expect(wrapped.code).toBe(EngineErrorCode.INTERNAL_ASSERTION_FAILED);
      expect(wrapped.message).toBe('ENOENT: no such file');
      expect(wrapped.domain).toBe('CLI');
      expect(wrapped.context).toEqual({ file: 'slot.json', originalStack: original.stack });
    });

    it('should stringify non-error values', () => {
      const wrapped = wrapEngineError(42);

      expect(wrapped.message).toBe('42');
      expect(wrapped.domain).toBe('Engine');
      expect(wrapped.context).toEqual({ originalStack: undefined });
    });
  });
});
