import {
  ErrorHandler,
  FormatError,
  GeometryError,
  InvalidOptionsError,
  UnknownToolError,
} from './error-handler';
import { ErrorCode } from '../types';

describe('ErrorHandler', () => {
  test('should carry the code and tool of an unknown tool', () => {
    const tool = new UnknownToolError('T07');

    expect(tool.code).toBe(ErrorCode.UnknownTool);
    expect(tool.message).toBe('Drill hit references undefined tool T07');
    expect(tool.details).toEqual({ toolCode: 'T07' });
  });

  test('should format errors with their location', () => {
    const error = new UnknownToolError('T05', { source: 'board-PTH.drl', line: 12 });

    expect(error.name).toBe('UnknownToolError');
    expect(ErrorHandler.formatError(error)).toBe(
      '[UNKNOWN_TOOL] Drill hit references undefined tool T05 (board-PTH.drl:12)'
    );
    expect(ErrorHandler.formatError(new FormatError('no format', { source: 'a.gbr' }))).toBe(
      '[FORMAT_ERROR] no format (a.gbr)'
    );
    expect(ErrorHandler.formatError(new Error('plain'))).toBe('plain');
  });

  test('should tell parse failures apart from other errors', () => {
    expect(ErrorHandler.isParseFailure(new FormatError('x'))).toBe(true);
    expect(ErrorHandler.isParseFailure(new UnknownToolError('T01'))).toBe(true);
    expect(ErrorHandler.isParseFailure(new GeometryError('x'))).toBe(false);
    expect(ErrorHandler.isParseFailure(new Error('x'))).toBe(false);
  });

  test('should map invalid options to exit code 2', () => {
    expect(ErrorHandler.exitCodeFor(new InvalidOptionsError('--min must be >= 0.'))).toBe(2);
    expect(ErrorHandler.exitCodeFor(new GeometryError('bad arc'))).toBe(1);
    expect(ErrorHandler.exitCodeFor('boom')).toBe(1);
  });
});
