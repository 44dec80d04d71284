import { describe, it, expect } from 'vitest';
import {
  DeckError,
  ERROR_HINTS,
  createDeckError,
  getExitCode,
  isDeckError,
  wrapError,
} from '../error/deck-error.js';

describe('DeckError', () => {
  it('should create error with code and message', () => {
    const error = new DeckError('DECK_TEST', 'Test error message');

    expect(error.name).toBe('DeckError');
    expect(error.code).toBe('DECK_TEST');
    expect(error.message).toBe('Test error message');
    expect(error.hint).toBeUndefined();
    expect(error.meta).toBeUndefined();
  });

  it('should attach the standard hint', () => {
    const error = createDeckError('DECK_MISSING_SLIDE', 'gone', { name: 'a.md' });

    expect(error.hint).toBe(ERROR_HINTS.DECK_MISSING_SLIDE);
    expect(error.meta).toEqual({ name: 'a.md' });
  });

  it('should map error codes to exit codes', () => {
    expect(getExitCode(createDeckError('DECK_BAD_ARGS', 'args'))).toBe(2);
    expect(getExitCode(createDeckError('DECK_CONFIG_PARSE_ERROR', 'yaml'))).toBe(2);
    expect(getExitCode(createDeckError('DECK_MISSING_SLIDE', 'gone'))).toBe(1);
    expect(getExitCode(createDeckError('DECK_WRITE_ERROR', 'disk'))).toBe(1);
    expect(getExitCode(new DeckError('UNKNOWN', 'Unknown'))).toBe(1);
  });

  it('should wrap foreign errors and pass DeckErrors through', () => {
    const original = createDeckError('DECK_WRITE_ERROR', 'disk');

    expect(wrapError(original)).toBe(original);
    expect(wrapError(new Error('boom'), 'DECK_BAD_ARGS')).toMatchObject({ code: 'DECK_BAD_ARGS', message: 'boom' });
    expect(wrapError('plain')).toMatchObject({ code: 'DECK_READ_ERROR', message: 'plain' });
  });

  it('should narrow with isDeckError', () => {
    expect(isDeckError(createDeckError('DECK_READ_ERROR', 'x'))).toBe(true);
    expect(isDeckError(new Error('x'))).toBe(false);
  });
});
