/**
 * @module @deckwright/core/error
 * Standardized error class for deckwright
 */

export class DeckError extends Error {
  constructor(
    public code: string,
    message: string,
    public hint?: string,
    public meta?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DeckError';
  }
}

/**
 * Error codes with their standard hints
 */
export const ERROR_HINTS = {
  DECK_NOT_A_DIRECTORY: 'Slide directory does not exist or is not a directory - check the path',
  DECK_EMPTY_DIRECTORY: 'No markdown slides found - the deck will contain no sections',
  DECK_MISSING_SLIDE: 'A listed slide file does not exist - fix include_files or slide_dir',
  DECK_READ_ERROR: 'Slide file could not be read - check permissions and encoding',
  DECK_WRITE_ERROR: 'Output document could not be written - check the output directory',
  DECK_CONFIG_PARSE_ERROR: 'Config file is invalid - check YAML syntax and required fields',
  DECK_TEMPLATE_MISSING_PLACEHOLDER: 'Template has no {{ slides }} placeholder - add one where slides belong',
  DECK_TEMPLATE_NOT_FOUND: 'Template file does not exist or is not a file - check template path',
  DECK_MISSING_RESOURCE: 'A slide references a local file that does not exist',
  DECK_BAD_ARGS: 'Invalid command line arguments - run with --help',
} as const;

export type ErrorCode = keyof typeof ERROR_HINTS;

/**
 * Maps DeckError codes to CLI exit codes
 */
export function getExitCode(err: DeckError): number {
  if (err.code === 'DECK_BAD_ARGS') {return 2;}
  if (err.code === 'DECK_CONFIG_PARSE_ERROR') {return 2;}
  return 1;
}

/**
 * Create a DeckError with standardized code and hint
 */
export function createDeckError(
  code: ErrorCode,
  message: string,
  meta?: Record<string, unknown>
): DeckError {
  return new DeckError(code, message, ERROR_HINTS[code], meta);
}

/**
 * Create a DeckError from a generic error
 */
export function wrapError(error: unknown, code: ErrorCode = 'DECK_READ_ERROR'): DeckError {
  if (error instanceof DeckError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  return createDeckError(code, message, { originalError: error });
}

/**
 * Check if an error is a DeckError
 */
export function isDeckError(error: unknown): error is DeckError {
  return error instanceof DeckError;
}

/**
 * Extract the message of an unknown thrown value
 */
export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
