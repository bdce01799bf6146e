/**
 * Error catalog for the interpreter. Every failure is fatal to the run;
 * callers get one of these back instead of an exception.
 */

export enum ErrorCode {
  MISSING_FILENAME = 'MISSING_FILENAME',
  SOURCE_LOAD_FAILURE = 'SOURCE_LOAD_FAILURE',
  UNMATCHED_BRACKET = 'UNMATCHED_BRACKET',
  POINTER_UNDERFLOW = 'POINTER_UNDERFLOW',
  INPUT_EXHAUSTED = 'INPUT_EXHAUSTED',
}

export interface BfError {
  readonly code: ErrorCode;
  readonly message: string;
  /** Instruction index the error belongs to, when there is one. */
  readonly index?: number;
}

export const missingFilename = (): BfError => ({
  code: ErrorCode.MISSING_FILENAME,
  message: 'no filename provided',
});

export const sourceLoadFailure = (path: string): BfError => ({
  code: ErrorCode.SOURCE_LOAD_FAILURE,
  message: `failed to load file: ${path}`,
});

export const unmatchedOpen = (index: number): BfError => ({
  code: ErrorCode.UNMATCHED_BRACKET,
  message: `unmatched loop open at index ${index}`,
  index,
});

export const unmatchedClose = (index: number): BfError => ({
  code: ErrorCode.UNMATCHED_BRACKET,
  message: `unmatched loop close at index ${index}`,
  index,
});

export const pointerUnderflow = (index: number): BfError => ({
  code: ErrorCode.POINTER_UNDERFLOW,
  message: `cannot decrement pointer below zero (instruction ${index})`,
  index,
});

export const inputExhausted = (index: number): BfError => ({
  code: ErrorCode.INPUT_EXHAUSTED,
  message: 'input read error',
  index,
});

export const formatError = (error: BfError): string =>
  `Error [${error.code}]: ${error.message}`;
