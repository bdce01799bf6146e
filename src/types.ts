// src/types.ts
export enum OpType {
  RIGHT = 'RIGHT',
  LEFT = 'LEFT',
  ADD = 'ADD',
  SUB = 'SUB',
  OUTPUT = 'OUTPUT',
  INPUT = 'INPUT',
  OPEN = 'OPEN',
  CLOSE = 'CLOSE',
}

export enum CharCode {
  LT = 60,    // '<'
  GT = 62,    // '>'
  ADD = 43,   // '+'
  COMMA = 44, // ','
  SUB = 45,   // '-'
  DOT = 46,   // '.'
  LB = 91,    // '['
  RB = 93     // ']'
}

export type Program = readonly OpType[];

/**
 * A program plus its bracket table. `jumps[i]` holds the index of the
 * partner bracket for a bracket at `i`, and -1 for every other instruction.
 */
export interface ResolvedProgram {
  readonly ops: Program;
  readonly jumps: Int32Array;
}

export const NO_JUMP = -1;
