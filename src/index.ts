// src/index.ts
import { lex } from './lexer.js';
import { resolve } from './resolver.js';
import { Interpreter } from './interpreter.js';
import { ByteIO, StdIO } from './io.js';
import { BfError } from './errors.js';
import { Result, andThen } from './result.js';

export { OpType, CharCode, NO_JUMP } from './types.js';
export type { Program, ResolvedProgram } from './types.js';
export { lex, render } from './lexer.js';
export { resolve } from './resolver.js';
export { Tape } from './tape.js';
export { Interpreter } from './interpreter.js';
export { StdIO, MemoryIO } from './io.js';
export type { ByteIO } from './io.js';
export { ErrorCode, formatError } from './errors.js';
export type { BfError } from './errors.js';
export { isOk, isErr } from './result.js';
export type { Result, Ok, Err } from './result.js';

/** Lex, resolve and execute a program. Nothing runs if resolution fails. */
export const run = (
    source: string | Uint8Array,
    io: ByteIO = new StdIO()
): Result<void, BfError> =>
    andThen(resolve(lex(source)), prog => new Interpreter(prog, io).run());
