// src/resolver.ts
import { OpType, Program, ResolvedProgram, NO_JUMP } from './types.js';
import { BfError, unmatchedOpen, unmatchedClose } from './errors.js';
import { Result, ok, err } from './result.js';

// Scan forward from an open bracket, counting nesting, to its close.
const findClose = (prog: Program, openPc: number): number => {
    let depth = 1;
    let pc = openPc + 1;
    while (pc < prog.length) {
        if (prog[pc] === OpType.OPEN) depth++;
        else if (prog[pc] === OpType.CLOSE) depth--;
        if (depth === 0) return pc;
        pc++;
    }
    return NO_JUMP;
};

// Scan backward from a close bracket to its open.
const findOpen = (prog: Program, closePc: number): number => {
    let depth = 1;
    let pc = closePc - 1;
    while (pc >= 0) {
        if (prog[pc] === OpType.CLOSE) depth++;
        else if (prog[pc] === OpType.OPEN) depth--;
        if (depth === 0) return pc;
        pc--;
    }
    return NO_JUMP;
};

/**
 * Builds the bracket table. Each bracket is matched on its own with a
 * linear scan, so deeply nested programs cost O(n²) here.
 *
 * Brackets are checked in program order; the first unmatched one wins.
 */
export const resolve = (prog: Program): Result<ResolvedProgram, BfError> => {
    const jumps = new Int32Array(prog.length).fill(NO_JUMP);

    for (let pc = 0; pc < prog.length; pc++) {
        const op = prog[pc];
        if (op === OpType.OPEN) {
            const target = findClose(prog, pc);
            if (target === NO_JUMP) {
                return err(unmatchedOpen(pc));
            }
            jumps[pc] = target;
        } else if (op === OpType.CLOSE) {
            const target = findOpen(prog, pc);
            if (target === NO_JUMP) {
                return err(unmatchedClose(pc));
            }
            jumps[pc] = target;
        }
    }

    return ok({ ops: prog, jumps });
};
