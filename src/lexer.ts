// src/lexer.ts
import { OpType, CharCode, Program } from './types.js';

const opMap: Record<number, OpType> = {
    [CharCode.GT]: OpType.RIGHT,
    [CharCode.LT]: OpType.LEFT,
    [CharCode.ADD]: OpType.ADD,
    [CharCode.SUB]: OpType.SUB,
    [CharCode.DOT]: OpType.OUTPUT,
    [CharCode.COMMA]: OpType.INPUT,
    [CharCode.LB]: OpType.OPEN,
    [CharCode.RB]: OpType.CLOSE,
};

const symbolMap: Record<OpType, string> = {
    [OpType.RIGHT]: '>',
    [OpType.LEFT]: '<',
    [OpType.ADD]: '+',
    [OpType.SUB]: '-',
    [OpType.OUTPUT]: '.',
    [OpType.INPUT]: ',',
    [OpType.OPEN]: '[',
    [OpType.CLOSE]: ']',
};

/**
 * One instruction per recognized symbol, in source order. Everything else
 * is dropped. All eight symbols are ASCII, so scanning the UTF-8 bytes of a
 * string gives the same program as scanning its characters.
 */
export const lex = (source: string | Uint8Array): Program => {
    const bytes = typeof source === 'string' ? Buffer.from(source, 'utf8') : source;
    const prog: OpType[] = [];

    for (let i = 0; i < bytes.length; i++) {
        const opType: OpType | undefined = opMap[bytes[i] & 0xFF];
        if (opType) {
            prog.push(opType);
        }
    }

    return prog;
};

/** Canonical source text for a program; `lex(render(p))` reproduces `p`. */
export const render = (prog: Program): string =>
    prog.map(op => symbolMap[op]).join('');
