// src/interpreter.ts
import { OpType, ResolvedProgram } from './types.js';
import { Tape } from './tape.js';
import { ByteIO } from './io.js';
import { BfError, pointerUnderflow, inputExhausted } from './errors.js';
import { Result, ok, err } from './result.js';

export class Interpreter {
    private readonly tape = new Tape();
    private cc = 0;
    private pc = 0;

    constructor(
        private readonly prog: ResolvedProgram,
        private readonly io: ByteIO
    ) { }

    get dataPointer(): number {
        return this.cc;
    }

    get cells(): Uint8Array {
        return this.tape.snapshot();
    }

    run(): Result<void, BfError> {
        const { ops, jumps } = this.prog;

        while (this.pc < ops.length) {
            this.tape.ensure(this.cc);

            switch (ops[this.pc]) {
                case OpType.RIGHT:
                    this.cc++;
                    break;
                case OpType.LEFT:
                    if (this.cc === 0) {
                        return err(pointerUnderflow(this.pc));
                    }
                    this.cc--;
                    break;
                case OpType.ADD:
                    this.tape.increment(this.cc);
                    break;
                case OpType.SUB:
                    this.tape.decrement(this.cc);
                    break;
                case OpType.OUTPUT:
                    this.io.write(this.tape.get(this.cc));
                    break;
                case OpType.INPUT: {
                    const byte = this.io.read();
                    if (byte === null) {
                        return err(inputExhausted(this.pc));
                    }
                    this.tape.set(this.cc, byte);
                    break;
                }
                case OpType.OPEN:
                    if (this.tape.get(this.cc) === 0) {
                        this.pc = jumps[this.pc];
                    }
                    break;
                case OpType.CLOSE:
                    if (this.tape.get(this.cc) !== 0) {
                        this.pc = jumps[this.pc];
                    }
                    break;
            }
            this.pc++;
        }

        return ok(undefined);
    }
}
