// src/io.ts
import fs from 'fs';

export interface ByteIO {
    write(byte: number): void;
    /** Next input byte, or null once input is exhausted or unreadable. */
    read(): number | null;
}

const STDIN_FD = 0;
const RETRY_PAUSE_MS = 5;
const pauseCell = new Int32Array(new SharedArrayBuffer(4));

export class StdIO implements ByteIO {
    private readonly buf = Buffer.alloc(1);

    write(byte: number): void {
        process.stdout.write(Buffer.of(byte & 0xFF));
    }

    read(): number | null {
        for (;;) {
            try {
                const count = fs.readSync(STDIN_FD, this.buf, 0, 1, null);
                return count === 1 ? this.buf[0] : null;
            } catch (e) {
                // stdin opened non-blocking: keep waiting for a byte
                if (isErrnoException(e) && e.code === 'EAGAIN') {
                    Atomics.wait(pauseCell, 0, 0, RETRY_PAUSE_MS);
                    continue;
                }
                return null;
            }
        }
    }
}

export class MemoryIO implements ByteIO {
    private readonly input: Uint8Array;
    private offset = 0;
    private readonly output: number[] = [];

    constructor(input: string | Uint8Array = new Uint8Array(0)) {
        this.input = typeof input === 'string' ? Buffer.from(input, 'latin1') : input;
    }

    write(byte: number): void {
        this.output.push(byte & 0xFF);
    }

    read(): number | null {
        if (this.offset >= this.input.length) return null;
        return this.input[this.offset++];
    }

    /** Number of input bytes consumed so far. */
    get consumed(): number {
        return this.offset;
    }

    outputBytes(): Uint8Array {
        return Uint8Array.from(this.output);
    }

    outputText(): string {
        return Buffer.from(this.output).toString('latin1');
    }
}

const isErrnoException = (e: unknown): e is NodeJS.ErrnoException =>
    e instanceof Error && 'code' in e;
