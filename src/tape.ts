// src/tape.ts
const INITIAL_CAPACITY = 32;

/**
 * Byte cells addressed from 0, grown one zero cell at a time on demand.
 * The tape never shrinks.
 */
export class Tape {
    private cells = new Uint8Array(INITIAL_CAPACITY);
    private size = 0;

    get length(): number {
        return this.size;
    }

    ensure(index: number): void {
        this.check(index);
        if (index < this.size) return;
        if (index >= this.cells.length) {
            let capacity = this.cells.length;
            while (capacity <= index) capacity *= 2;
            const grown = new Uint8Array(capacity);
            grown.set(this.cells.subarray(0, this.size));
            this.cells = grown;
        }
        // new cells are already zero
        this.size = index + 1;
    }

    get(index: number): number {
        this.ensure(index);
        return this.cells[index];
    }

    set(index: number, value: number): void {
        this.ensure(index);
        this.cells[index] = value & 0xFF;
    }

    increment(index: number): void {
        this.set(index, this.get(index) + 1);
    }

    decrement(index: number): void {
        this.set(index, this.get(index) - 1);
    }

    /** Copy of the cells written so far. */
    snapshot(): Uint8Array {
        return this.cells.slice(0, this.size);
    }

    private check(index: number): void {
        if (!Number.isInteger(index) || index < 0) {
            throw new RangeError(`invalid tape index: ${index}`);
        }
    }
}
