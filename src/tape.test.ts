import { describe, it, expect } from "vitest";
import { Tape } from "./tape.js";

describe("Tape", () => {
  it("starts empty", () => {
    const tape = new Tape();
    expect(tape.length).toBe(0);
    expect(tape.snapshot()).toEqual(new Uint8Array(0));
  });

  it("grows with zero cells up to the requested index", () => {
    const tape = new Tape();
    tape.ensure(2);
    expect(tape.length).toBe(3);
    expect(Array.from(tape.snapshot())).toEqual([0, 0, 0]);
  });

  it("never shrinks", () => {
    const tape = new Tape();
    tape.ensure(5);
    tape.ensure(1);
    expect(tape.length).toBe(6);
  });

  it("keeps cell values when growing past its capacity", () => {
    const tape = new Tape();
    tape.set(3, 7);
    tape.set(100, 9);
    expect(tape.length).toBe(101);
    expect(tape.get(3)).toBe(7);
    expect(tape.get(100)).toBe(9);
    expect(tape.get(50)).toBe(0);
  });

  it("wraps 255 + 1 to 0", () => {
    const tape = new Tape();
    tape.set(0, 255);
    tape.increment(0);
    expect(tape.get(0)).toBe(0);
  });

  it("wraps 0 - 1 to 255", () => {
    const tape = new Tape();
    tape.decrement(0);
    expect(tape.get(0)).toBe(255);
  });

  it("rejects negative and fractional indices", () => {
    const tape = new Tape();
    expect(() => tape.ensure(-1)).toThrow(RangeError);
    expect(() => tape.get(1.5)).toThrow("invalid tape index: 1.5");
  });
});
