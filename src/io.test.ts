import { describe, it, expect, vi, afterEach } from "vitest";
import fs from "fs";
import { StdIO, MemoryIO } from "./io.js";

describe("StdIO", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes each byte to stdout as a one-byte buffer", () => {
    const write = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    new StdIO().write(0xe9);
    expect(write).toHaveBeenCalledTimes(1);
    expect(write.mock.calls[0][0]).toEqual(Buffer.of(0xe9));
  });

  it("returns null when stdin is at end of input", () => {
    const readSync = vi.spyOn(fs, "readSync").mockImplementation(() => 0);
    expect(new StdIO().read()).toBeNull();
    expect(readSync).toHaveBeenCalledTimes(1);
  });

  it("returns the byte read from stdin", () => {
    vi.spyOn(fs, "readSync").mockImplementation((_fd, buffer) => {
      new Uint8Array(buffer.buffer, buffer.byteOffset, 1)[0] = 65;
      return 1;
    });
    expect(new StdIO().read()).toBe(65);
  });

  it("waits and retries while stdin reports EAGAIN", () => {
    let calls = 0;
    const readSync = vi.spyOn(fs, "readSync").mockImplementation((_fd, buffer) => {
      calls++;
      if (calls <= 2) {
        throw Object.assign(new Error("resource temporarily unavailable"), {
          code: "EAGAIN",
        });
      }
      new Uint8Array(buffer.buffer, buffer.byteOffset, 1)[0] = 7;
      return 1;
    });
    const wait = vi.spyOn(Atomics, "wait").mockImplementation(() => "timed-out");
    expect(new StdIO().read()).toBe(7);
    expect(readSync).toHaveBeenCalledTimes(3);
    expect(wait).toHaveBeenCalledTimes(2);
  });

  it("returns null on any other read error", () => {
    const readSync = vi.spyOn(fs, "readSync").mockImplementation(() => {
      throw Object.assign(new Error("i/o error"), { code: "EIO" });
    });
    expect(new StdIO().read()).toBeNull();
    expect(readSync).toHaveBeenCalledTimes(1);
  });
});

describe("MemoryIO", () => {
  it("serves input bytes in order, then null", () => {
    const io = new MemoryIO("hi");
    expect(io.read()).toBe(104);
    expect(io.read()).toBe(105);
    expect(io.read()).toBeNull();
    expect(io.consumed).toBe(2);
  });

  it("starts with no input", () => {
    expect(new MemoryIO().read()).toBeNull();
  });

  it("keeps the low eight bits of written values", () => {
    const io = new MemoryIO();
    io.write(72);
    io.write(256 + 105);
    expect(Array.from(io.outputBytes())).toEqual([72, 105]);
    expect(io.outputText()).toBe("Hi");
  });
});
