// src/cli.ts
import fs from 'fs';
import { run } from './index.js';
import { ByteIO, StdIO } from './io.js';
import { BfError, formatError, missingFilename, sourceLoadFailure } from './errors.js';
import { Result, ok, err, isErr } from './result.js';

function printUsage(): void {
    console.log(`
Tape Interpreter

Usage: bftape [options] [--] <file>

Options:
  --time, -t     Show execution time
  --help, -h     Show this help
`);
}

const decoder = new TextDecoder('utf-8', { fatal: true });

/** Reads a program file, rejecting anything that is not valid UTF-8 text. */
export function loadSource(file: string): Result<string, BfError> {
    try {
        return ok(decoder.decode(fs.readFileSync(file)));
    } catch {
        return err(sourceLoadFailure(file));
    }
}

/** Runs the CLI and returns the process exit status. */
export function main(args: string[], io: ByteIO = new StdIO()): number {
    let file: string | null = null;
    let showTime = false;
    let optionsDone = false;

    for (const arg of args) {
        if (optionsDone || !arg.startsWith('-')) {
            if (file === null) file = arg;
        } else if (arg === '--') {
            optionsDone = true;
        } else if (arg === '--help' || arg === '-h') {
            printUsage();
            return 0;
        } else if (arg === '--time' || arg === '-t') {
            showTime = true;
        } else {
            console.error(`unknown option: ${arg}`);
            return 1;
        }
    }

    if (file === null) {
        console.error(formatError(missingFilename()));
        printUsage();
        return 1;
    }

    const source = loadSource(file);
    if (isErr(source)) {
        console.error(formatError(source.error));
        return 1;
    }

    const start = process.hrtime.bigint();
    const result = run(source.value, io);
    if (isErr(result)) {
        console.error(formatError(result.error));
        return 1;
    }

    if (showTime) {
        const end = process.hrtime.bigint();
        const timeMs = Number(end - start) / 1e6;
        console.error(`\nExecution time: ${timeMs.toFixed(2)}ms`);
    }
    return 0;
}
