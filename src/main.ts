#!/usr/bin/env node
// src/main.ts
import { main } from './cli.js';

// exitCode rather than exit(): lets stdout drain when it is a pipe
process.exitCode = main(process.argv.slice(2));
