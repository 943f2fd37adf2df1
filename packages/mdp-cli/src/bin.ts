#!/usr/bin/env node
import { runSolve } from './cli/commands/solve.js';
import { createProcessContext } from './cli/context.js';

runSolve(createProcessContext(), process.argv.slice(2)).then(
  (result) => {
    process.exitCode = result.exitCode;
  },
  (error: unknown) => {
    process.stderr.write(`Unexpected failure: ${error instanceof Error ? (error.stack ?? error.message) : String(error)}\n`);
    process.exitCode = 1;
  }
);
