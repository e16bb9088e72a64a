#!/usr/bin/env node
import { createProgram, reportError } from './cli.js';

let exitCode = 0;

createProgram((code) => {
  exitCode = code;
})
  .parseAsync(process.argv)
  .then(
    () => process.exit(exitCode),
    (error: unknown) => process.exit(reportError(error))
  );
