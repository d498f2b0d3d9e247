#!/usr/bin/env node
import { runCli } from './cli/run.js';

runCli(process.argv.slice(2))
  .then((exitCode) => {
    process.exit(exitCode);
  })
  .catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : String(err));
    if (process.argv.includes('--verbose') && err instanceof Error && err.stack) {
      console.error(err.stack);
    }
    process.exit(1);
  });
