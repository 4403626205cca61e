#!/usr/bin/env node
import { runCli } from './cli';
import { logError } from './logger';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logError(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
