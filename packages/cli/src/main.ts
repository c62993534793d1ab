#!/usr/bin/env node
// packages/cli/src/main.ts
import { processIo, runCli } from "./commands.js";

runCli(process.argv.slice(2), processIo()).then(
  (code) => {
    process.exitCode = code;
  },
  (e: unknown) => {
    process.stderr.write(`hydrocheck: ${e instanceof Error ? e.message : String(e)}\n`);
    process.exitCode = 2;
  }
);
