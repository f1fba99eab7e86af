#!/usr/bin/env node
import { runCli } from "./program.js";

runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error("Fatal error:", err instanceof Error ? err.message : err);
    process.exitCode = 1;
  },
);
