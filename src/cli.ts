#!/usr/bin/env node
// src/cli.ts
import { buildProgram } from "./program.js";

process.once("SIGINT", () => {
  console.error("\nScan interrupted");
  process.exit(130);
});

const program = buildProgram();

// Default help when no subcommand given
if (process.argv.length <= 2) {
  program.outputHelp();
  process.exit(0);
}

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
