#!/usr/bin/env node
// src/cli.ts
import { Command } from "commander";

import {
  formatGid,
  parseGidArgument,
  runDumpTool,
  runInspectTool,
} from "./tiled/inspectTool.js";

const program = new Command();

program
  .name("tiledjson")
  .description("Decode and validate tile maps saved in the editor's JSON format")
  .version("0.1.0");

program
  .command("inspect")
  .description("Parse a map (or every .json/.tmj map in a directory) and print a summary")
  .argument("<input>", "Path to a map file or a directory")
  .option("--recursive", "Recurse into subdirectories (directory input)", false)
  .action(async (input: string, opts: { recursive: boolean }) => {
    const summary = await runInspectTool(input, opts);
    if (summary.failed > 0) process.exitCode = 1;
  });

program
  .command("dump")
  .description("Parse a map and print the decoded model as JSON")
  .argument("<input>", "Path to a map file")
  .option("-o, --output <path>", "Write JSON to a file (default: stdout)")
  .action(async (input: string, opts: { output?: string }) => {
    await runDumpTool(input, opts);
  });

program
  .command("gid")
  .description("Decode raw GIDs (decimal or 0x-prefixed) into tile id and flip flags")
  .argument("<values...>", "Raw 32-bit GID values")
  .action((values: string[]) => {
    for (const v of values) console.log(formatGid(parseGidArgument(v)));
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const msg = err instanceof Error ? err.message : String(err);
  process.stderr.write(msg + "\n");
  process.exitCode = 1;
});
