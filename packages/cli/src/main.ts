#!/usr/bin/env -S node --import tsx
/**
 * lode - Lode interpreter CLI
 */
import { createRequire } from "node:module";
import { Command, InvalidArgumentError } from "commander";
import { runCheck } from "./cmd-check.js";
import { runConfig } from "./cmd-config.js";
import { runRun } from "./cmd-run.js";
import { runTrace } from "./cmd-trace.js";

const require = createRequire(import.meta.url);

function packageVersion(): string {
  const pkg: unknown = require("../package.json");
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "0.0.0";
}

function parseLimit(value: string): number {
  const n = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(n)) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return n;
}

const program = new Command();

program
  .name("lode")
  .description("Lode: a resource-aware interpreter for JSON-encoded programs")
  .version(packageVersion());

program
  .command("run")
  .description("Run a program")
  .argument("<file>", "JSON program file to run (or - for stdin)")
  .option("--entry <name>", "Function to call after declarations are evaluated", "main")
  .option("--trace <path>", "Write JSONL trace to file")
  .option("--max-steps <n>", "Step budget (overrides configuration)", parseLimit)
  .option("--time-ms <n>", "Wall-clock budget in milliseconds (overrides configuration)", parseLimit)
  .option("--pretty", "Human-readable error output", false)
  .action(
    async (file: string, opts: { entry?: string; trace?: string; maxSteps?: number; timeMs?: number; pretty?: boolean }) => {
      const code = await runRun(file, opts);
      process.exit(code);
    }
  );

program
  .command("check")
  .description("Validate a program without running it")
  .argument("<file>", "JSON program file to check (or - for stdin)")
  .option("--pretty", "Human-readable output", false)
  .action(async (file: string, opts: { pretty?: boolean }) => {
    const code = await runCheck(file, opts);
    process.exit(code);
  });

program
  .command("trace")
  .description("Display trace summary")
  .argument("<file>", "JSONL trace file")
  .option("--json", "Output as JSON", false)
  .action(async (file: string, opts: { json?: boolean }) => {
    const code = await runTrace(file, opts);
    process.exit(code);
  });

program
  .command("config")
  .description("Display effective configuration and its source")
  .option("--json", "Output as JSON", false)
  .action(async (opts: { json?: boolean }) => {
    const code = await runConfig(opts);
    process.exit(code);
  });

// Reject unknown commands before Commander parses (prevents --help from masking exit code)
const knownCommands = new Set(["run", "check", "trace", "config", "help"]);
const userArgs = process.argv.slice(2);
const firstPositional = userArgs.find((a) => !a.startsWith("-"));
if (firstPositional && !knownCommands.has(firstPositional)) {
  console.error(`Unknown command: ${firstPositional}`);
  process.exit(1);
}

await program.parseAsync();
