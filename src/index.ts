#!/usr/bin/env node
import * as path from "path";
import type { CleanConfig, ValidateConfig } from "./types";
import { InputShapeError } from "./core/errors";
import { formatDuration, getErrorMessage } from "./core/utils";
import { runClean, runValidate } from "./pipeline";

const USAGE = `Usage:
  scrape-quality clean <input> <output>
  scrape-quality validate <input> <report> [--summary=<path>] [--no-details]
  scrape-quality run <input> <cleaned> <report> [--summary=<path>] [--no-details]`;

type Command = "clean" | "validate" | "run";

interface CliArgs {
  command: Command;
  positional: string[];
  summaryPath: string | null;
  details: boolean;
}

const ARITY: Record<Command, number> = { clean: 2, validate: 2, run: 3 };

function isCommand(value: string | undefined): value is Command {
  return value === "clean" || value === "validate" || value === "run";
}

/**
 * Parse CLI arguments.
 * Supports positional paths, --summary=<path> and --no-details.
 */
function parseArgs(argv: string[]): CliArgs | null {
  const [command, ...rest] = argv;
  if (!isCommand(command)) return null;

  const positional: string[] = [];
  const opts: Record<string, string> = {};
  let details = true;

  for (const arg of rest) {
    if (arg === "--no-details") { details = false; continue; }
    const eqIdx = arg.indexOf("=");
    if (arg.startsWith("--") && eqIdx !== -1) {
      opts[arg.slice(2, eqIdx)] = arg.slice(eqIdx + 1);
      continue;
    }
    positional.push(arg);
  }

  if (positional.length !== ARITY[command]) return null;

  return {
    command,
    positional: positional.map((p) => path.resolve(p)),
    summaryPath: opts.summary ? path.resolve(opts.summary) : null,
    details,
  };
}

function clean(config: CleanConfig): void {
  console.log(`Step 1: Cleaning ${config.inputPath}...`);
  const { records, outputPath } = runClean(config);
  console.log(`   ${outputPath} (${records.length} records)`);
}

function validate(config: ValidateConfig, step: number): void {
  console.log(`Step ${step}: Validating ${config.inputPath}...`);
  const { report, reportPath, summaryPath } = runValidate(config);
  console.log(`   ${reportPath}`);
  if (summaryPath) console.log(`   ${summaryPath}`);
  console.log(
    `   Valid: ${report.valid_records}/${report.total_records}` +
      `  Invalid: ${report.invalid_records}/${report.total_records}`
  );
}

function main(): void {
  const args = parseArgs(process.argv.slice(2));
  if (!args) {
    console.error(USAGE);
    process.exit(1);
  }

  const startTime = Date.now();
  const [input, second, third] = args.positional;

  try {
    if (args.command === "clean") {
      clean({ inputPath: input, outputPath: second });
    } else if (args.command === "validate") {
      validate(
        { inputPath: input, reportPath: second, summaryPath: args.summaryPath, details: args.details },
        1
      );
    } else {
      clean({ inputPath: input, outputPath: second });
      validate(
        { inputPath: second, reportPath: third, summaryPath: args.summaryPath, details: args.details },
        2
      );
    }
  } catch (err: unknown) {
    const stage = err instanceof InputShapeError ? err.stage : args.command;
    console.error(`Error [${stage}]: ${getErrorMessage(err)}`);
    process.exit(1);
  }

  console.log(`\nDone in ${formatDuration(Date.now() - startTime)}`);
}

if (require.main === module) main();
