/**
 * faultline CLI -- generate error modules from annotated interfaces
 *
 * Usage:
 *   faultline generate <files...> [--out-dir <dir>] [--check] [--verbose]
 *   faultline expand <file> [--verbose]
 *   faultline explain <code>
 */

import * as fs from "fs";
import * as path from "path";
import {
  GenerationError,
  config,
  getDiagnosticDescriptor,
  printDiagnostics,
} from "@faultline/core";
import { checkFile, generateFile, generateFromSource } from "./generate.js";

type Command = "generate" | "expand" | "explain";

const COMMANDS: readonly Command[] = ["generate", "expand", "explain"];

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  cwd: string;
}

interface CliOptions {
  command: Command;
  files: string[];
  outDir?: string;
  check: boolean;
  verbose: boolean;
}

class UsageError extends Error {}

const defaultIO: CliIO = {
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
  cwd: process.cwd(),
};

const HELP = `
faultline -- typed error chains from annotated interfaces

USAGE:
  faultline <command> [options]

COMMANDS:
  generate <files...>  Write a module for each annotated file
  expand <file>        Print the module generated for a file
  explain <code>       Describe a diagnostic code, e.g. FL1002

OPTIONS:
  -o, --out-dir <dir>  Write generated modules to <dir> (default: beside the source)
  --check              Exit with 1 when a generated module is missing or stale
  -v, --verbose        Enable verbose logging
  -h, --help           Show this help message

EXAMPLES:
  faultline generate src/app.errors.ts
  faultline generate src/*.errors.ts --out-dir src/generated --check
  faultline expand src/app.errors.ts
  faultline explain FL1004
`;

function isCommand(value: string): value is Command {
  return COMMANDS.some((c) => c === value);
}

function parseArgs(args: readonly string[]): CliOptions {
  const [command, ...rest] = args;
  if (!isCommand(command)) {
    throw new UsageError(
      `Unknown command: ${command}\nUsage: faultline <${COMMANDS.join("|")}> [options]`
    );
  }

  const options: CliOptions = { command, files: [], check: false, verbose: false };

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (arg === "--out-dir" || arg === "-o") {
      const dir = rest[++i];
      if (dir === undefined) throw new UsageError(`${arg} needs a directory`);
      options.outDir = dir;
    } else if (arg === "--check") {
      options.check = true;
    } else if (arg === "--verbose" || arg === "-v") {
      options.verbose = true;
    } else if (arg.startsWith("-")) {
      throw new UsageError(`Unknown option: ${arg}`);
    } else {
      options.files.push(arg);
    }
  }

  if (options.files.length === 0) {
    throw new UsageError(`faultline ${command} needs ${command === "explain" ? "a code" : "a file"}`);
  }
  if (command !== "generate" && options.files.length > 1) {
    throw new UsageError(`faultline ${command} takes a single argument`);
  }
  if (options.check && command !== "generate") {
    throw new UsageError("--check only applies to generate");
  }
  return options;
}

function reportFailure(error: unknown, io: CliIO): number {
  if (error instanceof GenerationError) {
    printDiagnostics(error.diagnostics, { writer: (text) => io.stderr(text) });
    return EXIT_FAILURE;
  }
  throw error;
}

function generate(options: CliOptions, io: CliIO): number {
  const outDir = options.outDir === undefined ? undefined : path.resolve(io.cwd, options.outDir);
  let status = EXIT_OK;

  for (const file of options.files) {
    const fileName = path.resolve(io.cwd, file);
    if (!fs.existsSync(fileName)) {
      io.stderr(`error: cannot find ${file}`);
      status = EXIT_FAILURE;
      continue;
    }

    try {
      if (options.check) {
        const checked = checkFile(fileName, { outDir });
        if (!checked.upToDate) {
          io.stderr(`stale: ${path.relative(io.cwd, checked.outFile)}`);
          status = EXIT_FAILURE;
        }
        continue;
      }

      const result = generateFile(fileName, { outDir });
      io.stdout(
        result.code === ""
          ? `skipped ${file}: no error types`
          : `wrote ${path.relative(io.cwd, result.outFile)} (${result.descriptors.map((d) => d.name).join(", ")})`
      );
    } catch (error) {
      status = reportFailure(error, io);
    }
  }

  return status;
}

function expand(options: CliOptions, io: CliIO): number {
  const fileName = path.resolve(io.cwd, options.files[0]);
  if (!fs.existsSync(fileName)) {
    io.stderr(`error: cannot find ${options.files[0]}`);
    return EXIT_FAILURE;
  }

  try {
    const result = generateFromSource(fileName, fs.readFileSync(fileName, "utf8"), {
      outDir: options.outDir === undefined ? undefined : path.resolve(io.cwd, options.outDir),
    });
    io.stdout(result.code);
    return EXIT_OK;
  } catch (error) {
    return reportFailure(error, io);
  }
}

function explain(options: CliOptions, io: CliIO): number {
  const code = options.files[0];
  const descriptor = getDiagnosticDescriptor(code);
  if (!descriptor) {
    io.stderr(`Unknown diagnostic code: ${code}`);
    return EXIT_USAGE;
  }
  io.stdout(`FL${descriptor.code} ${descriptor.name}\n\n${descriptor.explanation}`);
  return EXIT_OK;
}

/**
 * Run the CLI and return its exit code.
 */
export function runCli(args: readonly string[], io: CliIO = defaultIO): number {
  if (args.length === 0 || args.includes("-h") || args.includes("--help")) {
    io.stdout(HELP);
    return EXIT_OK;
  }

  let options: CliOptions;
  try {
    options = parseArgs(args);
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    io.stderr(error.message);
    return EXIT_USAGE;
  }

  config.load(io.cwd);
  if (options.verbose) {
    config.set({ verbose: true });
  }

  switch (options.command) {
    case "generate":
      return generate(options, io);
    case "expand":
      return expand(options, io);
    case "explain":
      return explain(options, io);
  }
}
