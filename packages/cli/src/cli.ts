/**
 * CLI Package - Command Line
 *
 * stagegen [server] [client] [openapi] DESCRIPTION [-o DIR] [-s] [--debug]
 * stagegen version
 */

import { VERSION, createConsoleLogger, describeError } from "@stagegen/codegen";
import { GENERATOR_NAMES, isGeneratorName, type GeneratorName } from "./driver.js";
import { UsageError } from "./errors.js";
import { generate } from "./orchestrator.js";
import type { GenerateOptions } from "./options.js";

export type CliCommand =
  | { kind: "help" }
  | { kind: "version" }
  | { kind: "generate"; options: GenerateOptions };

export interface CliIo {
  stdout: { write(text: string): unknown };
  stderr: { write(text: string): unknown };
}

/**
 * Parse command line arguments (without the node and script paths).
 *
 * @throws UsageError
 */
export function parseArgs(args: readonly string[]): CliCommand {
  const first = args[0];
  if (first === undefined || first === "--help" || first === "-h" || first === "help") {
    return { kind: "help" };
  }
  if (first === "version") {
    return { kind: "version" };
  }

  let offset = 0;
  const selected = new Set<GeneratorName>();
  while (offset < args.length - 1) {
    const arg = args[offset];
    if (arg === undefined || !isGeneratorName(arg)) break;
    selected.add(arg);
    offset++;
  }
  const description = args[offset];
  if (description === undefined || (args.length === 1 && isGeneratorName(description))) {
    throw new UsageError("missing description");
  }
  if (description.startsWith("-")) {
    throw new UsageError(`expected a description before ${description}`);
  }

  const options: GenerateOptions = {
    description,
    generators: selected.size > 0 ? [...selected].sort() : [...GENERATOR_NAMES],
  };

  const flags = args.slice(offset + 1);
  for (let i = 0; i < flags.length; i++) {
    const flag = flags[i] ?? "";
    const [name, inline] = splitFlag(flag);
    switch (name) {
      case "-o":
      case "--output":
      case "-output": {
        const value = inline ?? flags[i + 1];
        if (value === undefined || value === "") {
          throw new UsageError(`${name} needs a directory`);
        }
        if (inline === undefined) i++;
        options.output = value;
        break;
      }
      case "-s":
      case "--scaffold":
      case "-scaffold":
        options.scaffold = true;
        break;
      case "--debug":
      case "-debug":
        options.debug = true;
        break;
      case "-h":
      case "--help":
        return { kind: "help" };
      default:
        throw new UsageError(`unknown argument ${flag}`);
    }
  }

  return { kind: "generate", options };
}

function splitFlag(flag: string): [string, string | undefined] {
  const eq = flag.indexOf("=");
  return eq === -1 ? [flag, undefined] : [flag.slice(0, eq), flag.slice(eq + 1)];
}

export const USAGE = [
  "stagegen is a two-stage code generator: it compiles a small generator program",
  "for your service description, runs it and prints the files it wrote.",
  "",
  "Usage:",
  "  stagegen [server] [client] [openapi] DESCRIPTION [-o DIRECTORY] [-s] [--debug]",
  "  stagegen version",
  "",
  "Commands:",
  "  server   Service interfaces, handlers and HTTP server transport code.",
  "  client   HTTP client code.",
  "  openapi  OpenAPI document.",
  "  (none)   All of the above.",
  "",
  "Args:",
  "  DESCRIPTION  Path (./design/api.ts) or package specifier of the description module.",
  "",
  "Flags:",
  "  -o, --output DIRECTORY  Output directory (default: current directory).",
  "  -s, --scaffold          Also generate scaffold files; existing files are never overwritten.",
  "  --debug                 Keep the generator workspace and print progress to stderr.",
  "  -h, --help              Show this message.",
  "",
].join("\n");

/**
 * Run the command line. Returns the process exit code.
 */
export async function run(args: readonly string[], io: CliIo = process): Promise<number> {
  let command: CliCommand;
  try {
    command = parseArgs(args);
  } catch (error) {
    io.stderr.write(`${describeError(error)}\n\n${USAGE}`);
    return 1;
  }

  switch (command.kind) {
    case "help":
      io.stderr.write(USAGE);
      return args.length === 0 ? 1 : 0;
    case "version":
      io.stdout.write(`stagegen version ${VERSION}\n`);
      return 0;
    case "generate": {
      const logger = createConsoleLogger({ debug: command.options.debug ?? false });
      try {
        const output = await generate({ ...command.options, logger });
        io.stdout.write(output);
        return 0;
      } catch (error) {
        io.stderr.write(`${describeError(error)}\n`);
        return 1;
      }
    }
  }
}
