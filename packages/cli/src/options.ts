/**
 * CLI Package - Options
 *
 * Options of one generation run and their defaults.
 */

import { silentLogger, type Logger } from "@stagegen/codegen";
import { GENERATOR_NAMES, isGeneratorName, type GeneratorName } from "./driver.js";
import { GenerateError, GenerateErrorCode } from "./errors.js";

export interface GenerateOptions {
  /** Description module: a path (`./design/api.ts`) or a package specifier */
  description: string;
  /** Generators to run, in order (default: client, openapi, server) */
  generators?: readonly string[];
  /** Output directory handed to the driver (default: ".") */
  output?: string;
  /** Also write scaffold files (default: false) */
  scaffold?: boolean;
  /** Keep the workspace after a successful run (default: false, or STAGEGEN_DEBUG) */
  debug?: boolean;
  /** Working directory (default: process.cwd()) */
  cwd?: string;
  /** Logger (default: silent) */
  logger?: Logger;
}

export interface ResolvedGenerateOptions {
  description: string;
  generators: readonly GeneratorName[];
  output: string;
  scaffold: boolean;
  debug: boolean;
  cwd: string;
  logger: Logger;
}

/**
 * Fill in defaults and validate generator names.
 *
 * @throws GenerateError with code INVALID_OPTIONS
 */
export function resolveGenerateOptions(
  options: GenerateOptions,
  env: NodeJS.ProcessEnv = process.env,
): ResolvedGenerateOptions {
  if (options.description.trim() === "") {
    throw new GenerateError("missing description", GenerateErrorCode.INVALID_OPTIONS, "start");
  }

  const generators: GeneratorName[] = [];
  for (const name of options.generators ?? GENERATOR_NAMES) {
    if (!isGeneratorName(name)) {
      throw new GenerateError(
        `unknown generator "${name}" (expected one of ${GENERATOR_NAMES.join(", ")})`,
        GenerateErrorCode.INVALID_OPTIONS,
        "start",
      );
    }
    if (!generators.includes(name)) {
      generators.push(name);
    }
  }
  if (generators.length === 0) {
    throw new GenerateError("no generator selected", GenerateErrorCode.INVALID_OPTIONS, "start");
  }

  return {
    description: options.description,
    generators,
    output: options.output ?? ".",
    scaffold: options.scaffold ?? false,
    debug: options.debug ?? isTruthy(env.STAGEGEN_DEBUG),
    cwd: options.cwd ?? process.cwd(),
    logger: options.logger ?? silentLogger,
  };
}

function isTruthy(value: string | undefined): boolean {
  return value === "1" || value === "true";
}
