/**
 * @stagegen/cli
 *
 * Synthesizes the driver program, builds it with esbuild, runs it and
 * reports the files it wrote.
 *
 * @example
 * ```typescript
 * import { generate } from "@stagegen/cli";
 *
 * const written = await generate({
 *   description: "./design/api.ts",
 *   generators: ["server", "openapi"],
 *   output: "src",
 * });
 * console.log(written); // one path per line, sorted
 * ```
 */

export {
  generate,
  resolveDescription,
  stageWorkspace,
  writeDriver,
  compileDriver,
  executeDriver,
  WORKSPACE_PREFIX,
  DRIVER_BUNDLE,
  RUNTIME_EXTERNALS,
} from "./orchestrator.js";
export type { ExecuteDriverOptions, ExecuteDriverResult } from "./orchestrator.js";
export {
  driverFile,
  driverSpec,
  driverImports,
  driverTemplate,
  generatorCalls,
  isGeneratorName,
  GENERATOR_NAMES,
  DRIVER_SOURCE,
} from "./driver.js";
export type { DriverSpec, GeneratorName, GeneratorCall } from "./driver.js";
export { resolveGenerateOptions } from "./options.js";
export type { GenerateOptions, ResolvedGenerateOptions } from "./options.js";
export { GenerateError, GenerateErrorCode, UsageError } from "./errors.js";
export type { GenerateErrorCodeType, GenerateStage } from "./errors.js";
export { run, parseArgs, USAGE } from "./cli.js";
export type { CliCommand, CliIo } from "./cli.js";
