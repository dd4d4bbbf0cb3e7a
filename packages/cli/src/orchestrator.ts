/**
 * CLI Package - Build and Execute
 *
 * One generation run is a straight line of stages:
 *
 * ```
 * start → description-resolved → workspace-staged → driver-written
 *       → compiled → executed → done
 * ```
 *
 * Any failure ends the run with a GenerateError. The outer process never
 * loads the description itself: only the bundled driver imports it, in a
 * process of its own.
 */

import { spawn } from "node:child_process";
import { mkdtemp, rm, stat } from "node:fs/promises";
import path from "node:path";
import { build, formatMessages, type BuildFailure } from "esbuild";
import { VERSION, Writer, describeError, isMissingFileError, type Logger } from "@stagegen/codegen";
import { driverFile, driverSpec, type DriverSpec } from "./driver.js";
import { GenerateError, GenerateErrorCode } from "./errors.js";
import { resolveGenerateOptions, type GenerateOptions } from "./options.js";

/** Prefix of workspace directory names */
export const WORKSPACE_PREFIX = ".stagegen-";

/** File name of the bundled driver inside the workspace */
export const DRIVER_BUNDLE = "generator.mjs";

/** Packages the driver loads at run time instead of bundling */
export const RUNTIME_EXTERNALS: readonly string[] = ["typescript", "esbuild"];

const MODULE_EXTENSIONS = [".ts", ".mts", ".js", ".mjs"];

/* =============================================================================
 * RUN
 * ============================================================================= */

/**
 * Generate files for `options.description` and return what the driver
 * printed: the sorted list of written paths.
 */
export async function generate(input: GenerateOptions): Promise<string> {
  const options = resolveGenerateOptions(input);
  const { logger } = options;

  const description = await resolveDescription(options.description, options.cwd);
  logger.debug(`description resolved: ${description}`);
  const spec = driverSpec(options.generators, description, options.scaffold);

  const workspace = await stageWorkspace(options.cwd);
  logger.debug(`workspace staged: ${workspace}`);

  let done = false;
  try {
    const source = await writeDriver(workspace, spec, logger);
    logger.debug(`driver written: ${source}`);

    const bundle = await compileDriver(workspace, source);
    logger.debug(`driver compiled: ${bundle}`);

    const result = await executeDriver(bundle, { output: options.output, version: VERSION, cwd: options.cwd });
    logger.debug("driver executed");

    done = true;
    return result.stdout;
  } finally {
    if (done && !options.debug) {
      await rm(workspace, { recursive: true, force: true });
    } else {
      logger.info(`workspace retained at ${workspace}`);
    }
  }
}

/* =============================================================================
 * STAGES
 * ============================================================================= */

/**
 * Check that the description can be imported, without evaluating it.
 * Returns the module specifier the driver should import: an absolute file
 * path for path references, the specifier itself for packages.
 */
export async function resolveDescription(reference: string, cwd: string): Promise<string> {
  if (isPathReference(reference)) {
    const base = path.resolve(cwd, reference);
    const candidates = [
      base,
      ...MODULE_EXTENSIONS.map((ext) => base + ext),
      ...MODULE_EXTENSIONS.map((ext) => path.join(base, `index${ext}`)),
    ];
    for (const candidate of candidates) {
      let found: boolean;
      try {
        found = await isFile(candidate);
      } catch (error) {
        throw new GenerateError(
          `cannot read description "${reference}" at ${candidate}: ${describeError(error)}`,
          GenerateErrorCode.DESCRIPTION_NOT_FOUND,
          "start",
          { cause: error },
        );
      }
      if (found) {
        return candidate;
      }
    }
    throw new GenerateError(
      `cannot find description "${reference}": no module at ${base}`,
      GenerateErrorCode.DESCRIPTION_NOT_FOUND,
      "start",
    );
  }

  try {
    await resolveImport(reference, cwd);
  } catch (error) {
    const details = isBuildFailure(error)
      ? error.errors.map((message) => message.text).join("\n")
      : describeError(error);
    throw new GenerateError(
      `cannot resolve description "${reference}" from ${cwd}: ${details}`,
      GenerateErrorCode.DESCRIPTION_NOT_FOUND,
      "start",
      { cause: error },
    );
  }
  return reference;
}

/**
 * Create a uniquely named workspace directory under `cwd`.
 */
export async function stageWorkspace(cwd: string): Promise<string> {
  try {
    return await mkdtemp(path.join(cwd, WORKSPACE_PREFIX));
  } catch (error) {
    throw new GenerateError(
      `cannot create workspace in ${cwd}: ${describeError(error)}`,
      GenerateErrorCode.WORKSPACE,
      "description-resolved",
      { cause: error },
    );
  }
}

/**
 * Render the driver source into the workspace. Returns its path.
 */
export async function writeDriver(workspace: string, spec: DriverSpec, logger?: Logger): Promise<string> {
  const writer = new Writer(workspace, { logger });
  try {
    const written = await writer.write(driverFile(spec));
    if (written === null) {
      throw new Error("driver source was not written");
    }
    return written;
  } catch (error) {
    throw new GenerateError(
      `failed to write generator: ${describeError(error)}`,
      GenerateErrorCode.DRIVER_WRITE,
      "workspace-staged",
      { cause: error },
    );
  }
}

/**
 * Bundle the driver with everything it imports into one executable module.
 * Returns the bundle path.
 */
export async function compileDriver(workspace: string, source: string): Promise<string> {
  const outfile = path.join(workspace, DRIVER_BUNDLE);
  try {
    await build({
      entryPoints: [source],
      outfile,
      absWorkingDir: workspace,
      bundle: true,
      platform: "node",
      format: "esm",
      target: "node20",
      external: [...RUNTIME_EXTERNALS],
      sourcemap: false,
      logLevel: "silent",
    });
  } catch (error) {
    const details = isBuildFailure(error)
      ? (await formatMessages(error.errors, { kind: "error", color: false })).join("")
      : describeError(error);
    throw new GenerateError(
      `failed to compile generator:\n${details}`,
      GenerateErrorCode.COMPILE_FAILED,
      "driver-written",
      { cause: error },
    );
  }
  return outfile;
}

export interface ExecuteDriverOptions {
  output: string;
  version: string;
  cwd: string;
}

export interface ExecuteDriverResult {
  stdout: string;
  stderr: string;
}

interface DriverOutcome extends ExecuteDriverResult {
  code: number | null;
  signal: NodeJS.Signals | null;
  /** stdout and stderr interleaved as they arrived */
  combined: string;
}

/**
 * Run the bundled driver and wait for it to exit.
 */
export async function executeDriver(bundle: string, options: ExecuteDriverOptions): Promise<ExecuteDriverResult> {
  const args = [bundle, `--output=${options.output}`, `--version=${options.version}`];

  let outcome: DriverOutcome;
  try {
    outcome = await runNode(args, options.cwd);
  } catch (error) {
    throw new GenerateError(
      `generator failed: ${describeError(error)}`,
      GenerateErrorCode.EXECUTE_FAILED,
      "compiled",
      { cause: error },
    );
  }

  if (outcome.code !== 0) {
    const reason = outcome.signal ? `killed by ${outcome.signal}` : `exit status ${outcome.code}`;
    throw new GenerateError(
      `generator failed: ${reason}\n${outcome.combined}`,
      GenerateErrorCode.EXECUTE_FAILED,
      "compiled",
    );
  }

  return { stdout: outcome.stdout, stderr: outcome.stderr };
}

/* =============================================================================
 * HELPERS
 * ============================================================================= */

function runNode(args: readonly string[], cwd: string): Promise<DriverOutcome> {
  return new Promise((resolve, reject) => {
    const child = spawn(process.execPath, args, { cwd, stdio: ["ignore", "pipe", "pipe"] });
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    const combined: Buffer[] = [];

    child.stdout.on("data", (chunk: Buffer) => {
      stdout.push(chunk);
      combined.push(chunk);
    });
    child.stderr.on("data", (chunk: Buffer) => {
      stderr.push(chunk);
      combined.push(chunk);
    });
    child.on("error", reject);
    child.on("close", (code, signal) => {
      resolve({
        code,
        signal,
        stdout: Buffer.concat(stdout).toString("utf8"),
        stderr: Buffer.concat(stderr).toString("utf8"),
        combined: Buffer.concat(combined).toString("utf8"),
      });
    });
  });
}

function isPathReference(reference: string): boolean {
  return (
    reference.startsWith("./") ||
    reference.startsWith("../") ||
    reference === "." ||
    reference === ".." ||
    path.isAbsolute(reference)
  );
}

async function isFile(file: string): Promise<boolean> {
  try {
    return (await stat(file)).isFile();
  } catch (error) {
    if (isMissingFileError(error)) return false;
    throw error;
  }
}

const RESOLVING = Symbol("resolving");

/**
 * Resolve a bare specifier from `cwd` the way the bundled driver will: with
 * esbuild's resolver and the `import` conditions. Nothing is loaded.
 */
async function resolveImport(specifier: string, cwd: string): Promise<string> {
  let resolved = "";
  await build({
    stdin: { contents: `import ${JSON.stringify(specifier)};`, resolveDir: cwd, loader: "js" },
    bundle: true,
    write: false,
    platform: "node",
    format: "esm",
    logLevel: "silent",
    plugins: [
      {
        name: "resolve-description",
        setup(b) {
          b.onResolve({ filter: /.*/ }, async (args) => {
            if (args.pluginData === RESOLVING) {
              return undefined;
            }
            const result = await b.resolve(args.path, {
              kind: args.kind,
              importer: args.importer,
              resolveDir: args.resolveDir,
              pluginData: RESOLVING,
            });
            if (result.errors.length > 0) {
              return { errors: result.errors };
            }
            resolved = result.path;
            return { path: result.path, external: true };
          });
        },
      },
    ],
  });
  return resolved;
}

function isBuildFailure(error: unknown): error is BuildFailure {
  return error instanceof Error && "errors" in error && Array.isArray(error.errors);
}
