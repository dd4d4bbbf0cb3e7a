/**
 * CLI Package - Driver Synthesis
 *
 * Builds the descriptor of the transient `main.ts` program. Once bundled and
 * run, the program evaluates the description, calls the selected generators
 * and writes their files through its own writer session.
 */

import path from "node:path";
import {
  createSourceFile,
  defineTemplate,
  headerSection,
  section,
  type ImportSpec,
  type SourceFile,
} from "@stagegen/codegen";

/* =============================================================================
 * DRIVER SELECTION
 * ============================================================================= */

export const GENERATOR_NAMES = ["client", "openapi", "server"] as const;

export type GeneratorName = (typeof GENERATOR_NAMES)[number];

export function isGeneratorName(value: string): value is GeneratorName {
  return GENERATOR_NAMES.some((name) => name === value);
}

export interface DriverSpec {
  /** Generators to run, in order */
  readonly generators: readonly GeneratorName[];
  /** Module specifier of the description, as the driver imports it */
  readonly description: string;
  /** Also run the scaffold generators of the selected generators */
  readonly scaffold: boolean;
}

export function driverSpec(
  generators: readonly GeneratorName[],
  description: string,
  scaffold = false,
): DriverSpec {
  if (generators.length === 0) {
    throw new Error("driver needs at least one generator");
  }
  return Object.freeze({
    generators: Object.freeze([...generators]),
    description: description.split(path.sep).join("/"),
    scaffold,
  });
}

/* =============================================================================
 * GENERATOR CALLS
 * ============================================================================= */

export interface GeneratorCall {
  /** Name used in error messages */
  label: string;
  /** Export of @stagegen/generators to call */
  fn: "server" | "serverScaffold" | "client" | "openapi";
}

/**
 * Generator functions the driver calls, in call order.
 */
export function generatorCalls(spec: DriverSpec): GeneratorCall[] {
  const calls: GeneratorCall[] = [];
  for (const name of spec.generators) {
    switch (name) {
      case "server":
        calls.push({ label: "server", fn: "server" });
        if (spec.scaffold) {
          calls.push({ label: "server scaffold", fn: "serverScaffold" });
        }
        break;
      case "client":
        calls.push({ label: "client", fn: "client" });
        break;
      case "openapi":
        calls.push({ label: "openapi", fn: "openapi" });
        break;
      default:
        return unknownGenerator(name);
    }
  }
  return calls;
}

function unknownGenerator(name: never): never {
  throw new Error(`unknown generator ${String(name)}`);
}

/* =============================================================================
 * TEMPLATE
 * ============================================================================= */

export function driverImports(spec: DriverSpec): ImportSpec[] {
  return [
    { path: "@stagegen/codegen", names: ["Writer", "VERSION", "describeError"] },
    { path: "@stagegen/codegen", names: ["SourceFile", "Logger"], typeOnly: true },
    { path: "@stagegen/eval", names: ["runDSL", "roots", "resetContext"] },
    { path: "@stagegen/eval", names: ["Root"], typeOnly: true },
    { path: "@stagegen/generators", name: "generators" },
    { path: spec.description },
  ];
}

export const driverTemplate = defineTemplate<readonly GeneratorCall[]>("driver", (calls) => {
  const generate = calls.map(
    (call) => `  files.push(...run(${JSON.stringify(call.label)}, generators.${call.fn}, evaluated));`,
  );
  return `function fail(message: string): never {
  process.stderr.write(message.endsWith("\\n") ? message : \`\${message}\\n\`);
  process.exit(1);
}

function flag(name: string): string {
  const prefix = \`--\${name}=\`;
  const arg = process.argv.slice(2).find((a) => a.startsWith(prefix));
  return arg === undefined ? "" : arg.slice(prefix.length);
}

function run(
  name: string,
  generate: (roots: readonly Root[]) => SourceFile[],
  evaluated: readonly Root[],
): SourceFile[] {
  try {
    return generate(evaluated);
  } catch (error) {
    return fail(error instanceof generators.GenerationError ? error.message : \`\${name} generator: \${describeError(error)}\`);
  }
}

async function main(): Promise<void> {
  const out = flag("output");
  if (out === "") {
    fail("missing output flag");
  }
  const version = flag("version");
  if (version === "") {
    fail("missing version flag");
  }
  if (version !== VERSION) {
    fail(\`stagegen \${version} ran the description but the compiled generator is running \${VERSION}\`);
  }

  try {
    runDSL();
  } catch (error) {
    fail(describeError(error));
  }

  let evaluated: readonly Root[] = [];
  try {
    evaluated = roots();
  } catch (error) {
    fail(describeError(error));
  }

  const files: SourceFile[] = [];
${generate.join("\n")}

  const writer = new Writer(out);
  const outputs: string[] = [];
  for (const file of files) {
    const written = await writer.write(file);
    if (written !== null) {
      outputs.push(written);
    }
  }

  outputs.sort();
  process.stdout.write(outputs.length > 0 ? \`\${outputs.join("\\n")}\\n\` : "");
}

main().catch((error: unknown) => fail(describeError(error)));
`;
});

/* =============================================================================
 * FILE
 * ============================================================================= */

/** File name of the driver source inside the workspace */
export const DRIVER_SOURCE = "main.ts";

/**
 * The driver program for `spec`.
 */
export function driverFile(spec: DriverSpec): SourceFile {
  const calls = generatorCalls(spec);
  return createSourceFile({
    path: DRIVER_SOURCE,
    sections: (namespace) => [
      headerSection("stagegen driver", namespace, driverImports(spec)),
      section(driverTemplate, calls),
    ],
  });
}
