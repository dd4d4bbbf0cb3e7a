/**
 * @stagegen/codegen
 *
 * Building blocks shared by the orchestrator, the driver it synthesizes and
 * the concrete generators: sections, file descriptors, the writer session
 * and source normalization.
 *
 * @example
 * ```typescript
 * import { Writer, createSourceFile, defineTemplate, section } from "@stagegen/codegen";
 *
 * const greeting = defineTemplate<{ name: string }>("greeting", ({ name }) =>
 *   `export const greeting = ${JSON.stringify(`hello ${name}`)};\n`,
 * );
 *
 * const writer = new Writer("src/gen");
 * await writer.write(
 *   createSourceFile({
 *     path: "greeting.ts",
 *     sections: () => [section(greeting, { name: "world" })],
 *   }),
 * );
 * ```
 */

export { VERSION } from "./version.js";

// Errors
export {
  CodegenError,
  CodegenErrorCode,
  RenderError,
  PathCollisionError,
  NamespaceError,
  NormalizeError,
  describeError,
  isMissingFileError,
} from "./errors.js";
export type { CodegenErrorCodeType } from "./errors.js";

// Logging
export { createConsoleLogger, silentLogger } from "./logger.js";
export type { Logger, ConsoleLoggerOptions } from "./logger.js";

// Sections
export {
  defineTemplate,
  section,
  renderSection,
  importCode,
  headerTemplate,
  headerSection,
} from "./section.js";
export type { Template, Section, ImportSpec, HeaderData } from "./section.js";

// File descriptors
export { createSourceFile, resolveOutputPath, toPosix, MAX_PATH_SUFFIX } from "./file.js";
export type { SourceFile, SourceFileOptions, NamespaceContext, CollisionStrategy } from "./file.js";

// Writer
export { Writer } from "./writer.js";
export type { WriterOptions } from "./writer.js";
export { resolveNamespace } from "./namespace.js";

// Normalization
export {
  normalizeSource,
  normalizeFile,
  removeUnusedImports,
  isNormalizable,
  FORMAT_SETTINGS,
} from "./normalize.js";

// Edit utilities
export {
  applyEdits,
  applySingleEdit,
  replace,
  del,
  deleteWithWhitespace,
  extendSpanWithWhitespace,
} from "./edit.js";
export type { Span, SourceEdit } from "./edit.js";
