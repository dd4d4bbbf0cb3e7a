/**
 * Codegen Package - Errors
 *
 * Failures raised while rendering, placing and normalizing generated files.
 */

/** Error codes */
export const CodegenErrorCode = {
  RENDER: "CODEGEN_RENDER",
  PATH_COLLISION: "CODEGEN_PATH_COLLISION",
  NAMESPACE_NOT_FOUND: "CODEGEN_NAMESPACE_NOT_FOUND",
  NORMALIZE_PARSE: "CODEGEN_NORMALIZE_PARSE",
  NORMALIZE_FORMAT: "CODEGEN_NORMALIZE_FORMAT",
} as const;

export type CodegenErrorCodeType = (typeof CodegenErrorCode)[keyof typeof CodegenErrorCode];

/**
 * Base class of every error raised by the codegen package.
 */
export class CodegenError extends Error {
  constructor(
    message: string,
    public readonly code: CodegenErrorCodeType,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "CodegenError";
  }
}

/**
 * A template failed while rendering a section.
 * The message of the underlying failure is kept as-is.
 */
export class RenderError extends CodegenError {
  constructor(
    public readonly template: string,
    cause: unknown,
  ) {
    super(`template "${template}": ${describeError(cause)}`, CodegenErrorCode.RENDER, { cause });
    this.name = "RenderError";
  }
}

/**
 * A file asked for a path that is already reserved in the writer session.
 */
export class PathCollisionError extends CodegenError {
  constructor(public readonly path: string, detail?: string) {
    super(
      detail ? `output path "${path}" is already in use: ${detail}` : `output path "${path}" is already in use`,
      CodegenErrorCode.PATH_COLLISION,
    );
    this.name = "PathCollisionError";
  }
}

/**
 * The writer could not find the package that encloses its output directory.
 */
export class NamespaceError extends CodegenError {
  constructor(public readonly dir: string) {
    super(
      `cannot determine the package of "${dir}": no package.json with a name found in it or any parent directory`,
      CodegenErrorCode.NAMESPACE_NOT_FOUND,
    );
    this.name = "NamespaceError";
  }
}

/**
 * Generated source could not be parsed or formatted.
 * `content` holds the raw text that was produced.
 */
export class NormalizeError extends CodegenError {
  constructor(
    public readonly file: string,
    public readonly diagnostics: string,
    public readonly content: string,
    code: CodegenErrorCodeType = CodegenErrorCode.NORMALIZE_PARSE,
  ) {
    super(`${file}\n${diagnostics}\n========\nContent:\n${content}`, code);
    this.name = "NormalizeError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Whether a file system error means the path does not exist.
 */
export function isMissingFileError(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR")
  );
}
