/**
 * CLI Package - Errors
 */

/** Error codes */
export const GenerateErrorCode = {
  INVALID_OPTIONS: "GENERATE_INVALID_OPTIONS",
  DESCRIPTION_NOT_FOUND: "GENERATE_DESCRIPTION_NOT_FOUND",
  WORKSPACE: "GENERATE_WORKSPACE",
  DRIVER_WRITE: "GENERATE_DRIVER_WRITE",
  COMPILE_FAILED: "GENERATE_COMPILE_FAILED",
  EXECUTE_FAILED: "GENERATE_EXECUTE_FAILED",
} as const;

export type GenerateErrorCodeType = (typeof GenerateErrorCode)[keyof typeof GenerateErrorCode];

/**
 * Stages of one generation run, in order.
 */
export type GenerateStage =
  | "start"
  | "description-resolved"
  | "workspace-staged"
  | "driver-written"
  | "compiled"
  | "executed"
  | "done";

/**
 * A generation run failed. `stage` is the last stage it completed.
 */
export class GenerateError extends Error {
  constructor(
    message: string,
    public readonly code: GenerateErrorCodeType,
    public readonly stage: GenerateStage,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "GenerateError";
  }
}

/**
 * The command line was used incorrectly.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}
