/**
 * A concrete generator could not produce its files.
 */
export class GenerationError extends Error {
  constructor(
    public readonly generator: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`${generator} generator: ${message}`, options);
    this.name = "GenerationError";
  }
}
