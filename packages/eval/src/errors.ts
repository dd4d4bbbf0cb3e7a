/**
 * Every problem found while evaluating a description, reported together.
 */
export class EvalErrors extends Error {
  constructor(public readonly errors: readonly string[]) {
    super(errors.join("\n"));
    this.name = "EvalErrors";
  }
}
