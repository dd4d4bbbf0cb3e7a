import type { ApiExpr, Root } from "@stagegen/eval";
import { GenerationError } from "./errors.js";

/**
 * The API root every generator works from.
 */
export function apiRoot(generator: string, roots: readonly Root[]): ApiExpr {
  const api = roots.find((root) => root.kind === "api");
  if (!api) {
    throw new GenerationError(generator, "no API root in the description");
  }
  return api;
}

/** Text safe to place inside a block comment */
export function commentText(text: string): string {
  return text.replace(/\*\//g, "*\\/").replace(/\s*\n\s*/g, " ");
}
