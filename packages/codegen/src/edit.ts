/**
 * Codegen Package - Source Editing
 *
 * Text edits over generated source. Normalization computes edits from the
 * syntax tree and applies them here, so untouched text keeps its comments
 * and layout.
 */

import type ts from "typescript";

/* =============================================================================
 * TYPES
 * ============================================================================= */

export interface Span {
  start: number;
  end: number;
}

export type SourceEdit =
  | { type: "replace"; span: Span; newText: string }
  | { type: "delete"; span: Span };

/* =============================================================================
 * PUBLIC API
 * ============================================================================= */

/**
 * Apply multiple edits to source code.
 * Edits are applied in reverse order (bottom to top) to preserve positions.
 */
export function applyEdits(source: string, edits: readonly SourceEdit[]): string {
  const sorted = [...edits].sort((a, b) => b.span.start - a.span.start);

  let result = source;
  for (const edit of sorted) {
    result = applySingleEdit(result, edit);
  }
  return result;
}

export function applySingleEdit(source: string, edit: SourceEdit): string {
  switch (edit.type) {
    case "replace":
      return source.slice(0, edit.span.start) + edit.newText + source.slice(edit.span.end);
    case "delete":
      return source.slice(0, edit.span.start) + source.slice(edit.span.end);
  }
}

export function replace(span: Span, newText: string): SourceEdit {
  return { type: "replace", span, newText };
}

export function del(span: Span): SourceEdit {
  return { type: "delete", span };
}

/**
 * Extend a span to include surrounding whitespace.
 *
 * - Extends backward to eat leading spaces/tabs (stops at newline)
 * - Extends forward to eat trailing spaces/tabs and one newline
 */
export function extendSpanWithWhitespace(source: string, span: Span): Span {
  let start = span.start;
  let end = span.end;

  while (end < source.length && (source[end] === " " || source[end] === "\t")) {
    end++;
  }
  if (end < source.length && source[end] === "\r") {
    end++;
  }
  if (end < source.length && source[end] === "\n") {
    end++;
  }

  while (start > 0 && (source[start - 1] === " " || source[start - 1] === "\t")) {
    start--;
  }

  return { start, end };
}

export function deleteWithWhitespace(source: string, span: Span): SourceEdit {
  return del(extendSpanWithWhitespace(source, span));
}

/**
 * Convert edits produced by the TypeScript language service.
 */
export function fromTextChanges(changes: readonly ts.TextChange[]): SourceEdit[] {
  return changes.map((change) =>
    replace({ start: change.span.start, end: change.span.start + change.span.length }, change.newText),
  );
}
