/**
 * Codegen Package - Sections
 *
 * A generated file is the concatenation of its sections. Each section pairs a
 * reusable template with the data it renders.
 */

import { RenderError } from "./errors.js";
import type { NamespaceContext } from "./file.js";
import { VERSION } from "./version.js";

/* =============================================================================
 * TEMPLATES
 * ============================================================================= */

/**
 * A compiled, reusable template. `render` must not keep state between calls.
 */
export interface Template<T> {
  readonly name: string;
  render(data: T): string;
}

export function defineTemplate<T>(name: string, render: (data: T) => string): Template<T> {
  return Object.freeze({ name, render });
}

/* =============================================================================
 * SECTIONS
 * ============================================================================= */

export interface Section<T = unknown> {
  readonly template: Template<T>;
  readonly data: T;
}

export function section<T>(template: Template<T>, data: T): Section<T> {
  return Object.freeze({ template, data });
}

/**
 * Render a section to text.
 *
 * @throws RenderError wrapping whatever the template threw
 */
export function renderSection<T>(s: Section<T>): string {
  let text: unknown;
  try {
    text = s.template.render(s.data);
  } catch (error) {
    throw new RenderError(s.template.name, error);
  }
  if (typeof text !== "string") {
    throw new RenderError(s.template.name, new TypeError(`rendered ${typeof text} instead of text`));
  }
  return text;
}

/* =============================================================================
 * IMPORTS
 * ============================================================================= */

/**
 * A generated import statement.
 *
 * - `name` set: `import * as name from "path"`
 * - `names` set: `import { a, b as c } from "path"`
 * - neither: `import "path"` (side effects only)
 */
export interface ImportSpec {
  /** Module specifier */
  path: string;
  /** Local alias of the module namespace */
  name?: string;
  /** Named bindings, `"a"` or `"a as b"` */
  names?: readonly string[];
  /** Emit `import type` */
  typeOnly?: boolean;
}

export function importCode(spec: ImportSpec): string {
  const from = JSON.stringify(spec.path);
  const kind = spec.typeOnly ? "import type" : "import";
  const clauses: string[] = [];
  if (spec.names && spec.names.length > 0) {
    clauses.push(`{ ${spec.names.join(", ")} }`);
  }
  if (spec.name) {
    clauses.push(`* as ${spec.name}`);
  }
  if (clauses.length === 0) {
    return `import ${from};`;
  }
  // A namespace import cannot share a declaration with named bindings.
  return clauses.map((clause) => `${kind} ${clause} from ${from};`).join("\n");
}

/* =============================================================================
 * HEADER
 * ============================================================================= */

export interface HeaderData {
  title: string;
  namespace: NamespaceContext;
  imports: readonly ImportSpec[];
  /** Scaffolds are meant to be edited; their banner says so */
  scaffold?: boolean;
}

export const headerTemplate = defineTemplate<HeaderData>("header", ({ title, namespace, imports, scaffold }) => {
  const lines = [
    scaffold
      ? `// Scaffolded by stagegen v${VERSION}. This file is yours to edit; it is never regenerated.`
      : `// Code generated by stagegen v${VERSION}, DO NOT EDIT.`,
    "//",
    `// ${title}`,
    "//",
    `// Module: ${namespace.modulePath}`,
    "",
  ];
  for (const spec of imports) {
    lines.push(importCode(spec));
  }
  lines.push("", "");
  return lines.join("\n");
});

/**
 * The standard banner and import block every generated source starts with.
 */
export function headerSection(
  title: string,
  namespace: NamespaceContext,
  imports: readonly ImportSpec[],
  options: { scaffold?: boolean } = {},
): Section<HeaderData> {
  return section(headerTemplate, { title, namespace, imports, scaffold: options.scaffold ?? false });
}
