/**
 * Codegen Package - Normalization
 *
 * Cleans up freshly rendered source:
 *
 * ```
 * rendered text → syntax check → drop unused imports → format → canonical text
 * ```
 *
 * Templates list every import a section might need; this pass removes the
 * ones the rendered code never references. Output is deterministic and a
 * second pass over normalized text changes nothing.
 */

import { readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import ts from "typescript";
import { CodegenErrorCode, NormalizeError, describeError } from "./errors.js";
import { applyEdits, deleteWithWhitespace, fromTextChanges, replace, type SourceEdit, type Span } from "./edit.js";

/* =============================================================================
 * CONFIGURATION
 * ============================================================================= */

const NORMALIZABLE_EXTENSIONS = new Set([".ts", ".tsx", ".mts", ".cts", ".js", ".jsx", ".mjs", ".cjs"]);

/**
 * Formatting rules applied to every generated source.
 */
export const FORMAT_SETTINGS: ts.FormatCodeSettings = {
  ...ts.getDefaultFormatCodeSettings("\n"),
  indentSize: 2,
  tabSize: 2,
  convertTabsToSpaces: true,
  trimTrailingWhitespace: true,
  semicolons: ts.SemicolonPreference.Insert,
};

export function isNormalizable(file: string): boolean {
  return NORMALIZABLE_EXTENSIONS.has(path.extname(file).toLowerCase());
}

/* =============================================================================
 * PUBLIC API
 * ============================================================================= */

/**
 * Normalize a source text. `fileName` picks the dialect (TS, TSX, JS...) and
 * labels errors.
 *
 * @throws NormalizeError when the text does not parse or cannot be formatted
 */
export function normalizeSource(text: string, fileName: string): string {
  const hostFile = path.resolve(fileName);
  const host = new SingleFileHost(hostFile, text);
  const service = ts.createLanguageService(host, ts.createDocumentRegistry());
  try {
    const diagnostics = service.getSyntacticDiagnostics(hostFile);
    if (diagnostics.length > 0) {
      throw new NormalizeError(fileName, formatDiagnostics(diagnostics), text);
    }

    const pruned = removeUnusedImports(text, fileName);
    host.update(pruned);

    let formatted: string;
    try {
      const changes = service.getFormattingEditsForDocument(hostFile, FORMAT_SETTINGS);
      formatted = applyEdits(pruned, fromTextChanges(changes));
    } catch (error) {
      throw new NormalizeError(fileName, describeError(error), text, CodegenErrorCode.NORMALIZE_FORMAT);
    }
    return tidyBlankLines(formatted, fileName);
  } finally {
    service.dispose();
  }
}

/**
 * Normalize a file on disk in place.
 */
export async function normalizeFile(file: string): Promise<void> {
  const text = await readFile(file, "utf8");
  await writeFile(file, normalizeSource(text, file), "utf8");
}

/**
 * Remove import bindings that nothing outside the import declarations
 * references. Side-effect imports are kept.
 *
 * References are resolved with the type checker, so object keys, member
 * names and shadowing locals that merely share a binding's name do not keep
 * it alive.
 */
export function removeUnusedImports(text: string, fileName: string): string {
  const hostFile = path.resolve(fileName);
  const service = ts.createLanguageService(new SingleFileHost(hostFile, text), ts.createDocumentRegistry());
  try {
    const program = service.getProgram();
    const sourceFile = program?.getSourceFile(hostFile);
    if (!program || !sourceFile) {
      return text;
    }
    const checker = program.getTypeChecker();
    const references = collectReferences(sourceFile, checker);
    const isUsed = (name: ts.Identifier): boolean => {
      if (references.names.has(name.text)) return true;
      const symbol = checker.getSymbolAtLocation(name);
      return symbol === undefined || references.symbols.has(symbol);
    };

    const edits: SourceEdit[] = [];
    for (const statement of sourceFile.statements) {
      if (!ts.isImportDeclaration(statement) || !statement.importClause) {
        continue;
      }
      const edit = pruneImport(text, sourceFile, statement, statement.importClause, isUsed);
      if (edit) {
        edits.push(edit);
      }
    }
    return edits.length === 0 ? text : applyEdits(text, edits);
  } finally {
    service.dispose();
  }
}

/* =============================================================================
 * IMPORT PRUNING
 * ============================================================================= */

function pruneImport(
  text: string,
  sourceFile: ts.SourceFile,
  decl: ts.ImportDeclaration,
  clause: ts.ImportClause,
  isUsed: (name: ts.Identifier) => boolean,
): SourceEdit | null {
  const span: Span = { start: decl.getStart(sourceFile), end: decl.getEnd() };

  const defaultName = clause.name;
  const keepDefault = defaultName !== undefined && isUsed(defaultName);
  let total = defaultName ? 1 : 0;
  let kept = keepDefault ? 1 : 0;

  let namespace: ts.NamespaceImport | null = null;
  let named: ts.ImportSpecifier[] = [];
  const bindings = clause.namedBindings;
  if (bindings && ts.isNamespaceImport(bindings)) {
    total += 1;
    if (isUsed(bindings.name)) {
      namespace = bindings;
      kept += 1;
    }
  } else if (bindings) {
    total += bindings.elements.length;
    named = bindings.elements.filter((element) => isUsed(element.name));
    kept += named.length;
    // `import {} from "x"` loads the module for its side effects; leave it alone.
    if (bindings.elements.length === 0 && !defaultName) {
      return null;
    }
  }

  if (kept === total) {
    return null;
  }
  if (kept === 0) {
    return deleteWithWhitespace(text, span);
  }

  const parts: string[] = [];
  if (keepDefault && defaultName) {
    parts.push(defaultName.text);
  }
  if (namespace) {
    parts.push(`* as ${namespace.name.text}`);
  }
  if (named.length > 0) {
    parts.push(`{ ${named.map((element) => element.getText(sourceFile)).join(", ")} }`);
  }
  const typeOnly = clause.isTypeOnly ? "type " : "";
  const attributes = decl.attributes ? ` ${decl.attributes.getText(sourceFile)}` : "";
  return replace(
    span,
    `import ${typeOnly}${parts.join(", ")} from ${decl.moduleSpecifier.getText(sourceFile)}${attributes};`,
  );
}

interface References {
  /** Symbols referenced outside import declarations */
  symbols: Set<ts.Symbol>;
  /** JSX tag names, matched by text: the checker resolves them past the import */
  names: Set<string>;
}

function collectReferences(sourceFile: ts.SourceFile, checker: ts.TypeChecker): References {
  const references: References = { symbols: new Set(), names: new Set() };

  function visit(node: ts.Node): void {
    if (ts.isImportDeclaration(node)) {
      return;
    }
    if (ts.isIdentifier(node)) {
      if (isJsxTagName(node)) {
        references.names.add(node.text);
      }
      const symbol = referencedSymbol(node, checker);
      if (symbol) {
        references.symbols.add(symbol);
      }
    }
    ts.forEachChild(node, visit);
  }

  ts.forEachChild(sourceFile, visit);
  return references;
}

function referencedSymbol(node: ts.Identifier, checker: ts.TypeChecker): ts.Symbol | undefined {
  const parent = node.parent;
  if (ts.isShorthandPropertyAssignment(parent) && parent.name === node) {
    return checker.getShorthandAssignmentValueSymbol(parent);
  }
  if (ts.isExportSpecifier(parent) && !parent.parent.parent.moduleSpecifier) {
    return checker.getExportSpecifierLocalTargetSymbol(parent);
  }
  return checker.getSymbolAtLocation(node);
}

function isJsxTagName(node: ts.Identifier): boolean {
  const parent = node.parent;
  return (
    (ts.isJsxOpeningElement(parent) || ts.isJsxSelfClosingElement(parent) || ts.isJsxClosingElement(parent)) &&
    parent.tagName === node
  );
}

/* =============================================================================
 * LAYOUT
 * ============================================================================= */

/**
 * Collapse runs of blank lines to one, drop leading blank lines and end the
 * text with exactly one newline. Template literal text is left untouched.
 */
function tidyBlankLines(text: string, fileName: string): string {
  const protectedSpans = collectTemplateSpans(parse(text, fileName));
  const edits: SourceEdit[] = [];
  const blankRun = /\n(?:[ \t]*\n){2,}/g;

  for (let match = blankRun.exec(text); match !== null; match = blankRun.exec(text)) {
    const span = { start: match.index, end: match.index + match[0].length };
    if (!protectedSpans.some((p) => span.start < p.end && span.end > p.start)) {
      edits.push(replace(span, "\n\n"));
    }
  }

  const tidied = applyEdits(text, edits);
  return `${tidied.replace(/^(?:[ \t]*\n)+/, "").trimEnd()}\n`;
}

function collectTemplateSpans(sourceFile: ts.SourceFile): Span[] {
  const spans: Span[] = [];

  function visit(node: ts.Node): void {
    if (
      ts.isNoSubstitutionTemplateLiteral(node) ||
      ts.isTemplateHead(node) ||
      ts.isTemplateMiddle(node) ||
      ts.isTemplateTail(node) ||
      ts.isJsxText(node)
    ) {
      spans.push({ start: node.getStart(sourceFile), end: node.getEnd() });
    }
    ts.forEachChild(node, visit);
  }

  visit(sourceFile);
  return spans;
}

/* =============================================================================
 * HELPERS
 * ============================================================================= */

function parse(text: string, fileName: string): ts.SourceFile {
  return ts.createSourceFile(fileName, text, ts.ScriptTarget.Latest, true, scriptKind(fileName));
}

function scriptKind(fileName: string): ts.ScriptKind {
  switch (path.extname(fileName).toLowerCase()) {
    case ".tsx":
      return ts.ScriptKind.TSX;
    case ".jsx":
      return ts.ScriptKind.JSX;
    case ".js":
    case ".mjs":
    case ".cjs":
      return ts.ScriptKind.JS;
    default:
      return ts.ScriptKind.TS;
  }
}

function formatDiagnostics(diagnostics: readonly ts.DiagnosticWithLocation[]): string {
  return diagnostics
    .map((diagnostic) => {
      const { line, character } = diagnostic.file.getLineAndCharacterOfPosition(diagnostic.start);
      return `${line + 1}:${character + 1}: ${ts.flattenDiagnosticMessageText(diagnostic.messageText, "\n")}`;
    })
    .join("\n");
}

/**
 * Language service host over one in-memory file.
 */
class SingleFileHost implements ts.LanguageServiceHost {
  readonly #fileName: string;
  #text: string;
  #version = 0;

  constructor(fileName: string, text: string) {
    this.#fileName = fileName;
    this.#text = text;
  }

  update(text: string): void {
    this.#text = text;
    this.#version += 1;
  }

  getCompilationSettings(): ts.CompilerOptions {
    return {
      target: ts.ScriptTarget.ES2022,
      allowJs: true,
      jsx: ts.JsxEmit.Preserve,
      noLib: true,
      noResolve: true,
    };
  }

  getScriptFileNames(): string[] {
    return [this.#fileName];
  }

  getScriptVersion(): string {
    return String(this.#version);
  }

  getScriptSnapshot(fileName: string): ts.IScriptSnapshot | undefined {
    return fileName === this.#fileName ? ts.ScriptSnapshot.fromString(this.#text) : undefined;
  }

  getCurrentDirectory(): string {
    return path.dirname(this.#fileName);
  }

  getDefaultLibFileName(options: ts.CompilerOptions): string {
    return ts.getDefaultLibFilePath(options);
  }

  fileExists(fileName: string): boolean {
    return fileName === this.#fileName;
  }

  readFile(fileName: string): string | undefined {
    return fileName === this.#fileName ? this.#text : undefined;
  }
}
