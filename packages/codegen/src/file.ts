/**
 * Codegen Package - File Descriptors
 *
 * A file descriptor knows which sections make up a generated file and where
 * the file goes. It never touches the disk itself; see writer.ts.
 */

import path from "node:path";
import { PathCollisionError } from "./errors.js";
import type { Section } from "./section.js";

/* =============================================================================
 * TYPES
 * ============================================================================= */

/**
 * Identity of the module a file is written into.
 * Resolved once per writer session.
 */
export interface NamespaceContext {
  /** `name` of the enclosing package.json */
  packageName: string;
  /** Directory holding that package.json */
  packageDir: string;
  /** Package name joined with the output directory's path inside the package */
  modulePath: string;
}

export interface SourceFile {
  /**
   * Ordered sections of the file.
   */
  sections(namespace: NamespaceContext): readonly Section[];

  /**
   * Path of the file relative to the writer directory, in POSIX form.
   * Must be a pure function of `reserved` and must not return a member of it;
   * throws PathCollisionError when no free path exists.
   */
  outputPath(reserved: ReadonlySet<string>): string;

  /**
   * Scaffold files are written once and never replace an existing file.
   */
  readonly scaffold?: boolean;
}

/**
 * What a file does when its natural path is already reserved.
 *
 * - "fail": throw PathCollisionError
 * - "suffix": try `name_2.ext`, `name_3.ext`, ...
 */
export type CollisionStrategy = "fail" | "suffix";

/** Highest suffix tried by the "suffix" strategy */
export const MAX_PATH_SUFFIX = 100;

/* =============================================================================
 * PATH RESOLUTION
 * ============================================================================= */

/**
 * Resolve a natural path against the reserved set.
 */
export function resolveOutputPath(
  natural: string,
  reserved: ReadonlySet<string>,
  strategy: CollisionStrategy = "fail",
): string {
  const normalized = toPosix(natural);
  if (!reserved.has(normalized)) {
    return normalized;
  }
  if (strategy === "fail") {
    throw new PathCollisionError(normalized);
  }

  const ext = path.posix.extname(normalized);
  const stem = normalized.slice(0, normalized.length - ext.length);
  for (let i = 2; i <= MAX_PATH_SUFFIX; i++) {
    const candidate = `${stem}_${i}${ext}`;
    if (!reserved.has(candidate)) {
      return candidate;
    }
  }
  throw new PathCollisionError(normalized, `no free name up to suffix _${MAX_PATH_SUFFIX}`);
}

export function toPosix(p: string): string {
  return path.posix.normalize(p.split(path.sep).join("/"));
}

/* =============================================================================
 * FACTORY
 * ============================================================================= */

export interface SourceFileOptions {
  /** Natural output path relative to the writer directory */
  path: string;
  /** Builds the sections once the destination namespace is known */
  sections: (namespace: NamespaceContext) => readonly Section[];
  /** Collision handling (default: "fail") */
  collision?: CollisionStrategy;
  /** Never overwrite an existing file (default: false) */
  scaffold?: boolean;
}

export function createSourceFile(options: SourceFileOptions): SourceFile {
  const { path: natural, sections, collision = "fail", scaffold = false } = options;
  return {
    scaffold,
    sections,
    outputPath(reserved) {
      return resolveOutputPath(natural, reserved, collision);
    },
  };
}
