/**
 * Codegen Package - Writer
 *
 * A writer session renders file descriptors into one output directory and
 * remembers every path it produced, so no two files of the session land on
 * the same path. Sessions are never shared: the orchestrator and the driver
 * it runs each create their own.
 */

import { access, mkdir, open } from "node:fs/promises";
import path from "node:path";
import { PathCollisionError, isMissingFileError } from "./errors.js";
import type { NamespaceContext, SourceFile } from "./file.js";
import { silentLogger, type Logger } from "./logger.js";
import { resolveNamespace } from "./namespace.js";
import { isNormalizable, normalizeFile } from "./normalize.js";
import { renderSection } from "./section.js";

export interface WriterOptions {
  /** Logger for skipped scaffolds and written files */
  logger?: Logger;
}

export class Writer {
  /** Output directory */
  readonly dir: string;
  readonly #files = new Set<string>();
  readonly #logger: Logger;
  #namespace: Promise<NamespaceContext> | null = null;

  constructor(dir: string, options: WriterOptions = {}) {
    this.dir = dir;
    this.#logger = options.logger ?? silentLogger;
  }

  /**
   * Relative paths written so far in this session.
   */
  reserved(): ReadonlySet<string> {
    return new Set(this.#files);
  }

  /**
   * Namespace of the output directory, resolved on first use.
   */
  namespace(): Promise<NamespaceContext> {
    this.#namespace ??= resolveNamespace(this.dir);
    return this.#namespace;
  }

  /**
   * Render `file` into the session directory.
   *
   * Returns the written path, or null when `file` is a scaffold and its path
   * already exists. A failed write leaves the session's reserved paths as
   * they were.
   */
  async write(file: SourceFile): Promise<string | null> {
    const rel = file.outputPath(this.reserved());
    if (this.#files.has(rel)) {
      throw new PathCollisionError(rel);
    }
    const target = path.join(this.dir, rel);

    if (file.scaffold && (await exists(target))) {
      this.#logger.debug(`skipping scaffold ${target}: file exists`);
      return null;
    }

    const namespace = await this.namespace();
    await mkdir(path.dirname(target), { recursive: true });

    const handle = await open(target, "w");
    try {
      for (const s of file.sections(namespace)) {
        await handle.write(renderSection(s));
      }
    } finally {
      await handle.close();
    }

    if (isNormalizable(target)) {
      await normalizeFile(target);
    }

    this.#files.add(rel);
    this.#logger.debug(`wrote ${target}`);
    return target;
  }
}

async function exists(file: string): Promise<boolean> {
  try {
    await access(file);
    return true;
  } catch (error) {
    if (isMissingFileError(error)) return false;
    throw error;
  }
}
