import { readFile } from "node:fs/promises";
import path from "node:path";
import { NamespaceError, isMissingFileError } from "./errors.js";
import type { NamespaceContext } from "./file.js";

/**
 * Find the package a directory belongs to.
 *
 * Walks up from `dir` to the nearest package.json that declares a `name`.
 * The directory does not need to exist yet.
 *
 * @throws NamespaceError when no such package.json exists
 */
export async function resolveNamespace(dir: string): Promise<NamespaceContext> {
  const start = path.resolve(dir);
  let current = start;
  for (;;) {
    const name = await readPackageName(path.join(current, "package.json"));
    if (name !== null) {
      const rel = path.relative(current, start).split(path.sep).join("/");
      return {
        packageName: name,
        packageDir: current,
        modulePath: rel === "" ? name : `${name}/${rel}`,
      };
    }
    const parent = path.dirname(current);
    if (parent === current) {
      throw new NamespaceError(start);
    }
    current = parent;
  }
}

async function readPackageName(file: string): Promise<string | null> {
  let text: string;
  try {
    text = await readFile(file, "utf8");
  } catch (error) {
    if (isMissingFileError(error)) return null;
    throw error;
  }
  const parsed: unknown = JSON.parse(text);
  if (typeof parsed === "object" && parsed !== null && "name" in parsed && typeof parsed.name === "string") {
    return parsed.name;
  }
  return null;
}
