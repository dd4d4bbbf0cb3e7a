/**
 * Identifier helpers for generated code.
 */

import type { ActionExpr, ResourceExpr } from "@stagegen/eval";
import { GenerationError } from "./errors.js";

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

export function words(name: string): string[] {
  return name
    .replace(/([a-z0-9])([A-Z])/g, "$1 $2")
    .split(/[^A-Za-z0-9]+/)
    .filter((word) => word !== "")
    .map((word) => word.toLowerCase());
}

export function pascalCase(name: string): string {
  const joined = words(name)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join("");
  return /^[0-9]/.test(joined) ? `_${joined}` : joined;
}

export function camelCase(name: string): string {
  const pascal = pascalCase(name);
  return pascal.startsWith("_") ? pascal : pascal.charAt(0).toLowerCase() + pascal.slice(1);
}

export function snakeCase(name: string): string {
  return words(name).join("_");
}

/** `obj.name`, or `obj["na-me"]` when `name` is not an identifier */
export function member(obj: string, name: string): string {
  return IDENTIFIER.test(name) ? `${obj}.${name}` : `${obj}[${JSON.stringify(name)}]`;
}

/** Property key usable in an object literal or type */
export function propertyKey(name: string): string {
  return IDENTIFIER.test(name) ? name : JSON.stringify(name);
}

/**
 * Method name of every action of `resource`.
 *
 * @throws GenerationError when two actions map to the same name
 */
export function methodNames(generator: string, resource: ResourceExpr): Map<ActionExpr, string> {
  const names = new Map<ActionExpr, string>();
  const owners = new Map<string, string>();
  for (const action of resource.actions) {
    const name = camelCase(action.name);
    const owner = owners.get(name);
    if (owner !== undefined) {
      throw new GenerationError(
        generator,
        `resource "${resource.name}": actions "${owner}" and "${action.name}" both produce method "${name}"`,
      );
    }
    if (name === "") {
      throw new GenerationError(generator, `resource "${resource.name}": action "${action.name}" has no usable name`);
    }
    owners.set(name, action.name);
    names.set(action, name);
  }
  return names;
}
