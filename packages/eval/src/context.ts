/**
 * Eval Package - Context
 *
 * Descriptions are modules whose top-level `api()` and `resource()` calls
 * register definitions here. Their bodies run later, in `runDSL()`, which
 * then validates the result and exposes it as roots.
 */

import { EvalErrors } from "./errors.js";
import { fullPath, type ActionExpr, type ApiExpr, type Expr, type ResourceExpr, type Root } from "./expr.js";

type Definition =
  | { expr: ApiExpr; dsl?: () => void }
  | { expr: ResourceExpr; dsl?: () => void };

export class EvalContext {
  #definitions: Definition[] = [];
  #errors: string[] = [];
  #stack: Expr[] = [];
  #roots: Root[] | null = null;
  #failure: EvalErrors | null = null;

  /** Errors recorded so far */
  get errors(): readonly string[] {
    return this.#errors;
  }

  /** Whether `run()` completed */
  get evaluated(): boolean {
    return this.#roots !== null;
  }

  record(message: string): void {
    const location = this.#stack.map(describe).join(": ");
    this.#errors.push(location === "" ? message : `${location}: ${message}`);
  }

  register(definition: Definition): void {
    this.#definitions.push(definition);
  }

  /** Expression whose DSL body is running, if any */
  current(): Expr | undefined {
    return this.#stack[this.#stack.length - 1];
  }

  /**
   * Run `dsl` with `expr` as the current expression.
   */
  within(expr: Expr, dsl: (() => void) | undefined): void {
    if (!dsl) return;
    this.#stack.push(expr);
    try {
      dsl();
    } catch (error) {
      this.record(error instanceof Error ? error.message : String(error));
    } finally {
      this.#stack.pop();
    }
  }

  /**
   * Execute every registered definition and validate the result.
   *
   * @throws EvalErrors listing every problem found
   */
  run(): void {
    if (this.#roots !== null) return;
    if (this.#failure) throw this.#failure;

    for (const definition of this.#definitions) {
      this.within(definition.expr, definition.dsl);
    }

    const apis: ApiExpr[] = [];
    const resources: ResourceExpr[] = [];
    for (const { expr } of this.#definitions) {
      if (expr.kind === "api") apis.push(expr);
      else resources.push(expr);
    }

    const api = apis[0];
    if (!api) {
      this.#errors.push("no API defined: call api() in the description");
    }
    for (const extra of apis.slice(1)) {
      this.#errors.push(`API "${extra.name}" conflicts with API "${apis[0]?.name}": only one API may be defined`);
    }
    validateResources(resources, this.#errors);

    if (this.#errors.length > 0 || !api) {
      this.#failure = new EvalErrors([...this.#errors]);
      throw this.#failure;
    }

    api.resources = resources;
    this.#roots = [api];
  }

  /**
   * Roots produced by `run()`.
   */
  roots(): readonly Root[] {
    if (this.#roots === null) {
      throw new Error("roots are not available: the description has not been evaluated");
    }
    if (this.#roots.length === 0) {
      throw new Error("the description produced no roots");
    }
    return this.#roots;
  }

  reset(): void {
    this.#definitions = [];
    this.#errors = [];
    this.#stack = [];
    this.#roots = null;
    this.#failure = null;
  }
}

function validateResources(resources: readonly ResourceExpr[], errors: string[]): void {
  const seen = new Set<string>();
  for (const resource of resources) {
    const where = `resource "${resource.name}"`;
    if (seen.has(resource.name)) {
      errors.push(`${where} is defined more than once`);
    }
    seen.add(resource.name);

    if (resource.basePath !== "" && !resource.basePath.startsWith("/")) {
      errors.push(`${where}: base path "${resource.basePath}" must start with "/"`);
    }
    if (resource.actions.length === 0) {
      errors.push(`${where}: no actions defined`);
    }

    const names = new Set<string>();
    const routes = new Map<string, string>();
    for (const action of resource.actions) {
      if (names.has(action.name)) {
        errors.push(`${where}: action "${action.name}" is defined more than once`);
      }
      names.add(action.name);
      validateRoute(resource, action, routes, errors);
    }
  }
}

function validateRoute(
  resource: ResourceExpr,
  action: ActionExpr,
  routes: Map<string, string>,
  errors: string[],
): void {
  const where = `resource "${resource.name}": action "${action.name}"`;
  if (!action.route) {
    errors.push(`${where}: missing routing`);
    return;
  }
  if (action.route.path !== "" && !action.route.path.startsWith("/")) {
    errors.push(`${where}: path "${action.route.path}" must start with "/"`);
  }
  const key = `${action.route.method} ${fullPath(resource, action.route)}`;
  const other = routes.get(key);
  if (other !== undefined) {
    errors.push(`resource "${resource.name}": actions "${other}" and "${action.name}" both route ${key}`);
  } else {
    routes.set(key, action.name);
  }
}

function describe(expr: Expr): string {
  return `${expr.kind === "api" ? "API" : expr.kind} "${expr.name}"`;
}

/**
 * The context descriptions register into.
 */
export const context = new EvalContext();

/**
 * Evaluate the registered description.
 *
 * @throws EvalErrors listing every problem found
 */
export function runDSL(): void {
  context.run();
}

/**
 * Roots of the evaluated description.
 */
export function roots(): readonly Root[] {
  return context.roots();
}

export function resetContext(): void {
  context.reset();
}
