/**
 * Eval Package - Description DSL
 *
 * ```typescript
 * api("bank", () => {
 *   title("Bank API");
 *   version("1.0");
 * });
 *
 * resource("account", () => {
 *   basePath("/accounts");
 *   action("create", () => {
 *     routing(post(""));
 *     payload();
 *   });
 *   action("show", () => routing(get("/:id")));
 * });
 * ```
 *
 * Misplaced calls are recorded and reported by `runDSL()`; they never throw
 * at import time.
 */

import { context } from "./context.js";
import type { ActionExpr, ApiExpr, Expr, HttpMethod, ResourceExpr, RouteExpr } from "./expr.js";

/* =============================================================================
 * TOP LEVEL
 * ============================================================================= */

export function api(name: string, dsl?: () => void): void {
  if (!topLevel("api")) return;
  const expr: ApiExpr = { kind: "api", name, version: "1.0", resources: [] };
  context.register({ expr, dsl });
}

export function resource(name: string, dsl?: () => void): void {
  if (!topLevel("resource")) return;
  const expr: ResourceExpr = { kind: "resource", name, basePath: "", actions: [] };
  context.register({ expr, dsl });
}

/* =============================================================================
 * API
 * ============================================================================= */

export function title(value: string): void {
  const api = inside("title", "api");
  if (api) api.title = value;
}

export function version(value: string): void {
  const api = inside("version", "api");
  if (api) api.version = value;
}

export function description(value: string): void {
  const expr = context.current();
  if (!expr) {
    context.record("description must be called inside api, resource or action");
    return;
  }
  expr.description = value;
}

/* =============================================================================
 * RESOURCE
 * ============================================================================= */

export function basePath(value: string): void {
  const res = inside("basePath", "resource");
  if (res) res.basePath = value;
}

export function action(name: string, dsl?: () => void): void {
  const res = inside("action", "resource");
  if (!res) return;
  const expr: ActionExpr = { kind: "action", name, payload: false };
  res.actions.push(expr);
  context.within(expr, dsl);
}

/* =============================================================================
 * ACTION
 * ============================================================================= */

export function routing(route: RouteExpr): void {
  const act = inside("routing", "action");
  if (!act) return;
  if (act.route) {
    context.record(`routing is already set to ${act.route.method} ${act.route.path || "/"}`);
    return;
  }
  act.route = route;
}

export function payload(): void {
  const act = inside("payload", "action");
  if (act) act.payload = true;
}

export const get = (path: string): RouteExpr => route("GET", path);
export const post = (path: string): RouteExpr => route("POST", path);
export const put = (path: string): RouteExpr => route("PUT", path);
export const patch = (path: string): RouteExpr => route("PATCH", path);
export const del = (path: string): RouteExpr => route("DELETE", path);

/* =============================================================================
 * HELPERS
 * ============================================================================= */

function route(method: HttpMethod, path: string): RouteExpr {
  return { method, path };
}

function topLevel(fn: string): boolean {
  const current = context.current();
  if (current) {
    context.record(`${fn} must be called at the top level of the description`);
    return false;
  }
  return true;
}

type ExprOfKind<K extends Expr["kind"]> = Extract<Expr, { kind: K }>;

function inside<K extends Expr["kind"]>(fn: string, kind: K): ExprOfKind<K> | undefined {
  const current = context.current();
  if (current && isKind(current, kind)) {
    return current;
  }
  context.record(`${fn} must be called inside ${kind}`);
  return undefined;
}

function isKind<K extends Expr["kind"]>(expr: Expr, kind: K): expr is ExprOfKind<K> {
  return expr.kind === kind;
}
