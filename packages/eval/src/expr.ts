/**
 * Eval Package - Expressions
 *
 * The evaluated description. Generators only ever see these shapes.
 */

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

export interface RouteExpr {
  method: HttpMethod;
  /** Path relative to the resource base path */
  path: string;
}

export interface ActionExpr {
  kind: "action";
  name: string;
  description?: string;
  route?: RouteExpr;
  /** Whether requests carry a JSON body */
  payload: boolean;
}

export interface ResourceExpr {
  kind: "resource";
  name: string;
  description?: string;
  basePath: string;
  actions: ActionExpr[];
}

export interface ApiExpr {
  kind: "api";
  name: string;
  title?: string;
  description?: string;
  version: string;
  resources: ResourceExpr[];
}

export type Expr = ApiExpr | ResourceExpr | ActionExpr;

/**
 * Top-level result of evaluation.
 */
export type Root = ApiExpr;

/**
 * Full request path of an action: resource base path plus route path.
 */
export function fullPath(resource: ResourceExpr, route: RouteExpr): string {
  const joined = `${resource.basePath}${route.path}`;
  return joined === "" ? "/" : joined;
}

/**
 * Names of the `:param` segments of a path, in order.
 */
export function pathParams(path: string): string[] {
  return path
    .split("/")
    .filter((segment) => segment.startsWith(":") && segment.length > 1)
    .map((segment) => segment.slice(1));
}
