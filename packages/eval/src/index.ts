/**
 * @stagegen/eval
 *
 * The description DSL and the context that evaluates it.
 */

export {
  api,
  title,
  version,
  description,
  resource,
  basePath,
  action,
  routing,
  payload,
  get,
  post,
  put,
  patch,
  del,
} from "./dsl.js";
export { EvalContext, context, runDSL, roots, resetContext } from "./context.js";
export { EvalErrors } from "./errors.js";
export { fullPath, pathParams } from "./expr.js";
export type {
  HttpMethod,
  RouteExpr,
  ActionExpr,
  ResourceExpr,
  ApiExpr,
  Expr,
  Root,
} from "./expr.js";
