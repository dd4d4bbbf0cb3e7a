/**
 * Generators Package - HTTP Server Transport
 *
 * One `gen/transport/<resource>_http.ts` per resource: the service interface
 * the application implements, HTTP handlers calling it and a function that
 * mounts the handlers on a router.
 */

import {
  createSourceFile,
  defineTemplate,
  headerSection,
  section,
  type ImportSpec,
  type SourceFile,
} from "@stagegen/codegen";
import { fullPath, type ResourceExpr, type Root } from "@stagegen/eval";
import { GenerationError } from "./errors.js";
import { methodNames, pascalCase, snakeCase } from "./naming.js";
import { apiRoot, commentText } from "./roots.js";

/* =============================================================================
 * DATA
 * ============================================================================= */

export interface ServerActionData {
  /** Action name as described */
  name: string;
  /** Method name on the service interface */
  method: string;
  description: string;
  httpMethod: string;
  path: string;
  payload: boolean;
}

export interface ServerData {
  resource: string;
  /** PascalCase resource name */
  type: string;
  actions: ServerActionData[];
}

const SERVER_IMPORTS: readonly ImportSpec[] = [
  { path: "node:http", names: ["IncomingMessage", "ServerResponse", "Server"], typeOnly: true },
  { path: "node:buffer", names: ["Buffer"] },
  { path: "node:util", name: "util" },
];

export function serverData(generator: string, resource: ResourceExpr): ServerData {
  const methods = methodNames(generator, resource);
  return {
    resource: resource.name,
    type: pascalCase(resource.name),
    actions: resource.actions.map((action) => {
      const route = action.route;
      if (!route) {
        throw new GenerationError(generator, `resource "${resource.name}": action "${action.name}" has no route`);
      }
      return {
        name: action.name,
        method: methods.get(action) ?? action.name,
        description: commentText(action.description ?? `${action.name} action of the ${resource.name} service.`),
        httpMethod: route.method,
        path: fullPath(resource, route),
        payload: action.payload,
      };
    }),
  };
}

/* =============================================================================
 * TEMPLATES
 * ============================================================================= */

export const serviceTemplate = defineTemplate<ServerData>("server-service", ({ resource, type, actions }) => {
  const lines = [
    "/**",
    ` * Request passed to the ${resource} service methods.`,
    " */",
    `export interface ${type}Request {`,
    "  params: Record<string, string>;",
    "  body?: unknown;",
    "}",
    "",
    "/**",
    ` * ${type}Service is the ${resource} service interface.`,
    " */",
    `export interface ${type}Service {`,
  ];
  for (const action of actions) {
    lines.push(`  /** ${action.description} */`);
    lines.push(`  ${action.method}(req: ${type}Request): Promise<unknown>;`);
  }
  lines.push("}", "", "");
  return lines.join("\n");
});

export const handlersTemplate = defineTemplate<ServerData>("server-handlers", ({ resource, type, actions }) => {
  const lines = [
    `export type ${type}HttpHandler = (`,
    "  req: IncomingMessage,",
    "  res: ServerResponse,",
    "  params: Record<string, string>,",
    ") => Promise<void>;",
    "",
    "/**",
    ` * ${type}HttpHandlers lists the ${resource} service endpoint HTTP handlers.`,
    " */",
    `export interface ${type}HttpHandlers {`,
    ...actions.map((action) => `  ${action.method}: ${type}HttpHandler;`),
    "}",
    "",
    "/**",
    ` * Mux is the router the ${resource} handlers are mounted on.`,
    " */",
    "export interface Mux {",
    `  handle(method: string, pattern: string, handler: ${type}HttpHandler): void;`,
    "}",
    "",
    "/**",
    ` * new${type}HttpHandlers instantiates HTTP handlers for all the ${resource}`,
    " * service endpoints.",
    " */",
    `export function new${type}HttpHandlers(service: ${type}Service): ${type}HttpHandlers {`,
    "  return {",
  ];
  for (const action of actions) {
    if (action.payload) {
      lines.push(
        `    ${action.method}: async (req, res, params) => {`,
        "      const body = await readJson(req);",
        `      await respond(res, () => service.${action.method}({ params, body }));`,
        "    },",
      );
    } else {
      lines.push(
        `    ${action.method}: async (_req, res, params) => {`,
        `      await respond(res, () => service.${action.method}({ params }));`,
        "    },",
      );
    }
  }
  lines.push("  };", "}", "", "");
  return lines.join("\n");
});

export const mountTemplate = defineTemplate<ServerData>("server-mount", ({ resource, type, actions }) => {
  const lines = [
    "/**",
    ` * mount${type}HttpHandlers configures the mux to serve the ${resource} endpoints.`,
    " */",
    `export function mount${type}HttpHandlers(mux: Mux, h: ${type}HttpHandlers): void {`,
    ...actions.map(
      (action) =>
        `  mux.handle(${JSON.stringify(action.httpMethod)}, ${JSON.stringify(action.path)}, h.${action.method});`,
    ),
    "}",
    "",
    "",
  ];
  return lines.join("\n");
});

export const helpersTemplate = defineTemplate<ServerData>("server-helpers", ({ actions }) => {
  const lines = [
    "async function respond(res: ServerResponse, call: () => Promise<unknown>): Promise<void> {",
    "  let status = 200;",
    "  let result: unknown;",
    "  try {",
    "    result = await call();",
    "    if (result === undefined) status = 204;",
    "  } catch (error) {",
    "    status = 500;",
    "    result = { error: error instanceof Error ? error.message : String(error) };",
    "  }",
    "  res.statusCode = status;",
    "  if (status === 204) {",
    "    res.end();",
    "    return;",
    "  }",
    '  res.setHeader("content-type", "application/json");',
    "  res.end(JSON.stringify(result));",
    "}",
  ];
  if (actions.some((action) => action.payload)) {
    lines.push(
      "",
      "async function readJson(req: IncomingMessage): Promise<unknown> {",
      "  const chunks: Buffer[] = [];",
      "  for await (const chunk of req) {",
      '    chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);',
      "  }",
      '  const text = Buffer.concat(chunks).toString("utf8");',
      '  return text === "" ? undefined : JSON.parse(text);',
      "}",
    );
  }
  lines.push("");
  return lines.join("\n");
});

/* =============================================================================
 * GENERATOR
 * ============================================================================= */

/**
 * Server transport files, one per resource.
 */
export function server(roots: readonly Root[]): SourceFile[] {
  const api = apiRoot("server", roots);
  return api.resources.map((resource) => {
    const data = serverData("server", resource);
    return createSourceFile({
      path: `gen/transport/${snakeCase(resource.name)}_http.ts`,
      sections: (namespace) => [
        headerSection(`${resource.name} HTTP server transport`, namespace, SERVER_IMPORTS),
        section(serviceTemplate, data),
        section(handlersTemplate, data),
        section(mountTemplate, data),
        section(helpersTemplate, data),
      ],
    });
  });
}
