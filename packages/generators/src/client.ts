/**
 * Generators Package - HTTP Client
 *
 * One `gen/client/<resource>_client.ts` per resource with a fetch-based
 * client class, one method per action.
 */

import {
  createSourceFile,
  defineTemplate,
  headerSection,
  section,
  type ImportSpec,
  type SourceFile,
} from "@stagegen/codegen";
import { fullPath, pathParams, type ResourceExpr, type Root } from "@stagegen/eval";
import { GenerationError } from "./errors.js";
import { member, methodNames, pascalCase, propertyKey, snakeCase } from "./naming.js";
import { apiRoot, commentText } from "./roots.js";

export interface ClientActionData {
  method: string;
  description: string;
  httpMethod: string;
  /** Path params in order */
  params: string[];
  /** Request path as a template literal expression */
  pathExpr: string;
  payload: boolean;
}

export interface ClientData {
  resource: string;
  type: string;
  actions: ClientActionData[];
}

const CLIENT_IMPORTS: readonly ImportSpec[] = [
  { path: "node:url", names: ["URL"] },
  { path: "node:querystring", name: "querystring" },
];

export function clientData(generator: string, resource: ResourceExpr): ClientData {
  const methods = methodNames(generator, resource);
  return {
    resource: resource.name,
    type: pascalCase(resource.name),
    actions: resource.actions.map((action) => {
      if (!action.route) {
        throw new GenerationError(generator, `resource "${resource.name}": action "${action.name}" has no route`);
      }
      const path = fullPath(resource, action.route);
      return {
        method: methods.get(action) ?? action.name,
        description: commentText(action.description ?? `Calls the ${action.name} action of the ${resource.name} service.`),
        httpMethod: action.route.method,
        params: pathParams(path),
        pathExpr: pathExpression(path),
        payload: action.payload,
      };
    }),
  };
}

/**
 * `/accounts/:id` becomes `` `/accounts/${encodeURIComponent(params.id)}` ``.
 */
export function pathExpression(path: string): string {
  const segments = path.split("/").map((segment) => {
    if (segment.startsWith(":") && segment.length > 1) {
      return `\${encodeURIComponent(${member("params", segment.slice(1))})}`;
    }
    return segment.replace(/[`\\]/g, "\\$&").replace(/\$\{/g, "\\${");
  });
  return `\`${segments.join("/")}\``;
}

export const clientTemplate = defineTemplate<ClientData>("client", ({ resource, type, actions }) => {
  const lines = [
    `export interface ${type}ClientOptions {`,
    "  /** Scheme, host and port of the service */",
    "  baseUrl: string;",
    "  fetch?: typeof fetch;",
    "  headers?: Record<string, string>;",
    "}",
    "",
    "/**",
    ` * ${type}Client calls the ${resource} service over HTTP.`,
    " */",
    `export class ${type}Client {`,
    "  readonly #baseUrl: string;",
    "  readonly #fetch: typeof fetch;",
    "  readonly #headers: Record<string, string>;",
    "",
    `  constructor(options: ${type}ClientOptions) {`,
    "    this.#baseUrl = options.baseUrl;",
    "    this.#fetch = options.fetch ?? fetch;",
    "    this.#headers = options.headers ?? {};",
    "  }",
  ];

  for (const action of actions) {
    const args: string[] = [];
    if (action.params.length > 0) {
      args.push(`params: { ${action.params.map((p) => `${propertyKey(p)}: string`).join("; ")} }`);
    }
    if (action.payload) {
      args.push("body: unknown");
    }
    const call = action.payload
      ? `this.#request(${JSON.stringify(action.httpMethod)}, ${action.pathExpr}, body)`
      : `this.#request(${JSON.stringify(action.httpMethod)}, ${action.pathExpr})`;
    lines.push(
      "",
      `  /** ${action.description} */`,
      `  ${action.method}(${args.join(", ")}): Promise<unknown> {`,
      `    return ${call};`,
      "  }",
    );
  }

  lines.push(
    "",
    "  async #request(method: string, path: string, body?: unknown): Promise<unknown> {",
    "    const url = new URL(path, this.#baseUrl);",
    "    const headers: Record<string, string> = { accept: \"application/json\", ...this.#headers };",
    "    if (body !== undefined) {",
    "      headers[\"content-type\"] = \"application/json\";",
    "    }",
    "    const res = await this.#fetch(url, {",
    "      method,",
    "      headers,",
    "      body: body === undefined ? undefined : JSON.stringify(body),",
    "    });",
    "    if (!res.ok) {",
    "      throw new Error(`${method} ${url.pathname}: ${res.status} ${res.statusText}`);",
    "    }",
    "    if (res.status === 204) {",
    "      return undefined;",
    "    }",
    "    return res.json();",
    "  }",
    "}",
    "",
  );
  return lines.join("\n");
});

/**
 * Client files, one per resource.
 */
export function client(roots: readonly Root[]): SourceFile[] {
  const api = apiRoot("client", roots);
  return api.resources.map((resource) => {
    const data = clientData("client", resource);
    return createSourceFile({
      path: `gen/client/${snakeCase(resource.name)}_client.ts`,
      sections: (namespace) => [
        headerSection(`${resource.name} HTTP client`, namespace, CLIENT_IMPORTS),
        section(clientTemplate, data),
      ],
    });
  });
}
