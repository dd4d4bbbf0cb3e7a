/**
 * Generators Package - OpenAPI
 *
 * A single `gen/openapi.json` document (OpenAPI 3.0.3) describing every
 * action of the API.
 */

import { createSourceFile, defineTemplate, section, type SourceFile } from "@stagegen/codegen";
import { fullPath, pathParams, type ApiExpr, type Root } from "@stagegen/eval";
import { GenerationError } from "./errors.js";
import { apiRoot } from "./roots.js";

export interface OpenApiParameter {
  name: string;
  in: "path";
  required: true;
  schema: { type: "string" };
}

export interface OpenApiOperation {
  operationId: string;
  tags: string[];
  summary?: string;
  parameters?: OpenApiParameter[];
  requestBody?: {
    required: true;
    content: { "application/json": { schema: { type: "object" } } };
  };
  responses: Record<string, { description: string }>;
}

export interface OpenApiDocument {
  openapi: "3.0.3";
  info: { title: string; version: string; description?: string };
  paths: Record<string, Record<string, OpenApiOperation>>;
}

/**
 * `/accounts/:id` becomes `/accounts/{id}`.
 */
export function openApiPath(path: string): string {
  return path
    .split("/")
    .map((segment) => (segment.startsWith(":") && segment.length > 1 ? `{${segment.slice(1)}}` : segment))
    .join("/");
}

export function openApiDocument(api: ApiExpr): OpenApiDocument {
  const doc: OpenApiDocument = {
    openapi: "3.0.3",
    info: { title: api.title ?? api.name, version: api.version },
    paths: {},
  };
  if (api.description) {
    doc.info.description = api.description;
  }

  for (const resource of api.resources) {
    for (const action of resource.actions) {
      if (!action.route) {
        throw new GenerationError("openapi", `resource "${resource.name}": action "${action.name}" has no route`);
      }
      const path = fullPath(resource, action.route);
      const key = openApiPath(path);
      const operation: OpenApiOperation = {
        operationId: `${resource.name}#${action.name}`,
        tags: [resource.name],
        responses: {
          "200": { description: "OK" },
          "204": { description: "No Content" },
        },
      };
      if (action.description) {
        operation.summary = action.description;
      }
      const params = pathParams(path);
      if (params.length > 0) {
        operation.parameters = params.map((name) => ({ name, in: "path", required: true, schema: { type: "string" } }));
      }
      if (action.payload) {
        operation.requestBody = {
          required: true,
          content: { "application/json": { schema: { type: "object" } } },
        };
      }
      const item = (doc.paths[key] ??= {});
      item[action.route.method.toLowerCase()] = operation;
    }
  }
  return doc;
}

export const openApiTemplate = defineTemplate<OpenApiDocument>(
  "openapi",
  (doc) => `${JSON.stringify(doc, null, 2)}\n`,
);

/**
 * The OpenAPI document of the API.
 */
export function openapi(roots: readonly Root[]): SourceFile[] {
  const doc = openApiDocument(apiRoot("openapi", roots));
  return [
    createSourceFile({
      path: "gen/openapi.json",
      sections: () => [section(openApiTemplate, doc)],
    }),
  ];
}
