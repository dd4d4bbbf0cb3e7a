/**
 * Generators Package - Server Scaffold
 *
 * Starting point for the service implementation. Written once: the writer
 * leaves an existing file alone.
 */

import {
  createSourceFile,
  defineTemplate,
  headerSection,
  section,
  type ImportSpec,
  type SourceFile,
} from "@stagegen/codegen";
import type { Root } from "@stagegen/eval";
import { snakeCase } from "./naming.js";
import { apiRoot } from "./roots.js";
import { serverData, type ServerData } from "./server.js";

export const scaffoldTemplate = defineTemplate<ServerData>("server-scaffold", ({ resource, type, actions }) => {
  const lines = [
    "/**",
    ` * ${type}ServiceImpl implements the ${resource} service.`,
    " */",
    `export class ${type}ServiceImpl implements ${type}Service {`,
  ];
  actions.forEach((action, i) => {
    if (i > 0) lines.push("");
    lines.push(
      `  async ${action.method}(req: ${type}Request): Promise<unknown> {`,
      `    throw new Error(${JSON.stringify(`${resource}.${action.name} is not implemented`)});`,
      "  }",
    );
  });
  lines.push("}", "");
  return lines.join("\n");
});

/**
 * Service implementation stubs, one per resource.
 */
export function serverScaffold(roots: readonly Root[]): SourceFile[] {
  const api = apiRoot("server", roots);
  return api.resources.map((resource) => {
    const data = serverData("server", resource);
    const name = snakeCase(resource.name);
    const imports: ImportSpec[] = [
      {
        path: `./gen/transport/${name}_http.js`,
        names: [`${data.type}Request`, `${data.type}Service`],
        typeOnly: true,
      },
    ];
    return createSourceFile({
      path: `${name}_service.ts`,
      scaffold: true,
      sections: (namespace) => [
        headerSection(`${resource.name} service implementation`, namespace, imports, { scaffold: true }),
        section(scaffoldTemplate, data),
      ],
    });
  });
}
