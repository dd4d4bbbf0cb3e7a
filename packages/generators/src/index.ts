/**
 * @stagegen/generators
 *
 * Concrete generators. Each takes the evaluated roots and returns the files
 * to write, or throws a GenerationError naming itself.
 */

export { server, serverData, serviceTemplate, handlersTemplate, mountTemplate, helpersTemplate } from "./server.js";
export type { ServerData, ServerActionData } from "./server.js";
export { serverScaffold, scaffoldTemplate } from "./scaffold.js";
export { client, clientData, clientTemplate, pathExpression } from "./client.js";
export type { ClientData, ClientActionData } from "./client.js";
export { openapi, openApiDocument, openApiPath, openApiTemplate } from "./openapi.js";
export type { OpenApiDocument, OpenApiOperation, OpenApiParameter } from "./openapi.js";
export { GenerationError } from "./errors.js";
export { camelCase, pascalCase, snakeCase, words } from "./naming.js";
