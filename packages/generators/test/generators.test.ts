/**
 * Generators Package - Tests
 *
 * Evaluates a small description in process, runs each generator and writes
 * the result through a writer session.
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { Writer } from "@stagegen/codegen";
import {
  action,
  api,
  basePath,
  del,
  description,
  get,
  payload,
  post,
  resetContext,
  resource,
  roots,
  routing,
  runDSL,
  title,
} from "@stagegen/eval";
import {
  GenerationError,
  camelCase,
  client,
  openApiDocument,
  openApiPath,
  openapi,
  pascalCase,
  pathExpression,
  server,
  serverScaffold,
  snakeCase,
} from "@stagegen/generators";

function describeAccounts(): void {
  api("bank", () => {
    title("Bank API");
    description("Accounts service");
  });
  resource("account", () => {
    basePath("/accounts");
    action("create", () => {
      description("Open an account");
      routing(post(""));
      payload();
    });
    action("list", () => routing(get("")));
    action("show", () => routing(get("/:id")));
    action("delete", () => routing(del("/:id")));
  });
}

let tmp: string;

beforeEach(() => {
  resetContext();
  tmp = fs.mkdtempSync(path.join(os.tmpdir(), "stagegen-generators-"));
  fs.writeFileSync(path.join(tmp, "package.json"), JSON.stringify({ name: "bank" }));
});

afterEach(() => {
  fs.rmSync(tmp, { recursive: true, force: true });
});

async function writeAll(files: ReturnType<typeof server>): Promise<string[]> {
  const writer = new Writer(tmp);
  const written: string[] = [];
  for (const file of files) {
    const out = await writer.write(file);
    if (out !== null) written.push(path.relative(tmp, out).split(path.sep).join("/"));
  }
  return written;
}

function lines(rel: string): string[] {
  return fs.readFileSync(path.join(tmp, rel), "utf8").split("\n");
}

describe("naming", () => {
  it("converts names", () => {
    expect(pascalCase("bank-account")).toBe("BankAccount");
    expect(camelCase("show_one")).toBe("showOne");
    expect(camelCase("showOne")).toBe("showOne");
    expect(snakeCase("BankAccount")).toBe("bank_account");
    expect(pascalCase("2fa")).toBe("_2fa");
  });
});

describe("server", () => {
  it("writes one transport file per resource", async () => {
    describeAccounts();
    runDSL();

    expect(await writeAll(server(roots()))).toEqual(["gen/transport/account_http.ts"]);
  });

  it("keeps only the imports the code uses", async () => {
    describeAccounts();
    runDSL();
    await writeAll(server(roots()));

    const imports = lines("gen/transport/account_http.ts").filter((line) => line.startsWith("import"));
    expect(imports).toEqual([
      'import type { IncomingMessage, ServerResponse } from "node:http";',
      'import { Buffer } from "node:buffer";',
    ]);
  });

  it("renders the service, handlers and mount function", async () => {
    describeAccounts();
    runDSL();
    await writeAll(server(roots()));

    const text = lines("gen/transport/account_http.ts");
    expect(text[0]).toBe("// Code generated by stagegen v0.1.0, DO NOT EDIT.");
    expect(text).toContain("// Module: bank");
    expect(text).toContain("export interface AccountService {");
    expect(text).toContain("  /** Open an account */");
    expect(text).toContain("  create(req: AccountRequest): Promise<unknown>;");
    expect(text).toContain("export function newAccountHttpHandlers(service: AccountService): AccountHttpHandlers {");
    expect(text).toContain("      const body = await readJson(req);");
    expect(text).toContain("export function mountAccountHttpHandlers(mux: Mux, h: AccountHttpHandlers): void {");
    expect(text).toContain('  mux.handle("POST", "/accounts", h.create);');
    expect(text).toContain('  mux.handle("GET", "/accounts", h.list);');
    expect(text).toContain('  mux.handle("GET", "/accounts/:id", h.show);');
    expect(text).toContain('  mux.handle("DELETE", "/accounts/:id", h.delete);');
  });

  it("omits the body reader when no action takes a payload", async () => {
    api("svc");
    resource("status", () => action("ping", () => routing(get("/ping"))));
    runDSL();
    await writeAll(server(roots()));

    const text = lines("gen/transport/status_http.ts");
    expect(text.some((line) => line.includes("readJson"))).toBe(false);
    expect(text.filter((line) => line.startsWith("import"))).toEqual([
      'import type { IncomingMessage, ServerResponse } from "node:http";',
    ]);
  });

  it("drops the util import when an action is named util", async () => {
    api("svc");
    resource("tools", () => action("util", () => routing(get("/util"))));
    runDSL();
    await writeAll(server(roots()));

    const text = lines("gen/transport/tools_http.ts");
    expect(text).toContain("    util: async (_req, res, params) => {");
    expect(text.filter((line) => line.startsWith("import"))).toEqual([
      'import type { IncomingMessage, ServerResponse } from "node:http";',
    ]);
  });

  it("fails when two actions produce the same method", () => {
    api("svc");
    resource("account", () => {
      action("show-one", () => routing(get("/a")));
      action("show_one", () => routing(get("/b")));
    });
    runDSL();

    expect(() => server(roots())).toThrow(GenerationError);
    expect(() => server(roots())).toThrow(
      'server generator: resource "account": actions "show-one" and "show_one" both produce method "showOne"',
    );
  });

  it("fails without an API root", () => {
    expect(() => server([])).toThrow("server generator: no API root in the description");
  });
});

describe("client", () => {
  it("builds request paths from path parameters", () => {
    expect(pathExpression("/accounts/:id")).toBe("`/accounts/${encodeURIComponent(params.id)}`");
    expect(pathExpression("/files/:file-name")).toBe('`/files/${encodeURIComponent(params["file-name"])}`');
    expect(pathExpression("/")).toBe("`/`");
  });

  it("writes a client class per resource", async () => {
    describeAccounts();
    runDSL();

    expect(await writeAll(client(roots()))).toEqual(["gen/client/account_client.ts"]);

    const text = lines("gen/client/account_client.ts");
    expect(text.filter((line) => line.startsWith("import"))).toEqual(['import { URL } from "node:url";']);
    expect(text).toContain("export class AccountClient {");
    expect(text).toContain("  create(body: unknown): Promise<unknown> {");
    expect(text).toContain('    return this.#request("POST", `/accounts`, body);');
    expect(text).toContain("  show(params: { id: string }): Promise<unknown> {");
    expect(text).toContain('    return this.#request("GET", `/accounts/${encodeURIComponent(params.id)}`);');
  });

  it("fails on colliding method names", () => {
    api("svc");
    resource("account", () => {
      action("show-one", () => routing(get("/a")));
      action("show_one", () => routing(get("/b")));
    });
    runDSL();
    expect(() => client(roots())).toThrow(/^client generator: /);
  });
});

describe("openapi", () => {
  it("converts path parameters", () => {
    expect(openApiPath("/accounts/:id")).toBe("/accounts/{id}");
  });

  it("describes every action", () => {
    describeAccounts();
    runDSL();
    const [root] = roots();
    if (!root) throw new Error("no root");

    const doc = openApiDocument(root);

    expect(doc.info).toEqual({ title: "Bank API", version: "1.0", description: "Accounts service" });
    expect(Object.keys(doc.paths)).toEqual(["/accounts", "/accounts/{id}"]);
    expect(Object.keys(doc.paths["/accounts"] ?? {})).toEqual(["post", "get"]);
    expect(doc.paths["/accounts"]?.post).toMatchObject({
      operationId: "account#create",
      tags: ["account"],
      summary: "Open an account",
      requestBody: { required: true },
    });
    expect(doc.paths["/accounts/{id}"]?.delete?.parameters).toEqual([
      { name: "id", in: "path", required: true, schema: { type: "string" } },
    ]);
  });

  it("writes the document verbatim", async () => {
    describeAccounts();
    runDSL();
    const [root] = roots();
    if (!root) throw new Error("no root");

    expect(await writeAll(openapi(roots()))).toEqual(["gen/openapi.json"]);
    expect(fs.readFileSync(path.join(tmp, "gen/openapi.json"), "utf8")).toBe(
      `${JSON.stringify(openApiDocument(root), null, 2)}\n`,
    );
  });

  it("does not check method names", () => {
    api("svc");
    resource("account", () => {
      action("show-one", () => routing(get("/a")));
      action("show_one", () => routing(get("/b")));
    });
    runDSL();
    expect(openapi(roots())).toHaveLength(1);
  });
});

describe("serverScaffold", () => {
  it("writes an implementation stub once", async () => {
    describeAccounts();
    runDSL();

    expect(await writeAll(serverScaffold(roots()))).toEqual(["account_service.ts"]);

    const text = lines("account_service.ts");
    expect(text[0]).toBe(
      "// Scaffolded by stagegen v0.1.0. This file is yours to edit; it is never regenerated.",
    );
    expect(text).toContain('import type { AccountRequest, AccountService } from "./gen/transport/account_http.js";');
    expect(text).toContain("export class AccountServiceImpl implements AccountService {");
    expect(text).toContain('    throw new Error("account.delete is not implemented");');

    fs.writeFileSync(path.join(tmp, "account_service.ts"), "// edited\n");
    expect(await writeAll(serverScaffold(roots()))).toEqual([]);
    expect(fs.readFileSync(path.join(tmp, "account_service.ts"), "utf8")).toBe("// edited\n");
  });
});
