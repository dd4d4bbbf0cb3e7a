/**
 * Eval Package - DSL Tests
 */

import { describe, it, expect, beforeEach } from "vitest";
import {
  EvalErrors,
  action,
  api,
  basePath,
  context,
  del,
  description,
  fullPath,
  get,
  pathParams,
  payload,
  post,
  resetContext,
  resource,
  roots,
  routing,
  runDSL,
  title,
  version,
} from "@stagegen/eval";

function evalErrors(): string[] {
  try {
    runDSL();
  } catch (error) {
    if (error instanceof EvalErrors) return [...error.errors];
    throw error;
  }
  return [];
}

beforeEach(() => {
  resetContext();
});

describe("runDSL", () => {
  it("evaluates an API and its resources", () => {
    api("bank", () => {
      title("Bank API");
      description("Accounts and transfers");
      version("2.0");
    });
    resource("account", () => {
      basePath("/accounts");
      action("create", () => {
        description("Open an account");
        routing(post(""));
        payload();
      });
      action("show", () => {
        routing(get("/:id"));
      });
    });

    runDSL();
    const [root] = roots();

    expect(root).toMatchObject({ kind: "api", name: "bank", title: "Bank API", version: "2.0" });
    expect(root?.description).toBe("Accounts and transfers");
    expect(root?.resources.map((r) => r.name)).toEqual(["account"]);
    expect(root?.resources[0]?.actions).toEqual([
      { kind: "action", name: "create", description: "Open an account", payload: true, route: { method: "POST", path: "" } },
      { kind: "action", name: "show", payload: false, route: { method: "GET", path: "/:id" } },
    ]);
  });

  it("defaults the API version", () => {
    api("svc");
    resource("thing", () => {
      action("list", () => routing(get("")));
    });
    runDSL();
    expect(roots()[0]?.version).toBe("1.0");
  });

  it("runs bodies only once", () => {
    api("svc");
    resource("thing", () => {
      action("list", () => routing(get("")));
    });
    runDSL();
    runDSL();
    expect(roots()[0]?.resources[0]?.actions).toHaveLength(1);
  });

  it("reports every problem at once", () => {
    resource("account", () => {
      basePath("accounts");
      action("show", () => routing(get("/:id")));
      action("show", () => routing(del("/:id")));
      action("lookup", () => routing(get("/:id")));
      action("open");
    });
    resource("empty");

    expect(evalErrors()).toEqual([
      "no API defined: call api() in the description",
      'resource "account": base path "accounts" must start with "/"',
      'resource "account": action "show" is defined more than once',
      'resource "account": actions "show" and "lookup" both route GET accounts/:id',
      'resource "account": action "open": missing routing',
      'resource "empty": no actions defined',
    ]);
  });

  it("rejects a second API", () => {
    api("one");
    api("two");
    resource("r", () => action("a", () => routing(get(""))));
    expect(evalErrors()).toEqual(['API "two" conflicts with API "one": only one API may be defined']);
  });

  it("rejects duplicate resources", () => {
    api("svc");
    resource("r", () => action("a", () => routing(get(""))));
    resource("r", () => action("b", () => routing(get("/b"))));
    expect(evalErrors()).toEqual(['resource "r" is defined more than once']);
  });

  it("records misplaced calls with their location", () => {
    title("too early");
    api("svc", () => {
      basePath("/nope");
    });
    resource("r", () => {
      action("a", () => {
        routing(get(""));
        routing(post(""));
        action("nested");
      });
    });

    expect(evalErrors()).toEqual([
      "title must be called inside api",
      'API "svc": basePath must be called inside resource',
      'resource "r": action "a": routing is already set to GET /',
      'resource "r": action "a": action must be called inside resource',
    ]);
  });

  it("records errors thrown by a body", () => {
    api("svc", () => {
      throw new Error("bad description");
    });
    resource("r", () => action("a", () => routing(get(""))));
    expect(evalErrors()).toEqual(['API "svc": bad description']);
  });

  it("joins messages one per line", () => {
    resource("r");
    expect(() => runDSL()).toThrow(
      'no API defined: call api() in the description\nresource "r": no actions defined',
    );
  });
});

describe("roots", () => {
  it("fails before the description is evaluated", () => {
    expect(() => roots()).toThrow("roots are not available: the description has not been evaluated");
  });

  it("fails after a failed evaluation", () => {
    resource("r");
    expect(() => runDSL()).toThrow(EvalErrors);
    expect(context.evaluated).toBe(false);
    expect(() => roots()).toThrow("roots are not available");
  });
});

describe("paths", () => {
  it("joins base path and route path", () => {
    const res = { kind: "resource" as const, name: "r", basePath: "/accounts", actions: [] };
    expect(fullPath(res, { method: "GET", path: "/:id" })).toBe("/accounts/:id");
    expect(fullPath(res, { method: "GET", path: "" })).toBe("/accounts");
    expect(fullPath({ ...res, basePath: "" }, { method: "GET", path: "" })).toBe("/");
  });

  it("lists path parameters in order", () => {
    expect(pathParams("/orgs/:org/members/:id")).toEqual(["org", "id"]);
    expect(pathParams("/plain/:")).toEqual([]);
  });
});
