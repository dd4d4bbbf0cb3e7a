import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { fileURLToPath } from "node:url";

const here = path.dirname(fileURLToPath(import.meta.url));

/** node_modules of the repository root */
export const rootNodeModules = path.resolve(here, "../../../../node_modules");

export type FixtureName = "accounts" | "colliding";

/**
 * A throwaway project directory: a package.json, node_modules linked to the
 * repository's, and the named description copied in as design.ts.
 */
export function createProject(fixture?: FixtureName): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "stagegen-cli-"));
  fs.writeFileSync(path.join(dir, "package.json"), JSON.stringify({ name: "bank-service", private: true }));
  fs.symlinkSync(rootNodeModules, path.join(dir, "node_modules"), "junction");
  if (fixture) {
    fs.copyFileSync(path.join(here, `${fixture}.ts`), path.join(dir, "design.ts"));
  }
  return dir;
}

export function removeProject(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/** Workspace directories left in `dir` */
export function workspaces(dir: string): string[] {
  return fs.readdirSync(dir).filter((entry) => entry.startsWith(".stagegen-"));
}

/**
 * An application directory inside `project` whose node_modules holds
 * `esm-design`, a description package that only exports for `import`.
 * Returns the application directory.
 */
export function addEsmOnlyDescription(project: string): string {
  const app = path.join(project, "app");
  const pkg = path.join(app, "node_modules", "esm-design");
  fs.mkdirSync(pkg, { recursive: true });
  fs.writeFileSync(
    path.join(pkg, "package.json"),
    JSON.stringify({ name: "esm-design", type: "module", exports: { import: "./index.js" } }),
  );
  fs.writeFileSync(
    path.join(pkg, "index.js"),
    [
      'import { action, api, get, resource, routing } from "@stagegen/eval";',
      "",
      'api("status");',
      'resource("health", () => {',
      '  action("ping", () => {',
      '    routing(get("/ping"));',
      "  });",
      "});",
      "",
    ].join("\n"),
  );
  return app;
}
