/**
 * Codegen Package - File Descriptor Tests
 */

import { describe, it, expect } from "vitest";
import {
  MAX_PATH_SUFFIX,
  PathCollisionError,
  createSourceFile,
  resolveOutputPath,
} from "@stagegen/codegen";

describe("resolveOutputPath", () => {
  it("returns the natural path when it is free", () => {
    expect(resolveOutputPath("gen/a.ts", new Set(["gen/b.ts"]))).toBe("gen/a.ts");
  });

  it("normalizes the path to POSIX form", () => {
    expect(resolveOutputPath("gen/./sub/../a.ts", new Set())).toBe("gen/a.ts");
  });

  it("fails on a reserved path by default", () => {
    expect(() => resolveOutputPath("gen/a.ts", new Set(["gen/a.ts"]))).toThrow(PathCollisionError);
    expect(() => resolveOutputPath("gen/a.ts", new Set(["gen/a.ts"]))).toThrow(
      'output path "gen/a.ts" is already in use',
    );
  });

  it("picks the first free suffix with the suffix strategy", () => {
    const reserved = new Set(["gen/a.ts", "gen/a_2.ts"]);
    expect(resolveOutputPath("gen/a.ts", reserved, "suffix")).toBe("gen/a_3.ts");
  });

  it("suffixes files without an extension", () => {
    expect(resolveOutputPath("Makefile", new Set(["Makefile"]), "suffix")).toBe("Makefile_2");
  });

  it("gives up after the last suffix", () => {
    const reserved = new Set(["a.ts"]);
    for (let i = 2; i <= MAX_PATH_SUFFIX; i++) {
      reserved.add(`a_${i}.ts`);
    }
    expect(() => resolveOutputPath("a.ts", reserved, "suffix")).toThrow(
      `output path "a.ts" is already in use: no free name up to suffix _${MAX_PATH_SUFFIX}`,
    );
  });
});

describe("createSourceFile", () => {
  it("is pure in the reserved set", () => {
    const file = createSourceFile({ path: "out.ts", sections: () => [], collision: "suffix" });
    const reserved = new Set(["out.ts"]);
    expect(file.outputPath(reserved)).toBe("out_2.ts");
    expect(file.outputPath(reserved)).toBe("out_2.ts");
    expect(file.outputPath(new Set())).toBe("out.ts");
  });

  it("is not a scaffold unless asked", () => {
    expect(createSourceFile({ path: "a.ts", sections: () => [] }).scaffold).toBe(false);
    expect(createSourceFile({ path: "a.ts", sections: () => [], scaffold: true }).scaffold).toBe(true);
  });
});
