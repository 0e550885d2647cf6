import { readFileSync } from "node:fs";

import { describe, it, expect } from "vitest";

function readJson(name: string): unknown {
  return JSON.parse(
    readFileSync(new URL(`../../${name}`, import.meta.url), "utf8")
  );
}

describe("build configuration", () => {
  it("should compile only the sources into dist", () => {
    expect(readJson("tsconfig.build.json")).toEqual({
      extends: "./tsconfig.json",
      include: ["src/**/*.ts"],
    });
  });

  it("should build through the sources-only config", () => {
    expect(readJson("package.json")).toMatchObject({
      scripts: {
        build:
          "tsc -p tsconfig.build.json && cp src/graph/queries.cypher dist/src/graph/queries.cypher",
      },
    });
  });
});
