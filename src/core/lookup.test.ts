import { describe, expect, it } from "vitest";

import { createDeclarationTable, type Unit } from "./declarations.js";
import { formatArtifact } from "./header.js";
import { describeNotBuilt, lookupUnit, type ArtifactLocator } from "./lookup.js";
import { makeUnitRef } from "./unit-ref.js";

const DIGEST = "a".repeat(64);

function makeUnit(module: string, qualname: string): Unit {
  return {
    ref: makeUnitRef(module, qualname),
    module,
    qualname,
    kind: "build",
    text: `export declare function ${qualname}(): string;`,
    deps: [],
  };
}

class MapLocator implements ArtifactLocator {
  readonly files = new Map<string, string>();

  pathFor(moduleName: string): string {
    return `/gen/${moduleName}.ts`;
  }

  async read(moduleName: string): Promise<string | undefined> {
    if (moduleName === "locked") throw new Error("EACCES");
    return this.files.get(moduleName);
  }
}

const table = createDeclarationTable([
  makeUnit("text/slug", "slugify"),
  makeUnit("text/slug", "unslug"),
  makeUnit("locked", "secret"),
]);

function artifactFor(specRefs: string[], digest: string = DIGEST): string {
  return formatArtifact(
    { toolVersion: "0.3.0", kind: "build", sourceModule: "text/slug", moduleDigest: digest, specRefs },
    "export function slugify(input: string): string {\n  return input;\n}",
    "//",
  );
}

describe("lookupUnit", () => {
  it("returns the payload of a built unit under either reference form", async () => {
    const store = new MapLocator();
    store.files.set("text/slug", artifactFor(["text/slug:slugify", "text/slug:unslug"]));

    const result = await lookupUnit(table, store, "text/slug.slugify");

    expect(result.status).toBe("built");
    if (result.status !== "built") return;
    expect(result.ref).toBe("text/slug:slugify");
    expect(result.artifactPath).toBe("/gen/text/slug.ts");
    expect(result.payload).toBe(
      "export function slugify(input: string): string {\n  return input;\n}\n",
    );
    expect(result.header.moduleDigest).toBe(DIGEST);
  });

  it("reports undeclared and malformed references as unknown units", async () => {
    const store = new MapLocator();

    expect(await lookupUnit(table, store, "text/slug:missing")).toEqual({
      status: "not_built",
      ref: "text/slug:missing",
      reason: "unknown_unit",
    });
    expect(await lookupUnit(table, store, "::")).toEqual({
      status: "not_built",
      ref: "::",
      reason: "unknown_unit",
    });
  });

  it("reports absent and unreadable artifacts as missing", async () => {
    const store = new MapLocator();

    expect(await lookupUnit(table, store, "text/slug:slugify")).toMatchObject({
      reason: "missing_artifact",
    });
    expect(await lookupUnit(table, store, "locked:secret")).toMatchObject({
      reason: "missing_artifact",
    });
  });

  it("rejects artifacts without a usable header", async () => {
    const store = new MapLocator();
    store.files.set("text/slug", "export {};\n");
    expect(await lookupUnit(table, store, "text/slug:slugify")).toMatchObject({
      reason: "invalid_header",
    });

    store.files.set("text/slug", artifactFor(["text/slug:slugify"], "not-a-digest"));
    expect(await lookupUnit(table, store, "text/slug:slugify")).toMatchObject({
      reason: "invalid_header",
    });
  });

  it("reports units the artifact was generated without", async () => {
    const store = new MapLocator();
    store.files.set("text/slug", artifactFor(["text/slug:slugify"]));

    expect(await lookupUnit(table, store, "text/slug:unslug")).toEqual({
      status: "not_built",
      ref: "text/slug:unslug",
      reason: "unit_not_in_artifact",
    });
  });
});

describe("describeNotBuilt", () => {
  it("explains each reason", () => {
    expect(
      describeNotBuilt({ status: "not_built", ref: "text/slug:slugify", reason: "missing_artifact" }),
    ).toBe("No generated artifact exists for text/slug:slugify.");
    expect(describeNotBuilt({ status: "not_built", ref: "x", reason: "unknown_unit" })).toBe(
      "x is not a declared unit.",
    );
  });
});
