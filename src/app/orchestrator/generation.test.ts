import { describe, expect, it } from "vitest";

import { createDeclarationTable, groupUnitsByModule, type Unit } from "../../core/declarations.js";
import { moduleDigest } from "../../core/digest.js";
import { formatArtifact } from "../../core/header.js";
import type { JsonObject } from "../../core/logger.js";
import { makeUnitRef, type UnitRef } from "../../core/unit-ref.js";

import { FakeGenerator, InMemoryArtifactStore } from "./__tests__/fakes.js";
import { createModuleExecutor, expectedTopLevelNames, type ModuleExecutorInput } from "./generation.js";

function makeUnit(module: string, qualname: string, deps: string[] = []): Unit {
  return {
    ref: makeUnitRef(module, qualname),
    module,
    qualname,
    kind: "build",
    text: `/** @jaunt */\nexport declare function ${qualname}(): void;`,
    deps,
  };
}

function makeInput(
  units: Unit[],
  edges: Record<string, string[]>,
  overrides: Partial<ModuleExecutorInput> = {},
): ModuleExecutorInput & { store: InMemoryArtifactStore; generator: FakeGenerator } {
  const table = createDeclarationTable(units);
  const graph = new Map<UnitRef, Set<UnitRef>>();
  for (const unit of units) {
    const deps = (edges[unit.ref] ?? []).map((dep) => {
      const [module = "", qualname = ""] = dep.split(":");
      return makeUnitRef(module, qualname);
    });
    graph.set(unit.ref, new Set(deps));
  }
  return {
    kind: "build",
    moduleUnits: groupUnitsByModule(units),
    units: table,
    graph,
    toolVersion: "0.0.0-test",
    headerComment: "//",
    ...overrides,
    store: new InMemoryArtifactStore(),
    generator: new FakeGenerator(),
  };
}

describe("createModuleExecutor", () => {
  it("writes the artifact with a fresh header and logs the attempt", async () => {
    const foo = makeUnit("a", "foo");
    const events: Array<{ type: string; payload: JsonObject }> = [];
    const input = makeInput([foo], {}, { log: (type, payload) => events.push({ type, payload }) });

    const result = await createModuleExecutor(input)("a");

    expect(result).toEqual({ ok: true, errors: [] });
    const expected = formatArtifact(
      {
        toolVersion: "0.0.0-test",
        kind: "build",
        sourceModule: "a",
        moduleDigest: moduleDigest([foo.ref], input.units, input.graph),
        specRefs: ["a:foo"],
      },
      "export function foo(): void {}\n",
      "//",
    );
    expect(input.store.files.get("a")).toBe(expected);
    expect(events.map((event) => event.type)).toEqual(["module.attempt", "module.generated"]);
  });

  it("retries once with the validation errors as extra context", async () => {
    const input = makeInput([makeUnit("a", "foo")], {});
    input.generator.queueResult("a", "export const bar = 1;\n");

    const result = await createModuleExecutor(input)("a");

    expect(result.ok).toBe(true);
    const calls = input.generator.callsFor("a");
    expect(calls).toHaveLength(2);
    expect(calls[0]?.options.extraErrorContext).toEqual([]);
    expect(calls[1]?.options.extraErrorContext).toEqual([
      "previous output errors: Missing top-level definition: foo",
    ]);
  });

  it("accumulates error context and returns the last errors when every attempt fails", async () => {
    const input = makeInput([makeUnit("a", "foo")], {}, { maxAttempts: 3 });
    input.generator.queueResult("a", "export const bar = 1;\n");
    input.generator.queueResult("a", "export const baz = 2;\n");
    input.generator.queueResult("a", "export function qux() {}\n");

    const result = await createModuleExecutor(input)("a");

    expect(result).toEqual({ ok: false, errors: ["Missing top-level definition: foo"] });
    expect(input.generator.callsFor("a")[2]?.options.extraErrorContext).toEqual([
      "previous output errors: Missing top-level definition: foo",
      "previous output errors: Missing top-level definition: foo",
    ]);
    expect(input.store.files.has("a")).toBe(false);
  });

  it("stops after two attempts by default", async () => {
    const input = makeInput([makeUnit("a", "foo")], {});
    input.generator.queueResult("a", "export const bar = 1;\n");
    input.generator.queueResult("a", "export const baz = 2;\n");

    const result = await createModuleExecutor(input)("a");

    expect(result.ok).toBe(false);
    expect(input.generator.callsFor("a")).toHaveLength(2);
  });

  it("fails the module when the generator rejects", async () => {
    const input = makeInput([makeUnit("a", "foo")], {});
    input.generator.queueResult("a", new Error("boom"));

    const result = await createModuleExecutor(input)("a");

    expect(result).toEqual({ ok: false, errors: ["Generation failed: boom"] });
    expect(input.generator.callsFor("a")).toHaveLength(1);
  });

  it("fails the module when the artifact cannot be written", async () => {
    const input = makeInput([makeUnit("a", "foo")], {});
    input.store.failingWrites.add("a");

    const result = await createModuleExecutor(input)("a");

    expect(result).toEqual({
      ok: false,
      errors: ["Write failed: ENOSPC: no space left on device, write '/virtual/__generated__/a.ts'"],
    });
  });

  it("passes dependency APIs and persisted dependency payloads", async () => {
    const foo = makeUnit("a", "foo");
    const bar = makeUnit("b", "bar");
    const input = makeInput([foo, bar], { "b:bar": ["a:foo"] });
    input.store.files.set(
      "a",
      formatArtifact(
        {
          toolVersion: "0.0.0-test",
          kind: "build",
          sourceModule: "a",
          moduleDigest: "0".repeat(64),
          specRefs: ["a:foo"],
        },
        "export function foo(): void {}",
        "//",
      ),
    );

    await createModuleExecutor(input)("b");

    const context = input.generator.callsFor("b")[0]?.context;
    expect(context?.expectedNames).toEqual(["bar"]);
    expect(Array.from(context?.dependencyApis ?? [])).toEqual([["a:foo", foo.text]]);
    expect(Array.from(context?.dependencyArtifacts ?? [])).toEqual([
      ["a", "export function foo(): void {}\n"],
    ]);
    expect(context?.generatedPath).toBe("/virtual/__generated__/b.ts");
  });

  it("offers every unit of a dependency module, not only the referenced one", async () => {
    const foo = makeUnit("a", "foo");
    const helper = makeUnit("a", "helper");
    const bar = makeUnit("b", "bar");
    const input = makeInput([foo, helper, bar], { "b:bar": ["a:foo"] });

    await createModuleExecutor(input)("b");

    const context = input.generator.callsFor("b")[0]?.context;
    expect(Array.from(context?.dependencyApis.keys() ?? [])).toEqual(["a:foo", "a:helper"]);
    expect(context?.dependencyApis.get(helper.ref)).toBe(helper.text);
  });

  it("prefers content produced earlier in the run over the stored artifact", async () => {
    const input = makeInput([makeUnit("a", "foo"), makeUnit("b", "bar")], {
      "b:bar": ["a:foo"],
    });
    const execute = createModuleExecutor(input);

    await execute("a");
    input.store.files.set("a", "tampered");
    await execute("b");

    const context = input.generator.callsFor("b")[0]?.context;
    expect(context?.dependencyArtifacts.get("a")).toBe("export function foo(): void {}\n");
  });

  it("checks test modules for syntax only and offers the whole build API", async () => {
    const slugify = makeUnit("text/slug", "slugify");
    const pad = makeUnit("text/pad", "pad");
    const testUnit: Unit = {
      ...makeUnit("slug", "lowercases", ["text/slug:slugify"]),
      kind: "test",
    };
    const buildStore = new InMemoryArtifactStore();
    buildStore.files.set(
      "text/slug",
      formatArtifact(
        {
          toolVersion: "0.0.0-test",
          kind: "build",
          sourceModule: "text/slug",
          moduleDigest: "1".repeat(64),
          specRefs: ["text/slug:slugify"],
        },
        "export function slugify(): void {}",
        "//",
      ),
    );
    const input = makeInput([testUnit], {}, {
      kind: "test",
      external: { units: createDeclarationTable([slugify, pad]), store: buildStore },
    });
    input.generator.queueResult("slug", 'import { it } from "vitest";\nit("lowercases", () => {});\n');

    const result = await createModuleExecutor(input)("slug");

    expect(result).toEqual({ ok: true, errors: [] });
    const context = input.generator.callsFor("slug")[0]?.context;
    expect(Array.from(context?.dependencyApis.keys() ?? [])).toEqual([
      "text/pad:pad",
      "text/slug:slugify",
    ]);
    expect(Array.from(context?.dependencyArtifacts ?? [])).toEqual([
      ["text/slug", "export function slugify(): void {}\n"],
    ]);
    expect(input.store.files.get("slug")).toContain("// jaunt:kind=test");
  });

  it("reports modules without units", async () => {
    const input = makeInput([makeUnit("a", "foo")], {});

    const result = await createModuleExecutor(input)("missing");

    expect(result).toEqual({ ok: false, errors: ["No units declared for module missing."] });
  });
});

describe("expectedTopLevelNames", () => {
  it("keeps the first segment of each qualified name once, in unit order", () => {
    const units = [makeUnit("a", "Cache.get"), makeUnit("a", "Cache.set"), makeUnit("a", "helper")];

    expect(expectedTopLevelNames(units)).toEqual(["Cache", "helper"]);
  });
});
