import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { parseProjectConfig } from "../../core/config-loader.js";
import type { ProjectConfig } from "../../core/config.js";
import { DependencyCycleError, JauntError } from "../../core/errors.js";
import { parseHeader } from "../../core/header.js";

import { FakeClock, FakeGenerator, FakeLogSink } from "./__tests__/fakes.js";
import { buildRunContext, createBuildStore, type RunOptions } from "./run-context.js";
import { loadRunPlan, runBuild, selectTargets } from "./run-engine.js";

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

function makeTempDir(prefix: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
}

function writeFile(root: string, relativePath: string, content: string): void {
  const filePath = path.join(root, relativePath);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content, "utf8");
}

const SLUG_SOURCE = [
  "/**",
  " * Lowercase the input and join words with hyphens.",
  " * @jaunt",
  " */",
  "export function slugify(input: string): string {",
  '  throw new Error("generated");',
  "}",
  "",
].join("\n");

const TITLE_SOURCE = [
  'import { slugify } from "./slug.js";',
  "",
  "/**",
  " * Slug for a page title.",
  " * @jaunt",
  " */",
  "export function titleSlug(title: string): string {",
  "  return slugify(title);",
  "}",
  "",
].join("\n");

type Harness = {
  root: string;
  config: ProjectConfig;
  generator: FakeGenerator;
  logSink: FakeLogSink;
  run: (options?: RunOptions) => ReturnType<typeof runBuild>;
};

function makeProject(): Harness {
  const root = makeTempDir("jaunt-run-");
  writeFile(root, "src/text/slug.ts", SLUG_SOURCE);
  writeFile(root, "src/text/title.ts", TITLE_SOURCE);
  const config = parseProjectConfig("build:\n  jobs: 2\n", path.join(root, ".jaunt", "config.yaml"));
  const generator = new FakeGenerator();
  const logSink = new FakeLogSink(path.join(root, ".jaunt", "logs"));

  const run = (options: RunOptions = {}) =>
    runBuild(
      buildRunContext({
        config,
        kind: "build",
        options: { runId: "run-1", ...options },
        ports: { generator, logSink, clock: new FakeClock() },
      }),
    );

  return { root, config, generator, logSink, run };
}

describe("runBuild", () => {
  it("generates modules in dependency order and writes headed artifacts", async () => {
    const { root, generator, run } = makeProject();

    const { report, staleness } = await run();

    expect(Array.from(report.generated).sort()).toEqual(["text/slug", "text/title"]);
    expect(report.failed.size).toBe(0);
    expect(generator.calls.map((call) => call.moduleName)).toEqual(["text/slug", "text/title"]);
    expect(staleness.get("text/slug")).toBe("missing");

    const artifact = fs.readFileSync(path.join(root, "src/__generated__/text/title.ts"), "utf8");
    const header = parseHeader(artifact);
    expect(header?.comment).toBe("//");
    expect(header?.sourceModule).toBe("text/title");
    expect(header?.specRefs).toEqual(["text/title:titleSlug"]);
    expect(artifact.endsWith("export function titleSlug(): void {}\n")).toBe(true);

    const titleContext = generator.callsFor("text/title")[0]?.context;
    expect(Array.from(titleContext?.dependencyApis.keys() ?? [])).toEqual(["text/slug:slugify"]);
    expect(titleContext?.dependencyArtifacts.get("text/slug")).toBe(
      "export function slugify(): void {}\n",
    );
  });

  it("skips every module on an unchanged second run", async () => {
    const { generator, run } = makeProject();
    await run();
    const callsAfterFirstRun = generator.calls.length;

    const { report, staleness } = await run();

    expect(report.generated.size).toBe(0);
    expect(Array.from(report.skipped)).toEqual(["text/slug", "text/title"]);
    expect(Array.from(staleness.values())).toEqual(["fresh", "fresh"]);
    expect(generator.calls).toHaveLength(callsAfterFirstRun);
  });

  it("regenerates a changed module and its dependents", async () => {
    const { root, generator, run } = makeProject();
    await run();
    writeFile(
      root,
      "src/text/slug.ts",
      SLUG_SOURCE.replace("join words with hyphens", "join words with underscores"),
    );
    generator.calls.length = 0;

    const { report, staleness } = await run();

    expect(staleness.get("text/slug")).toBe("digest_mismatch");
    expect(staleness.get("text/title")).toBe("digest_mismatch");
    expect(Array.from(report.generated).sort()).toEqual(["text/slug", "text/title"]);
    expect(generator.calls.map((call) => call.moduleName)).toEqual(["text/slug", "text/title"]);
  });

  it("regenerates everything when forced", async () => {
    const { run } = makeProject();
    await run();

    const { report, staleness } = await run({ force: true });

    expect(Array.from(staleness.values())).toEqual(["forced", "forced"]);
    expect(report.generated.size).toBe(2);
  });

  it("propagates a failure to dependents without generating them", async () => {
    const { generator, logSink, run } = makeProject();
    generator.queueResult("text/slug", new Error("provider down"));

    const { report } = await run();

    expect(report.generated.size).toBe(0);
    expect(report.failed.get("text/slug")).toEqual(["Generation failed: provider down"]);
    expect(report.failed.get("text/title")).toEqual(["Dependency failed: text/slug"]);
    expect(generator.callsFor("text/title")).toHaveLength(0);
    expect(logSink.eventsOfType("module.dependency_failed")).toHaveLength(1);
  });

  it("logs the run lifecycle", async () => {
    const { logSink, run } = makeProject();

    const { logPath } = await run();

    const types = logSink.events.map((event) => event.type);
    expect(types[0]).toBe("build.start");
    expect(types[types.length - 1]).toBe("build.complete");
    expect(logSink.eventsOfType("module.dispatch")).toHaveLength(2);
    expect(logSink.eventsOfType("build.complete")[0]?.payload).toEqual({
      kind: "build",
      generated: ["text/slug", "text/title"],
      skipped: 0,
      failed: [],
      finished_at: "2024-01-01T00:00:00.000Z",
    });
    expect(fs.existsSync(logPath)).toBe(true);
  });

  it("only queues the dependency closure of the requested targets", async () => {
    const { root, generator, run } = makeProject();
    writeFile(
      root,
      "src/misc/other.ts",
      "/**\n * Unrelated.\n * @jaunt\n */\nexport function other(): number {\n  return 1;\n}\n",
    );

    const { queued } = await run({ targets: ["text/title"] });

    expect(Array.from(queued).sort()).toEqual(["text/slug", "text/title"]);
    expect(generator.callsFor("misc/other")).toHaveLength(0);
  });

  it("rejects dependency cycles before generating anything", async () => {
    const root = makeTempDir("jaunt-cycle-");
    writeFile(root, "src/a.ts", "/**\n * @jaunt\n * @deps b:beta\n */\nexport function alpha() {}\n");
    writeFile(root, "src/b.ts", "/**\n * @jaunt\n * @deps a:alpha\n */\nexport function beta() {}\n");
    const config = parseProjectConfig("", path.join(root, ".jaunt", "config.yaml"));
    const context = buildRunContext({ config, kind: "build", options: { runId: "cycle" } });

    const error = await loadRunPlan(context).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(DependencyCycleError);
    const participants = error instanceof DependencyCycleError ? error.participants : [];
    expect(participants).toEqual(["a:alpha", "b:beta"]);
  });
});

describe("selectTargets", () => {
  const dag = new Map([
    ["a", new Set<string>()],
    ["b", new Set(["a"])],
    ["c", new Set(["b"])],
    ["d", new Set<string>()],
  ]);

  it("selects every module without targets", () => {
    expect(Array.from(selectTargets(dag)).sort()).toEqual(["a", "b", "c", "d"]);
  });

  it("adds the transitive dependencies of each target", () => {
    expect(Array.from(selectTargets(dag, ["c"])).sort()).toEqual(["a", "b", "c"]);
  });

  it("rejects unknown modules", () => {
    expect(() => selectTargets(dag, ["zeta", "d"])).toThrow(JauntError);
    expect(() => selectTargets(dag, ["zeta"])).toThrow("Unknown target module(s): zeta");
  });
});

describe("createBuildStore", () => {
  it("places build artifacts under the first source root", () => {
    const config = parseProjectConfig("", "/proj/.jaunt/config.yaml");

    expect(createBuildStore(config).pathFor("text/slug")).toBe(
      path.resolve("/proj/src/__generated__/text/slug.ts"),
    );
  });
});
