import { describe, expect, it } from "vitest";

import { DependencyCycleError } from "./errors.js";
import { criticalPathLengths, runScheduler, type ExecuteResult } from "./scheduler.js";

type Dag = Map<string, Set<string>>;

function dagOf(edges: Record<string, string[]>): Dag {
  return new Map(Object.entries(edges).map(([node, deps]) => [node, new Set(deps)]));
}

function tick(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

describe("runScheduler", () => {
  it("settles a dependency before dispatching its dependent", async () => {
    const dag = dagOf({ a: [], b: ["a"] });
    const timeline: string[] = [];

    const report = await runScheduler({
      moduleDag: dag,
      queuedModules: ["a", "b"],
      staleModules: ["a", "b"],
      jobs: 4,
      execute: async () => {
        await tick();
        return { ok: true, errors: [] };
      },
      hooks: {
        onDispatch: (moduleName) => timeline.push(`dispatch:${moduleName}`),
        onSettled: (outcome) => timeline.push(`settled:${outcome.module}`),
      },
    });

    expect(report.generated).toEqual(new Set(["a", "b"]));
    expect(report.failed.size).toBe(0);
    expect(timeline).toEqual(["dispatch:a", "settled:a", "dispatch:b", "settled:b"]);
  });

  it("fails dependents of a failed module without running them", async () => {
    const dag = dagOf({ a: [], b: ["a"] });
    const executed: string[] = [];

    const report = await runScheduler({
      moduleDag: dag,
      queuedModules: ["a", "b"],
      staleModules: ["a", "b"],
      jobs: 2,
      execute: async (moduleName): Promise<ExecuteResult> => {
        executed.push(moduleName);
        return { ok: false, errors: ["Missing top-level definition: a"] };
      },
    });

    expect(executed).toEqual(["a"]);
    expect(report.generated.size).toBe(0);
    expect(Array.from(report.failed)).toEqual([
      ["a", ["Missing top-level definition: a"]],
      ["b", ["Dependency failed: a"]],
    ]);
  });

  it("lists every failed dependency and propagates transitively", async () => {
    const dag = dagOf({ a: [], b: [], c: ["a", "b"], d: ["c"] });

    const report = await runScheduler({
      moduleDag: dag,
      queuedModules: ["a", "b", "c", "d"],
      staleModules: ["a", "b", "c", "d"],
      jobs: 2,
      execute: async (moduleName) => ({ ok: false, errors: [`boom ${moduleName}`] }),
    });

    expect(report.failed.get("c")).toEqual(["Dependency failed: a", "Dependency failed: b"]);
    expect(report.failed.get("d")).toEqual(["Dependency failed: c"]);
  });

  it("raises a cycle error naming both modules", async () => {
    const run = runScheduler({
      moduleDag: dagOf({ a: ["b"], b: ["a"] }),
      queuedModules: ["a", "b"],
      staleModules: ["a", "b"],
      jobs: 1,
      execute: async () => ({ ok: true, errors: [] }),
    });

    await expect(run).rejects.toBeInstanceOf(DependencyCycleError);
    await expect(run).rejects.toThrow("Dependency cycle detected: a -> b -> a");
    await expect(run).rejects.toMatchObject({ participants: ["a", "b"] });
  });

  it("dispatches by critical path length, then by name", async () => {
    const order: string[] = [];

    await runScheduler({
      moduleDag: dagOf({ x: [], y: [], z: ["y"] }),
      queuedModules: ["x", "y", "z"],
      staleModules: ["x", "y", "z"],
      jobs: 1,
      execute: async (moduleName) => {
        order.push(moduleName);
        return { ok: true, errors: [] };
      },
    });

    expect(order).toEqual(["y", "x", "z"]);
  });

  it("never runs more than `jobs` modules at once", async () => {
    let inFlight = 0;
    let peak = 0;

    const report = await runScheduler({
      moduleDag: dagOf({ a: [], b: [], c: [], d: [], e: [] }),
      queuedModules: ["a", "b", "c", "d", "e"],
      staleModules: ["a", "b", "c", "d", "e"],
      jobs: 2,
      execute: async () => {
        inFlight += 1;
        peak = Math.max(peak, inFlight);
        await tick();
        inFlight -= 1;
        return { ok: true, errors: [] };
      },
    });

    expect(peak).toBe(2);
    expect(report.generated.size).toBe(5);
  });

  it("records rejected executions as unhandled errors", async () => {
    const report = await runScheduler({
      moduleDag: dagOf({ a: [], b: ["a"] }),
      queuedModules: ["a", "b"],
      staleModules: ["a", "b"],
      jobs: 1,
      execute: async () => {
        throw new Error("kaput");
      },
    });

    expect(report.failed.get("a")).toEqual(["Unhandled error: kaput"]);
    expect(report.failed.get("b")).toEqual(["Dependency failed: a"]);
  });

  it("substitutes a placeholder for a failure without errors", async () => {
    const report = await runScheduler({
      moduleDag: dagOf({ a: [] }),
      queuedModules: ["a"],
      staleModules: ["a"],
      jobs: 0,
      execute: async () => ({ ok: false, errors: [] }),
    });

    expect(report.failed.get("a")).toEqual(["Unknown error."]);
  });

  it("skips queued modules that are not stale", async () => {
    const executed: string[] = [];

    const report = await runScheduler({
      moduleDag: dagOf({ a: [], b: ["a"] }),
      queuedModules: ["b", "a"],
      staleModules: ["b", "outside"],
      jobs: 1,
      execute: async (moduleName) => {
        executed.push(moduleName);
        return { ok: true, errors: [] };
      },
    });

    expect(executed).toEqual(["b"]);
    expect(report.skipped).toEqual(new Set(["a"]));
    expect(report.generated).toEqual(new Set(["b"]));
  });
});

describe("criticalPathLengths", () => {
  it("counts the longest chain of dependents", () => {
    const dependents = new Map([
      ["a", new Set(["b", "c"])],
      ["b", new Set(["c"])],
      ["c", new Set<string>()],
    ]);

    expect(Object.fromEntries(criticalPathLengths(["a", "b", "c"], dependents))).toEqual({
      a: 2,
      b: 1,
      c: 0,
    });
  });
});
