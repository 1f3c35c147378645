/*
Purpose: run stale modules in dependency order with bounded concurrency and failure propagation.
Assumptions: `execute` owns retries; the scheduler only sees terminal outcomes.
Usage: const report = await runScheduler({ moduleDag, queuedModules, staleModules, jobs, execute });
*/

import { formatErrorMessage } from "./error-format.js";
import { DependencyCycleError } from "./errors.js";
import { findCycles, reverseGraph, toposort, type ModuleDag } from "./spec-graph.js";
import { compareStrings, sortedStrings } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type BuildReport = {
  generated: Set<string>;
  skipped: Set<string>;
  failed: Map<string, string[]>;
};

export type ExecuteResult = {
  ok: boolean;
  errors: string[];
};

export type ModuleExecutor = (moduleName: string) => Promise<ExecuteResult>;

export type ModuleOutcome = ExecuteResult & {
  module: string;
  /** True when the module failed because a dependency failed; it never ran. */
  propagated: boolean;
};

export type SchedulerHooks = {
  onDispatch?: (moduleName: string) => void;
  onSettled?: (outcome: ModuleOutcome) => void;
};

export type SchedulerInput = {
  moduleDag: ModuleDag;
  queuedModules: Iterable<string>;
  staleModules: Iterable<string>;
  jobs: number;
  execute: ModuleExecutor;
  hooks?: SchedulerHooks;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function runScheduler(input: SchedulerInput): Promise<BuildReport> {
  const jobs = clampJobs(input.jobs);
  const queued = new Set(input.queuedModules);
  const stale = new Set(Array.from(input.staleModules).filter((m) => queued.has(m)));
  const skipped = new Set(sortedStrings(queued).filter((m) => !stale.has(m)));

  const generated = new Set<string>();
  const failed = new Map<string, string[]>();
  if (stale.size === 0) {
    return { generated, skipped, failed };
  }

  const depsInStale = inducedSubgraph(input.moduleDag, stale);
  const order = toposort(depsInStale);
  const dependents = reverseGraph(depsInStale);
  const priority = criticalPathLengths(order, dependents);

  const indegree = new Map<string, number>();
  const ready = new ReadyQueue(priority);
  for (const [moduleName, deps] of depsInStale) {
    indegree.set(moduleName, deps.size);
    if (deps.size === 0) ready.push(moduleName);
  }

  const completed = new Set<string>();
  const inFlight = new Map<string, Promise<ModuleOutcome>>();

  const settle = (outcome: ModuleOutcome): void => {
    completed.add(outcome.module);
    if (outcome.ok) {
      generated.add(outcome.module);
    } else {
      failed.set(outcome.module, outcome.errors.length > 0 ? outcome.errors : ["Unknown error."]);
    }
    input.hooks?.onSettled?.(outcome);
  };

  const release = (moduleName: string): void => {
    const pending = [moduleName];
    while (pending.length > 0) {
      const current = pending.pop();
      if (current === undefined) break;

      for (const dependent of sortedStrings(dependents.get(current) ?? [])) {
        if (completed.has(dependent)) continue;
        const remaining = (indegree.get(dependent) ?? 0) - 1;
        indegree.set(dependent, remaining);
        if (remaining !== 0) continue;

        const failedDeps = sortedStrings(depsInStale.get(dependent) ?? []).filter((dep) =>
          failed.has(dep),
        );
        if (failedDeps.length === 0) {
          ready.push(dependent);
          continue;
        }

        settle({
          module: dependent,
          ok: false,
          errors: failedDeps.map((dep) => `Dependency failed: ${dep}`),
          propagated: true,
        });
        pending.push(dependent);
      }
    }
  };

  const dispatch = async (moduleName: string): Promise<ModuleOutcome> => {
    try {
      const result = await input.execute(moduleName);
      return { module: moduleName, ok: result.ok, errors: result.errors, propagated: false };
    } catch (err) {
      return {
        module: moduleName,
        ok: false,
        errors: [`Unhandled error: ${formatErrorMessage(err)}`],
        propagated: false,
      };
    }
  };

  while (ready.size > 0 || inFlight.size > 0) {
    while (ready.size > 0 && inFlight.size < jobs) {
      const next = ready.pop();
      if (next === undefined || completed.has(next)) continue;
      input.hooks?.onDispatch?.(next);
      inFlight.set(next, dispatch(next));
    }

    if (inFlight.size === 0) break;

    const outcome = await Promise.race(inFlight.values());
    inFlight.delete(outcome.module);
    settle(outcome);
    release(outcome.module);
  }

  const remaining = new Set(sortedStrings(stale).filter((m) => !completed.has(m)));
  if (remaining.size > 0) {
    throw remainingCycleError(inducedSubgraph(depsInStale, remaining), remaining);
  }

  return { generated, skipped, failed };
}

/**
 * Longest downstream chain per module: 0 without dependents, else
 * 1 + the maximum over its dependents. `order` lists dependencies first.
 */
export function criticalPathLengths(
  order: readonly string[],
  dependents: ReadonlyMap<string, ReadonlySet<string>>,
): Map<string, number> {
  const lengths = new Map<string, number>();
  for (let index = order.length - 1; index >= 0; index -= 1) {
    const moduleName = order[index];
    if (moduleName === undefined) continue;
    let length = 0;
    for (const dependent of dependents.get(moduleName) ?? []) {
      length = Math.max(length, (lengths.get(dependent) ?? 0) + 1);
    }
    lengths.set(moduleName, length);
  }
  return lengths;
}

// =============================================================================
// INTERNALS
// =============================================================================

function clampJobs(jobs: number): number {
  if (!Number.isFinite(jobs)) return 1;
  return Math.max(1, Math.floor(jobs));
}

function inducedSubgraph(dag: ModuleDag, members: ReadonlySet<string>): Map<string, Set<string>> {
  const induced = new Map<string, Set<string>>();
  for (const moduleName of sortedStrings(members)) {
    const deps = Array.from(dag.get(moduleName) ?? []).filter((dep) => members.has(dep));
    induced.set(moduleName, new Set(deps));
  }
  return induced;
}

function remainingCycleError(
  graph: ReadonlyMap<string, ReadonlySet<string>>,
  remaining: ReadonlySet<string>,
): DependencyCycleError {
  const [cycle] = findCycles(graph);
  const first = cycle?.[0];
  const message =
    cycle && first !== undefined
      ? `Dependency cycle detected: ${[...cycle, first].join(" -> ")}`
      : `Dependency cycle detected among: ${sortedStrings(remaining).join(", ")}`;
  return new DependencyCycleError(message, remaining);
}

/** Highest priority first, then ascending name. */
class ReadyQueue {
  private readonly items: string[] = [];

  constructor(private readonly priority: ReadonlyMap<string, number>) {}

  get size(): number {
    return this.items.length;
  }

  push(moduleName: string): void {
    let low = 0;
    let high = this.items.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      const current = this.items[mid];
      if (current !== undefined && this.compare(current, moduleName) <= 0) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }
    this.items.splice(low, 0, moduleName);
  }

  pop(): string | undefined {
    return this.items.shift();
  }

  private compare(a: string, b: string): number {
    const byPriority = (this.priority.get(b) ?? 0) - (this.priority.get(a) ?? 0);
    return byPriority !== 0 ? byPriority : compareStrings(a, b);
  }
}
