/*
Purpose: unit-level dependency graph, its module collapse, and cycle/toposort helpers.
Assumptions: explicit deps are authoritative; inference is advisory and never fails a build.
Usage: const graph = buildSpecGraph(table, { inferDefault: true, inferrer }); collapseToModuleDag(graph).
*/

import type { DeclarationTable, Unit } from "./declarations.js";
import { DependencyCycleError } from "./errors.js";
import { tryNormalizeUnitRef, unitRefModule, type UnitRef } from "./unit-ref.js";
import { compareStrings } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type SpecGraph = ReadonlyMap<UnitRef, ReadonlySet<UnitRef>>;

export type ModuleDag = ReadonlyMap<string, ReadonlySet<string>>;

export type InferenceResult = {
  refs: UnitRef[];
  warnings: string[];
};

export interface DependencyInferrer {
  infer(unit: Unit, units: DeclarationTable): InferenceResult;
}

export type BuildSpecGraphOptions = {
  inferDefault: boolean;
  inferrer?: DependencyInferrer;
  warnings?: string[];
};

// =============================================================================
// GRAPH BUILDER
// =============================================================================

export function buildSpecGraph(
  units: DeclarationTable,
  options: BuildSpecGraphOptions,
): Map<UnitRef, Set<UnitRef>> {
  const graph = new Map<UnitRef, Set<UnitRef>>();
  for (const ref of units.keys()) {
    graph.set(ref, new Set());
  }

  for (const [ref, unit] of units) {
    const deps = graph.get(ref) ?? new Set<UnitRef>();

    for (const raw of unit.deps) {
      const dep = tryNormalizeUnitRef(raw);
      if (dep === null || dep === ref || !units.has(dep)) continue;
      deps.add(dep);
    }

    const inferEnabled = unit.infer ?? options.inferDefault;
    if (!inferEnabled || !options.inferrer) continue;

    let inferred: InferenceResult;
    try {
      inferred = options.inferrer.infer(unit, units);
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      options.warnings?.push(`dependency inference failed for ${ref}: ${detail}`);
      continue;
    }

    for (const dep of inferred.refs) {
      if (dep !== ref && units.has(dep)) deps.add(dep);
    }
    options.warnings?.push(...inferred.warnings);
  }

  return graph;
}

export function collapseToModuleDag(graph: SpecGraph): Map<string, Set<string>> {
  const dag = new Map<string, Set<string>>();
  const ensure = (moduleName: string): Set<string> => {
    const existing = dag.get(moduleName);
    if (existing) return existing;
    const created = new Set<string>();
    dag.set(moduleName, created);
    return created;
  };

  for (const [ref, deps] of graph) {
    const moduleName = unitRefModule(ref);
    const moduleDeps = ensure(moduleName);
    for (const dep of deps) {
      const depModule = unitRefModule(dep);
      ensure(depModule);
      if (depModule !== moduleName) moduleDeps.add(depModule);
    }
  }

  return dag;
}

/** Maps each node to the nodes that depend on it. */
export function reverseGraph<K extends string>(
  graph: ReadonlyMap<K, ReadonlySet<K>>,
): Map<K, Set<K>> {
  const dependents = new Map<K, Set<K>>();
  for (const [node, deps] of graph) {
    if (!dependents.has(node)) dependents.set(node, new Set());
    for (const dep of deps) {
      const existing = dependents.get(dep);
      if (existing) {
        existing.add(node);
      } else {
        dependents.set(dep, new Set([node]));
      }
    }
  }
  return dependents;
}

// =============================================================================
// CYCLES
// =============================================================================

/**
 * Distinct elementary cycles found by DFS back-edges. Each cycle is rotated
 * so its smallest member comes first.
 */
export function findCycles<K extends string>(graph: ReadonlyMap<K, ReadonlySet<K>>): K[][] {
  const done = new Set<K>();
  const visiting = new Set<K>();
  const stack: K[] = [];
  const seen = new Set<string>();
  const cycles: K[][] = [];

  const visit = (node: K): void => {
    if (done.has(node)) return;
    if (visiting.has(node)) {
      const cycle = stack.slice(stack.indexOf(node));
      const rotated = rotateToSmallest(cycle);
      const key = rotated.join("\u0000");
      if (!seen.has(key)) {
        seen.add(key);
        cycles.push(rotated);
      }
      return;
    }

    visiting.add(node);
    stack.push(node);
    for (const dep of sortedNeighbors(graph, node)) {
      visit(dep);
    }
    stack.pop();
    visiting.delete(node);
    done.add(node);
  };

  for (const node of allNodes(graph)) {
    visit(node);
  }
  return cycles;
}

/** Dependencies first. Throws DependencyCycleError naming the cycle path. */
export function toposort<K extends string>(graph: ReadonlyMap<K, ReadonlySet<K>>): K[] {
  const done = new Set<K>();
  const visiting = new Set<K>();
  const stack: K[] = [];
  const order: K[] = [];

  const visit = (node: K): void => {
    if (done.has(node)) return;
    if (visiting.has(node)) {
      const cycle = stack.slice(stack.indexOf(node));
      throw new DependencyCycleError(
        `Dependency cycle detected: ${[...cycle, node].join(" -> ")}`,
        cycle,
      );
    }

    visiting.add(node);
    stack.push(node);
    for (const dep of sortedNeighbors(graph, node)) {
      visit(dep);
    }
    stack.pop();
    visiting.delete(node);
    done.add(node);
    order.push(node);
  };

  for (const node of allNodes(graph)) {
    visit(node);
  }
  return order;
}

// =============================================================================
// INTERNALS
// =============================================================================

function allNodes<K extends string>(graph: ReadonlyMap<K, ReadonlySet<K>>): K[] {
  const nodes = new Set<K>(graph.keys());
  for (const deps of graph.values()) {
    for (const dep of deps) nodes.add(dep);
  }
  return Array.from(nodes).sort(compareStrings);
}

function sortedNeighbors<K extends string>(graph: ReadonlyMap<K, ReadonlySet<K>>, node: K): K[] {
  return Array.from(graph.get(node) ?? []).sort(compareStrings);
}

function rotateToSmallest<K extends string>(cycle: K[]): K[] {
  let minIndex = 0;
  cycle.forEach((node, index) => {
    const current = cycle[minIndex];
    if (current !== undefined && compareStrings(node, current) < 0) minIndex = index;
  });
  return [...cycle.slice(minIndex), ...cycle.slice(0, minIndex)];
}
