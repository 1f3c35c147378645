/*
Purpose: decide which modules need regeneration by comparing persisted and fresh digests.
Assumptions: artifact reads resolve undefined for a missing artifact and reject when unreadable.
Usage: const report = await detectStaleness({ moduleUnits, units, graph, store, force });
*/

import type { DeclarationTable, ModuleUnits } from "./declarations.js";
import { moduleDigest, type DigestCache } from "./digest.js";
import { extractModuleDigest } from "./header.js";
import { reverseGraph, type ModuleDag, type SpecGraph } from "./spec-graph.js";
import { compareStrings } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type StaleReason =
  | "fresh"
  | "forced"
  | "missing"
  | "unreadable"
  | "unparsable"
  | "digest_mismatch"
  | "dependency_stale";

export type StalenessReport = Map<string, StaleReason>;

export interface ArtifactReader {
  read(moduleName: string): Promise<string | undefined>;
}

export type DetectStalenessInput = {
  moduleUnits: ModuleUnits;
  units: DeclarationTable;
  graph: SpecGraph;
  store: ArtifactReader;
  force?: boolean;
  cache?: DigestCache;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function detectStaleness(input: DetectStalenessInput): Promise<StalenessReport> {
  const cache = input.cache ?? new Map();
  const modules = Array.from(input.moduleUnits.keys()).sort(compareStrings);

  const reasons = await Promise.all(
    modules.map(async (moduleName): Promise<StaleReason> => {
      if (input.force) return "forced";

      let existing: string | undefined;
      try {
        existing = await input.store.read(moduleName);
      } catch {
        return "unreadable";
      }
      if (existing === undefined) return "missing";

      const onDisk = extractModuleDigest(existing);
      if (onDisk === null) return "unparsable";

      const refs = (input.moduleUnits.get(moduleName) ?? []).map((unit) => unit.ref);
      const computed = moduleDigest(refs, input.units, input.graph, cache);
      return onDisk === computed ? "fresh" : "digest_mismatch";
    }),
  );

  const report: StalenessReport = new Map();
  modules.forEach((moduleName, index) => {
    report.set(moduleName, reasons[index] ?? "fresh");
  });
  return report;
}

export async function detectStaleModules(input: DetectStalenessInput): Promise<Set<string>> {
  return staleModulesOf(await detectStaleness(input));
}

export function staleModulesOf(report: StalenessReport): Set<string> {
  const stale = new Set<string>();
  for (const [moduleName, reason] of report) {
    if (reason !== "fresh") stale.add(moduleName);
  }
  return stale;
}

/** Adds every transitive dependent of a stale module. */
export function expandStaleModules(
  moduleDag: ModuleDag,
  stale: ReadonlySet<string>,
): Set<string> {
  const dependents = reverseGraph(moduleDag);
  const expanded = new Set(stale);
  const queue = Array.from(stale);

  while (queue.length > 0) {
    const current = queue.pop();
    if (current === undefined) break;
    for (const dependent of dependents.get(current) ?? []) {
      if (expanded.has(dependent)) continue;
      expanded.add(dependent);
      queue.push(dependent);
    }
  }

  return expanded;
}

/** Marks fresh modules that sit downstream of a stale one as `dependency_stale`. */
export function applyDependentExpansion(
  report: StalenessReport,
  moduleDag: ModuleDag,
): StalenessReport {
  const expanded = expandStaleModules(moduleDag, staleModulesOf(report));
  const next: StalenessReport = new Map();
  for (const [moduleName, reason] of report) {
    next.set(
      moduleName,
      reason === "fresh" && expanded.has(moduleName) ? "dependency_stale" : reason,
    );
  }
  return next;
}
