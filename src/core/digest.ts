/*
Purpose: deterministic content fingerprints for units, dependency closures and modules.
Assumptions: graph values only name units present in the table; dangling edges are ignored.
Usage: moduleDigest(refs, units, graph) -> 64 hex chars; pass one cache per run to share work.
*/

import type { DeclarationTable, Unit } from "./declarations.js";
import { DependencyCycleError, JauntError } from "./errors.js";
import type { JsonObject, JsonValue } from "./logger.js";
import type { SpecGraph } from "./spec-graph.js";
import { tryNormalizeUnitRef, type UnitRef } from "./unit-ref.js";
import { compareStrings, sha256Hex } from "./utils.js";

export type DigestCache = Map<UnitRef, string>;

// =============================================================================
// LOCAL DIGEST
// =============================================================================

export function normalizeUnitText(text: string): string {
  const lines = text
    .replace(/\r\n/g, "\n")
    .replace(/\r/g, "\n")
    .split("\n")
    .map((line) => line.trimEnd());

  while (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines.join("\n");
}

export function unitMetadata(unit: Unit): JsonObject {
  const metadata: JsonObject = {
    deps: unit.deps.map((dep) => tryNormalizeUnitRef(dep) ?? dep).sort(compareStrings),
  };
  if (unit.prompt !== undefined) metadata.prompt = unit.prompt;
  if (unit.infer !== undefined) metadata.infer = unit.infer;
  return metadata;
}

export function localDigest(unit: Unit): string {
  const payload = `${normalizeUnitText(unit.text)}\n${canonicalJson(unitMetadata(unit))}`;
  return sha256Hex(payload);
}

export function canonicalJson(value: JsonValue): string {
  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalJson(item)).join(",")}]`;
  }
  if (value !== null && typeof value === "object") {
    const keys = Object.keys(value).sort(compareStrings);
    const entries = keys.map((key) => {
      const item = value[key];
      return `${JSON.stringify(key)}:${item === undefined ? "null" : canonicalJson(item)}`;
    });
    return `{${entries.join(",")}}`;
  }
  return JSON.stringify(value);
}

// =============================================================================
// GRAPH DIGEST
// =============================================================================

type Frame = {
  ref: UnitRef;
  deps: UnitRef[];
  next: number;
};

/**
 * Digest of a unit plus its transitive dependencies. Depth-first with an
 * explicit stack; `cache` doubles as the completed memo.
 */
export function graphDigest(
  ref: UnitRef,
  units: DeclarationTable,
  graph: SpecGraph,
  cache: DigestCache = new Map(),
): string {
  const cached = cache.get(ref);
  if (cached !== undefined) return cached;

  const inProgress = new Set<UnitRef>();
  const path: UnitRef[] = [];
  const stack: Frame[] = [];

  const enter = (next: UnitRef): void => {
    if (!units.has(next)) {
      throw new JauntError(`Unknown unit ${next}`);
    }
    inProgress.add(next);
    path.push(next);
    stack.push({ ref: next, deps: sortedDeps(next, units, graph), next: 0 });
  };

  enter(ref);

  while (stack.length > 0) {
    const frame = stack[stack.length - 1];
    if (!frame) break;

    const dep = frame.deps[frame.next];
    if (dep !== undefined) {
      frame.next += 1;
      if (cache.has(dep)) continue;
      if (inProgress.has(dep)) {
        const participants = path.slice(path.indexOf(dep));
        throw new DependencyCycleError(
          `Dependency cycle detected while hashing: ${[...participants, dep].join(" -> ")}`,
          participants,
        );
      }
      enter(dep);
      continue;
    }

    stack.pop();
    path.pop();
    inProgress.delete(frame.ref);

    const unit = requireUnit(frame.ref, units);
    const childDigests = frame.deps.map((child) => requireDigest(child, cache));
    cache.set(frame.ref, sha256Hex(`${localDigest(unit)}\n${childDigests.join("\n")}`));
  }

  return requireDigest(ref, cache);
}

// =============================================================================
// MODULE DIGEST
// =============================================================================

export function moduleDigest(
  refs: Iterable<UnitRef>,
  units: DeclarationTable,
  graph: SpecGraph,
  cache: DigestCache = new Map(),
): string {
  const digests = Array.from(refs)
    .sort(compareStrings)
    .map((ref) => graphDigest(ref, units, graph, cache))
    .sort(compareStrings);
  return sha256Hex(digests.join("\n"));
}

export function isDigest(value: string): boolean {
  return /^[0-9a-f]{64}$/.test(value);
}

// =============================================================================
// INTERNALS
// =============================================================================

function sortedDeps(ref: UnitRef, units: DeclarationTable, graph: SpecGraph): UnitRef[] {
  const deps = graph.get(ref);
  if (!deps) return [];
  return Array.from(deps)
    .filter((dep) => units.has(dep))
    .sort(compareStrings);
}

function requireUnit(ref: UnitRef, units: DeclarationTable): Unit {
  const unit = units.get(ref);
  if (!unit) {
    throw new JauntError(`Unknown unit ${ref}`);
  }
  return unit;
}

function requireDigest(ref: UnitRef, cache: DigestCache): string {
  const digest = cache.get(ref);
  if (digest === undefined) {
    throw new JauntError(`Digest for ${ref} was not computed`);
  }
  return digest;
}
