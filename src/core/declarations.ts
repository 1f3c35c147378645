import { type UnitRef } from "./unit-ref.js";
import { compareStrings } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type UnitKind = "build" | "test";

export type Unit = {
  ref: UnitRef;
  module: string;
  qualname: string;
  kind: UnitKind;
  /** Declaration text, JSDoc included. */
  text: string;
  prompt?: string;
  /** Raw `@deps` entries; normalized by the graph builder. */
  deps: string[];
  /** Per-unit inference override. Undefined falls back to the global default. */
  infer?: boolean;
  sourceFile?: string;
};

export type DeclarationTable = ReadonlyMap<UnitRef, Unit>;

export type ModuleUnits = ReadonlyMap<string, readonly Unit[]>;

// =============================================================================
// PUBLIC API
// =============================================================================

export function createDeclarationTable(units: Iterable<Unit>): Map<UnitRef, Unit> {
  const table = new Map<UnitRef, Unit>();
  for (const unit of units) {
    table.set(unit.ref, unit);
  }
  return table;
}

/**
 * Groups units by module. Modules come out in name order; units inside a
 * module are ordered by qualified name, then reference.
 */
export function groupUnitsByModule(units: Iterable<Unit>): Map<string, Unit[]> {
  const grouped = new Map<string, Unit[]>();
  for (const unit of units) {
    const existing = grouped.get(unit.module);
    if (existing) {
      existing.push(unit);
    } else {
      grouped.set(unit.module, [unit]);
    }
  }

  const ordered = new Map<string, Unit[]>();
  for (const moduleName of Array.from(grouped.keys()).sort(compareStrings)) {
    const moduleUnits = grouped.get(moduleName) ?? [];
    ordered.set(moduleName, moduleUnits.sort(compareUnits));
  }
  return ordered;
}

export function compareUnits(a: Unit, b: Unit): number {
  return compareStrings(a.qualname, b.qualname) || compareStrings(a.ref, b.ref);
}
