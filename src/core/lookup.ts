/*
Purpose: answer "has this unit been built?" without exceptions for the expected outcomes.
Assumptions: the declaration table is static for the invocation; artifacts may be absent or stale.
Usage: const result = await lookupUnit(table, store, "text/slug:slugify"); if (result.status === "built") ...
*/

import type { DeclarationTable } from "./declarations.js";
import { isDigest } from "./digest.js";
import { splitArtifact, type ParsedHeader } from "./header.js";
import type { ArtifactReader } from "./staleness.js";
import { tryNormalizeUnitRef, type UnitRef } from "./unit-ref.js";

export type NotBuiltReason =
  | "unknown_unit"
  | "missing_artifact"
  | "invalid_header"
  | "unit_not_in_artifact";

export type BuiltUnit = {
  status: "built";
  ref: UnitRef;
  module: string;
  artifactPath: string;
  payload: string;
  header: ParsedHeader;
};

export type NotBuiltUnit = {
  status: "not_built";
  ref: string;
  reason: NotBuiltReason;
};

export type LookupResult = BuiltUnit | NotBuiltUnit;

export interface ArtifactLocator extends ArtifactReader {
  pathFor(moduleName: string): string;
}

export async function lookupUnit(
  table: DeclarationTable,
  store: ArtifactLocator,
  rawRef: string,
): Promise<LookupResult> {
  const ref = tryNormalizeUnitRef(rawRef);
  const unit = ref === null ? undefined : table.get(ref);
  if (ref === null || !unit) {
    return { status: "not_built", ref: rawRef, reason: "unknown_unit" };
  }

  let text: string | undefined;
  try {
    text = await store.read(unit.module);
  } catch {
    text = undefined;
  }
  if (text === undefined) {
    return { status: "not_built", ref, reason: "missing_artifact" };
  }

  const split = splitArtifact(text);
  const digest = split?.header.moduleDigest;
  if (!split || digest === undefined || !isDigest(digest) || !split.header.specRefs) {
    return { status: "not_built", ref, reason: "invalid_header" };
  }

  if (!split.header.specRefs.includes(ref)) {
    return { status: "not_built", ref, reason: "unit_not_in_artifact" };
  }

  return {
    status: "built",
    ref,
    module: unit.module,
    artifactPath: store.pathFor(unit.module),
    payload: split.payload,
    header: split.header,
  };
}

export function describeNotBuilt(result: NotBuiltUnit): string {
  switch (result.reason) {
    case "unknown_unit":
      return `${result.ref} is not a declared unit.`;
    case "missing_artifact":
      return `No generated artifact exists for ${result.ref}.`;
    case "invalid_header":
      return `The artifact for ${result.ref} has a missing or malformed header.`;
    case "unit_not_in_artifact":
      return `The artifact for ${result.ref} was generated without this unit.`;
  }
}
