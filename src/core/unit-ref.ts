/**
 * Unit references.
 * Canonical form is `module:Qualified.Name` where module is a `/`-separated
 * path (`text/slug`) and the qualified name is a dotted identifier chain.
 * Dot shorthand (`text/slug.slugify`) splits at the last dot.
 */

import { InvalidUnitRefError } from "./errors.js";

export type UnitRef = string & { readonly __unitRef: unique symbol };

const MODULE_SEGMENT = /^[A-Za-z_$][A-Za-z0-9_$-]*$/;
const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

export function normalizeUnitRef(raw: string): UnitRef {
  const value = raw.trim();
  if (value.length === 0) {
    throw new InvalidUnitRefError(raw, "reference must be non-empty");
  }

  if (value.includes(":")) {
    const parts = value.split(":");
    if (parts.length !== 2) {
      throw new InvalidUnitRefError(raw, "reference must contain at most one ':'");
    }
    const [moduleName = "", qualname = ""] = parts;
    return buildRef(raw, moduleName, qualname);
  }

  const lastDot = value.lastIndexOf(".");
  if (lastDot <= 0) {
    throw new InvalidUnitRefError(raw, "dot shorthand must look like module.Name");
  }
  return buildRef(raw, value.slice(0, lastDot), value.slice(lastDot + 1));
}

export function tryNormalizeUnitRef(raw: string): UnitRef | null {
  try {
    return normalizeUnitRef(raw);
  } catch (err) {
    if (err instanceof InvalidUnitRefError) return null;
    throw err;
  }
}

export function makeUnitRef(moduleName: string, qualname: string): UnitRef {
  return buildRef(`${moduleName}:${qualname}`, moduleName, qualname);
}

export function unitRefModule(ref: UnitRef): string {
  return ref.slice(0, ref.indexOf(":"));
}

export function unitRefQualname(ref: UnitRef): string {
  return ref.slice(ref.indexOf(":") + 1);
}

export function isValidModuleName(moduleName: string): boolean {
  if (moduleName.length === 0) return false;
  return moduleName.split("/").every((segment) => MODULE_SEGMENT.test(segment));
}

export function isValidQualname(qualname: string): boolean {
  if (qualname.length === 0) return false;
  return qualname.split(".").every((part) => IDENTIFIER.test(part));
}

function buildRef(raw: string, moduleName: string, qualname: string): UnitRef {
  if (!isValidModuleName(moduleName)) {
    throw new InvalidUnitRefError(raw, `invalid module "${moduleName}"`);
  }
  if (!isValidQualname(qualname)) {
    throw new InvalidUnitRefError(raw, `invalid qualified name "${qualname}"`);
  }
  return `${moduleName}:${qualname}` as UnitRef;
}
