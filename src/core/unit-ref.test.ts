import { describe, expect, it } from "vitest";

import { InvalidUnitRefError } from "./errors.js";
import {
  makeUnitRef,
  normalizeUnitRef,
  tryNormalizeUnitRef,
  unitRefModule,
  unitRefQualname,
} from "./unit-ref.js";

describe("normalizeUnitRef", () => {
  it("keeps the colon form and trims whitespace", () => {
    expect(normalizeUnitRef("  text/slug:slugify ")).toBe("text/slug:slugify");
    expect(normalizeUnitRef("cache:LruCache.get")).toBe("cache:LruCache.get");
  });

  it("splits dot shorthand at the last dot", () => {
    expect(normalizeUnitRef("text/slug.slugify")).toBe("text/slug:slugify");
  });

  it("rejects malformed references", () => {
    expect(() => normalizeUnitRef("")).toThrow(InvalidUnitRefError);
    expect(() => normalizeUnitRef("a:b:c")).toThrow("reference must contain at most one ':'");
    expect(() => normalizeUnitRef("slugify")).toThrow("dot shorthand must look like module.Name");
    expect(() => normalizeUnitRef("text//slug:x")).toThrow('invalid module "text//slug"');
    expect(() => normalizeUnitRef("text/slug:1x")).toThrow('invalid qualified name "1x"');
  });

  it("returns null from the non-throwing variant", () => {
    expect(tryNormalizeUnitRef("nope")).toBeNull();
    expect(tryNormalizeUnitRef("a.b")).toBe("a:b");
  });
});

describe("unit ref parts", () => {
  it("splits module and qualified name", () => {
    const ref = makeUnitRef("text/slug", "Slugger.run");

    expect(unitRefModule(ref)).toBe("text/slug");
    expect(unitRefQualname(ref)).toBe("Slugger.run");
  });
});
