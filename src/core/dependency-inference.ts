/*
Purpose: best-effort inference of unit dependencies from TypeScript source.
Assumptions: only relative imports can name project modules; anything unresolved yields no edge.
Usage: new TsDependencyInferrer({ sourceRoots }) passed to buildSpecGraph as `inferrer`.
*/

import fs from "node:fs";
import path from "node:path";

import type { File, Node } from "@babel/types";

import type { DeclarationTable, Unit } from "./declarations.js";
import { moduleNameForFile } from "./paths.js";
import type { DependencyInferrer, InferenceResult } from "./spec-graph.js";
import { childNodes, parseTypeScript, topLevelDeclarations } from "./ts-source.js";
import { tryNormalizeUnitRef, type UnitRef } from "./unit-ref.js";

// =============================================================================
// TYPES
// =============================================================================

type ImportBinding = {
  /** Resolved project module, or null for package imports. */
  module: string | null;
  imported: string;
};

type ParsedSourceModule = {
  file: File;
  namedImports: Map<string, ImportBinding>;
  namespaceImports: Map<string, string>;
  reexports: Map<string, ImportBinding>;
};

type NameUses = {
  names: Set<string>;
  chains: Array<{ root: string; attrs: string[] }>;
};

export type TsDependencyInferrerOptions = {
  /** Absolute source roots, used to map resolved files back to module names. */
  sourceRoots: string[];
  readFile?: (filePath: string) => string;
  fileExists?: (filePath: string) => boolean;
};

const SOURCE_EXTENSIONS = [".ts", ".tsx", ".mts", ".cts"];

// =============================================================================
// INFERRER
// =============================================================================

export class TsDependencyInferrer implements DependencyInferrer {
  private readonly sourceRoots: string[];
  private readonly readFile: (filePath: string) => string;
  private readonly fileExists: (filePath: string) => boolean;
  private readonly parseCache = new Map<string, ParsedSourceModule>();

  constructor(options: TsDependencyInferrerOptions) {
    this.sourceRoots = options.sourceRoots.map((root) => path.resolve(root));
    this.readFile = options.readFile ?? ((filePath) => fs.readFileSync(filePath, "utf8"));
    this.fileExists = options.fileExists ?? ((filePath) => fs.existsSync(filePath));
  }

  infer(unit: Unit, units: DeclarationTable): InferenceResult {
    const result: InferenceResult = { refs: [], warnings: [] };
    if (!unit.sourceFile) return result;

    const parsed = this.parseModule(unit.sourceFile);
    const topName = unit.qualname.split(".")[0] ?? unit.qualname;
    const declaration = topLevelDeclarations(parsed.file.program).find(
      (entry) => entry.name === topName,
    );
    if (!declaration) return result;

    const uses = collectNameUses(declaration.node);
    const inferred = new Set<UnitRef>();
    const resolvedNames = new Set<string>();

    const accept = (candidate: UnitRef | null): boolean => {
      if (candidate === null || candidate === unit.ref || !units.has(candidate)) return false;
      inferred.add(candidate);
      return true;
    };

    // Named imports, with one level of re-export through the target module.
    for (const name of uses.names) {
      const binding = parsed.namedImports.get(name);
      if (!binding?.module) continue;
      if (accept(tryNormalizeUnitRef(`${binding.module}:${binding.imported}`))) {
        resolvedNames.add(name);
        continue;
      }
      const reexport = this.resolveReexport(binding);
      if (reexport && accept(tryNormalizeUnitRef(`${reexport.module}:${reexport.imported}`))) {
        resolvedNames.add(name);
      }
    }

    // Same-module siblings.
    for (const name of uses.names) {
      if (accept(tryNormalizeUnitRef(`${unit.module}:${name}`))) {
        resolvedNames.add(name);
      }
    }

    // Qualified chains through namespace imports: ns.sub.Foo tries mod/sub:Foo, then mod:sub.Foo.
    for (const chain of uses.chains) {
      const moduleName = parsed.namespaceImports.get(chain.root);
      if (!moduleName) continue;
      for (let split = chain.attrs.length - 1; split >= 0; split -= 1) {
        const modulePart = [moduleName, ...chain.attrs.slice(0, split)].join("/");
        const qualPart = chain.attrs.slice(split).join(".");
        if (accept(tryNormalizeUnitRef(`${modulePart}:${qualPart}`))) break;
      }
    }

    for (const name of uses.names) {
      if (resolvedNames.has(name)) continue;
      const binding = parsed.namedImports.get(name);
      if (!binding?.module) continue;
      result.warnings.push(
        `unresolved inferred dep: ${unit.ref} uses '${name}' (from import ${binding.module}:${binding.imported}) but it is not a known unit`,
      );
    }

    result.refs = Array.from(inferred).sort();
    return result;
  }

  private parseModule(filePath: string): ParsedSourceModule {
    const key = path.resolve(filePath);
    const cached = this.parseCache.get(key);
    if (cached) return cached;

    const file = parseTypeScript(this.readFile(key), key);
    const parsed: ParsedSourceModule = {
      file,
      namedImports: new Map(),
      namespaceImports: new Map(),
      reexports: new Map(),
    };

    for (const statement of file.program.body) {
      if (statement.type === "ImportDeclaration") {
        const target = this.resolveModule(key, statement.source.value);
        for (const specifier of statement.specifiers) {
          if (specifier.type === "ImportNamespaceSpecifier") {
            if (target) parsed.namespaceImports.set(specifier.local.name, target);
          } else if (specifier.type === "ImportSpecifier") {
            parsed.namedImports.set(specifier.local.name, {
              module: target,
              imported: exportName(specifier.imported),
            });
          }
        }
      } else if (statement.type === "ExportNamedDeclaration" && statement.source) {
        const target = this.resolveModule(key, statement.source.value);
        for (const specifier of statement.specifiers) {
          if (specifier.type !== "ExportSpecifier") continue;
          parsed.reexports.set(exportName(specifier.exported), {
            module: target,
            imported: specifier.local.name,
          });
        }
      }
    }

    this.parseCache.set(key, parsed);
    return parsed;
  }

  private resolveReexport(binding: ImportBinding): ImportBinding | null {
    if (!binding.module) return null;
    const filePath = this.moduleFile(binding.module);
    if (!filePath) return null;
    const reexport = this.parseModule(filePath).reexports.get(binding.imported);
    return reexport?.module ? reexport : null;
  }

  private resolveModule(fromFile: string, specifier: string): string | null {
    if (!specifier.startsWith(".")) return null;
    const base = path.resolve(path.dirname(fromFile), specifier).replace(/\.(c|m)?js$/, "");
    const candidates = [
      ...SOURCE_EXTENSIONS.map((ext) => `${base}${ext}`),
      ...SOURCE_EXTENSIONS.map((ext) => path.join(base, `index${ext}`)),
    ];
    const resolved = candidates.find((candidate) => this.fileExists(candidate));
    if (!resolved) return null;
    return this.moduleForFile(resolved);
  }

  private moduleForFile(filePath: string): string | null {
    for (const root of this.sourceRoots) {
      const moduleName = moduleNameForFile(root, filePath);
      if (moduleName !== null) return moduleName;
    }
    return null;
  }

  private moduleFile(moduleName: string): string | null {
    for (const root of this.sourceRoots) {
      for (const ext of SOURCE_EXTENSIONS) {
        const candidate = path.join(root, `${moduleName}${ext}`);
        if (this.fileExists(candidate)) return candidate;
      }
    }
    return null;
  }
}

// =============================================================================
// NAME COLLECTION
// =============================================================================

const KEY_FIELDS = new Set(["key"]);

export function collectNameUses(root: Node): NameUses {
  const uses: NameUses = { names: new Set(), chains: [] };
  const stack: Node[] = [root];

  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;

    switch (node.type) {
      case "Identifier":
        uses.names.add(node.name);
        continue;
      case "MemberExpression":
      case "OptionalMemberExpression":
      case "TSQualifiedName": {
        const chain = qualifiedChain(node);
        if (chain) {
          uses.names.add(chain.root);
          for (let length = 1; length <= chain.attrs.length; length += 1) {
            uses.chains.push({ root: chain.root, attrs: chain.attrs.slice(0, length) });
          }
          continue;
        }
        break;
      }
      default:
        break;
    }

    // Non-computed property keys and member properties are not references.
    const computed = "computed" in node && node.computed === true;
    const skip = new Set(computed ? [] : KEY_FIELDS);
    if ((node.type === "MemberExpression" || node.type === "OptionalMemberExpression") && !node.computed) {
      skip.add("property");
    }
    stack.push(...childNodes(node, skip).reverse());
  }

  return uses;
}

function qualifiedChain(node: Node): { root: string; attrs: string[] } | null {
  const attrs: string[] = [];
  let current: Node = node;

  while (true) {
    if (
      (current.type === "MemberExpression" || current.type === "OptionalMemberExpression") &&
      !current.computed &&
      current.property.type === "Identifier"
    ) {
      attrs.unshift(current.property.name);
      current = current.object;
      continue;
    }
    if (current.type === "TSQualifiedName") {
      attrs.unshift(current.right.name);
      current = current.left;
      continue;
    }
    break;
  }

  if (current.type !== "Identifier" || attrs.length === 0) return null;
  return { root: current.name, attrs };
}

function exportName(node: Node): string {
  if (node.type === "Identifier") return node.name;
  if (node.type === "StringLiteral") return node.value;
  return "";
}
