/*
Purpose: structural checks on generated TypeScript before it is persisted.
Assumptions: the generator returns a whole module; only syntax and top-level names are checked.
Usage: const errors = validateGeneratedSource(source, ["slugify"]); errors.length === 0 means valid.
*/

import type { Program } from "@babel/types";

import { parseTypeScript, topLevelDeclarations } from "../core/ts-source.js";

// =============================================================================
// PUBLIC API
// =============================================================================

export function validateGeneratedSource(source: string, expectedNames: readonly string[]): string[] {
  let program: Program;
  try {
    program = parseTypeScript(source).program;
  } catch (err) {
    return [formatSyntaxError(err)];
  }

  const defined = definedNames(program);
  return expectedNames
    .filter((name) => !defined.has(name))
    .map((name) => `Missing top-level definition: ${name}`);
}

export function definedNames(program: Program): Set<string> {
  const defined = new Set(topLevelDeclarations(program).map((declaration) => declaration.name));

  for (const statement of program.body) {
    if (statement.type !== "ExportNamedDeclaration" || statement.source) continue;
    for (const specifier of statement.specifiers) {
      if (specifier.type !== "ExportSpecifier") continue;
      defined.add(
        specifier.exported.type === "Identifier" ? specifier.exported.name : specifier.exported.value,
      );
    }
  }

  return defined;
}

// =============================================================================
// INTERNALS
// =============================================================================

type SourceLocation = { line: number; column: number };

function formatSyntaxError(err: unknown): string {
  const rawMessage = err instanceof Error ? err.message : String(err);
  const message = rawMessage.replace(/\s*\(\d+:\d+\)$/, "") || "invalid syntax";
  const loc = errorLocation(err);
  const where = loc ? ` (line ${loc.line}:${loc.column + 1})` : "";
  return `SyntaxError: ${message}${where}`;
}

function errorLocation(err: unknown): SourceLocation | null {
  if (typeof err !== "object" || err === null || !("loc" in err)) return null;
  const loc = err.loc;
  if (
    typeof loc === "object" &&
    loc !== null &&
    "line" in loc &&
    "column" in loc &&
    typeof loc.line === "number" &&
    typeof loc.column === "number"
  ) {
    return { line: loc.line, column: loc.column };
  }
  return null;
}
