/*
Purpose: shared TypeScript parsing helpers for discovery, inference and validation.
Assumptions: sources are ES modules; babel attaches comments to the outermost statement.
Usage: const file = parseTypeScript(code, filePath); topLevelDeclarations(file.program).
*/

import { parse, type ParseResult } from "@babel/parser";
import type { File, Node, Program, Statement } from "@babel/types";

export type TopLevelDeclaration = {
  name: string;
  /** The statement as written, including any `export` wrapper. */
  statement: Statement;
  /** The declaration node itself. */
  node: Node;
  exported: boolean;
};

export function parseTypeScript(code: string, filePath?: string): ParseResult<File> {
  return parse(code, {
    sourceType: "module",
    sourceFilename: filePath,
    plugins: ["typescript", "decorators-legacy", "importMeta", "topLevelAwait"],
  });
}

export function topLevelDeclarations(program: Program): TopLevelDeclaration[] {
  const out: TopLevelDeclaration[] = [];

  for (const statement of program.body) {
    if (statement.type === "ExportNamedDeclaration") {
      if (statement.declaration) {
        for (const [name, node] of declarationNames(statement.declaration)) {
          out.push({ name, statement, node, exported: true });
        }
      }
      continue;
    }

    if (statement.type === "ExportDefaultDeclaration") {
      const declaration = statement.declaration;
      if (
        (declaration.type === "FunctionDeclaration" || declaration.type === "ClassDeclaration") &&
        declaration.id
      ) {
        out.push({ name: declaration.id.name, statement, node: declaration, exported: true });
      }
      continue;
    }

    for (const [name, node] of declarationNames(statement)) {
      out.push({ name, statement, node, exported: false });
    }
  }

  return out;
}

export function isNode(value: unknown): value is Node {
  return (
    typeof value === "object" &&
    value !== null &&
    "type" in value &&
    typeof value.type === "string"
  );
}

const NON_CHILD_KEYS = new Set([
  "type",
  "loc",
  "start",
  "end",
  "range",
  "extra",
  "leadingComments",
  "trailingComments",
  "innerComments",
]);

/** Child nodes in field order, skipping position and comment metadata. */
export function childNodes(node: Node, skipKeys: ReadonlySet<string> = new Set()): Node[] {
  const children: Node[] = [];
  for (const [key, value] of Object.entries(node)) {
    if (NON_CHILD_KEYS.has(key) || skipKeys.has(key)) continue;
    if (Array.isArray(value)) {
      for (const item of value) {
        if (isNode(item)) children.push(item);
      }
    } else if (isNode(value)) {
      children.push(value);
    }
  }
  return children;
}

function declarationNames(node: Node): Array<[string, Node]> {
  switch (node.type) {
    case "FunctionDeclaration":
    case "ClassDeclaration":
      return node.id ? [[node.id.name, node]] : [];
    case "TSDeclareFunction":
      return node.id ? [[node.id.name, node]] : [];
    case "TSInterfaceDeclaration":
    case "TSTypeAliasDeclaration":
    case "TSEnumDeclaration":
      return [[node.id.name, node]];
    case "VariableDeclaration":
      return node.declarations.flatMap((declarator): Array<[string, Node]> =>
        declarator.id.type === "Identifier" ? [[declarator.id.name, node]] : [],
      );
    default:
      return [];
  }
}
