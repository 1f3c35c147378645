/*
Purpose: find `@jaunt`-tagged declarations under the configured roots and build Units from them.
Assumptions: one module per file; the JSDoc block directly above a declaration carries its tags.
Usage: const { units, warnings } = await discoverUnits({ projectRoot, roots: ["src"], kind: "build" });
*/

import fsp from "node:fs/promises";
import path from "node:path";

import type { Comment, Program } from "@babel/types";
import fse from "fs-extra";
import { minimatch } from "minimatch";

import type { Unit, UnitKind } from "./declarations.js";
import { DiscoveryError } from "./errors.js";
import { moduleNameForFile } from "./paths.js";
import { parseTypeScript, topLevelDeclarations } from "./ts-source.js";
import { makeUnitRef, isValidModuleName, type UnitRef } from "./unit-ref.js";
import { compareStrings, toPosixPath } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type DiscoverUnitsInput = {
  projectRoot: string;
  roots: string[];
  kind: UnitKind;
  include?: string[];
  exclude?: string[];
  generatedDir?: string;
};

export type DiscoveryResult = {
  units: Unit[];
  warnings: string[];
};

export type JauntTags = {
  deps: string[];
  prompt?: string;
  infer?: boolean;
};

const DEFAULT_INCLUDE = ["**/*.ts"];
const SKIPPED_DIRS = new Set(["node_modules", ".git", ".jaunt"]);

// =============================================================================
// PUBLIC API
// =============================================================================

export async function discoverUnits(input: DiscoverUnitsInput): Promise<DiscoveryResult> {
  const include = input.include && input.include.length > 0 ? input.include : DEFAULT_INCLUDE;
  const exclude = input.exclude ?? [];
  const byRef = new Map<UnitRef, Unit>();
  const warnings: string[] = [];

  for (const root of input.roots) {
    const rootDir = path.resolve(input.projectRoot, root);
    if (!(await fse.pathExists(rootDir))) {
      warnings.push(`source root ${root} does not exist`);
      continue;
    }

    const files = await listSourceFiles(rootDir, input.generatedDir);
    for (const filePath of files) {
      const relative = toPosixPath(path.relative(rootDir, filePath));
      if (!include.some((pattern) => minimatch(relative, pattern, { dot: true }))) continue;
      if (exclude.some((pattern) => minimatch(relative, pattern, { dot: true }))) continue;

      const moduleName = moduleNameForFile(rootDir, filePath);
      if (moduleName === null) continue;

      const code = await fse.readFile(filePath, "utf8");
      if (!code.includes("@jaunt")) continue;

      if (!isValidModuleName(moduleName)) {
        warnings.push(`skipping ${relative}: "${moduleName}" is not a valid module name`);
        continue;
      }

      for (const unit of extractUnits(code, filePath, moduleName, input.kind)) {
        if (byRef.has(unit.ref)) {
          warnings.push(`duplicate unit ${unit.ref} in ${relative}; keeping the last declaration`);
        }
        byRef.set(unit.ref, unit);
      }
    }
  }

  const units = Array.from(byRef.values()).sort((a, b) => compareStrings(a.ref, b.ref));
  return { units, warnings };
}

export function extractUnits(
  code: string,
  filePath: string,
  moduleName: string,
  kind: UnitKind,
): Unit[] {
  let program: Program;
  try {
    program = parseTypeScript(code, filePath).program;
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new DiscoveryError(`Failed to parse ${filePath}: ${detail}`, err);
  }

  const units: Unit[] = [];
  for (const declaration of topLevelDeclarations(program)) {
    const doc = jsdocFor(declaration.statement.leadingComments);
    if (!doc || !hasJauntTag(doc.value)) continue;

    const tags = parseJauntTags(doc.value);
    const start = doc.start ?? declaration.statement.start ?? 0;
    const end = declaration.statement.end ?? code.length;

    units.push({
      ref: makeUnitRef(moduleName, declaration.name),
      module: moduleName,
      qualname: declaration.name,
      kind,
      text: code.slice(start, end),
      prompt: tags.prompt,
      deps: tags.deps,
      infer: tags.infer,
      sourceFile: filePath,
    });
  }
  return units;
}

export function parseJauntTags(comment: string): JauntTags {
  const tags: JauntTags = { deps: [] };
  let promptLines: string[] | null = null;

  for (const rawLine of comment.split("\n")) {
    const line = rawLine.replace(/^\s*\*?\s?/, "").trimEnd();
    const tag = /^@(\w+)\s*(.*)$/.exec(line.trim());

    if (tag) {
      promptLines = null;
      const name = tag[1];
      const rest = (tag[2] ?? "").trim();
      if (name === "deps") {
        tags.deps.push(...rest.split(/[\s,]+/).filter((dep) => dep.length > 0));
      } else if (name === "prompt") {
        promptLines = rest.length > 0 ? [rest] : [];
        tags.prompt = rest;
      } else if (name === "infer") {
        if (rest === "true") tags.infer = true;
        if (rest === "false") tags.infer = false;
      }
      continue;
    }

    if (promptLines !== null) {
      if (line.trim().length === 0) {
        promptLines = null;
        continue;
      }
      promptLines.push(line.trim());
      tags.prompt = promptLines.join(" ");
    }
  }

  if (tags.prompt !== undefined && tags.prompt.length === 0) delete tags.prompt;
  return tags;
}

// =============================================================================
// INTERNALS
// =============================================================================

function hasJauntTag(comment: string): boolean {
  return /(^|[\s*])@jaunt(\s|$)/.test(comment);
}

function jsdocFor(comments: readonly Comment[] | null | undefined): Comment | undefined {
  if (!comments) return undefined;
  for (let index = comments.length - 1; index >= 0; index -= 1) {
    const comment = comments[index];
    if (comment && comment.type === "CommentBlock" && comment.value.startsWith("*")) {
      return comment;
    }
  }
  return undefined;
}

async function listSourceFiles(rootDir: string, generatedDir?: string): Promise<string[]> {
  const out: string[] = [];
  const pending = [rootDir];

  while (pending.length > 0) {
    const dir = pending.pop();
    if (dir === undefined) break;

    const entries = await fsp.readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (SKIPPED_DIRS.has(entry.name) || entry.name === generatedDir) continue;
        pending.push(fullPath);
      } else if (entry.isFile() && isSourceFile(entry.name)) {
        out.push(fullPath);
      }
    }
  }

  return out.sort(compareStrings);
}

function isSourceFile(name: string): boolean {
  return /\.(c|m)?tsx?$/.test(name) && !/\.d\.(c|m)?ts$/.test(name);
}
