/*
Purpose: console rendering shared by the jaunt commands.
Assumptions: stdout carries results, stderr carries warnings and failures.
Usage: printRunResult(result, "Build"); printTable(["Module", "Reason"], rows); emitJson(runResultJson("build", result)).
*/

import type { BuildRunResult } from "../app/orchestrator/run-engine.js";
import {
  createAnsiFormatter,
  formatBuildFailures,
  formatErrorLines,
  resolveColorEnabled,
  type AnsiFormatter,
  type ErrorFormatLine,
} from "../core/error-format.js";
import { sortedStrings } from "../core/utils.js";

export function stdoutFormatter(): AnsiFormatter {
  return createAnsiFormatter(resolveColorEnabled({ stream: process.stdout }));
}

export function stderrFormatter(): AnsiFormatter {
  return createAnsiFormatter(resolveColorEnabled({ stream: process.stderr }));
}

export function printWarnings(warnings: readonly string[]): void {
  const fmt = stderrFormatter();
  for (const warning of warnings) {
    console.error(fmt(`warning: ${warning}`, ["yellow"]));
  }
}

/** Prints the report; sets a failing exit code when any module failed. */
export function printRunResult(result: BuildRunResult, label: string): void {
  const out = stdoutFormatter();
  const { generated, skipped, failed } = result.report;

  printWarnings(result.warnings);
  console.log(
    `${label}: ${generated.size} generated, ${skipped.size} fresh, ${failed.size} failed.`,
  );
  for (const moduleName of sortedStrings(generated)) {
    console.log(`  ${out("+", ["green"])} ${moduleName}`);
  }

  if (failed.size > 0) {
    console.error(stderrFormatter()(formatBuildFailures(failed, label).trimEnd(), ["red"]));
    process.exitCode = 1;
  }

  console.log(out(`Log: ${result.logPath}`, ["dim"]));
}

// ===== JSON =====

export type RunResultJson = {
  command: string;
  ok: boolean;
  generated: string[];
  skipped: string[];
  failed: Record<string, string[]>;
};

export function runResultJson(command: string, result: BuildRunResult): RunResultJson {
  const { generated, skipped, failed } = result.report;
  const failures: Record<string, string[]> = {};
  for (const moduleName of sortedStrings(failed.keys())) {
    failures[moduleName] = [...(failed.get(moduleName) ?? [])];
  }
  return {
    command,
    ok: failed.size === 0,
    generated: sortedStrings(generated),
    skipped: sortedStrings(skipped),
    failed: failures,
  };
}

/** Writes one pretty-printed JSON document to stdout. */
export function emitJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

export function printTable(headers: readonly string[], rows: ReadonlyArray<readonly string[]>): void {
  const widths = headers.map((header, column) =>
    Math.max(header.length, ...rows.map((row) => (row[column] ?? "").length)),
  );
  const render = (cells: readonly string[]): string =>
    `  ${cells.map((cell, column) => pad(cell, widths[column] ?? 0)).join("  ")}`.trimEnd();

  console.log(render(headers));
  for (const row of rows) {
    console.log(render(row));
  }
}

export function printError(error: unknown, debug: boolean): void {
  const fmt = stderrFormatter();
  for (const line of formatErrorLines(error, { mode: debug ? "debug" : "short" })) {
    console.error(styleErrorLine(line, fmt));
  }
}

function styleErrorLine(line: ErrorFormatLine, fmt: AnsiFormatter): string {
  switch (line.kind) {
    case "title":
      return fmt(`Error: ${line.text}`, ["bold", "red"]);
    case "hint":
      return fmt(`Hint: ${line.text}`, ["yellow"]);
    case "next":
      return fmt(`Next: ${line.text}`, ["cyan"]);
    case "message":
      return line.text;
    default:
      return fmt(`${line.kind}: ${line.text}`, ["dim"]);
  }
}

function pad(value: string, width: number): string {
  return value.padEnd(width, " ");
}
