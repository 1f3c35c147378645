import { describe, expect, it } from "vitest";

import {
  createAnsiFormatter,
  formatBuildFailures,
  formatErrorLines,
  resolveColorEnabled,
} from "./error-format.js";
import {
  ConfigError,
  DependencyCycleError,
  USER_FACING_ERROR_CODES,
  UserFacingError,
} from "./errors.js";

describe("formatErrorLines", () => {
  it("formats user-facing errors in short mode", () => {
    const error = new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Config error",
      message: "Missing config value",
      hint: "Run jaunt init",
      next: "Edit .jaunt/config.yaml",
    });

    const lines = formatErrorLines(error);

    expect(lines.map((line) => line.kind)).toEqual(["title", "message", "hint", "next"]);
    expect(lines[0]?.text).toBe("Config error");
    expect(lines[1]?.text).toBe("Missing config value");
  });

  it("adds a cycle hint for dependency cycles", () => {
    const error = new DependencyCycleError("Dependency cycle detected: a -> b -> a", ["b", "a"]);

    const lines = formatErrorLines(error);

    expect(lines[0]).toEqual({ kind: "title", text: "Dependency cycle detected" });
    expect(lines[1]).toEqual({
      kind: "message",
      text: "Dependency cycle detected: a -> b -> a",
    });
    expect(lines[2]?.kind).toBe("hint");
    expect(lines[2]?.text).toContain("@infer false");
  });

  it("maps config errors to the config code in debug mode", () => {
    const lines = formatErrorLines(new ConfigError("build.jobs must be >= 1"), { mode: "debug" });

    expect(lines.find((line) => line.kind === "code")?.text).toBe("CONFIG_ERROR");
    expect(lines.find((line) => line.kind === "name")?.text).toBe("ConfigError");
  });

  it("includes debug details when requested", () => {
    const error = new UserFacingError({
      code: USER_FACING_ERROR_CODES.build,
      title: "Build failed",
      message: "Generator stopped",
      cause: new Error("boom"),
    });

    const lines = formatErrorLines(error, { mode: "debug" });

    expect(lines.some((line) => line.kind === "code" && line.text === "BUILD_ERROR")).toBe(true);
    expect(lines.some((line) => line.kind === "cause" && line.text === "boom")).toBe(true);
    expect(lines.find((line) => line.kind === "stack")?.text).toContain("UserFacingError");
  });

  it("defaults unknown inputs to an unexpected error title", () => {
    const lines = formatErrorLines("boom");

    expect(lines[0]?.text).toBe("Unexpected error");
    expect(lines[1]?.text).toBe("boom");
  });
});

describe("formatBuildFailures", () => {
  it("lists failed modules in name order with their errors", () => {
    const failed = new Map<string, string[]>([
      ["b", ["Dependency failed: a"]],
      ["a", ["Missing top-level definition: A", "SyntaxError: Unexpected token (1:4)"]],
    ]);

    expect(formatBuildFailures(failed)).toBe(
      [
        "Build failed for 2 module(s):",
        "",
        "  a:",
        "    - Missing top-level definition: A",
        "    - SyntaxError: Unexpected token (1:4)",
        "",
        "  b:",
        "    - Dependency failed: a",
        "",
      ].join("\n"),
    );
  });

  it("returns an empty string when nothing failed", () => {
    expect(formatBuildFailures(new Map())).toBe("");
  });
});

describe("resolveColorEnabled", () => {
  it("disables color for non-TTY streams", () => {
    expect(resolveColorEnabled({ stream: { isTTY: false } })).toBe(false);
    expect(resolveColorEnabled({ stream: { isTTY: true } })).toBe(true);
  });

  it("respects explicit useColor flags", () => {
    expect(resolveColorEnabled({ stream: { isTTY: true }, useColor: false })).toBe(false);
  });
});

describe("createAnsiFormatter", () => {
  it("returns input unchanged when disabled", () => {
    expect(createAnsiFormatter(false)("plain", ["red"])).toBe("plain");
  });

  it("wraps output with ANSI codes when enabled", () => {
    expect(createAnsiFormatter(true)("alert", ["red"])).toBe("\x1b[31malert\x1b[0m");
  });
});
