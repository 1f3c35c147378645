/*
Purpose: append-only JSONL event logs for build runs.
Assumptions: one logger per run file; writes are synchronous so events keep their order.
Usage: const log = new JsonlLogger(buildLogPath(root, runId), { runId }); logOrchestratorEvent(log, "build.start", {...}).
*/

import fs from "node:fs";
import path from "node:path";

import { isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type LogEvent = {
  type: string;
  module?: string;
  attempt?: number;
  payload?: JsonObject;
};

export type JsonlLoggerOptions = {
  runId?: string;
};

// =============================================================================
// LOGGER
// =============================================================================

export class JsonlLogger {
  readonly filePath: string;
  private readonly runId?: string;
  private dirReady = false;

  constructor(filePath: string, options: JsonlLoggerOptions = {}) {
    this.filePath = filePath;
    this.runId = options.runId;
  }

  log(event: LogEvent): void {
    const entry: JsonObject = { ts: isoNow(), type: event.type };
    if (this.runId) entry.run_id = this.runId;
    if (event.module !== undefined) entry.module = event.module;
    if (event.attempt !== undefined) entry.attempt = event.attempt;
    if (event.payload !== undefined) entry.payload = event.payload;

    this.ensureDir();
    fs.appendFileSync(this.filePath, `${JSON.stringify(entry)}\n`, "utf8");
  }

  private ensureDir(): void {
    if (this.dirReady) return;
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    this.dirReady = true;
  }
}

export function logOrchestratorEvent(
  logger: JsonlLogger,
  type: string,
  payload: JsonObject = {},
): void {
  const { module, attempt, ...rest } = payload;
  logger.log({
    type,
    module: typeof module === "string" ? module : undefined,
    attempt: typeof attempt === "number" ? attempt : undefined,
    payload: rest,
  });
}
