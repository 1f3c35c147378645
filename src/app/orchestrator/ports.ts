/**
 * Orchestrator ports.
 * Purpose: seams between build orchestration and its side effects (LLM, filesystem, logs, time).
 * Assumptions: every port is replaceable in tests; see __tests__/fakes.ts.
 */

import type { Unit, UnitKind } from "../../core/declarations.js";
import type { JsonObject, JsonlLogger } from "../../core/logger.js";
import type { ArtifactLocator } from "../../core/lookup.js";
import type { UnitRef } from "../../core/unit-ref.js";

// =============================================================================
// GENERATION
// =============================================================================

export type ModuleContext = {
  kind: UnitKind;
  moduleName: string;
  units: readonly Unit[];
  // Names the generated module must define at top level.
  expectedNames: readonly string[];
  // Declaration text of every dependency unit outside this module.
  dependencyApis: ReadonlyMap<UnitRef, string>;
  // Generated payloads of dependency modules that are already built.
  dependencyArtifacts: ReadonlyMap<string, string>;
  generatedPath: string;
};

export type GenerateOptions = {
  extraErrorContext: readonly string[];
};

export interface ModuleGenerator {
  generate(context: ModuleContext, options: GenerateOptions): Promise<string>;
}

// =============================================================================
// STORAGE
// =============================================================================

export interface ArtifactStore extends ArtifactLocator {
  write(moduleName: string, content: string): Promise<string>;
  remove(moduleName: string): Promise<boolean>;
  list(): Promise<string[]>;
}

// =============================================================================
// OBSERVABILITY
// =============================================================================

export type LogSink = {
  createBuildLogger: (projectRoot: string, runId: string) => JsonlLogger;
  logOrchestratorEvent: (logger: JsonlLogger, type: string, payload?: JsonObject) => void;
};

export type Clock = {
  now: () => Date;
  isoNow: () => string;
};

export type OrchestratorPorts = {
  generator: ModuleGenerator;
  buildStore: ArtifactStore;
  testStore: ArtifactStore;
  logSink: LogSink;
  clock: Clock;
};
