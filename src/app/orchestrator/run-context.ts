/**
 * RunContext + composition root for build and test runs.
 * Purpose: centralize run-scoped config and injected ports to avoid globals.
 * Assumptions: ports are thin adapters over core modules and are overrideable for tests.
 * Usage: runBuild(buildRunContext({ config, kind: "build", options })).
 */

import type { ProjectConfig } from "../../core/config.js";
import type { UnitKind } from "../../core/declarations.js";
import { JsonlLogger, logOrchestratorEvent } from "../../core/logger.js";
import {
  GENERATED_EXTENSION,
  GENERATED_TEST_EXTENSION,
  buildLogPath,
  generatedRoot,
} from "../../core/paths.js";
import { defaultRunId, isoNow } from "../../core/utils.js";
import { JAUNT_VERSION } from "../../core/version.js";
import { createModuleGenerator } from "../../llm/factory.js";

import { FsArtifactStore } from "./artifact-store.js";
import type { ArtifactStore, ModuleGenerator, OrchestratorPorts } from "./ports.js";

// =============================================================================
// TYPES
// =============================================================================

export type RunOptions = {
  targets?: string[];
  force?: boolean;
  jobs?: number;
  inferDeps?: boolean;
  runId?: string;
};

export type RunContext = {
  config: ProjectConfig;
  kind: UnitKind;
  options: RunOptions;
  runId: string;
  toolVersion: string;
  ports: OrchestratorPorts;
};

export type BuildRunContextInput = {
  config: ProjectConfig;
  kind: UnitKind;
  options?: RunOptions;
  ports?: Partial<OrchestratorPorts>;
};

// =============================================================================
// DEFAULT ADAPTERS
// =============================================================================

export function createBuildStore(config: ProjectConfig): ArtifactStore {
  const root = config.paths.source_roots[0] ?? "src";
  return new FsArtifactStore(
    generatedRoot(config.projectRoot, root, config.paths.generated_dir),
    GENERATED_EXTENSION,
  );
}

export function createTestStore(config: ProjectConfig): ArtifactStore {
  const root = config.paths.test_roots[0] ?? "tests";
  return new FsArtifactStore(
    generatedRoot(config.projectRoot, root, config.paths.generated_dir),
    GENERATED_TEST_EXTENSION,
  );
}

export function createDefaultPorts(config: ProjectConfig): OrchestratorPorts {
  return {
    generator: lazyGenerator(() => createModuleGenerator(config)),
    buildStore: createBuildStore(config),
    testStore: createTestStore(config),
    logSink: {
      createBuildLogger: (projectRoot, runId) =>
        new JsonlLogger(buildLogPath(projectRoot, runId), { runId }),
      logOrchestratorEvent,
    },
    clock: {
      now: () => new Date(),
      isoNow,
    },
  };
}

// The LLM client needs credentials; only build it once a module is generated.
function lazyGenerator(factory: () => ModuleGenerator): ModuleGenerator {
  let instance: ModuleGenerator | undefined;
  return {
    generate: (context, options) => {
      instance ??= factory();
      return instance.generate(context, options);
    },
  };
}

// =============================================================================
// COMPOSITION ROOT
// =============================================================================

export function buildRunContext(input: BuildRunContextInput): RunContext {
  const ports: OrchestratorPorts = {
    ...createDefaultPorts(input.config),
    ...input.ports,
  };
  const options = input.options ?? {};

  return {
    config: input.config,
    kind: input.kind,
    options,
    runId: options.runId ?? defaultRunId(ports.clock.now()),
    toolVersion: JAUNT_VERSION,
    ports,
  };
}
