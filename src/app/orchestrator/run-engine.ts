/**
 * RunEngine is the orchestrator entrypoint.
 * Purpose: discover units, build the graphs, detect staleness and drive the scheduler
 * through injected ports.
 * Assumptions: the declaration table is static for the duration of a run.
 * Usage: const result = await runBuild(buildRunContext({ config, kind: "build", options }));
 */

import path from "node:path";

import {
  createDeclarationTable,
  groupUnitsByModule,
  type DeclarationTable,
  type ModuleUnits,
  type UnitKind,
} from "../../core/declarations.js";
import { TsDependencyInferrer } from "../../core/dependency-inference.js";
import type { DigestCache } from "../../core/digest.js";
import { discoverUnits } from "../../core/discovery.js";
import { JauntError } from "../../core/errors.js";
import type { JsonObject } from "../../core/logger.js";
import { runScheduler, type BuildReport } from "../../core/scheduler.js";
import {
  buildSpecGraph,
  collapseToModuleDag,
  toposort,
  type ModuleDag,
  type SpecGraph,
} from "../../core/spec-graph.js";
import {
  applyDependentExpansion,
  detectStaleness,
  staleModulesOf,
  type StalenessReport,
} from "../../core/staleness.js";
import { sortedStrings } from "../../core/utils.js";

import { createModuleExecutor, type ExternalApis } from "./generation.js";
import type { ArtifactStore } from "./ports.js";
import type { RunContext } from "./run-context.js";

// =============================================================================
// TYPES
// =============================================================================

export type RunPlan = {
  kind: UnitKind;
  units: DeclarationTable;
  moduleUnits: ModuleUnits;
  graph: SpecGraph;
  moduleDag: ModuleDag;
  warnings: string[];
};

export type BuildRunResult = {
  report: BuildReport;
  staleness: StalenessReport;
  queued: Set<string>;
  warnings: string[];
  logPath: string;
};

export type RunBuildOptions = {
  plan?: RunPlan;
  // Precomputed stale set; skips digest comparison when given.
  staleModules?: Iterable<string>;
  external?: ExternalApis;
};

// =============================================================================
// PLANNING
// =============================================================================

export async function loadRunPlan(
  context: RunContext,
  kind: UnitKind = context.kind,
): Promise<RunPlan> {
  const { config } = context;
  const roots = kind === "build" ? config.paths.source_roots : config.paths.test_roots;
  const discovery = await discoverUnits({
    projectRoot: config.projectRoot,
    roots,
    kind,
    include: config.build.include,
    exclude: config.build.exclude,
    generatedDir: config.paths.generated_dir,
  });

  const units = createDeclarationTable(discovery.units);
  const warnings = [...discovery.warnings];
  const inferDefault =
    context.options.inferDeps ??
    (kind === "build" ? config.build.infer_deps : config.test.infer_deps);
  const graph = buildSpecGraph(units, {
    inferDefault,
    inferrer: new TsDependencyInferrer({
      sourceRoots: roots.map((root) => path.resolve(config.projectRoot, root)),
    }),
    warnings,
  });
  // Unit-level cycles are fatal even when they stay inside one module.
  toposort(graph);

  return {
    kind,
    units,
    moduleUnits: groupUnitsByModule(units.values()),
    graph,
    moduleDag: collapseToModuleDag(graph),
    warnings,
  };
}

/**
 * Named modules plus everything they depend on; every module when no
 * targets are given.
 */
export function selectTargets(moduleDag: ModuleDag, targets: readonly string[] = []): Set<string> {
  if (targets.length === 0) return new Set(moduleDag.keys());

  const unknown = targets.filter((target) => !moduleDag.has(target));
  if (unknown.length > 0) {
    throw new JauntError(`Unknown target module(s): ${sortedStrings(unknown).join(", ")}`);
  }

  const selected = new Set<string>();
  const pending = [...targets];
  while (pending.length > 0) {
    const current = pending.pop();
    if (current === undefined || selected.has(current)) continue;
    selected.add(current);
    pending.push(...(moduleDag.get(current) ?? []));
  }
  return selected;
}

export async function computeStaleness(args: {
  plan: RunPlan;
  queued: ReadonlySet<string>;
  store: ArtifactStore;
  force?: boolean;
  cache?: DigestCache;
}): Promise<StalenessReport> {
  const moduleUnits = new Map(
    Array.from(args.plan.moduleUnits).filter(([moduleName]) => args.queued.has(moduleName)),
  );
  const report = await detectStaleness({
    moduleUnits,
    units: args.plan.units,
    graph: args.plan.graph,
    store: args.store,
    force: args.force,
    cache: args.cache,
  });
  return applyDependentExpansion(report, args.plan.moduleDag);
}

// =============================================================================
// PUBLIC API
// =============================================================================

export async function runBuild(
  context: RunContext,
  options: RunBuildOptions = {},
): Promise<BuildRunResult> {
  const { config, ports, kind } = context;
  const logger = ports.logSink.createBuildLogger(config.projectRoot, context.runId);
  const log = (type: string, payload: JsonObject = {}): void =>
    ports.logSink.logOrchestratorEvent(logger, type, payload);

  const plan = options.plan ?? (await loadRunPlan(context));
  const store = kind === "build" ? ports.buildStore : ports.testStore;
  const queued = selectTargets(plan.moduleDag, context.options.targets);
  const jobs = context.options.jobs ?? (kind === "build" ? config.build.jobs : config.test.jobs);

  log("build.start", {
    kind,
    modules: queued.size,
    jobs,
    force: context.options.force ?? false,
    started_at: ports.clock.isoNow(),
  });
  for (const warning of plan.warnings) {
    log("inference.warning", { message: warning });
  }

  const digestCache: DigestCache = new Map();
  const staleness = options.staleModules
    ? precomputedReport(queued, new Set(options.staleModules))
    : await computeStaleness({
        plan,
        queued,
        store,
        force: context.options.force,
        cache: digestCache,
      });
  for (const [moduleName, reason] of staleness) {
    if (reason !== "fresh") log("build.stale", { module: moduleName, reason });
  }

  const execute = createModuleExecutor({
    kind,
    moduleUnits: plan.moduleUnits,
    units: plan.units,
    graph: plan.graph,
    store,
    generator: ports.generator,
    toolVersion: context.toolVersion,
    headerComment: config.build.header_comment,
    maxAttempts: config.build.max_attempts,
    digestCache,
    external: options.external,
    log,
  });

  const report = await runScheduler({
    moduleDag: plan.moduleDag,
    queuedModules: queued,
    staleModules: staleModulesOf(staleness),
    jobs,
    execute,
    hooks: {
      onDispatch: (moduleName) => log("module.dispatch", { module: moduleName }),
      onSettled: (outcome) => {
        if (outcome.propagated) {
          log("module.dependency_failed", { module: outcome.module, errors: outcome.errors });
        }
      },
    },
  });

  log("build.complete", {
    kind,
    generated: sortedStrings(report.generated),
    skipped: report.skipped.size,
    failed: sortedStrings(report.failed.keys()),
    finished_at: ports.clock.isoNow(),
  });

  return { report, staleness, queued, warnings: plan.warnings, logPath: logger.filePath };
}

function precomputedReport(
  queued: ReadonlySet<string>,
  stale: ReadonlySet<string>,
): StalenessReport {
  const report: StalenessReport = new Map();
  for (const moduleName of sortedStrings(queued)) {
    report.set(moduleName, stale.has(moduleName) ? "forced" : "fresh");
  }
  return report;
}
