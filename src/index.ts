export { buildCli, main } from "./cli/index.js";

export { buildRunContext, createDefaultPorts, type RunOptions } from "./app/orchestrator/run-context.js";
export { loadRunPlan, runBuild, selectTargets, type BuildRunResult } from "./app/orchestrator/run-engine.js";
export type { ModuleContext, ModuleGenerator } from "./app/orchestrator/ports.js";
export { loadProjectConfig, parseProjectConfig } from "./core/config-loader.js";
export type { ProjectConfig } from "./core/config.js";
export type { Unit, UnitKind } from "./core/declarations.js";
export { discoverUnits } from "./core/discovery.js";
export { DependencyCycleError, JauntError } from "./core/errors.js";
export { describeNotBuilt, lookupUnit, type LookupResult } from "./core/lookup.js";
export { runScheduler, type BuildReport } from "./core/scheduler.js";
export { normalizeUnitRef, type UnitRef } from "./core/unit-ref.js";
