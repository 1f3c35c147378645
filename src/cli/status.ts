import { buildRunContext } from "../app/orchestrator/run-context.js";
import { computeStaleness, loadRunPlan, selectTargets } from "../app/orchestrator/run-engine.js";
import type { ProjectConfig } from "../core/config.js";
import type { UnitKind } from "../core/declarations.js";
import type { StalenessReport } from "../core/staleness.js";
import { sortedStrings } from "../core/utils.js";

import { emitJson, printTable, printWarnings } from "./output.js";

export async function statusCommand(
  config: ProjectConfig,
  opts: { targets?: string[]; kind?: UnitKind; inferDeps?: boolean; json?: boolean } = {},
): Promise<StalenessReport> {
  const kind = opts.kind ?? "build";
  const context = buildRunContext({
    config,
    kind,
    options: { targets: opts.targets, inferDeps: opts.inferDeps },
  });
  const plan = await loadRunPlan(context);
  const queued = selectTargets(plan.moduleDag, opts.targets);
  const store = kind === "build" ? context.ports.buildStore : context.ports.testStore;
  const staleness = await computeStaleness({ plan, queued, store });

  printWarnings(plan.warnings);
  if (opts.json) {
    emitJson(stalenessJson(kind, staleness));
  } else {
    printStaleness(kind, staleness);
  }
  return staleness;
}

function stalenessJson(
  kind: UnitKind,
  staleness: StalenessReport,
): { command: "status"; ok: true; kind: UnitKind; stale: Record<string, string>; fresh: string[] } {
  const stale: Record<string, string> = {};
  const fresh: string[] = [];
  for (const moduleName of sortedStrings(staleness.keys())) {
    const reason = staleness.get(moduleName);
    if (reason === undefined || reason === "fresh") {
      fresh.push(moduleName);
    } else {
      stale[moduleName] = reason;
    }
  }
  return { command: "status", ok: true, kind, stale, fresh };
}

function printStaleness(kind: UnitKind, staleness: StalenessReport): void {
  if (staleness.size === 0) {
    console.log(`No ${kind} units found.`);
    return;
  }

  const rows = Array.from(staleness, ([moduleName, reason]) => [
    moduleName,
    reason === "fresh" ? "fresh" : "stale",
    reason === "fresh" ? "-" : reason,
  ]);
  const staleCount = rows.filter((row) => row[1] === "stale").length;

  console.log(`Modules (${kind}): ${staleness.size} total, ${staleCount} stale`);
  printTable(["Module", "Status", "Reason"], rows);
}
