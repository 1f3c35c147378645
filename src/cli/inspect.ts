import { buildRunContext } from "../app/orchestrator/run-context.js";
import { loadRunPlan } from "../app/orchestrator/run-engine.js";
import type { ProjectConfig } from "../core/config.js";
import type { UnitKind } from "../core/declarations.js";
import { DIGEST_PREFIX } from "../core/header.js";
import { describeNotBuilt, lookupUnit, type LookupResult } from "../core/lookup.js";

import { stdoutFormatter } from "./output.js";

export async function inspectCommand(
  config: ProjectConfig,
  ref: string,
  opts: { kind?: UnitKind } = {},
): Promise<LookupResult> {
  const kind = opts.kind ?? "build";
  const context = buildRunContext({ config, kind });
  const plan = await loadRunPlan(context);
  const store = kind === "build" ? context.ports.buildStore : context.ports.testStore;
  const result = await lookupUnit(plan.units, store, ref);

  if (result.status === "not_built") {
    console.error(describeNotBuilt(result));
    process.exitCode = 1;
    return result;
  }

  const fmt = stdoutFormatter();
  console.log(`${fmt(result.ref, ["bold"])}: built`);
  console.log(`  Module: ${result.module}`);
  console.log(`  Artifact: ${result.artifactPath}`);
  console.log(`  Digest: ${DIGEST_PREFIX}${result.header.moduleDigest ?? ""}`);
  console.log(`  Tool version: ${result.header.toolVersion ?? "unknown"}`);
  console.log("");
  console.log(result.payload.trimEnd());
  return result;
}
