import type { OrchestratorPorts } from "../app/orchestrator/ports.js";
import { buildRunContext, type RunOptions } from "../app/orchestrator/run-context.js";
import { runBuild, type BuildRunResult } from "../app/orchestrator/run-engine.js";
import type { ProjectConfig } from "../core/config.js";

import { emitJson, printRunResult, runResultJson } from "./output.js";

export type BuildCommandOptions = RunOptions & {
  json?: boolean;
  ports?: Partial<OrchestratorPorts>;
};

export async function buildCommand(
  config: ProjectConfig,
  opts: BuildCommandOptions = {},
): Promise<BuildRunResult> {
  const { ports, json = false, ...options } = opts;
  const result = await runBuild(buildRunContext({ config, kind: "build", options, ports }));
  if (json) {
    emitJson(runResultJson("build", result));
    if (result.report.failed.size > 0) process.exitCode = 1;
  } else {
    printRunResult(result, "Build");
  }
  return result;
}
