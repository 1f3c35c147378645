/*
Purpose: build stale implementation modules, generate test modules for @jaunt test declarations, then run them with Vitest.
Assumptions: every build unit is offered to the test prompts as API context; `build: false` trusts the artifacts on disk.
Usage: await testCommand(config, { targets: ["slug"], run: true });
*/

import { execa } from "execa";

import type { ArtifactStore, OrchestratorPorts } from "../app/orchestrator/ports.js";
import { buildRunContext, type RunOptions } from "../app/orchestrator/run-context.js";
import { loadRunPlan, runBuild, type BuildRunResult } from "../app/orchestrator/run-engine.js";
import type { ProjectConfig } from "../core/config.js";
import { hasJauntHeader } from "../core/header.js";
import { sortedStrings } from "../core/utils.js";

import { emitJson, printRunResult, runResultJson, type RunResultJson } from "./output.js";

/** Runs the given test files and resolves to the runner's exit code. */
export type TestRunner = (files: string[]) => Promise<number>;

export type TestCommandOptions = RunOptions & {
  build?: boolean;
  run?: boolean;
  json?: boolean;
  runner?: TestRunner;
  ports?: Partial<OrchestratorPorts>;
};

export type TestCommandResult = {
  // Absent under --no-build.
  build?: BuildRunResult;
  // Absent when the build failed.
  generation?: BuildRunResult;
  // Absent when nothing was run.
  runExitCode?: number;
};

export async function testCommand(
  config: ProjectConfig,
  opts: TestCommandOptions = {},
): Promise<TestCommandResult> {
  const { ports, build = true, run = true, json = false, runner, ...options } = opts;
  const outcome: TestCommandResult = {};
  const report = (): TestCommandResult => {
    if (json) emitJson(testResultJson(outcome));
    return outcome;
  };

  const buildContext = buildRunContext({
    config,
    kind: "build",
    options: { force: options.force, jobs: options.jobs, inferDeps: options.inferDeps },
    ports,
  });
  const buildPlan = await loadRunPlan(buildContext, "build");

  if (build) {
    outcome.build = await runBuild(buildContext, { plan: buildPlan });
    if (!json) printRunResult(outcome.build, "Build");
    if (outcome.build.report.failed.size > 0) {
      process.exitCode = 1;
      return report();
    }
  }

  const context = buildRunContext({ config, kind: "test", options, ports });
  const generation = await runBuild(context, {
    external: { units: buildPlan.units, store: context.ports.buildStore },
  });
  outcome.generation = generation;
  if (!json) printRunResult(generation, "Test generation");
  if (generation.report.failed.size > 0) {
    process.exitCode = 1;
    return report();
  }
  if (!run) return report();

  const files = await generatedTestFiles(generation.queued, context.ports.testStore);
  if (files.length === 0) {
    if (!json) console.log("No generated test files to run.");
    return report();
  }

  outcome.runExitCode = await (runner ?? createVitestRunner(config, { quiet: json }))(files);
  if (outcome.runExitCode !== 0) {
    process.exitCode = 1;
  }
  return report();
}

type TestResultJson = {
  command: "test";
  ok: boolean;
  build: RunResultJson | null;
  generation: RunResultJson | null;
  exit_code: number | null;
};

function testResultJson(outcome: TestCommandResult): TestResultJson {
  const ok =
    (outcome.build?.report.failed.size ?? 0) === 0 &&
    outcome.generation !== undefined &&
    outcome.generation.report.failed.size === 0 &&
    (outcome.runExitCode ?? 0) === 0;
  return {
    command: "test",
    ok,
    build: outcome.build ? runResultJson("build", outcome.build) : null,
    generation: outcome.generation ? runResultJson("test", outcome.generation) : null,
    exit_code: outcome.runExitCode ?? null,
  };
}

export function createVitestRunner(
  config: ProjectConfig,
  opts: { quiet?: boolean } = {},
): TestRunner {
  return async (files) => {
    const result = await execa("vitest", [...config.test.runner_args, ...files], {
      cwd: config.projectRoot,
      preferLocal: true,
      stdin: "inherit",
      // Keeps stdout a single JSON document under --json.
      stdout: opts.quiet ? "ignore" : "inherit",
      stderr: "inherit",
      reject: false,
    });
    return result.exitCode ?? 1;
  };
}

async function generatedTestFiles(
  modules: Iterable<string>,
  store: ArtifactStore,
): Promise<string[]> {
  const files: string[] = [];
  for (const moduleName of sortedStrings(modules)) {
    const text = await store.read(moduleName);
    if (text !== undefined && hasJauntHeader(text)) {
      files.push(store.pathFor(moduleName));
    }
  }
  return files;
}
