/*
Purpose: commander program for the jaunt CLI.
Assumptions: each action loads config itself so `init` works without one.
Usage: await buildCli().parseAsync(process.argv); main(argv) adds error reporting and exit codes.
*/

import { Command, InvalidArgumentError } from "commander";

import type { UnitKind } from "../core/declarations.js";
import { DependencyCycleError } from "../core/errors.js";
import { JAUNT_VERSION } from "../core/version.js";

import { buildCommand } from "./build.js";
import { cleanCommand } from "./clean.js";
import { loadConfigForCli, loadProjectEnv } from "./config.js";
import { initCommand } from "./init.js";
import { inspectCommand } from "./inspect.js";
import { emitJson, printError } from "./output.js";
import { statusCommand } from "./status.js";
import { testCommand } from "./test.js";

// =============================================================================
// TYPES
// =============================================================================

type GlobalOptions = {
  config?: string;
  debug?: boolean;
};

type GenerateFlags = {
  force?: boolean;
  jobs?: number;
  infer?: boolean;
  json?: boolean;
};

export const EXIT_FAILURE = 1;
export const EXIT_CYCLE = 2;

// =============================================================================
// PROGRAM
// =============================================================================

export function buildCli(): Command {
  const program = new Command();

  program
    .name("jaunt")
    .description("Incremental builds of @jaunt-tagged TypeScript declarations")
    .version(JAUNT_VERSION)
    .option("--config <path>", "Path to .jaunt/config.yaml (default: nearest, or $JAUNT_CONFIG)")
    .option("--debug", "Print error codes, causes and stack traces", false);

  program
    .command("init")
    .description("Create .jaunt/config.yaml in the current directory")
    .option("--force", "Overwrite an existing config", false)
    .action(async (opts: { force?: boolean }) => {
      await initCommand({ force: opts.force });
    });

  program
    .command("build")
    .description("Generate implementation modules that are stale")
    .argument("[targets...]", "Modules to build (with their dependencies)")
    .option("--force", "Regenerate every selected module", false)
    .option("--jobs <n>", "Maximum concurrent generations", parsePositiveInt)
    .option("--no-infer", "Disable dependency inference from imports")
    .option("--json", "Print the result as JSON", false)
    .action(async (targets: string[], opts: GenerateFlags, command: Command) => {
      await reportJsonErrors("build", opts.json, async () => {
        const { config } = loadConfigForCli({ explicitConfigPath: globalOptions(command).config });
        loadProjectEnv(config.projectRoot);
        await buildCommand(config, { targets, json: opts.json, ...runFlags(opts) });
      });
    });

  program
    .command("test")
    .description("Generate test modules for @jaunt test declarations and run them")
    .argument("[targets...]", "Test modules to generate (with their dependencies)")
    .option("--force", "Regenerate every selected test module", false)
    .option("--jobs <n>", "Maximum concurrent generations", parsePositiveInt)
    .option("--no-infer", "Disable dependency inference from imports")
    .option("--no-build", "Skip building stale implementation modules first")
    .option("--no-run", "Generate the test modules without running them")
    .option("--json", "Print the result as JSON", false)
    .action(
      async (
        targets: string[],
        opts: GenerateFlags & { build?: boolean; run?: boolean },
        command: Command,
      ) => {
        await reportJsonErrors("test", opts.json, async () => {
          const { config } = loadConfigForCli({
            explicitConfigPath: globalOptions(command).config,
          });
          loadProjectEnv(config.projectRoot);
          await testCommand(config, {
            targets,
            build: opts.build !== false,
            run: opts.run !== false,
            json: opts.json,
            ...runFlags(opts),
          });
        });
      },
    );

  program
    .command("status")
    .description("Show which modules are stale and why")
    .argument("[targets...]", "Modules to check (with their dependencies)")
    .option("--tests", "Check test modules instead of implementation modules", false)
    .option("--no-infer", "Disable dependency inference from imports")
    .option("--json", "Print the result as JSON", false)
    .action(
      async (
        targets: string[],
        opts: { tests?: boolean; infer?: boolean; json?: boolean },
        command: Command,
      ) => {
        await reportJsonErrors("status", opts.json, async () => {
          const { config } = loadConfigForCli({
            explicitConfigPath: globalOptions(command).config,
          });
          await statusCommand(config, {
            targets,
            kind: kindFor(opts.tests),
            inferDeps: opts.infer === false ? false : undefined,
            json: opts.json,
          });
        });
      },
    );

  program
    .command("inspect")
    .description("Show whether a unit is built and print its generated module")
    .argument("<ref>", "Unit reference, e.g. text/slug:slugify or text/slug.slugify")
    .option("--tests", "Look the unit up among test declarations", false)
    .action(async (ref: string, opts: { tests?: boolean }, command: Command) => {
      const { config } = loadConfigForCli({ explicitConfigPath: globalOptions(command).config });
      await inspectCommand(config, ref, { kind: kindFor(opts.tests) });
    });

  program
    .command("clean")
    .description("Remove generated modules that carry a jaunt header")
    .option("--dry-run", "List what would be removed", false)
    .action(async (opts: { dryRun?: boolean }, command: Command) => {
      const { config } = loadConfigForCli({ explicitConfigPath: globalOptions(command).config });
      await cleanCommand(config, { dryRun: opts.dryRun });
    });

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const program = buildCli();

  try {
    await program.parseAsync(argv);
  } catch (err) {
    const debug = globalOptions(program).debug === true || process.env.JAUNT_DEBUG === "1";
    printError(err, debug);
    process.exitCode = err instanceof DependencyCycleError ? EXIT_CYCLE : EXIT_FAILURE;
  }
}

// =============================================================================
// HELPERS
// =============================================================================

function globalOptions(command: Command): GlobalOptions {
  const values = command.optsWithGlobals();
  return {
    config: typeof values.config === "string" ? values.config : undefined,
    debug: values.debug === true,
  };
}

/** Under --json, failures still produce one JSON document on stdout before `main` reports them. */
async function reportJsonErrors(
  commandName: string,
  json: boolean | undefined,
  action: () => Promise<void>,
): Promise<void> {
  try {
    await action();
  } catch (err) {
    if (json) {
      emitJson({
        command: commandName,
        ok: false,
        error: err instanceof Error ? err.message : String(err),
      });
    }
    throw err;
  }
}

function runFlags(opts: GenerateFlags): { force: boolean; jobs?: number; inferDeps?: boolean } {
  return {
    force: opts.force ?? false,
    jobs: opts.jobs,
    inferDeps: opts.infer === false ? false : undefined,
  };
}

function kindFor(tests: boolean | undefined): UnitKind {
  return tests ? "test" : "build";
}

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}
