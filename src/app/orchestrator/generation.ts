/**
 * Per-module generation.
 * Purpose: assemble a module's context, call the generator, validate, retry once with the
 * validation errors, then write the artifact with a fresh header.
 * Assumptions: the scheduler runs a module only after its dependencies settled, so their
 * payloads are in `produced` or on disk.
 * Usage: runScheduler({ ..., execute: createModuleExecutor({ kind: "build", ... }) }).
 */

import type { DeclarationTable, ModuleUnits, Unit, UnitKind } from "../../core/declarations.js";
import { moduleDigest, type DigestCache } from "../../core/digest.js";
import { formatErrorMessage } from "../../core/error-format.js";
import { formatArtifact, splitArtifact, type CommentLeader } from "../../core/header.js";
import type { JsonObject } from "../../core/logger.js";
import type { ExecuteResult, ModuleExecutor } from "../../core/scheduler.js";
import type { SpecGraph } from "../../core/spec-graph.js";
import type { ArtifactReader } from "../../core/staleness.js";
import { tryNormalizeUnitRef, type UnitRef } from "../../core/unit-ref.js";
import { compareStrings, sortedStrings } from "../../core/utils.js";
import { validateGeneratedSource } from "../../validators/source-validator.js";

import type { ArtifactStore, ModuleContext, ModuleGenerator } from "./ports.js";

// =============================================================================
// TYPES
// =============================================================================

export const DEFAULT_MAX_ATTEMPTS = 2;
export const ERROR_CONTEXT_PREFIX = "previous output errors: ";

export type EventLogger = (type: string, payload: JsonObject) => void;

export type ExternalApis = {
  units: DeclarationTable;
  store: ArtifactReader;
};

export type ModuleExecutorInput = {
  kind: UnitKind;
  moduleUnits: ModuleUnits;
  units: DeclarationTable;
  graph: SpecGraph;
  store: ArtifactStore;
  generator: ModuleGenerator;
  toolVersion: string;
  headerComment: CommentLeader;
  maxAttempts?: number;
  digestCache?: DigestCache;
  // Build units offered to test modules as API context.
  external?: ExternalApis;
  validate?: (source: string, expectedNames: readonly string[]) => string[];
  log?: EventLogger;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function createModuleExecutor(input: ModuleExecutorInput): ModuleExecutor {
  const maxAttempts = Math.max(1, input.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
  const digestCache = input.digestCache ?? new Map();
  const validate = input.validate ?? validateGeneratedSource;
  const log: EventLogger = input.log ?? (() => undefined);
  // Payloads written during this run, keyed by module.
  const produced = new Map<string, string>();

  return async (moduleName: string): Promise<ExecuteResult> => {
    const units = input.moduleUnits.get(moduleName) ?? [];
    if (units.length === 0) {
      return { ok: false, errors: [`No units declared for module ${moduleName}.`] };
    }

    const context = await assembleModuleContext({
      ...input,
      moduleName,
      ownUnits: units,
      produced,
    });
    const digest = moduleDigest(
      units.map((unit) => unit.ref),
      input.units,
      input.graph,
      digestCache,
    );
    // Test modules are only checked for syntax; their test names are free-form.
    const validationNames = input.kind === "build" ? context.expectedNames : [];
    const extraErrorContext: string[] = [];
    let errors: string[] = [];

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      log("module.attempt", { module: moduleName, attempt, kind: input.kind });

      let source: string;
      try {
        source = await input.generator.generate(context, {
          extraErrorContext: [...extraErrorContext],
        });
      } catch (err) {
        const message = `Generation failed: ${formatErrorMessage(err)}`;
        log("module.failed", { module: moduleName, attempt, errors: [message] });
        return { ok: false, errors: [message] };
      }

      errors = validate(source, validationNames);
      if (errors.length === 0) {
        const artifact = formatArtifact(
          {
            toolVersion: input.toolVersion,
            kind: input.kind,
            sourceModule: moduleName,
            moduleDigest: digest,
            specRefs: units.map((unit) => unit.ref),
          },
          source,
          input.headerComment,
        );

        let filePath: string;
        try {
          filePath = await input.store.write(moduleName, artifact);
        } catch (err) {
          const message = `Write failed: ${formatErrorMessage(err)}`;
          log("module.failed", { module: moduleName, attempt, errors: [message] });
          return { ok: false, errors: [message] };
        }

        produced.set(moduleName, source.trimEnd() + "\n");
        log("module.generated", { module: moduleName, attempt, path: filePath, digest });
        return { ok: true, errors: [] };
      }

      log("module.validation_failed", { module: moduleName, attempt, errors });
      if (attempt < maxAttempts) {
        extraErrorContext.push(...errors.map((error) => `${ERROR_CONTEXT_PREFIX}${error}`));
      }
    }

    log("module.failed", { module: moduleName, attempt: maxAttempts, errors });
    return { ok: false, errors };
  };
}

// =============================================================================
// CONTEXT
// =============================================================================

type AssembleInput = ModuleExecutorInput & {
  moduleName: string;
  ownUnits: readonly Unit[];
  produced: ReadonlyMap<string, string>;
};

export async function assembleModuleContext(input: AssembleInput): Promise<ModuleContext> {
  const dependencyApis = new Map<UnitRef, string>();
  const internalModules = new Set<string>();
  const externalModules = new Set<string>();

  for (const unit of input.ownUnits) {
    for (const dep of input.graph.get(unit.ref) ?? []) {
      const depUnit = input.units.get(dep);
      if (!depUnit || depUnit.module === input.moduleName) continue;
      internalModules.add(depUnit.module);
    }

    if (!input.external) continue;
    for (const raw of unit.deps) {
      const ref = tryNormalizeUnitRef(raw);
      const external = ref === null ? undefined : input.external.units.get(ref);
      if (external) externalModules.add(external.module);
    }
  }

  // A dependency module contributes every unit it declares, not only the referenced ones.
  for (const moduleName of internalModules) {
    for (const depUnit of input.moduleUnits.get(moduleName) ?? []) {
      dependencyApis.set(depUnit.ref, depUnit.text);
    }
  }
  // Test modules see the whole build API; @deps only selects which payloads are attached.
  for (const external of input.external?.units.values() ?? []) {
    dependencyApis.set(external.ref, external.text);
  }

  const dependencyArtifacts = new Map<string, string>();
  for (const moduleName of sortedStrings(internalModules)) {
    const payload =
      input.produced.get(moduleName) ?? (await readPayload(input.store, moduleName));
    if (payload !== undefined) dependencyArtifacts.set(moduleName, payload);
  }
  if (input.external) {
    for (const moduleName of sortedStrings(externalModules)) {
      const payload = await readPayload(input.external.store, moduleName);
      if (payload !== undefined) dependencyArtifacts.set(moduleName, payload);
    }
  }

  return {
    kind: input.kind,
    moduleName: input.moduleName,
    units: input.ownUnits,
    expectedNames: expectedTopLevelNames(input.ownUnits),
    dependencyApis: new Map(
      Array.from(dependencyApis).sort(([a], [b]) => compareStrings(a, b)),
    ),
    dependencyArtifacts,
    generatedPath: input.store.pathFor(input.moduleName),
  };
}

/** First segment of each qualified name, de-duplicated, in unit order. */
export function expectedTopLevelNames(units: readonly Unit[]): string[] {
  const names = new Set<string>();
  for (const unit of units) {
    names.add(unit.qualname.split(".")[0] ?? unit.qualname);
  }
  return Array.from(names);
}

async function readPayload(store: ArtifactReader, moduleName: string): Promise<string | undefined> {
  let text: string | undefined;
  try {
    text = await store.read(moduleName);
  } catch {
    // An unreadable dependency artifact only thins the prompt context.
    return undefined;
  }
  if (text === undefined) return undefined;
  return splitArtifact(text)?.payload;
}
