import type { ArtifactStore } from "../app/orchestrator/ports.js";
import { createBuildStore, createTestStore } from "../app/orchestrator/run-context.js";
import type { ProjectConfig } from "../core/config.js";
import { hasJauntHeader } from "../core/header.js";

/** Removes generated artifacts; files without a jaunt header are left alone. */
export async function cleanCommand(
  config: ProjectConfig,
  opts: { dryRun?: boolean } = {},
): Promise<string[]> {
  const dryRun = opts.dryRun ?? false;
  const removed: string[] = [];

  for (const store of [createBuildStore(config), createTestStore(config)]) {
    for (const filePath of await cleanStore(store, dryRun)) {
      console.log(`${dryRun ? "Would remove" : "Removed"} ${filePath}`);
      removed.push(filePath);
    }
  }

  const verb = dryRun ? "would be removed" : "removed";
  console.log(`${removed.length} artifact(s) ${verb}.`);
  return removed;
}

async function cleanStore(store: ArtifactStore, dryRun: boolean): Promise<string[]> {
  const paths: string[] = [];
  for (const moduleName of await store.list()) {
    const text = await store.read(moduleName);
    if (text === undefined || !hasJauntHeader(text)) continue;
    if (!dryRun) await store.remove(moduleName);
    paths.push(store.pathFor(moduleName));
  }
  return paths;
}
