import { initProjectConfig } from "../core/config-discovery.js";

export async function initCommand(opts: { force?: boolean; cwd?: string }): Promise<void> {
  try {
    const result = initProjectConfig({ cwd: opts.cwd ?? process.cwd(), force: opts.force });

    if (result.status === "created") {
      console.log(`Created jaunt config at ${result.configPath}`);
      console.log(`Edit ${result.configPath} to set source roots and the LLM provider.`);
      return;
    }

    if (result.status === "overwritten") {
      console.log(`Overwrote jaunt config at ${result.configPath}`);
      console.log(`Review ${result.configPath} for your project settings.`);
      return;
    }

    console.log(`Config already exists at ${result.configPath}`);
    console.log("Pass --force to overwrite it.");
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    console.error(`Init failed: ${detail}`);
    process.exitCode = 1;
  }
}
