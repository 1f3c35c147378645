import fs from "node:fs";
import path from "node:path";

import { parse as parseDotenv } from "dotenv";

import type { ProjectConfig } from "../core/config.js";
import { loadProjectConfig } from "../core/config-loader.js";
import { resolveProjectConfigPath, type ConfigSource } from "../core/config-discovery.js";

export function loadConfigForCli(args: {
  explicitConfigPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}): {
  config: ProjectConfig;
  configPath: string;
  source: ConfigSource;
} {
  const resolved = resolveProjectConfigPath({
    explicitPath: args.explicitConfigPath,
    cwd: args.cwd,
    env: args.env,
  });

  const config = loadProjectConfig(resolved.configPath);
  return { config, configPath: resolved.configPath, source: resolved.source };
}

/**
 * Copies `<projectRoot>/.env` into `env`. Keys already present, even empty ones, win.
 * Returns the keys that were set; a missing file sets none.
 */
export function loadProjectEnv(projectRoot: string, env: NodeJS.ProcessEnv = process.env): string[] {
  const envPath = path.join(projectRoot, ".env");
  if (!fs.existsSync(envPath)) return [];

  const loaded: string[] = [];
  for (const [key, value] of Object.entries(parseDotenv(fs.readFileSync(envPath, "utf8")))) {
    if (key in env) continue;
    env[key] = value;
    loaded.push(key);
  }
  return loaded;
}
