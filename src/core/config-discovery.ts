import fs from "node:fs";
import path from "node:path";

import { JAUNT_DIR, projectConfigPath } from "./paths.js";

export type ConfigSource = "explicit" | "env" | "project";

export type ConfigResolution = {
  configPath: string;
  source: ConfigSource;
};

export type InitResult = {
  projectRoot: string;
  configPath: string;
  status: "created" | "exists" | "overwritten";
};

export function resolveProjectConfigPath(args: {
  explicitPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}): ConfigResolution {
  const cwd = args.cwd ?? process.cwd();
  const env = args.env ?? process.env;

  if (args.explicitPath) {
    return { configPath: path.resolve(cwd, args.explicitPath), source: "explicit" };
  }

  const fromEnv = env.JAUNT_CONFIG;
  if (fromEnv) {
    return { configPath: path.resolve(cwd, fromEnv), source: "env" };
  }

  const projectRoot = findProjectRoot(cwd) ?? path.resolve(cwd);
  return { configPath: projectConfigPath(projectRoot), source: "project" };
}

export function initProjectConfig(args: { cwd?: string; force?: boolean }): InitResult {
  const projectRoot = path.resolve(args.cwd ?? process.cwd());
  const configPath = projectConfigPath(projectRoot);
  const hasConfig = fs.existsSync(configPath);
  const force = args.force ?? false;

  ensureProjectLayout(projectRoot);

  if (hasConfig && !force) {
    return { projectRoot, configPath, status: "exists" };
  }

  fs.writeFileSync(configPath, buildDefaultConfig(), "utf8");
  return { projectRoot, configPath, status: hasConfig ? "overwritten" : "created" };
}

/** Nearest directory at or above `startDir` holding `.jaunt/config.yaml`. */
export function findProjectRoot(startDir: string): string | null {
  let current = path.resolve(startDir);
  while (true) {
    if (fs.existsSync(projectConfigPath(current))) {
      return current;
    }

    const parent = path.dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}

function ensureProjectLayout(projectRoot: string): void {
  const configDir = path.join(projectRoot, JAUNT_DIR);
  fs.mkdirSync(configDir, { recursive: true });

  const ignorePath = path.join(configDir, ".gitignore");
  const content = "logs/\n";
  const current = fs.existsSync(ignorePath) ? fs.readFileSync(ignorePath, "utf8") : null;
  if (current !== content) {
    fs.writeFileSync(ignorePath, content, "utf8");
  }
}

function buildDefaultConfig(): string {
  return [
    "# Auto-generated jaunt config. Update as needed.",
    "version: 1",
    "",
    "paths:",
    "  source_roots: [src]",
    "  test_roots: [tests]",
    "  generated_dir: __generated__",
    "",
    "llm:",
    "  provider: openai",
    "  model: gpt-4.1",
    "  api_key_env: OPENAI_API_KEY",
    "  timeout_seconds: 120",
    "  max_retries: 3",
    "",
    "build:",
    "  jobs: 8",
    "  infer_deps: true",
    '  header_comment: "//"',
    '  include: ["**/*.ts"]',
    "  exclude: []",
    "",
    "test:",
    "  jobs: 4",
    "  infer_deps: true",
    "  runner_args: [run]",
    "",
  ].join("\n");
}
