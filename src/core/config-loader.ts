import fs from "node:fs";
import path from "node:path";

import { parse as parseYAML } from "yaml";

import { formatConfigIssues, ProjectConfigSchema, type ProjectConfig } from "./config.js";
import { ConfigError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";
import { JAUNT_DIR } from "./paths.js";

export function loadProjectConfig(configPath: string): ProjectConfig {
  const resolved = path.resolve(configPath);

  if (!fs.existsSync(resolved)) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Project config missing.",
      message: `No config found at ${resolved}.`,
      hint: "Run `jaunt init` to create .jaunt/config.yaml.",
    });
  }

  const raw = fs.readFileSync(resolved, "utf8");
  return parseProjectConfig(raw, resolved);
}

export function parseProjectConfig(raw: string, configPath: string): ProjectConfig {
  let data: unknown;
  try {
    data = parseYAML(raw);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Failed to parse ${configPath}: ${detail}`, err);
  }

  const parsed = ProjectConfigSchema.safeParse(data ?? {});
  if (!parsed.success) {
    const issues = formatConfigIssues(parsed.error.issues);
    throw new ConfigError(
      `Invalid config at ${configPath}:\n${issues.map((issue) => `  - ${issue}`).join("\n")}`,
      parsed.error,
    );
  }

  return { ...parsed.data, projectRoot: projectRootForConfig(configPath) };
}

/** `<root>/.jaunt/config.yaml` -> `<root>`; any other location -> its own directory. */
export function projectRootForConfig(configPath: string): string {
  const dir = path.dirname(path.resolve(configPath));
  return path.basename(dir) === JAUNT_DIR ? path.dirname(dir) : dir;
}
