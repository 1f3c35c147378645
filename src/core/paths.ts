import path from "node:path";

import { toPosixPath } from "./utils.js";

export const JAUNT_DIR = ".jaunt";
export const CONFIG_FILE = "config.yaml";
export const GENERATED_EXTENSION = ".ts";
export const GENERATED_TEST_EXTENSION = ".test.ts";

const SOURCE_FILE_PATTERN = /(\.(test|spec))?\.(c|m)?tsx?$/;

export function jauntDir(projectRoot: string): string {
  return path.join(projectRoot, JAUNT_DIR);
}

export function projectConfigPath(projectRoot: string): string {
  return path.join(jauntDir(projectRoot), CONFIG_FILE);
}

export function logsDir(projectRoot: string): string {
  return path.join(jauntDir(projectRoot), "logs");
}

export function buildLogPath(projectRoot: string, runId: string): string {
  return path.join(logsDir(projectRoot), `${runId}.jsonl`);
}

/**
 * Module name for a source file under `root`: the relative path without its
 * extension, `/`-separated. Null when the file lies outside the root.
 */
export function moduleNameForFile(root: string, filePath: string): string | null {
  const relative = path.relative(path.resolve(root), path.resolve(filePath));
  if (relative.length === 0 || relative.startsWith("..") || path.isAbsolute(relative)) {
    return null;
  }
  return toPosixPath(relative).replace(SOURCE_FILE_PATTERN, "");
}

/** Artifact location relative to the generated root, e.g. `text/slug.ts`. */
export function artifactRelativePath(
  moduleName: string,
  extension: string = GENERATED_EXTENSION,
): string {
  return `${moduleName}${extension}`;
}

export function generatedRoot(projectRoot: string, root: string, generatedDir: string): string {
  return path.resolve(projectRoot, root, generatedDir);
}
