/**
 * Filesystem artifact store.
 * Purpose: map module names to generated files under one generated root.
 * Assumptions: module names use `/` separators; nothing is written outside the root.
 */

import fsp from "node:fs/promises";
import path from "node:path";

import fse from "fs-extra";

import { atomicWriteFile } from "../../core/atomic-write.js";
import { ArtifactPathError } from "../../core/errors.js";
import { artifactRelativePath } from "../../core/paths.js";
import { toPosixPath } from "../../core/utils.js";

import type { ArtifactStore } from "./ports.js";

export class FsArtifactStore implements ArtifactStore {
  readonly root: string;

  constructor(
    root: string,
    private readonly extension: string,
  ) {
    this.root = path.resolve(root);
  }

  pathFor(moduleName: string): string {
    const target = path.resolve(this.root, artifactRelativePath(moduleName, this.extension));
    const relative = path.relative(this.root, target);
    if (relative.length === 0 || relative.startsWith("..") || path.isAbsolute(relative)) {
      throw new ArtifactPathError(target, this.root);
    }
    return target;
  }

  async read(moduleName: string): Promise<string | undefined> {
    const filePath = this.pathFor(moduleName);
    try {
      return await fsp.readFile(filePath, "utf8");
    } catch (err) {
      if (isMissingFileError(err)) return undefined;
      throw err;
    }
  }

  async write(moduleName: string, content: string): Promise<string> {
    const filePath = this.pathFor(moduleName);
    await atomicWriteFile(filePath, content);
    return filePath;
  }

  async remove(moduleName: string): Promise<boolean> {
    const filePath = this.pathFor(moduleName);
    if (!(await fse.pathExists(filePath))) return false;
    await fse.remove(filePath);
    return true;
  }

  async list(): Promise<string[]> {
    if (!(await fse.pathExists(this.root))) return [];

    const modules: string[] = [];
    const pending = [this.root];
    while (pending.length > 0) {
      const dir = pending.pop();
      if (dir === undefined) break;
      const entries = await fsp.readdir(dir, { withFileTypes: true });
      for (const entry of entries) {
        const fullPath = path.join(dir, entry.name);
        if (entry.isDirectory()) {
          pending.push(fullPath);
        } else if (entry.isFile() && entry.name.endsWith(this.extension)) {
          const relative = toPosixPath(path.relative(this.root, fullPath));
          modules.push(relative.slice(0, -this.extension.length));
        }
      }
    }
    return modules.sort();
  }
}

function isMissingFileError(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
