import crypto from "node:crypto";
import path from "node:path";

import fse from "fs-extra";

export function isoNow(): string {
  return new Date().toISOString();
}

export function defaultRunId(now: Date = new Date()): string {
  const stamp = now.toISOString().replace(/[-:]/g, "").replace(/\.\d{3}Z$/, "Z");
  return `${stamp}-${crypto.randomBytes(3).toString("hex")}`;
}

export async function ensureDir(dirPath: string): Promise<void> {
  await fse.ensureDir(dirPath);
}

export function toPosixPath(value: string): string {
  return value.split(path.sep).join("/");
}

export function sha256Hex(payload: string): string {
  return crypto.createHash("sha256").update(payload, "utf8").digest("hex");
}

export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function sortedStrings(values: Iterable<string>): string[] {
  return Array.from(values).sort(compareStrings);
}
