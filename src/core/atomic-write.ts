import crypto from "node:crypto";
import fsp from "node:fs/promises";
import path from "node:path";

import fse from "fs-extra";

/**
 * Writes `content` to a temp file beside `filePath`, fsyncs it, then renames
 * it over the target. Readers see either the old file or the new one.
 */
export async function atomicWriteFile(filePath: string, content: string): Promise<void> {
  const dir = path.dirname(filePath);
  const tmp = path.join(
    dir,
    `.jaunt-tmp-${path.basename(filePath)}.${crypto.randomBytes(4).toString("hex")}`,
  );

  await fse.ensureDir(dir);

  try {
    const handle = await fsp.open(tmp, "w", 0o644);
    try {
      await handle.writeFile(content, "utf8");
      await handle.sync();
    } finally {
      await handle.close();
    }
    await fsp.rename(tmp, filePath);
  } catch (err) {
    await fse.remove(tmp);
    throw err;
  }
}
