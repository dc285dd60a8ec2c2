/**
 * File helpers for stores: atomic replace (tmp file + rename) and reads
 * that treat a missing file as "no data".
 */

import { readFile, rename, unlink, writeFile } from "node:fs/promises";

let tmpCounter = 0;

export function isMissingFile(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

/**
 * Replace `filePath` with `data` so that readers see either the old or the
 * new content, never a partial write.
 */
export async function writeFileAtomic(filePath: string, data: string, mode = 0o600): Promise<void> {
  const tmpPath = `${filePath}.${process.pid}.${++tmpCounter}.tmp`;
  try {
    await writeFile(tmpPath, data, { encoding: "utf-8", mode });
    await rename(tmpPath, filePath);
  } catch (err) {
    const cleanupErr = await unlink(tmpPath).then(
      () => null,
      (e: unknown) => e,
    );
    if (cleanupErr !== null && !isMissingFile(cleanupErr)) {
      throw new AggregateError([err, cleanupErr], `Atomic write of ${filePath} failed; left ${tmpPath} behind`);
    }
    throw err;
  }
}

/** Read a UTF-8 file, or null when it does not exist. Other errors propagate. */
export async function readTextIfExists(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) return null;
    throw err;
  }
}
