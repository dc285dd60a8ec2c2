/**
 * Cross-process lock file (O_EXCL) for stores whose files may be shared by
 * several processes pointing at the same data directory.
 */
import { open, unlink, readFile } from "node:fs/promises";
import { constants } from "node:fs";

export interface FileLockOptions {
  /** Max time (ms) to wait for the lock before throwing. Default: 5000 */
  timeoutMs?: number;
  /** Age (ms) after which a lock file is considered stale. Default: 30000 */
  staleMs?: number;
  /** Initial retry interval (ms). Backs off up to 4x. Default: 25 */
  retryMs?: number;
}

export class FileLockTimeoutError extends Error {
  constructor(
    public readonly lockPath: string,
    timeoutMs: number,
  ) {
    super(`Failed to acquire file lock: ${lockPath} (timeout ${timeoutMs}ms)`);
    this.name = "FileLockTimeoutError";
  }
}

interface LockPayload {
  pid: number;
  ts: number;
}

function hasErrorCode(err: unknown, code: string): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === code;
}

function isPidAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: the process exists but belongs to someone else
    return hasErrorCode(err, "EPERM");
  }
}

function parsePayload(content: string): LockPayload | null {
  try {
    const parsed: unknown = JSON.parse(content);
    if (
      typeof parsed === "object" &&
      parsed !== null &&
      "pid" in parsed &&
      "ts" in parsed &&
      typeof parsed.pid === "number" &&
      typeof parsed.ts === "number"
    ) {
      return { pid: parsed.pid, ts: parsed.ts };
    }
    return null;
  } catch {
    return null;
  }
}

async function removeLockFile(lockPath: string): Promise<boolean> {
  try {
    await unlink(lockPath);
    return true;
  } catch (err) {
    return hasErrorCode(err, "ENOENT");
  }
}

async function tryCleanStaleLock(lockPath: string, staleMs: number): Promise<boolean> {
  let content: string;
  try {
    content = await readFile(lockPath, "utf-8");
  } catch (err) {
    // Released between our open() and readFile()
    return hasErrorCode(err, "ENOENT");
  }

  const payload = parsePayload(content);
  if (payload && Date.now() - payload.ts <= staleMs && isPidAlive(payload.pid)) {
    return false;
  }
  return removeLockFile(lockPath);
}

/**
 * Acquire a cross-process file lock using O_EXCL (atomic create-or-fail).
 * Resolves to a `release()` function that removes the lock file.
 *
 * @throws FileLockTimeoutError if the lock cannot be acquired within `timeoutMs`.
 */
export async function acquireFileLock(
  lockPath: string,
  options?: FileLockOptions,
): Promise<() => Promise<void>> {
  const timeoutMs = options?.timeoutMs ?? 5000;
  const staleMs = options?.staleMs ?? 30000;
  const baseRetryMs = options?.retryMs ?? 25;

  const deadline = Date.now() + timeoutMs;
  let retryMs = baseRetryMs;
  const data = JSON.stringify({ pid: process.pid, ts: Date.now() } satisfies LockPayload);

  while (true) {
    try {
      const fh = await open(lockPath, constants.O_WRONLY | constants.O_CREAT | constants.O_EXCL);
      try {
        await fh.writeFile(data, "utf-8");
      } finally {
        await fh.close();
      }

      return async () => {
        try {
          await unlink(lockPath);
        } catch (releaseErr) {
          if (!hasErrorCode(releaseErr, "ENOENT")) throw releaseErr;
        }
      };
    } catch (err: unknown) {
      if (!hasErrorCode(err, "EEXIST")) {
        throw err;
      }

      if (await tryCleanStaleLock(lockPath, staleMs)) {
        continue;
      }
      if (Date.now() >= deadline) {
        throw new FileLockTimeoutError(lockPath, timeoutMs);
      }

      await new Promise<void>((r) => setTimeout(r, retryMs));
      retryMs = Math.min(retryMs * 2, baseRetryMs * 4);
    }
  }
}

/** Run `fn` while holding the lock file at `lockPath`. */
export async function withFileLock<T>(
  lockPath: string,
  fn: () => Promise<T>,
  options?: FileLockOptions,
): Promise<T> {
  const release = await acquireFileLock(lockPath, options);
  try {
    return await fn();
  } finally {
    await release();
  }
}
