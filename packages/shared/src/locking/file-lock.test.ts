import { describe, it, expect, afterEach } from "vitest";
import { acquireFileLock, withFileLock, FileLockTimeoutError } from "./file-lock.js";
import { mkdtemp, rm, stat, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";

describe("acquireFileLock", () => {
  let tempDir: string;

  afterEach(async () => {
    if (tempDir) {
      await rm(tempDir, { recursive: true, force: true });
    }
  });

  async function makeTempDir() {
    tempDir = await mkdtemp(join(tmpdir(), "chatmem-lock-"));
    return tempDir;
  }

  it("creates the lock file and removes it on release", async () => {
    const lockPath = join(await makeTempDir(), "meta.lock");

    const release = await acquireFileLock(lockPath, { timeoutMs: 1000 });
    await expect(stat(lockPath)).resolves.toBeDefined();

    await release();
    await expect(stat(lockPath)).rejects.toThrow();
  });

  it("release tolerates a lock file that is already gone", async () => {
    const lockPath = join(await makeTempDir(), "meta.lock");
    const release = await acquireFileLock(lockPath);
    await rm(lockPath);
    await expect(release()).resolves.toBeUndefined();
  });

  it("second caller waits for the first to release", async () => {
    const lockPath = join(await makeTempDir(), "contention.lock");
    const order: number[] = [];

    const release1 = await acquireFileLock(lockPath, { timeoutMs: 2000 });
    order.push(1);

    const second = (async () => {
      const release2 = await acquireFileLock(lockPath, { timeoutMs: 2000, retryMs: 20 });
      order.push(2);
      await release2();
    })();

    await new Promise((r) => setTimeout(r, 100));
    await release1();
    order.push(3);

    await second;
    expect(order).toEqual([1, 3, 2]);
  });

  it("throws FileLockTimeoutError on timeout", async () => {
    const lockPath = join(await makeTempDir(), "timeout.lock");
    const release = await acquireFileLock(lockPath, { timeoutMs: 2000 });

    await expect(acquireFileLock(lockPath, { timeoutMs: 150, retryMs: 20 })).rejects.toBeInstanceOf(
      FileLockTimeoutError,
    );

    await release();
  });

  it("cleans a stale lock left by a dead process", async () => {
    const lockPath = join(await makeTempDir(), "stale.lock");
    await writeFile(lockPath, JSON.stringify({ pid: 999999, ts: Date.now() }), "utf-8");

    const release = await acquireFileLock(lockPath, { timeoutMs: 1000 });
    await release();
  });

  it("cleans a lock older than staleMs", async () => {
    const lockPath = join(await makeTempDir(), "aged.lock");
    await writeFile(lockPath, JSON.stringify({ pid: process.pid, ts: Date.now() - 60000 }), "utf-8");

    const release = await acquireFileLock(lockPath, { timeoutMs: 1000, staleMs: 100 });
    await release();
  });

  it("cleans a lock file with an unreadable payload", async () => {
    const lockPath = join(await makeTempDir(), "garbage.lock");
    await writeFile(lockPath, "not json", "utf-8");

    const release = await acquireFileLock(lockPath, { timeoutMs: 1000 });
    await release();
  });
});

describe("withFileLock", () => {
  let tempDir: string;

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it("releases the lock when fn throws", async () => {
    tempDir = await mkdtemp(join(tmpdir(), "chatmem-lock-"));
    const lockPath = join(tempDir, "meta.lock");

    await expect(
      withFileLock(lockPath, async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    await expect(stat(lockPath)).rejects.toThrow();
    await expect(withFileLock(lockPath, async () => "ok")).resolves.toBe("ok");
  });
});
