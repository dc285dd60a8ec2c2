import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readdir, readFile, rm, stat } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { isMissingFile, readTextIfExists, writeFileAtomic } from "./atomic-write.js";

describe("atomic-write", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "chatmem-atomic-"));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it("writes a new file and leaves no temp files behind", async () => {
    const target = join(tempDir, "summary.json");
    await writeFileAtomic(target, '{"text":"hi"}');

    expect(await readFile(target, "utf-8")).toBe('{"text":"hi"}');
    expect(await readdir(tempDir)).toEqual(["summary.json"]);
  });

  it("replaces existing content", async () => {
    const target = join(tempDir, "meta.json");
    await writeFileAtomic(target, "old");
    await writeFileAtomic(target, "new");
    expect(await readFile(target, "utf-8")).toBe("new");
  });

  it("applies owner-only permissions by default", async () => {
    if (process.platform === "win32") return;
    const target = join(tempDir, "meta.json");
    await writeFileAtomic(target, "{}");
    const info = await stat(target);
    expect(info.mode & 0o777).toBe(0o600);
  });

  it("rejects when the parent directory does not exist", async () => {
    const target = join(tempDir, "missing", "meta.json");
    await expect(writeFileAtomic(target, "{}")).rejects.toSatisfy(isMissingFile);
  });

  it("readTextIfExists returns null for a missing file", async () => {
    await expect(readTextIfExists(join(tempDir, "nope.json"))).resolves.toBeNull();
  });

  it("readTextIfExists returns file contents", async () => {
    const target = join(tempDir, "meta.json");
    await writeFileAtomic(target, "привет");
    await expect(readTextIfExists(target)).resolves.toBe("привет");
  });

  it("readTextIfExists propagates errors other than a missing file", async () => {
    await expect(readTextIfExists(tempDir)).rejects.toMatchObject({ code: "EISDIR" });
  });

  it("isMissingFile only matches ENOENT", () => {
    expect(isMissingFile({ code: "ENOENT" })).toBe(true);
    expect(isMissingFile({ code: "EACCES" })).toBe(false);
    expect(isMissingFile(new Error("ENOENT"))).toBe(false);
    expect(isMissingFile(null)).toBe(false);
  });
});
