import { afterEach, describe, expect, it, vi } from "vitest";
import { runCli } from "../src/cli.js";

describe("runCli", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should print help", async () => {
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    expect(await runCli(["--help"])).toBe(0);
    expect(logSpy).toHaveBeenCalledWith("Usage: chatmem <command> [options]");
    expect(logSpy).toHaveBeenCalledWith("  status   Show message count and summary state of a conversation");
  });

  it("should route to a subcommand", async () => {
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    expect(await runCli(["version"])).toBe(0);
    expect(logSpy).toHaveBeenCalledWith("chatmem v0.1.0");
  });

  it("should reject an unknown command", async () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    expect(await runCli(["deploy"])).toBe(1);
    expect(errorSpy).toHaveBeenCalledWith("Unknown command: deploy");
    expect(errorSpy).toHaveBeenCalledWith("Available commands: chat, status, reset, version");
  });
});
