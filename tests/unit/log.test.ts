import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { createLoggerWithCleanup, errorMessage } from "../../src/log.js";

describe("createLoggerWithCleanup()", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "relay-log-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("writes JSON lines to the log file and flushes them on close", async () => {
    const filePath = path.join(tempDir, "logs", "relay.log");
    const { logger, close } = createLoggerWithCleanup("info", filePath, "debug", { console: false });

    logger.debug({ channel: "/a" }, "Relay bound");
    logger.trace("not written");
    await close();

    const lines = (await fs.readFile(filePath, "utf-8")).trim().split("\n");
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({ level: 20, channel: "/a", msg: "Relay bound" });
  });

  it("closes immediately without a file", async () => {
    const { close } = createLoggerWithCleanup("silent");
    await expect(close()).resolves.toBeUndefined();
  });
});

describe("errorMessage()", () => {
  it("reads messages from errors and stringifies anything else", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage("plain")).toBe("plain");
    expect(errorMessage(42)).toBe("42");
  });
});
