/**
 * Tests for the console logger and error helpers
 */

import { describe, test, expect, vi, afterEach } from "vitest";
import { MemoryError, attempt } from "../errors.js";
import { createConsoleLogger } from "../logger.js";

describe("createConsoleLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test("drops messages below the level and writes the rest to stderr", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const logger = createConsoleLogger("warn");

    logger.debug?.("noise");
    logger.info("noise");
    logger.warn("agent-recall: degraded");
    logger.error("agent-recall: store failed");

    expect(spy.mock.calls).toEqual([["[warn] agent-recall: degraded"], ["[error] agent-recall: store failed"]]);
  });

  test("silent writes nothing", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    createConsoleLogger("silent").error("x");
    expect(spy).not.toHaveBeenCalled();
  });
});

describe("attempt", () => {
  test("captures a MemoryError as a failed result", async () => {
    const error = new MemoryError("NotFound", "Memory not found: mem_1");
    await expect(attempt(() => Promise.reject(error))).resolves.toEqual({ ok: false, error });
  });

  test("passes values through", async () => {
    await expect(attempt(() => Promise.resolve(42))).resolves.toEqual({ ok: true, value: 42 });
  });

  test("rethrows anything else", async () => {
    const bug = new TypeError("x is undefined");
    await expect(attempt(() => Promise.reject(bug))).rejects.toBe(bug);
  });
});
