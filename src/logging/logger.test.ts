import { afterEach, describe, expect, it, vi } from "vitest";
import { createLogger, formatLine, isLogLevel, setLogLevel } from "./logger.js";

describe("logger", () => {
  afterEach(() => {
    setLogLevel("info");
    vi.restoreAllMocks();
  });

  it("accepts only the four level names", () => {
    expect(["debug", "info", "warn", "error"].every(isLogLevel)).toBe(true);
    expect(isLogLevel("toString")).toBe(false);
    expect(isLogLevel("constructor")).toBe(false);
    expect(isLogLevel("trace")).toBe(false);
  });

  it("renders fields as key=value", () => {
    expect(formatLine("Cache", "loaded", { records: 2, path: "/tmp/a b", error: new Error("boom") })).toBe(
      '[Cache] loaded records=2 path="/tmp/a b" error="boom"',
    );
    expect(formatLine("Cache", "empty")).toBe("[Cache] empty");
  });

  it("drops lines below the threshold", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const log = createLogger("Runner");

    setLogLevel("warn");
    log.info("hidden");
    log.warn("shown", { pass: 3 });

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith("[Runner] shown pass=3");
  });
});
